import { describe, expect, it, vi } from 'vitest';
import { CancellationToken } from '../src/cancel.js';
import { ConnectionError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { PortalClient, type PortalSession } from '../src/portal/client.js';
import type { NotificationRecord } from '../src/types.js';
import {
  FakePortalPage,
  IDP_URL,
  PORTAL_URL,
  TAB,
  TEST_SELECTORS,
  TEST_TIMEOUTS,
  cellLink,
  portalShowing,
  type FakeTable,
} from './fake-portal.js';

const ROSSI: NotificationRecord = {
  id: 'msg-1',
  patientName: 'ROSSI MARIO',
  portalUrl: `${PORTAL_URL}#/?codiceFiscale=RSSMRA80A01F205X`,
  identifier: 'RSSMRA80A01F205X',
  subject: 'Nuovo referto disponibile - ROSSI MARIO',
};

const HEADERS = ['Data', 'Tipologia', 'Ente', 'Visualizza'];

const VISIT: FakeTable = {
  headers: HEADERS,
  rows: [
    ['10/05/2024', 'REFERTO SPECIALISTICO', 'ASST Milano', ''],
    ['10/05/2024', 'NON DISPONIBILE', 'ASST Milano', ''],
    ['02/03/2024', 'REFERTO', 'ASST Bergamo', ''],
  ],
};

const SAVED = /^\/downloads\/row\d+_[0-9a-f-]{36}\.pdf$/;

/** Client over a fake page; each login poll advances the clock and runs `afterSleep`. */
function setup(page: FakePortalPage) {
  const clock = { ms: 0, afterSleep: () => {} };
  const session = {
    start: vi.fn(async () => page),
    stop: vi.fn(async () => {}),
    ensureAlive: vi.fn(async () => page),
  } satisfies PortalSession;
  const client = new PortalClient({
    session,
    portalUrl: PORTAL_URL,
    downloadDir: '/downloads',
    logDir: '/logs',
    timeouts: TEST_TIMEOUTS,
    logger: silentLogger(),
    selectors: TEST_SELECTORS,
    sleep: async ms => {
      clock.ms += ms;
      clock.afterSleep();
    },
    now: () => clock.ms,
  });
  return { client, clock, session };
}

describe('PortalClient.processPatient', () => {
  it('downloads the latest visit and reports excluded rows as skipped', async () => {
    const page = portalShowing(VISIT);
    page.downloads = ['referto.pdf'];
    const { client } = setup(page);

    const outcome = await client.processPatient(ROSSI);

    expect(page.gotos).toEqual([ROSSI.portalUrl]);
    expect(outcome.interrupted).toBe(false);
    expect(outcome.results).toHaveLength(2);
    expect(outcome.results[0]).toMatchObject({ classification: 'REFERTO SPECIALISTICO', skipped: false });
    expect(outcome.results[0]?.downloadPath).toMatch(SAVED);
    expect(outcome.results[1]).toEqual({ classification: 'NON DISPONIBILE', skipped: true });
    expect(page.clicks).toEqual([TAB, cellLink(0, 'nth:3')]);
    expect(page.saved).toEqual([outcome.results[0]?.downloadPath]);
  });

  it('turns a navigation failure into one N/A result with a screenshot', async () => {
    const page = new FakePortalPage();
    const { client } = setup(page);

    const outcome = await client.processPatient(ROSSI);

    expect(outcome).toEqual({
      results: [{ classification: 'N/A', skipped: false, error: `Section "Referti" not found on ${ROSSI.portalUrl}` }],
      interrupted: false,
    });
    expect(page.screenshots).toEqual(['/logs/debug_ROSSI_MARIO.png']);
  });

  it('lets session loss through', async () => {
    const page = portalShowing(VISIT);
    page.onGoto = () => { throw new ConnectionError('Target page, context or browser has been closed'); };
    const { client } = setup(page);

    await expect(client.processPatient(ROSSI)).rejects.toBeInstanceOf(ConnectionError);
    expect(page.screenshots).toEqual([]);
  });

  it('waits for a new login when the deep link lands on the identity provider', async () => {
    const page = portalShowing(VISIT);
    page.downloads = ['referto.pdf'];
    page.onGoto = () => {
      if (page.gotos.length === 1) page.currentUrl = IDP_URL;
    };
    const { client, clock } = setup(page);
    clock.afterSleep = () => { page.currentUrl = PORTAL_URL; };

    const outcome = await client.processPatient(ROSSI);

    expect(clock.ms).toBe(2_000);
    expect(page.gotos).toEqual([ROSSI.portalUrl, ROSSI.portalUrl]);
    expect(outcome.results[0]?.downloadPath).toMatch(SAVED);
  });

  it('waits for a new login when navigation itself is redirected', async () => {
    const page = portalShowing(VISIT);
    page.downloads = ['referto.pdf'];
    let tabClicks = 0;
    page.on(TAB, () => {
      tabClicks++;
      if (tabClicks === 1) page.currentUrl = IDP_URL;
      else page.table = VISIT;
    });
    const { client, clock } = setup(page);
    clock.afterSleep = () => { page.currentUrl = PORTAL_URL; };

    const outcome = await client.processPatient(ROSSI);

    expect(tabClicks).toBe(2);
    expect(page.gotos).toHaveLength(2);
    expect(clock.ms).toBe(2_000);
    expect(outcome.results[0]).toMatchObject({ classification: 'REFERTO SPECIALISTICO', skipped: false });
    expect(outcome.results[0]?.error).toBeUndefined();
  });

  it('gives up on the patient after one re-login pass', async () => {
    const page = portalShowing(VISIT);
    page.onGoto = () => { page.currentUrl = IDP_URL; };
    const { client, clock } = setup(page);
    clock.afterSleep = () => { page.currentUrl = PORTAL_URL; };

    const outcome = await client.processPatient(ROSSI);

    expect(page.gotos).toHaveLength(2);
    expect(outcome.results).toEqual([{
      classification: 'N/A',
      skipped: false,
      error: `Still redirected to login after re-authentication (${IDP_URL})`,
    }]);
  });

  it('reports cancellation during the login wait as an interruption', async () => {
    const page = portalShowing(VISIT);
    page.onGoto = () => { page.currentUrl = IDP_URL; };
    const cancel = new CancellationToken();
    const { client, clock } = setup(page);
    clock.afterSleep = () => cancel.cancel();

    const outcome = await client.processPatient(ROSSI, { cancel });

    expect(outcome).toEqual({ results: [], interrupted: true });
    expect(page.gotos).toHaveLength(1);
  });
});

describe('PortalClient downloads', () => {
  it('clicks the last cell when no action column is found', async () => {
    const page = portalShowing({
      headers: ['Data', 'Tipologia', 'Struttura'],
      rows: [['10/05/2024', 'REFERTO', 'ASST Bergamo', '']],
    });
    page.linkInCell = false;
    page.downloads = ['referto.pdf'];
    const { client } = setup(page);
    const onFacilitiesFound = vi.fn();

    const outcome = await client.processPatientAllDates('RSSMRA80A01F205X', {}, { onFacilitiesFound });

    expect(page.gotos).toEqual([`${PORTAL_URL}#/?codiceFiscale=RSSMRA80A01F205X`]);
    expect(page.clicks).toEqual([TAB, 'table > tbody tr > nth:0 > td > last']);
    expect(onFacilitiesFound).toHaveBeenCalledWith(['ASST Bergamo']);
    expect(outcome.results[0]?.downloadPath).toMatch(SAVED);
  });

  it('returns the rows done so far when cancelled between rows', async () => {
    const page = portalShowing({
      headers: HEADERS,
      rows: [
        ['10/05/2024', 'REFERTO', 'ASST Milano', ''],
        ['11/05/2024', 'REFERTO', 'ASST Milano', ''],
        ['12/05/2024', 'REFERTO', 'ASST Milano', ''],
      ],
    });
    page.downloads = ['a.pdf', 'b.pdf', 'c.pdf'];
    const cancel = new CancellationToken();
    page.on(cellLink(0, 'nth:3'), () => cancel.cancel());
    const { client } = setup(page);

    const outcome = await client.processPatientAllDates('RSSMRA80A01F205X', {}, { cancel });

    expect(outcome.interrupted).toBe(true);
    expect(outcome.results).toHaveLength(1);
    expect(outcome.results[0]?.downloadPath).toMatch(SAVED);
    expect(page.downloads).toEqual(['b.pdf', 'c.pdf']);
  });

  it('logs in again when the retry reload lands on the identity provider', async () => {
    const page = portalShowing(VISIT);
    page.downloads = [new Error('net::ERR_ABORTED'), 'referto.pdf'];
    page.onReload = () => {
      page.currentUrl = IDP_URL;
      page.table = null;
    };
    const { client, clock } = setup(page);
    clock.afterSleep = () => { page.currentUrl = PORTAL_URL; };

    const outcome = await client.processPatient(ROSSI);

    expect(page.reloads).toBe(1);
    expect(clock.ms).toBe(2_000);
    expect(page.gotos).toEqual([ROSSI.portalUrl, ROSSI.portalUrl]);
    expect(outcome.results[0]?.downloadPath).toMatch(SAVED);
    expect(outcome.results[1]).toEqual({ classification: 'NON DISPONIBILE', skipped: true });
  });

  it('abandons the remaining rows when the login is not recovered', async () => {
    const page = portalShowing({
      headers: HEADERS,
      rows: [
        ['10/05/2024', 'REFERTO', 'ASST Milano', ''],
        ['10/05/2024', 'NON DISPONIBILE', 'ASST Milano', ''],
        ['10/05/2024', 'REFERTO', 'ASST Milano', ''],
      ],
    });
    page.downloads = [new Error('net::ERR_ABORTED'), new Error('net::ERR_ABORTED')];
    page.onReload = () => { page.currentUrl = IDP_URL; };
    const { client, clock } = setup(page);

    const outcome = await client.processPatient(ROSSI);

    expect(clock.ms).toBe(TEST_TIMEOUTS.reloginMs);
    expect(outcome.interrupted).toBe(false);
    expect(outcome.results).toEqual([
      { classification: 'REFERTO', skipped: false, error: 'net::ERR_ABORTED' },
      { classification: 'NON DISPONIBILE', skipped: true },
      { classification: 'REFERTO', skipped: false, error: 'Session expired: login not completed' },
    ]);
    expect(page.reloads).toBe(1);
    expect(page.screenshots).toEqual(['/logs/debug_ROSSI_MARIO_row1.png']);
  });
});

describe('PortalClient login and scan', () => {
  it('returns at once when already authenticated', async () => {
    const page = new FakePortalPage();
    const { client, clock } = setup(page);

    expect(await client.waitForManualLogin()).toBe('returned');
    expect(page.gotos).toEqual([PORTAL_URL]);
    expect(clock.ms).toBe(0);
  });

  it('polls until the operator is back from the identity provider', async () => {
    const page = new FakePortalPage();
    page.onGoto = () => { page.currentUrl = IDP_URL; };
    const { client, clock } = setup(page);
    clock.afterSleep = () => {
      if (clock.ms >= 6_000) page.currentUrl = `${PORTAL_URL}#/home`;
    };

    expect(await client.waitForManualLogin()).toBe('returned');
    expect(clock.ms).toBe(6_000);
  });

  it('lists the facilities of a patient', async () => {
    const page = portalShowing(VISIT);
    const { client } = setup(page);

    expect(await client.scanPatientFacilities('RSSMRA80A01F205X')).toEqual(['ASST Bergamo', 'ASST Milano']);
  });
});
