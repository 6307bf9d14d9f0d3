import { format } from 'date-fns';
import type { Page } from 'playwright-core';
import { NEVER_CANCELLED, type CancellationToken } from '../cancel.js';
import { saveDebugScreenshot } from '../capture/screenshot.js';
import { HttpEndpointProbe, PlaywrightEngineInstaller, type Sleep } from '../chrome-launcher.js';
import type { AppConfig, Timeouts } from '../config.js';
import { playwrightEngine } from '../connection.js';
import { ConnectionError, NavigationError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { systemLaunchOverride } from '../platform/launch-override.js';
import { SystemProcessControl } from '../platform/processes.js';
import { SystemBrowserRegistration } from '../platform/registration.js';
import { SessionController, type SessionPlatform } from '../session.js';
import type {
  DocumentResult,
  FilterCriteria,
  NotificationRecord,
  PatientOutcome,
  PortalPage,
  PortalSelectors,
  RowDecision,
  RowRecord,
  TableSchema,
} from '../types.js';
import { downloadRow, type DownloadContext } from './download.js';
import { distinctFacilities, selectMostRecentRows, selectRows } from './filter.js';
import { isIdentityProviderUrl, isOnPortal, waitForPortalReturn, type LoginWaitOutcome } from './login.js';
import { navigateToResultsTable } from './navigator.js';
import { DEFAULT_SELECTORS, patientDeepLink } from './selectors.js';
import { scrapeResultsTable } from './table.js';
import { settle } from './wait.js';

const SESSION_EXPIRED = 'Session expired: login not completed';

/** What a batch run needs from the portal side. */
export interface PatientProcessor {
  start(): Promise<void>;
  stop(): Promise<void>;
  waitForManualLogin(cancel?: CancellationToken): Promise<LoginWaitOutcome>;
  processPatient(record: NotificationRecord, opts?: { cancel?: CancellationToken; allowedTypes?: ReadonlySet<string> }): Promise<PatientOutcome>;
}

/** The part of `SessionController` the client drives. */
export type PortalSession = Pick<SessionController<PortalPage>, 'start' | 'stop' | 'ensureAlive'>;

export interface PortalClientOptions {
  session: PortalSession;
  portalUrl: string;
  downloadDir: string;
  logDir: string;
  timeouts: Timeouts;
  logger: Logger;
  selectors?: PortalSelectors;
  sleep?: Sleep;
  now?: () => number;
}

export interface AllDatesOptions {
  cancel?: CancellationToken;
  /** Called with the distinct facilities of the table, before any download */
  onFacilitiesFound?: (facilities: string[]) => void;
  /** Used in log lines and screenshot names; defaults to the identifier */
  label?: string;
}

/**
 * Per-patient operations on the portal, on top of one `SessionController`.
 *
 * @example
 * ```ts
 * const client = PortalClient.create(loadConfig(), logger);
 * await client.start();
 * await client.waitForManualLogin();
 * const { results } = await client.processPatientAllDates('RSSMRA80A01F205X', {
 *   allowedTypes: new Set(['REFERTO']),
 * });
 * await client.stop();
 * ```
 */
export class PortalClient implements PatientProcessor {
  private readonly session: PortalSession;
  private readonly opts: PortalClientOptions;
  private readonly selectors: PortalSelectors;
  private readonly logger: Logger;

  constructor(opts: PortalClientOptions) {
    this.session = opts.session;
    this.opts = opts;
    this.selectors = opts.selectors ?? DEFAULT_SELECTORS;
    this.logger = opts.logger.child({ component: 'portal' });
  }

  /** Wire the client to the real browser, OS registration and process table. */
  static create(config: AppConfig, logger: Logger): PortalClient {
    const platform: SessionPlatform = {
      registration: new SystemBrowserRegistration(),
      probe: new HttpEndpointProbe(),
      processes: new SystemProcessControl(),
      launchOverride: systemLaunchOverride(),
      installer: new PlaywrightEngineInstaller(logger),
    };
    const session = new SessionController<Page>({
      engine: playwrightEngine,
      platform,
      logger,
      channel: config.channel,
      useExistingBrowser: config.useExistingBrowser,
      port: config.cdpPort,
      headless: config.headless,
      userDataDir: config.browserDataDir,
      downloadsPath: config.downloadDir,
      pageTimeoutMs: config.timeouts.pageMs,
      attachTimeoutMs: config.timeouts.attachMs,
      attachPollMs: config.timeouts.attachPollMs,
    });
    return new PortalClient({
      session,
      portalUrl: config.portalUrl,
      downloadDir: config.downloadDir,
      logDir: config.logDir,
      timeouts: config.timeouts,
      logger,
    });
  }

  async start(): Promise<void> {
    await this.session.start();
  }

  async stop(): Promise<void> {
    await this.session.stop();
    this.logger.info('Browser session closed');
  }

  /** Open the portal and give the operator up to the login timeout to authenticate. */
  async waitForManualLogin(cancel: CancellationToken = NEVER_CANCELLED): Promise<LoginWaitOutcome> {
    const page = await this.session.ensureAlive();
    const { timeouts } = this.opts;
    await page.goto(this.opts.portalUrl, { waitUntil: 'domcontentloaded', timeout: timeouts.pageMs });
    await settle(page, this.selectors.overlay, timeouts);

    if (isOnPortal(page.url(), this.opts.portalUrl, this.selectors.identityProviderPatterns)) {
      this.logger.info('Already authenticated');
      return 'returned';
    }
    this.logger.info({ timeoutSeconds: Math.round(timeouts.loginMs / 1000) }, 'Complete the login in the browser window');
    const outcome = await waitForPortalReturn({
      readUrl: () => page.url(),
      portalUrl: this.opts.portalUrl,
      patterns: this.selectors.identityProviderPatterns,
      timeoutMs: timeouts.loginMs,
      pollMs: timeouts.loginPollMs,
      cancel,
      logger: this.logger,
      ...this.clock(),
    });
    if (outcome === 'returned') this.logger.info('Login completed');
    return outcome;
  }

  /** Most-recent mode: open the record's deep link and download the latest visit's documents. */
  async processPatient(
    record: NotificationRecord,
    opts: { cancel?: CancellationToken; allowedTypes?: ReadonlySet<string> } = {},
  ): Promise<PatientOutcome> {
    const cancel = opts.cancel ?? NEVER_CANCELLED;
    const log = this.logger.child({ patient: record.patientName });
    const url = record.portalUrl || patientDeepLink(this.opts.portalUrl, record.identifier);
    log.info({ url }, 'Processing patient');

    return await this.collect(record.patientName, record.identifier, url, cancel, log, rows =>
      selectMostRecentRows(rows, opts.allowedTypes));
  }

  /** All-dates mode: every row of the table through the filter chain. */
  async processPatientAllDates(identifier: string, criteria: FilterCriteria = {}, opts: AllDatesOptions = {}): Promise<PatientOutcome> {
    const cancel = opts.cancel ?? NEVER_CANCELLED;
    const label = opts.label ?? identifier;
    const log = this.logger.child({ patient: label });
    const url = patientDeepLink(this.opts.portalUrl, identifier);
    log.info({ criteria: describeCriteria(criteria) }, 'Processing patient (all dates)');

    return await this.collect(label, identifier, url, cancel, log, rows => {
      opts.onFacilitiesFound?.(distinctFacilities(rows));
      return selectRows(rows, criteria);
    });
  }

  /** Distinct facility names in a patient's results, for a picklist. Reuses the live session. */
  async scanPatientFacilities(identifier: string): Promise<string[]> {
    const page = await this.session.ensureAlive();
    const log = this.logger.child({ patient: identifier });
    const opened = await this.openPatient(page, patientDeepLink(this.opts.portalUrl, identifier), identifier, NEVER_CANCELLED, log);
    if (!opened) return [];
    const { rows } = await scrapeResultsTable(page, { headerLabel: this.selectors.typeHeaderLabel, timeoutMs: this.opts.timeouts.pageMs });
    const facilities = distinctFacilities(rows);
    log.info({ count: facilities.length }, 'Facilities found');
    return facilities;
  }

  // ── Internals ──

  private async collect(
    label: string,
    identifier: string,
    url: string,
    cancel: CancellationToken,
    log: Logger,
    decide: (rows: RowRecord[]) => RowDecision[],
  ): Promise<PatientOutcome> {
    const page = await this.session.ensureAlive();
    let schema: TableSchema;
    let decisions: RowDecision[];
    try {
      if (!await this.openPatient(page, url, identifier, cancel, log)) {
        log.warn('Interrupted by user');
        return { results: [], interrupted: true };
      }
      const scraped = await scrapeResultsTable(page, {
        headerLabel: this.selectors.typeHeaderLabel,
        timeoutMs: this.opts.timeouts.pageMs,
      });
      log.info({ rows: scraped.rows.length, malformed: scraped.malformed.length }, 'Results table read');
      schema = scraped.schema;
      decisions = decide(scraped.rows);
    } catch (err) {
      return await this.patientFailure(page, label, err, log);
    }
    return await this.processDecisions(page, { label, identifier, url }, schema, decisions, cancel, log);
  }

  private async processDecisions(
    page: PortalPage,
    patient: { label: string; identifier: string; url: string },
    schema: TableSchema,
    decisions: RowDecision[],
    cancel: CancellationToken,
    log: Logger,
  ): Promise<PatientOutcome> {
    const ctx: DownloadContext = {
      page,
      selectors: this.selectors,
      timeouts: this.opts.timeouts,
      downloadDir: this.opts.downloadDir,
      logger: log,
      screenshot: async shotLabel => { await this.screenshot(page, shotLabel, log); },
      reopenAfterLogin: async () => {
        const reopened = await this.waitForRelogin(page, cancel, log) === 'returned'
          && await this.openPatient(page, patient.url, patient.identifier, cancel, log);
        if (!reopened) throw new NavigationError('Cancelled while waiting for login');
      },
    };

    const results: DocumentResult[] = [];
    for (const [i, decision] of decisions.entries()) {
      if (cancel.cancelled) {
        log.warn({ done: results.length, remaining: decisions.length - results.length }, 'Interrupted by user');
        return { results, interrupted: true };
      }
      const { row } = decision;
      if (decision.action === 'skip') {
        log.info({ row: row.index + 1, classification: row.type, reason: decision.reason }, 'Row skipped');
        results.push({ classification: row.type, skipped: true });
        continue;
      }
      const result = await downloadRow(ctx, {
        rowIndex: row.index,
        schema,
        classification: row.type,
        label: `${patient.label}_row${row.index + 1}`,
      });
      results.push(result);

      if (result.error !== undefined && this.onIdentityProvider(page)) {
        const rest = decisions.slice(i + 1);
        log.error({ remaining: rest.length }, 'Login not recovered, remaining rows abandoned');
        for (const left of rest) {
          results.push(left.action === 'skip'
            ? { classification: left.row.type, skipped: true }
            : { classification: left.row.type, skipped: false, error: SESSION_EXPIRED });
        }
        break;
      }
    }
    return { results, interrupted: false };
  }

  /**
   * Go to `url` and on to the results section. Landing on the identity provider, before or
   * during navigation, means the session expired: wait for the operator to log in again, then
   * start over once. Returns false when cancelled during that wait.
   */
  private async openPatient(page: PortalPage, url: string, identifier: string, cancel: CancellationToken, log: Logger): Promise<boolean> {
    const { timeouts } = this.opts;
    for (let pass = 0; pass < 2; pass++) {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeouts.pageMs });
      await settle(page, this.selectors.overlay, timeouts);

      if (await this.reachResultsTable(page, identifier, log)) return true;
      if (pass === 1) break;

      log.warn('Session expired, waiting for login');
      if (await this.waitForRelogin(page, cancel, log) === 'cancelled') return false;
    }
    throw new NavigationError(`Still redirected to login after re-authentication (${page.url()})`);
  }

  /** False when the browser is on, or ends up on, the identity provider. */
  private async reachResultsTable(page: PortalPage, identifier: string, log: Logger): Promise<boolean> {
    if (this.onIdentityProvider(page)) return false;
    try {
      await navigateToResultsTable({ page, selectors: this.selectors, timeouts: this.opts.timeouts, logger: log }, identifier);
    } catch (err) {
      if (!this.onIdentityProvider(page)) throw err;
      log.debug({ err: describeError(err) }, 'Navigation interrupted by a login redirect');
      return false;
    }
    return !this.onIdentityProvider(page);
  }

  private async waitForRelogin(page: PortalPage, cancel: CancellationToken, log: Logger): Promise<LoginWaitOutcome> {
    const { timeouts } = this.opts;
    return await waitForPortalReturn({
      readUrl: () => page.url(),
      portalUrl: this.opts.portalUrl,
      patterns: this.selectors.identityProviderPatterns,
      timeoutMs: timeouts.reloginMs,
      pollMs: timeouts.loginPollMs,
      cancel,
      logger: log,
      ...this.clock(),
    });
  }

  private clock(): { sleep?: Sleep; now?: () => number } {
    return {
      ...(this.opts.sleep ? { sleep: this.opts.sleep } : {}),
      ...(this.opts.now ? { now: this.opts.now } : {}),
    };
  }

  private onIdentityProvider(page: PortalPage): boolean {
    return isIdentityProviderUrl(page.url(), this.selectors.identityProviderPatterns);
  }

  private async screenshot(page: PortalPage, label: string, log: Logger): Promise<void> {
    await saveDebugScreenshot(page, { logDir: this.opts.logDir, label, logger: log });
  }

  /** Patient-level failure as a single "N/A" result. Session loss still aborts the run. */
  private async patientFailure(page: PortalPage, label: string, err: unknown, log: Logger): Promise<PatientOutcome> {
    if (err instanceof ConnectionError) throw err;
    const error = describeError(err) || 'Navigation failed';
    log.error({ err: error }, 'Patient processing failed');
    await this.screenshot(page, label, log);
    return { results: [{ classification: 'N/A', skipped: false, error }], interrupted: false };
  }
}

function describeCriteria(criteria: FilterCriteria): Record<string, unknown> {
  return {
    ...(criteria.allowedTypes ? { allowedTypes: [...criteria.allowedTypes] } : {}),
    ...(criteria.facility ? { facility: criteria.facility } : {}),
    ...(criteria.dateFrom ? { dateFrom: format(criteria.dateFrom, 'yyyy-MM-dd') } : {}),
    ...(criteria.dateTo ? { dateTo: format(criteria.dateTo, 'yyyy-MM-dd') } : {}),
  };
}
