import type { Timeouts } from '../config.js';
import { NavigationError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PortalPage, PortalSelectors } from '../types.js';
import { isIdentityProviderUrl } from './login.js';
import { isVisibleWithin, settle, waitForOverlayGone, waitForNetworkIdle } from './wait.js';

export interface NavigatorContext {
  page: PortalPage;
  selectors: PortalSelectors;
  timeouts: Timeouts;
  logger: Logger;
}

function assertNotRedirected(page: PortalPage, selectors: PortalSelectors): void {
  if (isIdentityProviderUrl(page.url(), selectors.identityProviderPatterns)) {
    throw new NavigationError(`Redirected to login (${page.url()})`);
  }
}

/**
 * Bring the portal to the results section of one patient from whatever state it is in.
 * Every step runs only when its element is on screen. A step that lands on the identity
 * provider ends the navigation with a `NavigationError`.
 */
export async function navigateToResultsTable(ctx: NavigatorContext, identifier: string): Promise<void> {
  const { page, selectors, timeouts, logger } = ctx;

  await waitForOverlayGone(page, selectors.overlay, timeouts.overlayMs);

  const search = page.locator(selectors.searchInput).first();
  if (await isVisibleWithin(search, timeouts.presenceMs)) {
    logger.debug('Search form visible, searching patient');
    await search.fill(identifier);
    await waitForOverlayGone(page, selectors.overlay, timeouts.overlayMs);
    await page.getByRole('button', { name: selectors.searchButton }).first().click();
    await waitForNetworkIdle(page, timeouts.pageMs);
    await waitForOverlayGone(page, selectors.overlay, timeouts.overlayMs);
    assertNotRedirected(page, selectors);
  }

  const enter = page.getByRole('button', { name: selectors.enterRecordButton });
  if (await isVisibleWithin(enter, timeouts.presenceMs)) {
    logger.debug('Entering patient record');
    await enter.first().click();
    await settle(page, selectors.overlay, timeouts);
    assertNotRedirected(page, selectors);
  }

  const exactTab = page.getByText(selectors.sectionTab, { exact: true });
  const partialTab = page.getByText(selectors.sectionTab);
  let tab = exactTab;
  if (!await isVisibleWithin(exactTab, timeouts.pageMs)) {
    if (!await isVisibleWithin(partialTab, timeouts.presenceMs)) {
      throw new NavigationError(`Section "${selectors.sectionTab}" not found on ${page.url()}`);
    }
    tab = partialTab;
  }
  await tab.first().click();
  await settle(page, selectors.overlay, timeouts);
  assertNotRedirected(page, selectors);
}
