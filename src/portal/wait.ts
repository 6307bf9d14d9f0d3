import { isTimeoutError } from '../connection.js';
import type { PortalLocator, PortalPage } from '../types.js';

/** Whether the first match becomes visible within `timeoutMs`. Only a timeout reads as "no". */
export async function isVisibleWithin(locator: PortalLocator, timeoutMs: number): Promise<boolean> {
  try {
    await locator.first().waitFor({ state: 'visible', timeout: timeoutMs });
    return true;
  } catch (err) {
    if (isTimeoutError(err)) return false;
    throw err;
  }
}

/** Wait for the loading overlay to go away. A page without one is already done. */
export async function waitForOverlayGone(page: PortalPage, selector: string, timeoutMs: number): Promise<boolean> {
  const overlay = page.locator(selector).first();
  if (await overlay.count() === 0) return true;
  try {
    await overlay.waitFor({ state: 'hidden', timeout: timeoutMs });
    return true;
  } catch (err) {
    if (isTimeoutError(err)) return false;
    throw err;
  }
}

/** Network-idle with a bound; SPAs that keep polling never reach it, which is not an error. */
export async function waitForNetworkIdle(page: PortalPage, timeoutMs: number): Promise<boolean> {
  try {
    await page.waitForLoadState('networkidle', { timeout: timeoutMs });
    return true;
  } catch (err) {
    if (isTimeoutError(err)) return false;
    throw err;
  }
}

/** Network-idle, then the overlay: the settle step after every click. */
export async function settle(page: PortalPage, overlaySelector: string, timeouts: { pageMs: number; overlayMs: number }): Promise<void> {
  await waitForNetworkIdle(page, timeouts.pageMs);
  await waitForOverlayGone(page, overlaySelector, timeouts.overlayMs);
}
