import { chromium, errors } from 'playwright-core';
import type { Page } from 'playwright-core';
import type { BrowserEngine } from './types.js';

// ── Engine Adapter ──

/** Playwright's Chromium driver behind the session controller's engine seam. */
export const playwrightEngine: BrowserEngine<Page> = {
  connectOverCDP: async (endpoint, timeoutMs) => await chromium.connectOverCDP(endpoint, { timeout: timeoutMs }),
  launchPersistent: async (userDataDir, opts) => await chromium.launchPersistentContext(userDataDir, opts),
};

// ── Error Helpers ──

export function isTimeoutError(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

/** Rewrite Playwright's locator errors into something an operator can act on. */
export function toFriendlyError(error: unknown, what: string): Error {
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes('strict mode violation')) {
    const countMatch = message.match(/resolved to (\d+) elements/);
    const count = countMatch?.[1] ?? 'multiple';
    return new Error(`${what} matched ${count} elements on the page`, { cause: error });
  }
  if (isTimeoutError(error) || message.includes('waiting for')) {
    return new Error(`${what} not found or not visible`, { cause: error });
  }
  if (message.includes('intercepts pointer events') || message.includes('not receive pointer events')) {
    return new Error(`${what} is covered by another element`, { cause: error });
  }
  if (message.includes('Target page, context or browser has been closed')) {
    return new Error(`Browser closed while working on ${what}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(message);
}
