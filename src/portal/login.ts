import type { CancellationToken } from '../cancel.js';
import { sleep as realSleep, type Sleep } from '../chrome-launcher.js';
import { LoginTimeoutError } from '../errors.js';
import type { Logger } from '../logger.js';

function hostOf(url: string): string | null {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return null;
  }
}

export function isIdentityProviderUrl(url: string, patterns: RegExp[]): boolean {
  return patterns.some(p => p.test(url));
}

/** On the portal's own host and not on one of its login pages. */
export function isOnPortal(url: string, portalUrl: string, patterns: RegExp[]): boolean {
  const host = hostOf(url);
  return host !== null && host === hostOf(portalUrl) && !isIdentityProviderUrl(url, patterns);
}

export type LoginWaitOutcome = 'returned' | 'cancelled';

/**
 * Poll the current URL until the browser is back on the portal. Throws `LoginTimeoutError`
 * when `timeoutMs` runs out; returns `'cancelled'` when the token fires first.
 */
export async function waitForPortalReturn(opts: {
  readUrl: () => string;
  portalUrl: string;
  patterns: RegExp[];
  timeoutMs: number;
  pollMs: number;
  cancel?: CancellationToken;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}): Promise<LoginWaitOutcome> {
  const wait = opts.sleep ?? realSleep;
  const now = opts.now ?? Date.now;
  const deadline = now() + opts.timeoutMs;
  let lastLogged = 0;

  for (;;) {
    if (opts.cancel?.cancelled) return 'cancelled';
    const url = opts.readUrl();
    if (isOnPortal(url, opts.portalUrl, opts.patterns)) return 'returned';

    const remaining = deadline - now();
    if (remaining <= 0) throw new LoginTimeoutError(opts.timeoutMs);
    if (opts.logger && now() - lastLogged >= 30_000) {
      opts.logger.info({ remainingSeconds: Math.round(remaining / 1000) }, 'Waiting for login');
      lastLogged = now();
    }
    await wait(Math.min(opts.pollMs, remaining));
  }
}
