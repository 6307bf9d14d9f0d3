import path from 'node:path';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PortalPage } from '../types.js';

export function screenshotFileName(label: string): string {
  const safe = label.replace(/[^\p{L}\p{N}_-]+/gu, '_').replace(/^_+|_+$/g, '') || 'page';
  return `debug_${safe}.png`;
}

/** Best-effort diagnostic screenshot. Returns the file path, or null when it could not be taken. */
export async function saveDebugScreenshot(page: PortalPage, opts: { logDir: string; label: string; logger: Logger }): Promise<string | null> {
  const file = path.join(opts.logDir, screenshotFileName(opts.label));
  try {
    await page.screenshot({ path: file, fullPage: true });
    opts.logger.debug({ file }, 'Debug screenshot saved');
    return file;
  } catch (err) {
    opts.logger.debug({ label: opts.label, err: describeError(err) }, 'Debug screenshot failed');
    return null;
  }
}
