import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { Timeouts } from '../config.js';
import { toFriendlyError } from '../connection.js';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { DocumentResult, PortalLocator, PortalPage, PortalSelectors, TableSchema } from '../types.js';
import { isIdentityProviderUrl } from './login.js';
import { CLICKABLE_IN_CELL } from './selectors.js';
import { dataRows, resultsTable, waitForResultsTable } from './table.js';
import { isVisibleWithin, settle } from './wait.js';

export const MAX_DOWNLOAD_ATTEMPTS = 2;

/**
 * Two-attempt policy around one row. `attempt` returns the saved file; `recover` runs between
 * the attempts; `onGiveUp` runs after the last failure. Failures come back as data.
 */
export async function downloadWithRetry(opts: {
  label: string;
  classification: string;
  attempt: () => Promise<string>;
  recover: () => Promise<void>;
  onGiveUp: () => Promise<void>;
  logger: Logger;
}): Promise<DocumentResult> {
  const { label, classification, logger } = opts;
  let lastError: unknown;

  for (let attempt = 1; attempt <= MAX_DOWNLOAD_ATTEMPTS; attempt++) {
    try {
      const downloadPath = await opts.attempt();
      logger.info({ row: label, classification, file: path.basename(downloadPath) }, 'Document downloaded');
      return { classification, skipped: false, downloadPath };
    } catch (err) {
      lastError = err;
      if (attempt === MAX_DOWNLOAD_ATTEMPTS) break;
      logger.warn({ row: label, classification, attempt, err: describeError(err) }, 'Download failed, reloading and retrying');
      try {
        await opts.recover();
      } catch (recoverErr) {
        logger.warn({ row: label, err: describeError(recoverErr) }, 'Reload before retry failed');
      }
    }
  }

  const error = describeError(lastError) || 'Download failed';
  logger.error({ row: label, classification, err: error }, 'Download failed after retry');
  try {
    await opts.onGiveUp();
  } catch (giveUpErr) {
    logger.debug({ row: label, err: describeError(giveUpErr) }, 'Post-failure hook failed');
  }
  return { classification, skipped: false, error };
}

// ── Page ──

export interface DownloadContext {
  page: PortalPage;
  selectors: PortalSelectors;
  timeouts: Timeouts;
  downloadDir: string;
  logger: Logger;
  /** Best-effort diagnostic capture, keyed by row label */
  screenshot: (label: string) => Promise<void>;
  /** Runs when the retry reload lands on the identity provider: wait for login and reopen the results. */
  reopenAfterLogin: () => Promise<void>;
}

async function clickTarget(cell: PortalLocator): Promise<PortalLocator> {
  const clickable = cell.locator(CLICKABLE_IN_CELL).first();
  return await clickable.count() > 0 ? clickable : cell;
}

async function clickAndConfirm(ctx: DownloadContext, target: PortalLocator): Promise<void> {
  await target.click();
  const confirm = ctx.page.getByRole('button', { name: ctx.selectors.confirmButton });
  if (await isVisibleWithin(confirm, ctx.timeouts.confirmMs)) {
    await confirm.first().click();
  }
}

async function attemptDownload(ctx: DownloadContext, rowIndex: number, schema: TableSchema): Promise<string> {
  const { page, selectors, timeouts } = ctx;
  const table = resultsTable(page, selectors.typeHeaderLabel);
  const cells = dataRows(page, table).nth(rowIndex).locator('td');
  const cell = schema.actionIndex !== undefined ? cells.nth(schema.actionIndex) : cells.last();

  try {
    const target = await clickTarget(cell);
    const [download] = await Promise.all([
      page.waitForEvent('download', { timeout: timeouts.downloadMs }),
      clickAndConfirm(ctx, target),
    ]);
    const extension = path.extname(download.suggestedFilename()) || '.pdf';
    const dest = path.join(ctx.downloadDir, `row${rowIndex + 1}_${uuidv4()}${extension}`);
    await download.saveAs(dest);
    return dest;
  } catch (err) {
    throw toFriendlyError(err, `Download control of row ${rowIndex + 1}`);
  }
}

async function reloadTable(ctx: DownloadContext): Promise<void> {
  await ctx.page.reload({ waitUntil: 'domcontentloaded' });
  await settle(ctx.page, ctx.selectors.overlay, ctx.timeouts);
  if (isIdentityProviderUrl(ctx.page.url(), ctx.selectors.identityProviderPatterns)) {
    ctx.logger.warn('Session expired during download, waiting for login');
    await ctx.reopenAfterLogin();
  }
  await waitForResultsTable(ctx.page, ctx.selectors.typeHeaderLabel, ctx.timeouts.pageMs);
}

/** Download the document of one data row. Never throws. */
export async function downloadRow(ctx: DownloadContext, opts: {
  rowIndex: number;
  schema: TableSchema;
  classification: string;
  label: string;
}): Promise<DocumentResult> {
  return await downloadWithRetry({
    label: opts.label,
    classification: opts.classification,
    logger: ctx.logger,
    attempt: () => attemptDownload(ctx, opts.rowIndex, opts.schema),
    recover: () => reloadTable(ctx),
    onGiveUp: () => ctx.screenshot(opts.label),
  });
}
