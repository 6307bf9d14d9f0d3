import fs from 'node:fs';
import path from 'node:path';
import { NEVER_CANCELLED, type CancellationToken } from './cancel.js';
import { describeError } from './errors.js';
import { runStamp, type Logger } from './logger.js';
import type { PatientProcessor } from './portal/client.js';
import type { DocumentResult, DocumentSink, Mailbox, NotificationRecord, RunSummary } from './types.js';

export interface RunOptions {
  mailbox: Mailbox;
  sink: DocumentSink;
  processor: PatientProcessor;
  logger: Logger;
  /** Where `summary_<stamp>.json` is written */
  logDir: string;
  /** 0 processes every pending record */
  maxRecords?: number;
  allowedTypes?: ReadonlySet<string>;
  cancel?: CancellationToken;
  stamp?: string;
}

export function emptySummary(): RunSummary {
  return {
    recordsFound: 0,
    recordsProcessed: 0,
    recordsFailed: 0,
    documentsDownloaded: 0,
    documentsPersisted: 0,
    documentsSkipped: 0,
    documentsFailed: 0,
    interrupted: false,
  };
}

/** Hand one patient's results to the sink. Returns true when every document made it. */
async function persistResults(
  results: DocumentResult[],
  record: NotificationRecord,
  sink: DocumentSink,
  summary: RunSummary,
  log: Logger,
): Promise<boolean> {
  let complete = true;
  for (const result of results) {
    if (result.skipped) {
      summary.documentsSkipped++;
      continue;
    }
    if (result.error !== undefined || result.downloadPath === undefined) {
      summary.documentsFailed++;
      complete = false;
      continue;
    }
    summary.documentsDownloaded++;
    let finalPath: string | null;
    try {
      finalPath = await sink.accept({ result, record });
    } catch (err) {
      log.error({ classification: result.classification, err: describeError(err) }, 'Persisting document failed');
      finalPath = null;
    }
    if (finalPath) {
      summary.documentsPersisted++;
    } else {
      complete = false;
      log.warn({ classification: result.classification, file: result.downloadPath }, 'Document not persisted');
    }
  }
  return complete;
}

async function writeSummary(logDir: string, stamp: string, summary: RunSummary, log: Logger): Promise<void> {
  const file = path.join(logDir, `summary_${stamp}.json`);
  try {
    await fs.promises.mkdir(logDir, { recursive: true });
    await fs.promises.writeFile(file, JSON.stringify({ ...summary, finishedAt: new Date().toISOString() }, null, 2));
    log.debug({ file }, 'Summary written');
  } catch (err) {
    log.error({ file, err: describeError(err) }, 'Writing run summary failed');
  }
}

/**
 * One mailbox-driven batch: fetch records, open the session, wait for login, then process the
 * records in order. A record is marked handled only when none of its documents failed.
 * Session-level errors abort the run after the session is closed.
 */
export async function runProcessing(opts: RunOptions): Promise<RunSummary> {
  const { mailbox, sink, processor } = opts;
  const cancel = opts.cancel ?? NEVER_CANCELLED;
  const log = opts.logger.child({ component: 'run' });
  const stamp = opts.stamp ?? runStamp();
  const summary = emptySummary();

  const pending = await mailbox.fetchPending();
  summary.recordsFound = pending.length;
  const records = opts.maxRecords && opts.maxRecords > 0 ? pending.slice(0, opts.maxRecords) : pending;
  log.info({ found: pending.length, selected: records.length }, 'Notification records fetched');

  if (records.length === 0) {
    await writeSummary(opts.logDir, stamp, summary, log);
    return summary;
  }

  try {
    await processor.start();
    if (await processor.waitForManualLogin(cancel) === 'cancelled') {
      summary.interrupted = true;
    } else {
      for (const record of records) {
        if (cancel.cancelled) {
          summary.interrupted = true;
          break;
        }
        const recordLog = log.child({ patient: record.patientName, record: record.id });
        const outcome = await processor.processPatient(record, {
          cancel,
          ...(opts.allowedTypes ? { allowedTypes: opts.allowedTypes } : {}),
        });
        summary.recordsProcessed++;

        const complete = await persistResults(outcome.results, record, sink, summary, recordLog);
        if (outcome.interrupted) {
          summary.interrupted = true;
          break;
        }
        if (!complete) {
          summary.recordsFailed++;
          recordLog.warn('Record left pending: some documents failed');
          continue;
        }
        try {
          await mailbox.markHandled(record.id);
        } catch (err) {
          summary.recordsFailed++;
          recordLog.error({ err: describeError(err) }, 'Could not mark record as handled');
        }
      }
    }
  } finally {
    await processor.stop();
    try {
      await sink.finish();
    } catch (err) {
      log.error({ err: describeError(err) }, 'Finishing document sink failed');
    }
  }

  if (summary.interrupted) log.warn('Interrupted by user');
  log.info({
    processed: summary.recordsProcessed,
    downloaded: summary.documentsDownloaded,
    skipped: summary.documentsSkipped,
    failed: summary.documentsFailed,
  }, 'Run finished');
  await writeSummary(opts.logDir, stamp, summary, log);
  return summary;
}
