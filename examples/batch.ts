import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  CancellationToken,
  createLogger,
  describeError,
  loadConfig,
  PortalClient,
  runProcessing,
  runStamp,
  type DocumentSink,
  type Mailbox,
  type NotificationRecord,
} from '../src/index.js';

const recordFile = z.array(z.object({
  id: z.string().min(1),
  patientName: z.string(),
  portalUrl: z.string().default(''),
  identifier: z.string().min(1),
  subject: z.string().default(''),
  handled: z.boolean().default(false),
}));

type StoredRecord = z.infer<typeof recordFile>[number];

/** Records kept in a JSON file; handled ids are written back to it. */
class JsonFileMailbox implements Mailbox {
  constructor(private readonly file: string) {}

  private async read(): Promise<StoredRecord[]> {
    return recordFile.parse(JSON.parse(await fs.promises.readFile(this.file, 'utf8')));
  }

  async fetchPending(): Promise<NotificationRecord[]> {
    const entries = await this.read();
    return entries
      .filter(entry => !entry.handled)
      .map(({ handled: _handled, ...record }) => record);
  }

  async markHandled(id: string): Promise<void> {
    const next = (await this.read()).map(entry => entry.id === id ? { ...entry, handled: true } : entry);
    await fs.promises.writeFile(this.file, JSON.stringify(next, null, 2));
  }
}

/** Moves each download to `<archive>/<PATIENT>/<type>_<n>.pdf`. */
class ArchiveSink implements DocumentSink {
  private count = 0;

  constructor(private readonly archiveDir: string) {}

  async accept({ result, record }: Parameters<DocumentSink['accept']>[0]): Promise<string | null> {
    if (!result.downloadPath) return null;
    const dir = path.join(this.archiveDir, record.patientName.replace(/[^\p{L}\p{N}]+/gu, '_'));
    await fs.promises.mkdir(dir, { recursive: true });
    const target = path.join(dir, `${result.classification.replace(/[^\p{L}\p{N}]+/gu, '_')}_${++this.count}${path.extname(result.downloadPath)}`);
    await fs.promises.rename(result.downloadPath, target);
    return target;
  }

  async finish(): Promise<void> {}
}

async function main() {
  const config = loadConfig();
  const stamp = runStamp();
  const logger = createLogger({ level: config.logLevel, logDir: config.logDir, stamp });
  const cancel = new CancellationToken();
  process.once('SIGINT', () => cancel.cancel());

  try {
    const summary = await runProcessing({
      mailbox: new JsonFileMailbox(process.argv[2] ?? 'records.json'),
      sink: new ArchiveSink(path.join(config.downloadDir, 'archive')),
      processor: PortalClient.create(config, logger),
      logger,
      logDir: config.logDir,
      maxRecords: config.maxRecords,
      cancel,
      stamp,
    });
    process.exitCode = summary.recordsFailed > 0 ? 1 : 0;
  } catch (err) {
    logger.error({ err: describeError(err) }, 'Run aborted');
    process.exitCode = 1;
  }
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
