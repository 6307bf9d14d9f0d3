import { isValid, parse } from 'date-fns';
import { createLogger, describeError, loadConfig, PortalClient, runStamp } from '../src/index.js';

// Usage: node examples/single-patient.js <identifier> [dd/MM/yyyy] [dd/MM/yyyy]
async function main() {
  const [identifier, from, to] = process.argv.slice(2);
  if (!identifier) {
    console.error('Usage: single-patient <identifier> [from] [to]');
    process.exitCode = 2;
    return;
  }

  const criteria = {
    ...(from ? { dateFrom: parseDay(from) } : {}),
    ...(to ? { dateTo: parseDay(to) } : {}),
  };
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, logDir: config.logDir, stamp: runStamp() });
  const client = PortalClient.create(config, logger);

  try {
    await client.start();
    if (await client.waitForManualLogin() === 'cancelled') return;

    const facilities = await client.scanPatientFacilities(identifier);
    logger.info({ facilities }, 'Facilities on record');

    const outcome = await client.processPatientAllDates(identifier, criteria);
    for (const result of outcome.results) {
      logger.info({ result }, 'Document');
    }
  } catch (err) {
    logger.error({ err: describeError(err) }, 'Run aborted');
    process.exitCode = 1;
  } finally {
    await client.stop();
  }
}

function parseDay(text: string): Date {
  const date = parse(text.trim(), 'dd/MM/yyyy', new Date());
  if (!isValid(date)) throw new Error(`Not a dd/MM/yyyy date: ${text}`);
  return date;
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
