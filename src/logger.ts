import fs from 'node:fs';
import path from 'node:path';
import { format } from 'date-fns';
import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/** Timestamp used in log, summary and screenshot file names. */
export function runStamp(date = new Date()): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

/**
 * Create the root logger. With a `logDir`, every record is also appended to
 * `<logDir>/processing_<stamp>.log` at debug level.
 */
export function createLogger(opts: { level?: LogLevel; logDir?: string; stamp?: string } = {}): Logger {
  const level = opts.level ?? 'info';
  if (!opts.logDir || level === 'silent') return pino({ level });

  fs.mkdirSync(opts.logDir, { recursive: true });
  const file = path.join(opts.logDir, `processing_${opts.stamp ?? runStamp()}.log`);
  const streams = pino.multistream([
    { level, stream: process.stdout },
    { level: 'debug', stream: pino.destination({ dest: file, sync: false, mkdir: true }) },
  ]);
  return pino({ level: level === 'trace' ? 'trace' : 'debug' }, streams);
}

/** A logger that drops everything; handy as a default for optional collaborators. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
