import fs from 'node:fs';
import path from 'node:path';
import { config as loadEnvFile } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CDP_PORT } from './chrome-launcher.js';
import { ConfigError } from './errors.js';
import type { BrowserChannel } from './types.js';

const DEFAULT_PORTAL_URL = 'https://operatorisiss.servizirl.it/opefseie/';

const boolFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const secondsFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback).transform(s => s * 1000);

const envSchema = z.object({
  PORTAL_URL: z.string().url().default(DEFAULT_PORTAL_URL),
  BROWSER_CHANNEL: z.enum(['msedge', 'chrome', 'chromium', 'bundled']).default('msedge'),
  USE_EXISTING_BROWSER: boolFromEnv.default('false'),
  CDP_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_CDP_PORT),
  HEADLESS: boolFromEnv.default('false'),
  DOWNLOAD_TIMEOUT: secondsFromEnv(60),
  PAGE_TIMEOUT: secondsFromEnv(30),
  DOWNLOAD_DIR: z.string().min(1).default('./downloads'),
  LOG_DIR: z.string().min(1).default('./logs'),
  BROWSER_DATA_DIR: z.string().min(1).default('./browser_data'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  MAX_RECORDS: z.coerce.number().int().min(0).default(0),
});

const CASE_INSENSITIVE_KEYS = new Set(['BROWSER_CHANNEL', 'USE_EXISTING_BROWSER', 'HEADLESS', 'LOG_LEVEL']);

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface Timeouts {
  /** Element visibility and network-idle waits */
  pageMs: number;
  /** Download capture */
  downloadMs: number;
  /** Presence check of an optional element (search form, record button, section tab) */
  presenceMs: number;
  /** Loading overlay disappearance */
  overlayMs: number;
  /** Consent button after a download click */
  confirmMs: number;
  /** Initial manual login */
  loginMs: number;
  /** Re-login after session expiry */
  reloginMs: number;
  /** URL polling while waiting for login */
  loginPollMs: number;
  /** Debugging endpoint availability after a launch */
  attachMs: number;
  /** Debugging endpoint polling */
  attachPollMs: number;
}

export interface AppConfig {
  portalUrl: string;
  channel: BrowserChannel;
  useExistingBrowser: boolean;
  cdpPort: number;
  headless: boolean;
  downloadDir: string;
  logDir: string;
  browserDataDir: string;
  logLevel: LogLevel;
  /** 0 processes every pending record */
  maxRecords: number;
  timeouts: Timeouts;
}

export const DEFAULT_TIMEOUTS: Omit<Timeouts, 'pageMs' | 'downloadMs'> = {
  presenceMs: 3_000,
  overlayMs: 15_000,
  confirmMs: 5_000,
  loginMs: 300_000,
  reloginMs: 60_000,
  loginPollMs: 2_000,
  attachMs: 15_000,
  attachPollMs: 500,
};

/**
 * Build the configuration from an environment record.
 * Empty strings count as unset so a blank line in `settings.env` falls back to the default.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) cleaned[key] = CASE_INSENSITIVE_KEYS.has(key) ? trimmed.toLowerCase() : trimmed;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;

  return {
    portalUrl: e.PORTAL_URL,
    channel: e.BROWSER_CHANNEL,
    useExistingBrowser: e.USE_EXISTING_BROWSER,
    cdpPort: e.CDP_PORT,
    headless: e.HEADLESS,
    downloadDir: path.resolve(e.DOWNLOAD_DIR),
    logDir: path.resolve(e.LOG_DIR),
    browserDataDir: path.resolve(e.BROWSER_DATA_DIR),
    logLevel: e.LOG_LEVEL,
    maxRecords: e.MAX_RECORDS,
    timeouts: {
      ...DEFAULT_TIMEOUTS,
      pageMs: e.PAGE_TIMEOUT,
      downloadMs: e.DOWNLOAD_TIMEOUT,
    },
  };
}

/**
 * Load `settings.env` (values already in `process.env` win), validate it and create the
 * working directories.
 */
export function loadConfig(envPath = 'settings.env'): AppConfig {
  const absolutePath = path.resolve(envPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }
  const loaded = loadEnvFile({ path: absolutePath });
  if (loaded.error) throw new ConfigError(`Cannot read ${absolutePath}: ${loaded.error.message}`);

  const config = parseConfig({ ...process.env });
  for (const dir of [config.downloadDir, config.logDir, config.browserDataDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return config;
}
