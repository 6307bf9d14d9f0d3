import net from 'node:net';
import path from 'node:path';
import { spawn } from 'node:child_process';
import { createRequire } from 'node:module';
import type { Logger } from './logger.js';
import type { BrowserRegistration } from './platform/registration.js';
import type { BrowserChannel, ConnectionTarget, PersistentLaunchOptions } from './types.js';

export const DEFAULT_CDP_PORT = 9222;

export function cdpEndpoint(port: number): string {
  return `http://127.0.0.1:${port}`;
}

// ── Connection Target ──

/**
 * Work out which browser a session should reach or start.
 *
 * The default-browser registration is read first and independently of `channel`, since its
 * process name is what crash recovery has to terminate. When nothing is registered there,
 * the configured channel is looked up directly. An empty target is a valid result.
 */
export function resolveConnectionTarget(opts: {
  channel: BrowserChannel;
  port: number;
  registration: BrowserRegistration;
}): ConnectionTarget {
  const found = opts.registration.defaultBrowser()
    ?? (opts.channel !== 'bundled' ? opts.registration.findByChannel(opts.channel) : null);
  if (!found) return { port: opts.port };
  return {
    port: opts.port,
    processName: found.processName,
    executablePath: found.path,
    ...(found.progId ? { progId: found.progId } : {}),
  };
}

// ── Endpoint Probe ──

/** Liveness check of a remote debugging endpoint. */
export interface EndpointProbe {
  isResponding(port: number): Promise<boolean>;
}

export async function isVersionInfoReachable(port: number, timeoutMs = 500): Promise<boolean> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const res = await fetch(`${cdpEndpoint(port)}/json/version`, { signal: ctrl.signal });
    return res.status === 200;
  } catch { return false; }
  finally { clearTimeout(t); }
}

export async function isPortOpen(port: number, timeoutMs = 500): Promise<boolean> {
  return await new Promise<boolean>(resolve => {
    const socket = net.createConnection({ host: '127.0.0.1', port });
    const done = (open: boolean) => {
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => done(true));
    socket.once('timeout', () => done(false));
    socket.once('error', () => done(false));
  });
}

/** `GET /json/version`, falling back to a bare TCP connect when HTTP gives no answer. */
export class HttpEndpointProbe implements EndpointProbe {
  constructor(private readonly timeoutMs = 500) {}

  async isResponding(port: number): Promise<boolean> {
    if (await isVersionInfoReachable(port, this.timeoutMs)) return true;
    return await isPortOpen(port, this.timeoutMs);
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/** Poll until the endpoint answers or `timeoutMs` elapses. */
export async function waitForEndpoint(opts: {
  probe: EndpointProbe;
  port: number;
  timeoutMs: number;
  pollMs: number;
  sleep?: Sleep;
  now?: () => number;
}): Promise<boolean> {
  const wait = opts.sleep ?? sleep;
  const now = opts.now ?? Date.now;
  const deadline = now() + opts.timeoutMs;
  while (now() < deadline) {
    if (await opts.probe.isResponding(opts.port)) return true;
    await wait(opts.pollMs);
  }
  return await opts.probe.isResponding(opts.port);
}

// ── Launch Arguments ──

/** Flags for a browser started outside Playwright that we later attach to. */
export function debuggingArgs(port: number, userDataDir?: string): string[] {
  const args = [`--remote-debugging-port=${port}`, '--no-first-run', '--no-default-browser-check'];
  if (userDataDir) args.push(`--user-data-dir=${userDataDir}`);
  return args;
}

const OWNED_ARGS = [
  '--no-first-run',
  '--no-default-browser-check',
  '--disable-blink-features=AutomationControlled',
  '--disable-session-crashed-bubble',
  '--hide-crash-restore-bubble',
];

export interface LaunchContext {
  headless: boolean;
  downloadsPath: string;
  /** Executable found for the channel, when the channel needs one */
  executablePath?: string;
}

type LaunchBuilder = (ctx: LaunchContext) => PersistentLaunchOptions;

function baseOptions(ctx: LaunchContext): PersistentLaunchOptions {
  const args = [...OWNED_ARGS];
  if (process.platform === 'linux') args.push('--disable-dev-shm-usage');
  return { headless: ctx.headless, acceptDownloads: true, downloadsPath: ctx.downloadsPath, args };
}

/** One launch strategy per channel. */
export const LAUNCH_BUILDERS: Record<BrowserChannel, LaunchBuilder> = {
  msedge: ctx => ({ ...baseOptions(ctx), channel: 'msedge' }),
  chrome: ctx => ({ ...baseOptions(ctx), channel: 'chrome' }),
  chromium: ctx => (ctx.executablePath ? { ...baseOptions(ctx), executablePath: ctx.executablePath } : baseOptions(ctx)),
  bundled: ctx => baseOptions(ctx),
};

export function buildLaunchOptions(channel: BrowserChannel, ctx: LaunchContext): PersistentLaunchOptions {
  return LAUNCH_BUILDERS[channel](ctx);
}

// ── Bundled Engine ──

/** Installs the automation library's own browser build. */
export interface EngineInstaller {
  install(): Promise<void>;
}

export function isMissingExecutableError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return message.includes("Executable doesn't exist") || message.includes('please run the following command to download new browsers');
}

/** Runs `playwright-core`'s CLI (`install chromium`) with the current Node binary. */
export class PlaywrightEngineInstaller implements EngineInstaller {
  constructor(private readonly logger: Logger) {}

  async install(): Promise<void> {
    const require = createRequire(import.meta.url);
    const cli = path.join(path.dirname(require.resolve('playwright-core/package.json')), 'cli.js');
    this.logger.info('Installing the bundled Chromium engine (one-time download)');

    await new Promise<void>((resolve, reject) => {
      const child = spawn(process.execPath, [cli, 'install', 'chromium'], {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
      child.stdout.on('data', (chunk: Buffer) => this.logger.debug(chunk.toString().trim()));
      child.stderr.on('data', (chunk: Buffer) => this.logger.debug(chunk.toString().trim()));
      child.once('error', reject);
      child.once('exit', code => {
        if (code === 0) resolve();
        else reject(new Error(`Browser engine install exited with code ${code ?? 'null'}`));
      });
    });
    this.logger.info('Bundled Chromium engine installed');
  }
}
