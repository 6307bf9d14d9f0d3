import {
  buildLaunchOptions,
  cdpEndpoint,
  debuggingArgs,
  isMissingExecutableError,
  resolveConnectionTarget,
  sleep as realSleep,
  waitForEndpoint,
  type EndpointProbe,
  type EngineInstaller,
  type Sleep,
} from './chrome-launcher.js';
import { ConnectionError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { LaunchOverride } from './platform/launch-override.js';
import type { ProcessControl } from './platform/processes.js';
import type { BrowserRegistration } from './platform/registration.js';
import type {
  BrowserChannel,
  BrowserEngine,
  BrowserHandle,
  ConnectionTarget,
  ContextHandle,
  PageHandle,
  SessionState,
} from './types.js';

/** Operating-system capabilities the controller depends on. */
export interface SessionPlatform {
  registration: BrowserRegistration;
  probe: EndpointProbe;
  processes: ProcessControl;
  launchOverride: LaunchOverride;
  installer: EngineInstaller;
}

export interface SessionOptions<P extends PageHandle> {
  engine: BrowserEngine<P>;
  platform: SessionPlatform;
  logger: Logger;
  channel: BrowserChannel;
  /** Attach to the browser the operator already uses instead of launching a profile */
  useExistingBrowser: boolean;
  port: number;
  headless: boolean;
  /** Profile directory of owned sessions; kept across restarts */
  userDataDir: string;
  downloadsPath: string;
  pageTimeoutMs: number;
  attachTimeoutMs: number;
  attachPollMs: number;
  sleep?: Sleep;
  now?: () => number;
}

const OVERRIDE_HINT =
  'Close every window of the browser and retry, or enable the remote debugging launch override so the browser always starts attachable.';

/**
 * Owns the single browser session of a run.
 *
 * An attached session borrows the operator's browser: `stop()` closes the tab it opened and
 * disconnects. An owned session launched its own profile, and `stop()` closes all of it.
 */
export class SessionController<P extends PageHandle> {
  private readonly opts: SessionOptions<P>;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  private _state: SessionState = 'not-started';
  private browser: BrowserHandle<P> | null = null;
  private context: ContextHandle<P> | null = null;
  private _page: P | null = null;
  /** Set by a successful handshake; survives the session going dead so teardown stays tab-only. */
  private attachedSession = false;

  constructor(opts: SessionOptions<P>) {
    this.opts = opts;
    this.logger = opts.logger.child({ component: 'session' });
    this.sleep = opts.sleep ?? realSleep;
    this.now = opts.now ?? Date.now;
  }

  get state(): SessionState { return this._state; }

  get attached(): boolean { return this.attachedSession; }

  /** The automation page. Throws when the session has not been started. */
  get page(): P {
    if (!this._page) throw new ConnectionError('Browser session not started');
    return this._page;
  }

  async start(): Promise<P> {
    if (this._page) return this._page;
    const target = resolveConnectionTarget({
      channel: this.opts.channel,
      port: this.opts.port,
      registration: this.opts.platform.registration,
    });
    this.logger.debug({ target }, 'Connection target resolved');

    if (this.opts.useExistingBrowser) await this.attach(target);
    else await this.launchOwned(target);

    const page = this.page;
    page.setDefaultTimeout(this.opts.pageTimeoutMs);
    this.logger.info({ mode: this._state, port: this.opts.port }, 'Browser session started');
    return page;
  }

  async stop(): Promise<void> {
    const { browser, context, _page: page } = this;
    const attached = this.attachedSession;
    this.browser = null;
    this.context = null;
    this._page = null;
    this._state = 'not-started';

    const closers: Array<[string, () => Promise<void>]> = [];
    if (attached) {
      if (page) closers.push(['page', () => page.close()]);
    } else if (context) {
      closers.push(['context', () => context.close()]);
    }
    if (browser) closers.push(['browser', () => browser.close()]);

    for (const [resource, close] of closers) {
      try {
        await close();
      } catch (err) {
        this.logger.debug({ resource, err: describeError(err) }, 'Close failed');
      }
    }
    this.attachedSession = false;
  }

  /** Cheap liveness probe; any failure marks the session dead. */
  async isAlive(): Promise<boolean> {
    if (!this._page) return false;
    try {
      await this._page.title();
      return true;
    } catch {
      this._state = 'dead';
      return false;
    }
  }

  async restart(): Promise<P> {
    this.logger.warn('Restarting browser session');
    await this.stop();
    return await this.start();
  }

  /** Return the live page, restarting the session when the probe fails. */
  async ensureAlive(): Promise<P> {
    if (await this.isAlive()) return this.page;
    return await this.restart();
  }

  // ── Attach Protocol ──

  private async attach(target: ConnectionTarget): Promise<void> {
    const { port } = this.opts;
    const { probe, processes, launchOverride } = this.opts.platform;

    if (await probe.isResponding(port)) {
      try {
        await this.handshake();
        return;
      } catch (err) {
        this.logger.warn({ port, err: describeError(err) }, 'Handshake failed on an open debugging port');
        if (!target.executablePath || !target.processName) {
          throw new ConnectionError(`Cannot attach to the browser on port ${port}`, {
            hint: 'Close the program holding the debugging port and retry.',
            cause: err,
          });
        }
        processes.killAll(target.processName);
        await this.sleep(this.opts.attachPollMs);
        await this.launchWithDebugging(target.executablePath);
        await this.handshakeOrFail();
        return;
      }
    }

    if (!target.executablePath) {
      throw new ConnectionError('No browser executable found to launch with remote debugging', {
        hint: 'Install Microsoft Edge or Google Chrome, or set BROWSER_CHANNEL=bundled with USE_EXISTING_BROWSER=false.',
      });
    }

    if (target.processName && processes.isRunning(target.processName)) {
      const overrideActive = target.progId !== undefined && launchOverride.isEnabled(target.progId, port);
      if (!overrideActive) {
        throw new ConnectionError(`${target.processName} is running without remote debugging on port ${port}`, {
          hint: OVERRIDE_HINT,
        });
      }
      this.logger.info({ process: target.processName }, 'Restarting browser with remote debugging enabled');
      processes.killAll(target.processName);
      await this.sleep(this.opts.attachPollMs);
    }

    await this.launchWithDebugging(target.executablePath);
    await this.handshakeOrFail();
  }

  private async launchWithDebugging(executablePath: string): Promise<void> {
    const { port, attachTimeoutMs, attachPollMs } = this.opts;
    this.logger.info({ executable: executablePath, port }, 'Launching browser with remote debugging');
    try {
      await this.opts.platform.processes.spawnDetached(executablePath, debuggingArgs(port));
    } catch (err) {
      throw new ConnectionError(`Cannot start ${executablePath}`, {
        hint: 'Check that the browser executable exists and can be run by this user.',
        cause: err,
      });
    }

    const up = await waitForEndpoint({
      probe: this.opts.platform.probe,
      port,
      timeoutMs: attachTimeoutMs,
      pollMs: attachPollMs,
      sleep: this.sleep,
      now: this.now,
    });
    if (!up) {
      throw new ConnectionError(`Debugging endpoint on port ${port} did not respond within ${Math.round(attachTimeoutMs / 1000)}s`, {
        hint: OVERRIDE_HINT,
      });
    }
  }

  private async handshakeOrFail(): Promise<void> {
    try {
      await this.handshake();
    } catch (err) {
      throw new ConnectionError(`Cannot attach to the browser on port ${this.opts.port}`, { cause: err });
    }
  }

  /** Connect, reuse the first context for its cookies and open a fresh tab in it. */
  private async handshake(): Promise<void> {
    const browser = await this.opts.engine.connectOverCDP(cdpEndpoint(this.opts.port), this.opts.attachTimeoutMs);
    try {
      const context = browser.contexts()[0] ?? await browser.newContext();
      const page = await context.newPage();
      this.browser = browser;
      this.context = context;
      this._page = page;
      this._state = 'attached';
      this.attachedSession = true;
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        this.logger.debug({ err: describeError(closeErr) }, 'Disconnect after failed handshake failed');
      });
      throw err;
    }
  }

  // ── Owned Launch ──

  private async launchOwned(target: ConnectionTarget): Promise<void> {
    const { channel } = this.opts;
    let context: ContextHandle<P>;
    if (channel === 'bundled') {
      context = await this.launchBundled();
    } else {
      try {
        context = await this.launchChannel(channel, target);
      } catch (err) {
        this.logger.warn({ channel, err: describeError(err) }, 'Channel launch failed, falling back to the bundled engine');
        context = await this.launchBundled();
      }
    }

    this.context = context;
    this._page = context.pages()[0] ?? await context.newPage();
    this._state = 'owned';
  }

  private async launchChannel(channel: BrowserChannel, target: ConnectionTarget): Promise<ContextHandle<P>> {
    const chromiumExe = channel === 'chromium'
      ? this.opts.platform.registration.findByChannel('chromium')?.path ?? target.executablePath
      : undefined;
    const launchOpts = buildLaunchOptions(channel, {
      headless: this.opts.headless,
      downloadsPath: this.opts.downloadsPath,
      ...(chromiumExe ? { executablePath: chromiumExe } : {}),
    });
    return await this.opts.engine.launchPersistent(this.opts.userDataDir, launchOpts);
  }

  private async launchBundled(): Promise<ContextHandle<P>> {
    const launchOpts = buildLaunchOptions('bundled', {
      headless: this.opts.headless,
      downloadsPath: this.opts.downloadsPath,
    });
    try {
      return await this.opts.engine.launchPersistent(this.opts.userDataDir, launchOpts);
    } catch (err) {
      if (!isMissingExecutableError(err)) {
        throw new ConnectionError('Cannot launch the bundled browser engine', { cause: err });
      }
    }

    try {
      await this.opts.platform.installer.install();
      return await this.opts.engine.launchPersistent(this.opts.userDataDir, launchOpts);
    } catch (err) {
      throw new ConnectionError('Cannot install or launch the bundled browser engine', {
        hint: 'Check the network connection for the one-time engine download.',
        cause: err,
      });
    }
  }
}
