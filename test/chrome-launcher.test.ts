import { describe, expect, it, vi } from 'vitest';
import {
  buildLaunchOptions,
  debuggingArgs,
  isMissingExecutableError,
  resolveConnectionTarget,
  waitForEndpoint,
} from '../src/chrome-launcher.js';
import type { BrowserRegistration } from '../src/platform/registration.js';
import type { BrowserExecutable } from '../src/types.js';

const CHROME: BrowserExecutable = {
  channel: 'chrome',
  path: '/usr/bin/google-chrome',
  processName: 'google-chrome',
  progId: 'google-chrome.desktop',
};

const EDGE: BrowserExecutable = {
  channel: 'msedge',
  path: '/usr/bin/microsoft-edge',
  processName: 'microsoft-edge',
};

function registration(defaultBrowser: BrowserExecutable | null, byChannel: BrowserExecutable | null = null) {
  return {
    defaultBrowser: vi.fn(() => defaultBrowser),
    findByChannel: vi.fn(() => byChannel),
  } satisfies BrowserRegistration;
}

describe('resolveConnectionTarget', () => {
  it('prefers the registered default browser over the configured channel', () => {
    const reg = registration(CHROME, EDGE);
    expect(resolveConnectionTarget({ channel: 'msedge', port: 9222, registration: reg })).toEqual({
      port: 9222,
      processName: 'google-chrome',
      executablePath: '/usr/bin/google-chrome',
      progId: 'google-chrome.desktop',
    });
    expect(reg.findByChannel).not.toHaveBeenCalled();
  });

  it('looks the channel up when nothing is registered', () => {
    const reg = registration(null, EDGE);
    expect(resolveConnectionTarget({ channel: 'msedge', port: 9333, registration: reg })).toEqual({
      port: 9333,
      processName: 'microsoft-edge',
      executablePath: '/usr/bin/microsoft-edge',
    });
    expect(reg.findByChannel).toHaveBeenCalledWith('msedge');
  });

  it('returns a bare target when nothing is found', () => {
    const reg = registration(null);
    expect(resolveConnectionTarget({ channel: 'bundled', port: 9222, registration: reg })).toEqual({ port: 9222 });
    expect(reg.findByChannel).not.toHaveBeenCalled();
  });
});

describe('waitForEndpoint', () => {
  it('polls until the endpoint answers', async () => {
    let clock = 0;
    const isResponding = vi.fn<(port: number) => Promise<boolean>>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    const sleep = vi.fn(async (ms: number) => { clock += ms; });

    const up = await waitForEndpoint({ probe: { isResponding }, port: 9222, timeoutMs: 15_000, pollMs: 500, sleep, now: () => clock });

    expect(up).toBe(true);
    expect(isResponding).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[500], [500]]);
  });

  it('returns false at the deadline', async () => {
    let clock = 0;
    const isResponding = vi.fn(async (_port: number) => false);

    const up = await waitForEndpoint({
      probe: { isResponding },
      port: 9222,
      timeoutMs: 2_000,
      pollMs: 500,
      sleep: async ms => { clock += ms; },
      now: () => clock,
    });

    expect(up).toBe(false);
    expect(isResponding).toHaveBeenCalledTimes(5);
  });
});

describe('launch options', () => {
  const ctx = { headless: true, downloadsPath: '/tmp/downloads' };

  it('maps each channel to its own strategy', () => {
    expect(buildLaunchOptions('msedge', ctx).channel).toBe('msedge');
    expect(buildLaunchOptions('chrome', ctx).channel).toBe('chrome');
    expect(buildLaunchOptions('bundled', ctx).channel).toBeUndefined();
    expect(buildLaunchOptions('bundled', ctx).executablePath).toBeUndefined();
    expect(buildLaunchOptions('chromium', { ...ctx, executablePath: '/usr/bin/chromium' }).executablePath).toBe('/usr/bin/chromium');
  });

  it('always accepts downloads into the configured directory', () => {
    const opts = buildLaunchOptions('chrome', ctx);
    expect(opts.acceptDownloads).toBe(true);
    expect(opts.downloadsPath).toBe('/tmp/downloads');
    expect(opts.headless).toBe(true);
    expect(opts.args).toContain('--disable-blink-features=AutomationControlled');
  });

  it('builds the debugging flags for an attachable launch', () => {
    expect(debuggingArgs(9222)).toEqual(['--remote-debugging-port=9222', '--no-first-run', '--no-default-browser-check']);
    expect(debuggingArgs(9223, '/profiles/a')).toContain('--user-data-dir=/profiles/a');
  });
});

describe('isMissingExecutableError', () => {
  it('recognizes the missing browser message', () => {
    expect(isMissingExecutableError(new Error("browserType.launchPersistentContext: Executable doesn't exist at /root/.cache/ms-playwright/chromium-1134/chrome-linux/chrome"))).toBe(true);
    expect(isMissingExecutableError(new Error('Target page, context or browser has been closed'))).toBe(false);
  });
});
