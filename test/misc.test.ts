import { describe, expect, it, vi } from 'vitest';
import { CancellationToken } from '../src/cancel.js';
import { screenshotFileName } from '../src/capture/screenshot.js';
import { ConnectionError, LoginTimeoutError, PortalError, describeError } from '../src/errors.js';
import { runStamp } from '../src/logger.js';

describe('CancellationToken', () => {
  it('notifies listeners once', () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    token.onCancel(listener);

    token.cancel();
    token.cancel();

    expect(token.cancelled).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('calls late listeners immediately and honours unsubscribe', () => {
    const token = new CancellationToken();
    const dropped = vi.fn();
    const unsubscribe = token.onCancel(dropped);
    unsubscribe();
    token.cancel();

    const late = vi.fn();
    token.onCancel(late);

    expect(dropped).not.toHaveBeenCalled();
    expect(late).toHaveBeenCalledTimes(1);
  });
});

describe('errors', () => {
  it('carries a code and a name', () => {
    const err = new ConnectionError('Cannot attach to the browser on port 9222');
    expect(err).toBeInstanceOf(PortalError);
    expect(err.code).toBe('CONNECTION_FAILED');
    expect(err.name).toBe('ConnectionError');
  });

  it('describes errors with their hint', () => {
    expect(describeError(new LoginTimeoutError(300_000))).toBe(
      'Login not completed within 300s (Complete the login in the browser window before the timeout expires.)',
    );
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('file names', () => {
  it('formats the run stamp', () => {
    expect(runStamp(new Date(2024, 4, 10, 9, 5, 3))).toBe('20240510_090503');
  });

  it('makes screenshot labels safe', () => {
    expect(screenshotFileName('Rossi Mario / referto 3')).toBe('debug_Rossi_Mario_referto_3.png');
    expect(screenshotFileName('***')).toBe('debug_page.png');
  });
});
