import { describe, expect, it } from 'vitest';
import { executableFromCommand } from '../src/platform/exec.js';
import { UnsupportedLaunchOverride, debuggingCommand } from '../src/platform/launch-override.js';
import { SystemProcessControl } from '../src/platform/processes.js';
import { defaultHandlerFromLaunchServices, inferChannelFromExeName } from '../src/platform/registration.js';

describe('executableFromCommand', () => {
  it('unquotes a quoted path with spaces', () => {
    expect(executableFromCommand('"C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe" --single-argument %1'))
      .toBe('C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe');
  });

  it('cuts an unquoted command after the executable', () => {
    expect(executableFromCommand('C:\\Apps\\chrome.exe --profile-directory=Default')).toBe('C:\\Apps\\chrome.exe');
    expect(executableFromCommand('/usr/bin/chromium %U')).toBe('/usr/bin/chromium');
  });

  it('returns null for blank or broken commands', () => {
    expect(executableFromCommand('   ')).toBeNull();
    expect(executableFromCommand('"')).toBeNull();
  });
});

describe('inferChannelFromExeName', () => {
  it('maps image names to channels', () => {
    expect(inferChannelFromExeName('msedge.exe')).toBe('msedge');
    expect(inferChannelFromExeName('Microsoft Edge')).toBe('msedge');
    expect(inferChannelFromExeName('google-chrome')).toBe('chrome');
    expect(inferChannelFromExeName('chromium-browser')).toBe('chromium');
    expect(inferChannelFromExeName('brave')).toBe('chromium');
  });
});

describe('launch override', () => {
  it('builds the debugging launch command', () => {
    expect(debuggingCommand('C:\\Edge\\msedge.exe', 9222))
      .toBe('"C:\\Edge\\msedge.exe" --remote-debugging-port=9222 --single-argument %1');
  });

  it('is never enabled where unsupported', () => {
    const override = new UnsupportedLaunchOverride();
    expect(override.isEnabled()).toBe(false);
    expect(override.enable()).toBe(false);
    expect(override.disable()).toBe(false);
  });
});

describe('SystemProcessControl', () => {
  it('rejects when the executable cannot be started', async () => {
    await expect(new SystemProcessControl().spawnDetached('/nonexistent/fse-test-browser', [])).rejects.toThrow(/ENOENT/);
  });
});

describe('defaultHandlerFromLaunchServices', () => {
  it('lets the http handler decide over an earlier https one', () => {
    expect(defaultHandlerFromLaunchServices([
      { LSHandlerURLScheme: 'https', LSHandlerRoleAll: 'com.apple.safari' },
      { LSHandlerURLScheme: 'http', LSHandlerRoleAll: 'com.google.chrome' },
      { LSHandlerURLScheme: 'mailto', LSHandlerRoleAll: 'com.apple.mail' },
    ])).toBe('com.google.chrome');
  });

  it('keeps the last entry of a scheme and falls back to https', () => {
    expect(defaultHandlerFromLaunchServices([
      { LSHandlerURLScheme: 'http', LSHandlerRoleViewer: 'com.apple.safari' },
      { LSHandlerURLScheme: 'http', LSHandlerRoleAll: 'com.microsoft.edgemac' },
    ])).toBe('com.microsoft.edgemac');
    expect(defaultHandlerFromLaunchServices([
      { LSHandlerURLScheme: 'https', LSHandlerRoleAll: 'com.microsoft.edgemac' },
    ])).toBe('com.microsoft.edgemac');
  });

  it('ignores data that is not a handler list', () => {
    expect(defaultHandlerFromLaunchServices({ LSHandlers: 'none' })).toBeNull();
  });
});
