import { execText, readRegistryValue } from './exec.js';

/**
 * A user-level override of the browser's launch command that adds the remote debugging flag,
 * so every launch from a link or a shortcut is attachable.
 */
export interface LaunchOverride {
  isEnabled(progId: string, port: number): boolean;
  /** Idempotent. Returns false when the override could not be written. */
  enable(progId: string, executablePath: string, port: number): boolean;
  disable(progId: string): boolean;
}

function overrideKey(progId: string): string {
  return `HKCU\\Software\\Classes\\${progId}\\shell\\open\\command`;
}

export function debuggingCommand(executablePath: string, port: number): string {
  return `"${executablePath}" --remote-debugging-port=${port} --single-argument %1`;
}

/** Override stored under `HKCU\Software\Classes`, which shadows the machine-wide ProgID. */
export class WindowsLaunchOverride implements LaunchOverride {
  isEnabled(progId: string, port: number): boolean {
    const command = readRegistryValue(overrideKey(progId));
    return command !== null && command.includes(`--remote-debugging-port=${port}`);
  }

  enable(progId: string, executablePath: string, port: number): boolean {
    if (this.isEnabled(progId, port)) return true;
    const command = debuggingCommand(executablePath, port);
    const out = execText('reg', ['add', overrideKey(progId), '/ve', '/t', 'REG_SZ', '/d', command, '/f'], 5000);
    return out !== null;
  }

  disable(progId: string): boolean {
    return execText('reg', ['delete', overrideKey(progId), '/f'], 5000) !== null;
  }
}

/** Platforms without a launch-command override store. */
export class UnsupportedLaunchOverride implements LaunchOverride {
  isEnabled(): boolean { return false; }
  enable(): boolean { return false; }
  disable(): boolean { return false; }
}

export function systemLaunchOverride(): LaunchOverride {
  return process.platform === 'win32' ? new WindowsLaunchOverride() : new UnsupportedLaunchOverride();
}
