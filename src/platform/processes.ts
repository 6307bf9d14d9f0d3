import { spawn } from 'node:child_process';
import { execText } from './exec.js';

/** Operating-system process operations used by the attach recovery branches. */
export interface ProcessControl {
  isRunning(processName: string): boolean;
  /** Terminate every instance of the image. Not finding one is not an error. */
  killAll(processName: string): void;
  /** Start the executable detached from this process so it survives us. Rejects when it cannot start. */
  spawnDetached(executablePath: string, args: string[]): Promise<void>;
}

function stripExe(name: string): string {
  return name.replace(/\.exe$/i, '');
}

export class SystemProcessControl implements ProcessControl {
  isRunning(processName: string): boolean {
    if (process.platform === 'win32') {
      const out = execText('tasklist', ['/FI', `IMAGENAME eq ${processName}`, '/NH'], 5000);
      return out !== null && out.toLowerCase().includes(processName.toLowerCase());
    }
    return execText('pgrep', ['-x', stripExe(processName)], 5000) !== null;
  }

  killAll(processName: string): void {
    if (process.platform === 'win32') {
      execText('taskkill', ['/F', '/IM', processName, '/T'], 10_000);
      return;
    }
    execText('pkill', ['-x', stripExe(processName)], 10_000);
  }

  async spawnDetached(executablePath: string, args: string[]): Promise<void> {
    const child = spawn(executablePath, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: false,
    });
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });
    child.unref();
  }
}
