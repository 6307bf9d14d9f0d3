import fs from 'node:fs';
import { execFileSync } from 'node:child_process';

export function fileExists(filePath: string): boolean {
  try { return fs.existsSync(filePath); } catch { return false; }
}

/** Run a short-lived command and return its trimmed stdout, or `null` on any failure. */
export function execText(command: string, args: string[], timeoutMs = 2000): string | null {
  try {
    const output = execFileSync(command, args, {
      timeout: timeoutMs,
      encoding: 'utf8',
      maxBuffer: 1024 * 1024,
      windowsHide: true,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return String(output ?? '').trim() || null;
  } catch { return null; }
}

/** Read the default value or a named value of a registry key through `reg.exe`. */
export function readRegistryValue(key: string, valueName?: string): string | null {
  const args = ['query', key, ...(valueName ? ['/v', valueName] : ['/ve'])];
  const out = execText('reg', args);
  if (!out) return null;
  for (const line of out.split(/\r?\n/)) {
    const match = line.match(/^\s*(.+?)\s+REG_(?:EXPAND_)?SZ\s+(.*)$/);
    if (match?.[2] !== undefined) return match[2].trim();
  }
  return null;
}

/** First token of a shell command line, with surrounding quotes removed. */
export function executableFromCommand(command: string): string | null {
  const trimmed = command.trim();
  if (!trimmed) return null;
  if (trimmed.startsWith('"')) {
    const end = trimmed.indexOf('"', 1);
    return end > 1 ? trimmed.slice(1, end) : null;
  }
  const exeMatch = trimmed.match(/^(.+?\.exe)\b/i);
  if (exeMatch?.[1]) return exeMatch[1];
  return trimmed.split(/\s+/)[0] ?? null;
}
