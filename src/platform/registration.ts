import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { z } from 'zod';
import type { BrowserChannel, BrowserExecutable } from '../types.js';
import { execText, executableFromCommand, fileExists, readRegistryValue } from './exec.js';

/** Read-only view of how browsers are registered with the operating system. */
export interface BrowserRegistration {
  /** The user's default web browser, when it is a Chromium-family browser. */
  defaultBrowser(): BrowserExecutable | null;
  /** Secondary lookup of a specific browser family, independent of the default. */
  findByChannel(channel: BrowserChannel): BrowserExecutable | null;
}

// ── Executable Detection ──

const CHROMIUM_BUNDLE_IDS = new Set([
  'com.google.Chrome',
  'com.google.Chrome.beta',
  'com.google.Chrome.dev',
  'com.microsoft.Edge',
  'com.microsoft.EdgeBeta',
  'com.microsoft.EdgeDev',
  'org.chromium.Chromium',
  'com.brave.Browser',
]);

const CHROMIUM_DESKTOP_IDS = new Set([
  'google-chrome.desktop',
  'google-chrome-beta.desktop',
  'microsoft-edge.desktop',
  'microsoft-edge-beta.desktop',
  'microsoft-edge-dev.desktop',
  'chromium.desktop',
  'chromium-browser.desktop',
  'brave-browser.desktop',
  'org.chromium.Chromium.desktop',
]);

const CHROMIUM_EXE_NAMES = new Set([
  'chrome.exe', 'msedge.exe', 'chromium.exe', 'brave.exe',
  'google chrome', 'microsoft edge', 'chromium', 'brave browser',
  'chrome', 'msedge', 'brave', 'brave-browser',
  'google-chrome', 'google-chrome-stable', 'google-chrome-beta',
  'microsoft-edge', 'microsoft-edge-stable', 'microsoft-edge-beta', 'microsoft-edge-dev',
  'chromium-browser',
]);

/** Windows executable image names per channel, as registered under "App Paths". */
const WINDOWS_IMAGE_NAMES: Partial<Record<BrowserChannel, string>> = {
  msedge: 'msedge.exe',
  chrome: 'chrome.exe',
};

export function inferChannelFromExeName(name: string): BrowserChannel {
  const lower = name.toLowerCase();
  if (lower.includes('edge') || lower.includes('msedge')) return 'msedge';
  if (lower.includes('chromium')) return 'chromium';
  if (lower.includes('chrome')) return 'chrome';
  return 'chromium';
}

function toExecutable(exePath: string, progId?: string): BrowserExecutable {
  const processName = process.platform === 'win32'
    ? path.win32.basename(exePath)
    : path.basename(exePath);
  return {
    channel: inferChannelFromExeName(processName),
    path: exePath,
    processName,
    ...(progId ? { progId } : {}),
  };
}

function findFirstExe(candidates: Array<{ channel: BrowserChannel; path: string }>, channel: BrowserChannel): BrowserExecutable | null {
  for (const c of candidates) {
    if (c.channel === channel && fileExists(c.path)) return toExecutable(c.path);
  }
  return null;
}

// ── Windows ──

const USER_CHOICE_KEY = 'HKCU\\Software\\Microsoft\\Windows\\Shell\\Associations\\UrlAssociations\\https\\UserChoice';

function detectDefaultWindows(): BrowserExecutable | null {
  const progId = readRegistryValue(USER_CHOICE_KEY, 'ProgId');
  if (!progId) return null;
  const command = readRegistryValue(`HKCR\\${progId}\\shell\\open\\command`);
  const exePath = command ? executableFromCommand(command) : null;
  if (!exePath || !fileExists(exePath)) return null;
  if (!CHROMIUM_EXE_NAMES.has(path.win32.basename(exePath).toLowerCase())) return null;
  return toExecutable(exePath, progId);
}

function findWindows(channel: BrowserChannel): BrowserExecutable | null {
  const image = WINDOWS_IMAGE_NAMES[channel];
  if (image) {
    for (const hive of ['HKCU', 'HKLM']) {
      const registered = readRegistryValue(`${hive}\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\${image}`);
      if (registered && fileExists(registered)) return toExecutable(registered);
    }
  }

  const localAppData = process.env.LOCALAPPDATA ?? '';
  const programFiles = process.env.ProgramFiles ?? 'C:\\Program Files';
  const programFilesX86 = process.env['ProgramFiles(x86)'] ?? 'C:\\Program Files (x86)';
  const j = path.win32.join;
  const candidates: Array<{ channel: BrowserChannel; path: string }> = [];
  if (localAppData) {
    candidates.push({ channel: 'chrome', path: j(localAppData, 'Google', 'Chrome', 'Application', 'chrome.exe') });
    candidates.push({ channel: 'msedge', path: j(localAppData, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
    candidates.push({ channel: 'chromium', path: j(localAppData, 'Chromium', 'Application', 'chrome.exe') });
  }
  candidates.push({ channel: 'chrome', path: j(programFiles, 'Google', 'Chrome', 'Application', 'chrome.exe') });
  candidates.push({ channel: 'chrome', path: j(programFilesX86, 'Google', 'Chrome', 'Application', 'chrome.exe') });
  candidates.push({ channel: 'msedge', path: j(programFiles, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  candidates.push({ channel: 'msedge', path: j(programFilesX86, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  return findFirstExe(candidates, channel);
}

// ── Mac ──

const launchServicesHandlers = z.array(z.object({
  LSHandlerURLScheme: z.string().optional(),
  LSHandlerRoleAll: z.string().optional(),
  LSHandlerRoleViewer: z.string().optional(),
}));

/**
 * Bundle id of the default web browser from the `LSHandlers` list. Later entries override
 * earlier ones for the same scheme; http decides and https is the fallback.
 */
export function defaultHandlerFromLaunchServices(raw: unknown): string | null {
  const handlers = launchServicesHandlers.safeParse(raw);
  if (!handlers.success) return null;

  const resolveScheme = (scheme: 'http' | 'https'): string | null => {
    let candidate: string | null = null;
    for (const entry of handlers.data) {
      if (entry.LSHandlerURLScheme !== scheme) continue;
      const role = entry.LSHandlerRoleAll ?? entry.LSHandlerRoleViewer;
      if (role) candidate = role;
    }
    return candidate;
  };
  return resolveScheme('http') ?? resolveScheme('https');
}

function detectDefaultBundleIdMac(): string | null {
  const plistPath = path.join(os.homedir(), 'Library/Preferences/com.apple.LaunchServices/com.apple.launchservices.secure.plist');
  if (!fileExists(plistPath)) return null;
  const handlersRaw = execText('/usr/bin/plutil', ['-extract', 'LSHandlers', 'json', '-o', '-', '--', plistPath]);
  if (!handlersRaw) return null;
  try {
    return defaultHandlerFromLaunchServices(JSON.parse(handlersRaw));
  } catch {
    return null;
  }
}

function detectDefaultMac(): BrowserExecutable | null {
  const bundleId = detectDefaultBundleIdMac();
  if (!bundleId || !CHROMIUM_BUNDLE_IDS.has(bundleId)) return null;
  const appPathRaw = execText('/usr/bin/osascript', ['-e', `POSIX path of (path to application id "${bundleId}")`]);
  if (!appPathRaw) return null;
  const appPath = appPathRaw.trim().replace(/\/$/, '');
  const exeName = execText('/usr/bin/defaults', ['read', path.join(appPath, 'Contents', 'Info'), 'CFBundleExecutable']);
  if (!exeName) return null;
  const exePath = path.join(appPath, 'Contents', 'MacOS', exeName.trim());
  if (!fileExists(exePath)) return null;
  return toExecutable(exePath, bundleId);
}

function findMac(channel: BrowserChannel): BrowserExecutable | null {
  const home = os.homedir();
  return findFirstExe([
    { channel: 'chrome', path: '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome' },
    { channel: 'chrome', path: path.join(home, 'Applications/Google Chrome.app/Contents/MacOS/Google Chrome') },
    { channel: 'msedge', path: '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge' },
    { channel: 'msedge', path: path.join(home, 'Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge') },
    { channel: 'chromium', path: '/Applications/Chromium.app/Contents/MacOS/Chromium' },
  ], channel);
}

// ── Linux ──

function detectDefaultLinux(): BrowserExecutable | null {
  const desktopId = execText('xdg-settings', ['get', 'default-web-browser']) ??
    execText('xdg-mime', ['query', 'default', 'x-scheme-handler/https']);
  if (!desktopId) return null;
  const trimmed = desktopId.trim();
  if (!CHROMIUM_DESKTOP_IDS.has(trimmed)) return null;

  const searchDirs = [
    path.join(os.homedir(), '.local', 'share', 'applications'),
    '/usr/local/share/applications',
    '/usr/share/applications',
    '/var/lib/snapd/desktop/applications',
  ];
  const desktopPath = searchDirs.map(dir => path.join(dir, trimmed)).find(fileExists);
  if (!desktopPath) return null;

  let execLine: string | null = null;
  try {
    const line = fs.readFileSync(desktopPath, 'utf8').split(/\r?\n/).find(l => l.startsWith('Exec='));
    execLine = line ? line.slice(5).trim() : null;
  } catch { return null; }
  if (!execLine) return null;

  const command = execLine.split(/\s+/)
    .find(token => token && token !== 'env' && !(token.includes('=') && !token.startsWith('/')))
    ?.replace(/^["']|["']$/g, '');
  if (!command) return null;

  const resolved = command.startsWith('/') ? command : (execText('which', [command], 800) ?? null);
  if (!resolved) return null;
  if (!CHROMIUM_EXE_NAMES.has(path.posix.basename(resolved).toLowerCase())) return null;
  return toExecutable(resolved, trimmed);
}

function findLinux(channel: BrowserChannel): BrowserExecutable | null {
  return findFirstExe([
    { channel: 'chrome', path: '/usr/bin/google-chrome' },
    { channel: 'chrome', path: '/usr/bin/google-chrome-stable' },
    { channel: 'msedge', path: '/usr/bin/microsoft-edge' },
    { channel: 'msedge', path: '/usr/bin/microsoft-edge-stable' },
    { channel: 'chromium', path: '/usr/bin/chromium' },
    { channel: 'chromium', path: '/usr/bin/chromium-browser' },
    { channel: 'chromium', path: '/snap/bin/chromium' },
  ], channel);
}

// ── System Registration ──

/** Looks browsers up the way the current platform registers them. */
export class SystemBrowserRegistration implements BrowserRegistration {
  defaultBrowser(): BrowserExecutable | null {
    if (process.platform === 'win32') return detectDefaultWindows();
    if (process.platform === 'darwin') return detectDefaultMac();
    if (process.platform === 'linux') return detectDefaultLinux();
    return null;
  }

  findByChannel(channel: BrowserChannel): BrowserExecutable | null {
    if (channel === 'bundled') return null;
    if (process.platform === 'win32') return findWindows(channel);
    if (process.platform === 'darwin') return findMac(channel);
    if (process.platform === 'linux') return findLinux(channel);
    return null;
  }
}
