import { existsSync } from 'node:fs';

// ── RuntimeEnvironment interface ─────────────────────────────

export type EnvVars = Readonly<Record<string, string | undefined>>;

/**
 * Everything the kit reads from the live process, behind one seam so
 * tests can supply fixed values without touching real process state.
 */
export interface RuntimeEnvironment {
  env(): EnvVars;
  /** Absolute path of the executable running this program. */
  runtimePath(): string;
  platform(): NodeJS.Platform;
  exists(filePath: string): boolean;
}

// ── Process-backed implementation ────────────────────────────

export function createProcessEnvironment(): RuntimeEnvironment {
  return {
    env: () => process.env,
    runtimePath: () => process.execPath,
    platform: () => process.platform,
    exists: (filePath) => existsSync(filePath),
  };
}

// ── Search path helpers ──────────────────────────────────────

export function isWindows(runtime: RuntimeEnvironment): boolean {
  return runtime.platform() === 'win32';
}

export function pathListSeparator(runtime: RuntimeEnvironment): string {
  return isWindows(runtime) ? ';' : ':';
}

/**
 * Name of the search-path variable. Windows env keys are case-insensitive,
 * so the first key spelled any way as "path" is used there.
 */
export function pathKey(runtime: RuntimeEnvironment): string {
  if (!isWindows(runtime)) return 'PATH';
  const key = Object.keys(runtime.env()).find((k) => k.toLowerCase() === 'path');
  return key ?? 'PATH';
}

export function searchPathEntries(runtime: RuntimeEnvironment): string[] {
  const raw = runtime.env()[pathKey(runtime)];
  if (raw === undefined || raw === '') return [];
  return raw.split(pathListSeparator(runtime));
}
