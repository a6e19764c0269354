import path from 'node:path';

import type { RuntimeEnvironment } from '../runtime/index.js';
import { isWindows } from '../runtime/index.js';
import { OmnibusInstallNotFoundError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface OmnibusLayout {
  root: string;
  appsDir: string;
  /** `<root>/embedded/apps/<appName>`; its presence marks the install. */
  appDir: string;
  binDir: string;
  embeddedBinDir: string;
}

// ── Layout resolution ────────────────────────────────────────
// An omnibus runtime lives at <root>/embedded/bin/<executable>.

export function resolveOmnibusLayout(
  runtime: RuntimeEnvironment,
  appName: string,
): OmnibusLayout {
  const p = isWindows(runtime) ? path.win32 : path.posix;

  const runtimePath = runtime.runtimePath();
  if (runtimePath === '' || !p.isAbsolute(runtimePath)) {
    throw new OmnibusInstallNotFoundError();
  }

  const root = p.resolve(runtimePath, '..', '..', '..');
  const appsDir = p.join(root, 'embedded', 'apps');
  const appDir = p.join(appsDir, appName);

  if (!runtime.exists(appDir)) {
    throw new OmnibusInstallNotFoundError(appDir);
  }

  return {
    root,
    appsDir,
    appDir,
    binDir: p.join(root, 'bin'),
    embeddedBinDir: p.join(root, 'embedded', 'bin'),
  };
}

/**
 * Like resolveOmnibusLayout, but returns null when the layout cannot be
 * derived for any reason.
 */
export function findOmnibusLayout(
  runtime: RuntimeEnvironment,
  appName: string,
): OmnibusLayout | null {
  try {
    return resolveOmnibusLayout(runtime, appName);
  } catch {
    return null;
  }
}
