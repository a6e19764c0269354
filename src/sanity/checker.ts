import type { RuntimeEnvironment } from '../runtime/index.js';
import { isWindows, pathKey, searchPathEntries } from '../runtime/index.js';
import { resolveOmnibusLayout } from '../omnibus/index.js';
import type { OmnibusLayout } from '../omnibus/index.js';
import type { SanityResult } from '../schema/index.js';
import type { Logger } from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface SanityCheckOptions {
  /** Marker directory name under <root>/embedded/apps. */
  appName: string;
  /** Program name used in the shell-init hint. */
  programName: string;
  logger: Logger;
}

export interface EnvironmentSanityChecker {
  check(): SanityResult;
}

// ── Path comparison ──────────────────────────────────────────
// POSIX compares exact strings. Windows paths are case-insensitive and
// accept either slash, so both sides are folded before comparing there.

function comparable(runtime: RuntimeEnvironment): (dir: string) => string {
  if (!isWindows(runtime)) return (dir) => dir;
  return (dir) => dir.replace(/\//g, '\\').toLowerCase();
}

function shellInitHint(programName: string): string {
  return `Consider using \`${programName} shell-init <SHELL>\` in your user's <SHELL> rc file.`;
}

// ── Classification ───────────────────────────────────────────

export function classifySearchPath(
  entries: readonly string[],
  layout: Pick<OmnibusLayout, 'binDir' | 'embeddedBinDir'>,
  options: { programName: string; pathKey?: string; fold?: (dir: string) => string },
): SanityResult {
  const fold = options.fold ?? ((dir: string) => dir);
  const key = options.pathKey ?? 'PATH';
  const folded = entries.map(fold);

  const binIndex = folded.indexOf(fold(layout.binDir));
  const embeddedIndex = folded.indexOf(fold(layout.embeddedBinDir));

  if (embeddedIndex === -1) {
    return { verdict: 'ok' };
  }

  if (binIndex === -1) {
    return {
      verdict: 'warn-missing-embedded',
      message:
        `WARN: only ${layout.embeddedBinDir} is present in your ${key}, ` +
        `you must add ${layout.binDir} before that directory.\n` +
        shellInitHint(options.programName) + '\n',
    };
  }

  if (embeddedIndex < binIndex) {
    return {
      verdict: 'warn-wrong-order',
      message:
        `WARN: ${layout.embeddedBinDir} is before ${layout.binDir} in your ${key}, ` +
        `please reverse that order.\n` +
        shellInitHint(options.programName) + '\n',
    };
  }

  return { verdict: 'ok' };
}

// ── Checker ──────────────────────────────────────────────────

export function createSanityChecker(
  runtime: RuntimeEnvironment,
  options: SanityCheckOptions,
): EnvironmentSanityChecker {
  const log = options.logger;

  return {
    check(): SanityResult {
      let layout: OmnibusLayout;
      try {
        layout = resolveOmnibusLayout(runtime, options.appName);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.debug('sanity check skipped', { reason: message });
        return { verdict: 'skipped-no-install' };
      }

      const result = classifySearchPath(searchPathEntries(runtime), layout, {
        programName: options.programName,
        pathKey: pathKey(runtime),
        fold: comparable(runtime),
      });
      log.debug('sanity check', { verdict: result.verdict, root: layout.root });
      return result;
    },
  };
}
