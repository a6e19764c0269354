/**
 * Test helpers: in-memory output sinks and a fixed runtime environment.
 */

import type { CommandContext, OutputSink } from '../../src/commands/index.js';
import type { EnvVars, RuntimeEnvironment } from '../../src/runtime/index.js';
import { PRODUCT, VERSION } from '../../src/config/defaults.js';

// ── Sinks ────────────────────────────────────────────────────

export interface MemorySink extends OutputSink {
  text(): string;
}

export function createSink(): MemorySink {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

// ── Runtime ──────────────────────────────────────────────────

export interface FakeRuntimeOptions {
  env?: EnvVars;
  runtimePath?: string;
  platform?: NodeJS.Platform;
  /** Paths that exist. Compared case-insensitively on win32. */
  existing?: readonly string[];
  exists?: (filePath: string) => boolean;
}

export const UNIX_RUNTIME = '/opt/omnikit/embedded/bin/node';
export const UNIX_APP_DIR = '/opt/omnikit/embedded/apps/omnikit';
export const UNIX_BIN = '/opt/omnikit/bin';
export const UNIX_EMBEDDED_BIN = '/opt/omnikit/embedded/bin';

export const WINDOWS_RUNTIME = 'c:/opscode/omnikit/embedded/bin/node.exe';
export const WINDOWS_APP_DIR = 'c:\\opscode\\omnikit\\embedded\\apps\\omnikit';

export function createFakeRuntime(options: FakeRuntimeOptions = {}): RuntimeEnvironment {
  const platform = options.platform ?? 'linux';
  const fold = (p: string): string =>
    platform === 'win32' ? p.replace(/\//g, '\\').toLowerCase() : p;
  const existing = new Set((options.existing ?? []).map(fold));

  return {
    env: () => options.env ?? {},
    runtimePath: () => options.runtimePath ?? UNIX_RUNTIME,
    platform: () => platform,
    exists: options.exists ?? ((filePath) => existing.has(fold(filePath))),
  };
}

export function omnibusRuntime(pathValue: string | undefined): RuntimeEnvironment {
  return createFakeRuntime({
    env: pathValue === undefined ? {} : { PATH: pathValue },
    existing: [UNIX_APP_DIR],
  });
}

// ── Command context ──────────────────────────────────────────

export interface TestContext {
  context: CommandContext;
  stdout: MemorySink;
  stderr: MemorySink;
}

export function createTestContext(
  runtime: RuntimeEnvironment,
  overrides: Partial<Pick<CommandContext, 'config'>> = {},
): TestContext {
  const stdout = createSink();
  const stderr = createSink();
  return {
    stdout,
    stderr,
    context: {
      stdout,
      stderr,
      runtime,
      config: overrides.config ?? {},
      programName: PRODUCT.PROGRAM_NAME,
      productName: PRODUCT.PRODUCT_NAME,
      version: VERSION,
      appName: PRODUCT.APP_NAME,
    },
  };
}
