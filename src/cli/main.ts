#!/usr/bin/env node

/**
 * kit CLI entry point.
 * Thin wrapper — wires process streams and the live environment into the
 * dispatcher.
 */

import 'dotenv/config';

import { createProcessEnvironment } from '../runtime/index.js';
import { loadConfigFile, resolveConfigPath } from '../config/loader.js';
import { EXIT_CODES } from '../config/defaults.js';
import type { KitConfig } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { createKit } from './kit.js';

function loadUserConfig(env: Readonly<Record<string, string | undefined>>): KitConfig {
  try {
    return loadConfigFile(resolveConfigPath(env));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`${message} (continuing with defaults)`);
    return {};
  }
}

function main(): void {
  const runtime = createProcessEnvironment();

  try {
    createKit({
      runtime,
      stdout: process.stdout,
      stderr: process.stderr,
      config: loadUserConfig(runtime.env()),
    }).start(process.argv.slice(2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Fatal: ${message}`);
    process.exitCode = EXIT_CODES.INTERNAL;
  }
}

main();
