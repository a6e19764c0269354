import { existsSync, readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { kitConfigSchema } from '../schema/config.js';
import type { KitConfig } from '../schema/config.js';
import { CONFIG_PATHS } from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Path resolution ─────────────────────────────────────────

export interface ConfigLocation {
  path: string;
  explicit: boolean;
}

/**
 * `KIT_CONFIG` wins; otherwise `~/.kit/config.yaml`.
 */
export function resolveConfigPath(
  env: Readonly<Record<string, string | undefined>>,
  homeDir: string = os.homedir(),
): ConfigLocation {
  const fromEnv = env[CONFIG_PATHS.ENV_VAR];
  if (fromEnv !== undefined && fromEnv !== '') {
    return { path: path.resolve(fromEnv), explicit: true };
  }
  return {
    path: path.join(homeDir, CONFIG_PATHS.DEFAULT_DIR, CONFIG_PATHS.DEFAULT_FILE),
    explicit: false,
  };
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a kit config file (YAML, or JSON by extension).
 * A missing default file yields an empty config; a missing explicit file
 * or an invalid one throws a ConfigError.
 */
export function loadConfigFile(location: ConfigLocation): KitConfig {
  if (!existsSync(location.path)) {
    if (location.explicit) {
      throw new ConfigError(`Config file not found: ${location.path}`, location.path);
    }
    return {};
  }

  const raw = readFileSync(location.path, 'utf-8');

  let parsed: unknown;
  try {
    parsed = location.path.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${location.path}: ${message}`, location.path);
  }

  try {
    return kitConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config ${location.path}: ${issues}`, location.path);
    }
    throw err;
  }
}
