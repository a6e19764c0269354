/**
 * omnikit - top-level dispatcher for the kit's command-line tools.
 *
 * Programmatic API: build a dispatcher, register subcommands, run argv.
 */

export * from './cli/index.js';
export * from './commands/index.js';
export * from './sanity/index.js';
export * from './omnibus/index.js';
export * from './runtime/index.js';
export * from './schema/index.js';
export { VERSION, PRODUCT, EXIT_CODES, loadConfigFile, resolveConfigPath, ConfigError } from './config/index.js';
export type { ConfigLocation } from './config/index.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LogSink } from './utils/logger.js';
