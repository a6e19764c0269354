/**
 * Configuration module.
 * Product identity, exit codes, and the optional user config file.
 * Zod-validated.
 */

export { VERSION, PRODUCT, EXIT_CODES, CONFIG_PATHS } from './defaults.js';
export { loadConfigFile, resolveConfigPath, ConfigError } from './loader.js';
export type { ConfigLocation } from './loader.js';
