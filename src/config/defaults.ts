/**
 * Default configuration values.
 * Product identity and process exit codes shared by every module.
 */

export const VERSION = '0.1.0';

export const PRODUCT = {
  PROGRAM_NAME: 'kit',
  PRODUCT_NAME: 'Omnikit Development Kit',
  // Directory under <root>/embedded/apps that marks an omnibus install.
  APP_NAME: 'omnikit',
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  INTERNAL: 2,
} as const;

export const CONFIG_PATHS = {
  ENV_VAR: 'KIT_CONFIG',
  DEFAULT_DIR: '.kit',
  DEFAULT_FILE: 'config.yaml',
} as const;
