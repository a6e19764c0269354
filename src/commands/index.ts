/**
 * Subcommands.
 * Registry of name → factory, plus the kit's built-in commands.
 */

import type { CommandRegistry } from './registry.js';
import { createShellInitCommand, SHELL_INIT_DESCRIPTION } from './shellInit.js';
import { createEnvCommand, ENV_DESCRIPTION } from './env.js';

export * from './types.js';
export { createCommandRegistry, DuplicateCommandError } from './registry.js';
export type { CommandRegistry } from './registry.js';
export { createShellInitCommand, renderShellInit, detectShell } from './shellInit.js';
export { createEnvCommand, collectEnvReport } from './env.js';
export type { EnvReport } from './env.js';

export function registerBuiltins(registry: CommandRegistry): void {
  registry.register('env', createEnvCommand, { description: ENV_DESCRIPTION });
  registry.register('shell-init', createShellInitCommand, { description: SHELL_INIT_DESCRIPTION });
}
