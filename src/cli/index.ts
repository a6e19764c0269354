/**
 * CLI module — top-level dispatch.
 * Parses argv, prints help and version, delegates to subcommands.
 * No subcommand logic lives here.
 */

export { Dispatcher, parseInvocation } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { renderHelp, renderVersion } from './help.js';
export { createKit } from './kit.js';
export type { KitOptions } from './kit.js';
