import type { CommandSpec, SubcommandFactory } from './types.js';

// ── CommandRegistry interface ────────────────────────────────

export interface CommandRegistry {
  register(name: string, factory: SubcommandFactory, options: { description: string }): void;
  /** Case-sensitive exact match. */
  lookup(name: string): CommandSpec | undefined;
  /** Commands in registration order. */
  list(): readonly CommandSpec[];
}

// ── Error ────────────────────────────────────────────────────

export class DuplicateCommandError extends Error {
  constructor(readonly commandName: string) {
    super(`Command "${commandName}" is already registered`);
    this.name = 'DuplicateCommandError';
  }
}

// ── Factory ──────────────────────────────────────────────────

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, CommandSpec>();

  return {
    register(name, factory, options) {
      if (name.length === 0 || name.startsWith('-')) {
        throw new Error(`Invalid command name: "${name}"`);
      }
      if (commands.has(name)) {
        throw new DuplicateCommandError(name);
      }
      commands.set(name, Object.freeze({ name, description: options.description, factory }));
    },

    lookup(name) {
      return commands.get(name);
    },

    list() {
      return [...commands.values()];
    },
  };
}
