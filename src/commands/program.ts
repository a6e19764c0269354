import { Command, CommanderError } from 'commander';

import type { CommandContext } from './types.js';

// ── Commander wiring ─────────────────────────────────────────
// Subcommands parse their own options with commander, writing to the
// injected sinks and never exiting the process themselves.

export function createSubcommandProgram(
  context: CommandContext,
  name: string,
  description: string,
): Command {
  return new Command()
    .name(`${context.programName} ${name}`)
    .description(description)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        context.stdout.write(str);
      },
      writeErr: (str) => {
        context.stderr.write(str);
      },
    });
}

/**
 * Parse user arguments. Returns commander's exit code when it handled the
 * invocation itself (help output or a usage error), otherwise null.
 */
export function parseArguments(program: Command, args: readonly string[]): number | null {
  try {
    program.parse([...args], { from: 'user' });
    return null;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
}
