import path from 'node:path';

import { Argument } from 'commander';

import { pathListSeparator, isWindows } from '../runtime/index.js';
import { resolveOmnibusLayout, OmnibusInstallNotFoundError } from '../omnibus/index.js';
import type { OmnibusLayout } from '../omnibus/index.js';
import { shellNameSchema } from '../schema/index.js';
import type { ShellName } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { createSubcommandProgram, parseArguments } from './program.js';
import type { CommandContext, Subcommand } from './types.js';

export const SHELL_INIT_DESCRIPTION = 'Print shell statements that put the kit on your PATH';

// ── Shell selection ──────────────────────────────────────────

/**
 * Shell used when none is given: config, then the basename of $SHELL, then
 * the platform default.
 */
export function detectShell(context: CommandContext): ShellName {
  if (context.config.shell !== undefined) return context.config.shell;

  const login = context.runtime.env()['SHELL'];
  if (login !== undefined && login !== '') {
    const candidate = path.basename(login) === 'pwsh' ? 'powershell' : path.basename(login);
    const parsed = shellNameSchema.safeParse(candidate);
    if (parsed.success) return parsed.data;
  }

  return isWindows(context.runtime) ? 'powershell' : 'sh';
}

// ── Rendering ────────────────────────────────────────────────

export function renderShellInit(
  shell: ShellName,
  layout: Pick<OmnibusLayout, 'binDir' | 'embeddedBinDir'>,
  separator: string,
): string {
  const { binDir, embeddedBinDir } = layout;

  switch (shell) {
    case 'sh':
    case 'bash':
    case 'zsh':
      return `export PATH="${binDir}${separator}${embeddedBinDir}${separator}$PATH"\n`;
    case 'fish':
      return `set -gx PATH "${binDir}" "${embeddedBinDir}" $PATH;\n`;
    case 'powershell':
      return `$env:PATH = "${binDir}${separator}${embeddedBinDir}${separator}" + $env:PATH\n`;
  }
}

// ── Command ──────────────────────────────────────────────────

export function createShellInitCommand(context: CommandContext): Subcommand {
  return {
    run(args) {
      const selected: { shell?: ShellName } = {};

      const program = createSubcommandProgram(context, 'shell-init', SHELL_INIT_DESCRIPTION)
        .addArgument(
          new Argument('[shell]', 'shell to emit statements for').choices(shellNameSchema.options),
        )
        .action((shell: unknown) => {
          const parsed = shellNameSchema.safeParse(shell);
          if (parsed.success) selected.shell = parsed.data;
        });

      const handled = parseArguments(program, args);
      if (handled !== null) return handled;

      let layout: OmnibusLayout;
      try {
        layout = resolveOmnibusLayout(context.runtime, context.appName);
      } catch (err) {
        if (!(err instanceof OmnibusInstallNotFoundError)) throw err;
        context.stderr.write(
          `${context.programName} shell-init only works with an omnibus install of ${context.productName}.\n`,
        );
        return EXIT_CODES.USAGE;
      }

      const shell = selected.shell ?? detectShell(context);
      context.stdout.write(renderShellInit(shell, layout, pathListSeparator(context.runtime)));
      return EXIT_CODES.SUCCESS;
    },
  };
}
