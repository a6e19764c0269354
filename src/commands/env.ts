import { stringify as stringifyYaml } from 'yaml';

import { searchPathEntries } from '../runtime/index.js';
import { findOmnibusLayout } from '../omnibus/index.js';
import { createSanityChecker } from '../sanity/index.js';
import type { SanityVerdict } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { createLogger } from '../utils/logger.js';
import { createSubcommandProgram, parseArguments } from './program.js';
import type { CommandContext, Subcommand } from './types.js';

export const ENV_DESCRIPTION = 'Describe the kit installation and its environment';

// ── Report shape ─────────────────────────────────────────────

export interface EnvReport {
  product: string;
  version: string;
  platform: string;
  runtime: string;
  omnibus: {
    root: string;
    binDir: string;
    embeddedBinDir: string;
  } | null;
  sanity: SanityVerdict;
  path: string[];
}

export function collectEnvReport(context: CommandContext): EnvReport {
  const layout = findOmnibusLayout(context.runtime, context.appName);
  const sanity = createSanityChecker(context.runtime, {
    appName: context.appName,
    programName: context.programName,
    logger: createLogger(context.stderr, () => context.runtime.env()),
  }).check();

  return {
    product: context.productName,
    version: context.version,
    platform: context.runtime.platform(),
    runtime: context.runtime.runtimePath(),
    omnibus:
      layout !== null
        ? { root: layout.root, binDir: layout.binDir, embeddedBinDir: layout.embeddedBinDir }
        : null,
    sanity: sanity.verdict,
    path: searchPathEntries(context.runtime),
  };
}

// ── Command ──────────────────────────────────────────────────

export function createEnvCommand(context: CommandContext): Subcommand {
  return {
    run(args) {
      const flags = { json: false };

      const program = createSubcommandProgram(context, 'env', ENV_DESCRIPTION)
        .option('--json', 'Output JSON instead of YAML')
        .action((opts: { json?: true }) => {
          flags.json = opts.json === true;
        });

      const handled = parseArguments(program, args);
      if (handled !== null) return handled;

      const report = collectEnvReport(context);
      context.stdout.write(
        flags.json ? JSON.stringify(report, null, 2) + '\n' : stringifyYaml(report),
      );
      return EXIT_CODES.SUCCESS;
    },
  };
}
