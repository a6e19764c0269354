import type {
  CommandContext,
  CommandRegistry,
  OutputSink,
} from '../commands/index.js';
import type { RuntimeEnvironment } from '../runtime/index.js';
import type { EnvironmentSanityChecker } from '../sanity/index.js';
import { createSanityChecker } from '../sanity/index.js';
import { SANITY_POLICY } from '../schema/index.js';
import type { KitConfig, ParsedInvocation } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { renderHelp, renderVersion } from './help.js';

// ── Public types ─────────────────────────────────────────────

export interface DispatcherOptions {
  registry: CommandRegistry;
  runtime: RuntimeEnvironment;
  stdout: OutputSink;
  stderr: OutputSink;
  programName: string;
  productName: string;
  version: string;
  appName: string;
  config?: KitConfig;
  /** Receives the final exit code from start(). */
  exit?: (code: number) => void;
  /** Replaces the default omnibus PATH check. */
  sanityChecker?: EnvironmentSanityChecker;
  /** Defaults to the injected stderr, with KIT_DEBUG read from the runtime env. */
  logger?: Logger;
}

const HELP_FLAGS: ReadonlySet<string> = new Set(['-h', '--help']);
const VERSION_FLAGS: ReadonlySet<string> = new Set(['-v', '--version']);

// ── Argument parsing ─────────────────────────────────────────

export function parseInvocation(
  argv: readonly string[],
  registry: Pick<CommandRegistry, 'lookup'>,
): ParsedInvocation {
  const [first, ...rest] = argv;

  if (first === undefined || HELP_FLAGS.has(first)) {
    return { mode: 'help' };
  }
  if (VERSION_FLAGS.has(first)) {
    return { mode: 'version' };
  }
  if (first.startsWith('-')) {
    return { mode: 'invalid-option', token: first };
  }
  if (registry.lookup(first) === undefined) {
    return { mode: 'unknown-command', commandName: first, args: rest };
  }
  return { mode: 'run', commandName: first, args: rest };
}

// ── Dispatcher ───────────────────────────────────────────────

export class Dispatcher {
  private readonly options: DispatcherOptions;
  private readonly sanityChecker: EnvironmentSanityChecker;
  private readonly log: Logger;

  constructor(options: DispatcherOptions) {
    this.options = options;
    this.log = options.logger ?? createLogger(options.stderr, () => options.runtime.env());
    this.sanityChecker =
      options.sanityChecker ??
      createSanityChecker(options.runtime, {
        appName: options.appName,
        programName: options.programName,
        logger: this.log,
      });
  }

  /**
   * Route argv and return the exit code. Usage problems become stderr text
   * plus help; nothing is thrown for them.
   */
  run(argv: readonly string[]): number {
    const { stdout, stderr } = this.options;
    const invocation = parseInvocation(argv, this.options.registry);
    this.log.debug('dispatch', invocation);

    switch (invocation.mode) {
      case 'help':
        stdout.write(this.help());
        return EXIT_CODES.SUCCESS;

      case 'version':
        stdout.write(renderVersion(this.options.productName, this.options.version));
        return EXIT_CODES.SUCCESS;

      case 'invalid-option':
        stderr.write(`invalid option: ${invocation.token}\n`);
        stdout.write(this.help());
        return EXIT_CODES.USAGE;

      case 'unknown-command':
        return this.unknownCommand(invocation.commandName);

      case 'run':
        return this.delegate(invocation.commandName, invocation.args);
    }
  }

  /**
   * Run and hand the exit code to the exit effect (process.exitCode by
   * default).
   */
  start(argv: readonly string[]): number {
    const code = this.run(argv);
    const exit =
      this.options.exit ??
      ((c: number) => {
        process.exitCode = c;
      });
    exit(code);
    return code;
  }

  help(): string {
    return renderHelp(this.options.programName, this.options.registry.list());
  }

  private delegate(name: string, args: readonly string[]): number {
    const spec = this.options.registry.lookup(name);
    if (spec === undefined) return this.unknownCommand(name);

    const sanity = this.sanityChecker.check();
    const policy = SANITY_POLICY[sanity.verdict];
    if (sanity.message !== undefined) {
      this.options.stdout.write(sanity.message);
    }
    if (policy.blocking) {
      return policy.exitCode;
    }

    const command = spec.factory(this.context());
    const code = command.run(args);
    this.log.debug('command finished', { command: name, exitCode: code });
    return code;
  }

  private unknownCommand(name: string): number {
    this.options.stderr.write(`Unknown command \`${name}'.\n`);
    this.options.stdout.write(this.help());
    return EXIT_CODES.USAGE;
  }

  private context(): CommandContext {
    const o = this.options;
    return {
      stdout: o.stdout,
      stderr: o.stderr,
      runtime: o.runtime,
      config: o.config ?? {},
      programName: o.programName,
      productName: o.productName,
      version: o.version,
      appName: o.appName,
    };
  }
}
