import type { RuntimeEnvironment } from '../runtime/index.js';
import type { KitConfig } from '../schema/index.js';

// ── Output sinks ─────────────────────────────────────────────
// process.stdout and process.stderr satisfy this shape.

export interface OutputSink {
  write(chunk: string): unknown;
}

// ── Subcommand contract ──────────────────────────────────────

export interface Subcommand {
  /** Runs with the arguments after the command name; returns the exit code. */
  run(args: readonly string[]): number;
}

export interface CommandContext {
  stdout: OutputSink;
  stderr: OutputSink;
  runtime: RuntimeEnvironment;
  config: KitConfig;
  programName: string;
  productName: string;
  version: string;
  appName: string;
}

export type SubcommandFactory = (context: CommandContext) => Subcommand;

export interface CommandSpec {
  readonly name: string;
  readonly description: string;
  readonly factory: SubcommandFactory;
}
