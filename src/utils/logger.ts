/**
 * Diagnostic logger for kit.
 *
 * All output goes to stderr so stdout stays clean for command output.
 * Debug lines only appear when KIT_DEBUG is set.
 */

// ── Logger interface ────────────────────────────────────────

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

function debugFlagSet(flag: string | undefined): boolean {
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

/**
 * Logger bound to a sink, with the debug flag read from `env` on every call.
 */
export function createLogger(
  sink: LogSink,
  env: () => Readonly<Record<string, string | undefined>>,
): Logger {
  const write = (message: string): void => {
    sink.write(message + '\n');
  };

  return {
    debug(message, data) {
      if (!debugFlagSet(env()['KIT_DEBUG'])) return;
      const suffix = data !== undefined ? ' ' + JSON.stringify(data) : '';
      write(`🔧 ${message}${suffix}`);
    },
    info(message) {
      write(`ℹ️  ${message}`);
    },
    warn(message) {
      write(`⚠️  ${message}`);
    },
    error(message) {
      write(`💥 ${message}`);
    },
  };
}

// ── Process-bound default ───────────────────────────────────

const processLogger = createLogger(
  { write: (chunk: string) => process.stderr.write(chunk) },
  () => process.env,
);

export function debug(message: string, data?: unknown): void {
  processLogger.debug(message, data);
}

export function info(message: string): void {
  processLogger.info(message);
}

export function warn(message: string): void {
  processLogger.warn(message);
}

export function error(message: string): void {
  processLogger.error(message);
}
