import { createCommandRegistry, registerBuiltins } from '../commands/index.js';
import type { OutputSink } from '../commands/index.js';
import type { RuntimeEnvironment } from '../runtime/index.js';
import type { KitConfig } from '../schema/index.js';
import { PRODUCT, VERSION } from '../config/defaults.js';
import { Dispatcher } from './dispatcher.js';

export interface KitOptions {
  runtime: RuntimeEnvironment;
  stdout: OutputSink;
  stderr: OutputSink;
  config?: KitConfig;
  exit?: (code: number) => void;
}

/**
 * Dispatcher for the `kit` program with the built-in commands registered.
 */
export function createKit(options: KitOptions): Dispatcher {
  const registry = createCommandRegistry();
  registerBuiltins(registry);

  return new Dispatcher({
    ...options,
    registry,
    programName: PRODUCT.PROGRAM_NAME,
    productName: PRODUCT.PRODUCT_NAME,
    version: VERSION,
    appName: PRODUCT.APP_NAME,
  });
}
