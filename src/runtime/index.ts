/**
 * Runtime module.
 * The only place that reads the live process environment.
 */

export {
  createProcessEnvironment,
  isWindows,
  pathListSeparator,
  pathKey,
  searchPathEntries,
} from './environment.js';
export type { RuntimeEnvironment, EnvVars } from './environment.js';
