/**
 * Environment sanity check.
 * Warns when the omnibus embedded bin directory shadows the kit's own bin
 * directory on the search path. Advisory only.
 */

export { createSanityChecker, classifySearchPath } from './checker.js';
export type { EnvironmentSanityChecker, SanityCheckOptions } from './checker.js';
