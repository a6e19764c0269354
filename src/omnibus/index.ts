/**
 * Omnibus install layout.
 * Derives the bundled distribution's directories from the running runtime.
 */

export { resolveOmnibusLayout, findOmnibusLayout } from './layout.js';
export type { OmnibusLayout } from './layout.js';
export { OmnibusInstallNotFoundError } from './errors.js';
