/**
 * Route exports
 */

export { healthRoutes, API_VERSION } from './health.js';
export type { HealthRoutesOptions } from './health.js';
export { vaultRoutes } from './vault.js';
export type { VaultRoutesOptions } from './vault.js';
export { inputRoutes } from './inputs.js';
export type { InputRoutesOptions } from './inputs.js';
