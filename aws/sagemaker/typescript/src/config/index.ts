/**
 * Training action configuration
 */

export * from './defaults.js';
export { collectInputs, getInput } from './inputs.js';
export { toActionConfig, credentialsFromInputs } from './action-config.js';
export type { ActionConfig, CredentialsConfig } from './action-config.js';
