/**
 * Configuration
 *
 * Client configuration, environment loading and validation.
 */

export type { RepositoryConfig, CredentialsConfig } from './config.js';
export { RepositoryConfigBuilder, resolveTableName } from './config.js';
export { DEFAULT_REGION, DEFAULT_LOCAL_ENDPOINT, MAX_BATCH_WRITE_ITEMS } from './defaults.js';
export { loadConfigFromEnv, getEnvBoolean } from './environment.js';
export { validateConfig } from './validation.js';
