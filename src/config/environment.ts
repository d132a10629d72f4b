/**
 * Environment variable loading.
 * @module config/environment
 */

import type { RepositoryConfig, CredentialsConfig } from './config.js';
import { DEFAULT_LOCAL_ENDPOINT, DEFAULT_REGION } from './defaults.js';
import { isLogLevel } from '../observability/logging.js';

/**
 * Loads configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: profile-based credentials
 * - DYNAMODB_ENDPOINT: custom endpoint
 * - DYNAMODB_LOCAL: set to 'true' to use the local endpoint
 * - DYNAMODB_TABLE_PREFIX: prefix for every table name
 * - DYNAMODB_LOG_LEVEL: error | warn | info | debug | trace
 *
 * @param env - Variables to read, defaults to process.env
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RepositoryConfig {
  const config: RepositoryConfig = {};

  config.region = env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION;
  config.credentials = loadCredentialsFromEnv(env);

  const endpoint = env.DYNAMODB_ENDPOINT;
  if (endpoint) {
    config.endpoint = endpoint;
  } else if (getEnvBoolean(env, 'DYNAMODB_LOCAL')) {
    config.endpoint = DEFAULT_LOCAL_ENDPOINT;
  }

  const prefix = env.DYNAMODB_TABLE_PREFIX;
  if (prefix) {
    config.tableNamePrefix = prefix;
  }

  const logLevel = env.DYNAMODB_LOG_LEVEL?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Loads credentials configuration from environment variables.
 *
 * Priority order:
 * 1. Static credentials (AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY)
 * 2. Profile (AWS_PROFILE)
 * 3. Environment (default SDK credential chain)
 */
function loadCredentialsFromEnv(env: NodeJS.ProcessEnv): CredentialsConfig {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: env.AWS_SESSION_TOKEN,
    };
  }

  const profile = env.AWS_PROFILE;
  if (profile) {
    return {
      type: 'profile',
      profileName: profile,
    };
  }

  return {
    type: 'environment',
  };
}

/**
 * Gets an environment variable as a boolean.
 */
export function getEnvBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue = false): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true' || value === '1';
}
