/**
 * Configuration validation.
 * @module config/validation
 */

import type { RepositoryConfig, CredentialsConfig } from './config.js';
import { ConfigurationError } from '../error/index.js';

/**
 * Validates the configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: RepositoryConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  if (config.tableNameOverrides !== undefined) {
    for (const [tableName, physicalName] of Object.entries(config.tableNameOverrides)) {
      if (physicalName.trim().length === 0) {
        throw new ConfigurationError(`Table name override for ${tableName} must be a non-empty string`);
      }
    }
  }
}

/**
 * Validates AWS region format.
 */
function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  // e.g. us-east-1, eu-west-2
  const regionPattern = /^[a-z]{2}(-[a-z]+)+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(
      `Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-west-2'`
    );
  }
}

/**
 * Validates endpoint URL.
 */
function validateEndpoint(endpoint: string): void {
  if (endpoint.trim().length === 0) {
    throw new ConfigurationError('Endpoint must be a non-empty string');
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`, {
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol');
  }
}

/**
 * Validates credentials configuration.
 */
function validateCredentials(credentials: CredentialsConfig): void {
  switch (credentials.type) {
    case 'static':
      if (credentials.accessKeyId.trim().length === 0) {
        throw new ConfigurationError('Static credentials require non-empty accessKeyId');
      }
      if (credentials.secretAccessKey.trim().length === 0) {
        throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
      }
      break;
    case 'profile':
      if (credentials.profileName.trim().length === 0) {
        throw new ConfigurationError('Profile credentials require non-empty profileName');
      }
      break;
    case 'environment':
      break;
  }
}
