/**
 * Configuration types for the storage client and repositories.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';

/**
 * Credentials configuration.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'environment' };

/**
 * Main configuration interface.
 */
export interface RepositoryConfig {
  /**
   * AWS region where DynamoDB is located.
   * @example 'us-east-1', 'eu-west-1'
   */
  region?: string;

  /**
   * Custom endpoint URL (useful for DynamoDB Local).
   * @example 'http://localhost:8000'
   */
  endpoint?: string;

  /**
   * Credentials configuration. When absent the SDK's default provider chain applies.
   */
  credentials?: CredentialsConfig;

  /**
   * Prefix prepended to every declared table name, e.g. 'staging-'.
   */
  tableNamePrefix?: string;

  /**
   * Declared table name to physical table name. Takes precedence over the prefix.
   */
  tableNameOverrides?: Record<string, string>;

  /**
   * Minimum level for the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;
}

/**
 * Resolves the physical table name for a declared table name.
 */
export function resolveTableName(config: RepositoryConfig, tableName: string): string {
  const override = config.tableNameOverrides?.[tableName];
  if (override !== undefined) {
    return override;
  }
  return `${config.tableNamePrefix ?? ''}${tableName}`;
}

/**
 * Fluent builder for creating RepositoryConfig objects.
 */
export class RepositoryConfigBuilder {
  private config: RepositoryConfig = {};

  /**
   * Sets the AWS region.
   */
  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the custom endpoint URL.
   */
  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Sets static credentials.
   */
  withStaticCredentials(
    accessKeyId: string,
    secretAccessKey: string,
    sessionToken?: string
  ): this {
    this.config.credentials = {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken,
    };
    return this;
  }

  /**
   * Sets profile-based credentials.
   */
  withProfileCredentials(profileName: string): this {
    this.config.credentials = {
      type: 'profile',
      profileName,
    };
    return this;
  }

  /**
   * Sets environment-based credentials.
   */
  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  /**
   * Sets the table name prefix.
   */
  withTableNamePrefix(prefix: string): this {
    this.config.tableNamePrefix = prefix;
    return this;
  }

  /**
   * Maps one declared table name to a physical table name.
   */
  withTableNameOverride(tableName: string, physicalName: string): this {
    this.config.tableNameOverrides = { ...this.config.tableNameOverrides, [tableName]: physicalName };
    return this;
  }

  /**
   * Sets the minimum log level of the default logger.
   */
  withLogLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds the configuration.
   */
  build(): RepositoryConfig {
    return { ...this.config };
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: RepositoryConfig): RepositoryConfigBuilder {
    const builder = new RepositoryConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
