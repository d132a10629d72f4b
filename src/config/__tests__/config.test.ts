/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  RepositoryConfigBuilder,
  resolveTableName,
  loadConfigFromEnv,
  getEnvBoolean,
  validateConfig,
  DEFAULT_LOCAL_ENDPOINT,
} from '../index.js';
import { ConfigurationError } from '../../error/index.js';

describe('RepositoryConfigBuilder', () => {
  it('should build a complete configuration', () => {
    const config = new RepositoryConfigBuilder()
      .withRegion('eu-west-1')
      .withEndpoint('http://localhost:8000')
      .withStaticCredentials('test', 'test-secret')
      .withTableNamePrefix('dev-')
      .withTableNameOverride('Orders', 'orders-v2')
      .withTableNameOverride('Customers', 'crm')
      .withLogLevel('debug')
      .build();

    expect(config).toEqual({
      region: 'eu-west-1',
      endpoint: 'http://localhost:8000',
      credentials: { type: 'static', accessKeyId: 'test', secretAccessKey: 'test-secret', sessionToken: undefined },
      tableNamePrefix: 'dev-',
      tableNameOverrides: { Orders: 'orders-v2', Customers: 'crm' },
      logLevel: 'debug',
    });
  });

  it('should replace earlier credentials', () => {
    const builder = new RepositoryConfigBuilder().withProfileCredentials('dev');
    expect(builder.build().credentials).toEqual({ type: 'profile', profileName: 'dev' });

    expect(builder.withEnvironmentCredentials().build().credentials).toEqual({ type: 'environment' });
  });

  it('should start from an existing configuration without changing it', () => {
    const base = { region: 'us-west-2' };
    const config = RepositoryConfigBuilder.from(base).withTableNamePrefix('qa-').build();

    expect(config).toEqual({ region: 'us-west-2', tableNamePrefix: 'qa-' });
    expect(base).toEqual({ region: 'us-west-2' });
  });
});

describe('resolveTableName', () => {
  it('should prefer overrides over the prefix', () => {
    const config = { tableNamePrefix: 'dev-', tableNameOverrides: { Orders: 'orders-v2' } };

    expect(resolveTableName(config, 'Orders')).toBe('orders-v2');
    expect(resolveTableName(config, 'Customers')).toBe('dev-Customers');
    expect(resolveTableName({}, 'Customers')).toBe('Customers');
  });
});

describe('loadConfigFromEnv', () => {
  it('should fall back to defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({ region: 'us-east-1', credentials: { type: 'environment' } });
  });

  it('should read region, credentials, prefix and log level', () => {
    const config = loadConfigFromEnv({
      AWS_DEFAULT_REGION: 'ap-south-1',
      AWS_ACCESS_KEY_ID: 'test',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_PROFILE: 'ignored',
      DYNAMODB_TABLE_PREFIX: 'ci-',
      DYNAMODB_LOG_LEVEL: 'WARN',
    });

    expect(config).toEqual({
      region: 'ap-south-1',
      credentials: { type: 'static', accessKeyId: 'test', secretAccessKey: 'test-secret', sessionToken: undefined },
      tableNamePrefix: 'ci-',
      logLevel: 'warn',
    });
  });

  it('should use a profile when no static credentials are set', () => {
    expect(loadConfigFromEnv({ AWS_PROFILE: 'dev' }).credentials).toEqual({ type: 'profile', profileName: 'dev' });
  });

  it('should resolve the endpoint', () => {
    expect(loadConfigFromEnv({ DYNAMODB_LOCAL: 'true' }).endpoint).toBe(DEFAULT_LOCAL_ENDPOINT);
    expect(
      loadConfigFromEnv({ DYNAMODB_LOCAL: 'true', DYNAMODB_ENDPOINT: 'http://dynamo:8000' }).endpoint
    ).toBe('http://dynamo:8000');
    expect(loadConfigFromEnv({ DYNAMODB_LOCAL: 'no' }).endpoint).toBeUndefined();
  });

  it('should ignore an unknown log level', () => {
    expect(loadConfigFromEnv({ DYNAMODB_LOG_LEVEL: 'verbose' }).logLevel).toBeUndefined();
  });
});

describe('getEnvBoolean', () => {
  it('should accept true and 1', () => {
    expect(getEnvBoolean({ FLAG: 'TRUE' }, 'FLAG')).toBe(true);
    expect(getEnvBoolean({ FLAG: '1' }, 'FLAG')).toBe(true);
    expect(getEnvBoolean({ FLAG: 'yes' }, 'FLAG')).toBe(false);
    expect(getEnvBoolean({}, 'FLAG', true)).toBe(true);
  });
});

describe('validateConfig', () => {
  it('should accept a valid configuration', () => {
    expect(() =>
      validateConfig({
        region: 'us-east-1',
        endpoint: 'https://dynamodb.us-east-1.amazonaws.com',
        credentials: { type: 'profile', profileName: 'dev' },
        tableNameOverrides: { Orders: 'orders-v2' },
      })
    ).not.toThrow();
  });

  it('should reject a malformed region', () => {
    expect(() => validateConfig({ region: 'useast1' })).toThrow(
      "Invalid region format: useast1. Expected format like 'us-east-1' or 'eu-west-2'"
    );
    expect(() => validateConfig({ region: ' ' })).toThrow('Region must be a non-empty string');
  });

  it('should reject endpoints that are not http URLs', () => {
    expect(() => validateConfig({ endpoint: 'not a url' })).toThrow('Invalid endpoint URL: not a url');
    expect(() => validateConfig({ endpoint: 'ftp://localhost' })).toThrow(
      'Endpoint URL must use http: or https: protocol'
    );
  });

  it('should reject empty credentials and overrides', () => {
    expect(() =>
      validateConfig({ credentials: { type: 'static', accessKeyId: 'test', secretAccessKey: '' } })
    ).toThrow('Static credentials require non-empty secretAccessKey');
    expect(() => validateConfig({ tableNameOverrides: { Orders: '' } })).toThrow(ConfigurationError);
  });
});
