/**
 * DynamoDB Template
 *
 * The storage collaborator over the AWS SDK v3 document client. Each call
 * resolves the physical table name, renames properties to their stored
 * attribute names and back, and reports to the logger and metrics
 * collector. Failures are logged and rethrown unchanged; there is no retry
 * at this layer.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { fromIni } from '@aws-sdk/credential-providers';

import type { RepositoryConfig } from '../config/config.js';
import { resolveTableName } from '../config/config.js';
import { DEFAULT_REGION } from '../config/defaults.js';
import type { EntityKeyMetadata } from '../metadata/entity.js';
import { attributeNameOf, sortKeyOf } from '../metadata/entity.js';
import type { Logger } from '../observability/logging.js';
import { ConsoleLogger, logError } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { NoopMetricsCollector, RepositoryMetricNames } from '../observability/metrics.js';
import type { AttributeValue, Key } from '../types/key.js';
import { toKeyMap } from '../types/key.js';
import type { Item } from '../types/item.js';
import type { ConsistencyMode, QueryRequest, ScanRequest } from '../types/request.js';
import { toConsistentRead } from '../types/request.js';
import type { BatchDeleteResult, Page } from '../types/results.js';
import { getItem } from '../operations/get.js';
import { queryPage, countQuery } from '../operations/query.js';
import { scanPage, countScan } from '../operations/scan.js';
import { putItem } from '../operations/put.js';
import { deleteItem } from '../operations/delete.js';
import { batchDelete } from '../batch/delete.js';
import { ParameterBindingError } from '../error/index.js';
import type { DynamoDBOperations } from './operations.js';
import { isQueryRequest } from './operations.js';

export type { DynamoDBOperations } from './operations.js';
export { isQueryRequest } from './operations.js';

// ============================================================================
// Client Factory
// ============================================================================

/**
 * Creates a document client from repository configuration.
 *
 * @example
 * ```typescript
 * const docClient = createDocumentClient(
 *   new RepositoryConfigBuilder().withRegion('eu-west-1').withEndpoint('http://localhost:8000').build()
 * );
 * ```
 */
export function createDocumentClient(config: RepositoryConfig = {}): DynamoDBDocumentClient {
  const awsConfig: DynamoDBClientConfig = {
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
  };

  if (config.credentials) {
    switch (config.credentials.type) {
      case 'static':
        awsConfig.credentials = {
          accessKeyId: config.credentials.accessKeyId,
          secretAccessKey: config.credentials.secretAccessKey,
          sessionToken: config.credentials.sessionToken,
        };
        break;
      case 'profile':
        awsConfig.credentials = fromIni({ profile: config.credentials.profileName });
        break;
      case 'environment':
        // The SDK's default chain reads AWS_ACCESS_KEY_ID and friends
        break;
    }
  }

  return DynamoDBDocumentClient.from(new DynamoDBClient(awsConfig), {
    marshallOptions: {
      removeUndefinedValues: true,
      convertClassInstanceToMap: true,
    },
    unmarshallOptions: {
      wrapNumbers: false,
    },
  });
}

// ============================================================================
// DynamoDBTemplate
// ============================================================================

export interface DynamoDBTemplateOptions {
  /** Table-name prefix and overrides are taken from here */
  config?: RepositoryConfig;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * DynamoDBOperations over a document client.
 *
 * @example
 * ```typescript
 * const template = DynamoDBTemplate.fromConfig(loadConfigFromEnv());
 * const order = await template.load(orders, { partitionKey: 'c-1', sortKey: 'o-7' });
 * ```
 */
export class DynamoDBTemplate implements DynamoDBOperations {
  private readonly config: RepositoryConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    options: DynamoDBTemplateOptions = {}
  ) {
    this.config = options.config ?? {};
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel ?? 'info');
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Creates a template with its own document client.
   */
  static fromConfig(config: RepositoryConfig, options: Omit<DynamoDBTemplateOptions, 'config'> = {}): DynamoDBTemplate {
    return new DynamoDBTemplate(createDocumentClient(config), { ...options, config });
  }

  /**
   * Physical table name of an entity.
   */
  tableNameOf(entity: EntityKeyMetadata): string {
    return resolveTableName(this.config, entity.tableName);
  }

  async load(entity: EntityKeyMetadata, key: Key, consistency: ConsistencyMode = 'DEFAULT'): Promise<Item | undefined> {
    return this.execute('GetItem', entity, async (tableName) => {
      const item = await getItem(this.docClient, tableName, this.keyMapOf(entity, key), toConsistentRead(consistency));
      return item === undefined ? undefined : this.fromStorage(entity, item);
    });
  }

  async query(
    entity: EntityKeyMetadata,
    request: QueryRequest,
    exclusiveStartKey?: Record<string, AttributeValue>
  ): Promise<Page> {
    return this.execute('Query', entity, async (tableName) => {
      const page = await queryPage(this.docClient, tableName, request, exclusiveStartKey);
      return { ...page, items: page.items.map((item) => this.fromStorage(entity, item)) };
    });
  }

  async scan(
    entity: EntityKeyMetadata,
    request: ScanRequest,
    exclusiveStartKey?: Record<string, AttributeValue>
  ): Promise<Page> {
    return this.execute('Scan', entity, async (tableName) => {
      const page = await scanPage(this.docClient, tableName, request, exclusiveStartKey);
      return { ...page, items: page.items.map((item) => this.fromStorage(entity, item)) };
    });
  }

  async count(entity: EntityKeyMetadata, request: QueryRequest | ScanRequest): Promise<number> {
    if (isQueryRequest(request)) {
      return this.execute('QueryCount', entity, (tableName) => countQuery(this.docClient, tableName, request));
    }
    return this.execute('ScanCount', entity, (tableName) => countScan(this.docClient, tableName, request));
  }

  async save(entity: EntityKeyMetadata, item: Item): Promise<Item> {
    return this.execute('PutItem', entity, async (tableName) => {
      await putItem(this.docClient, tableName, this.toStorage(entity, item));
      return item;
    });
  }

  async delete(entity: EntityKeyMetadata, key: Key): Promise<Item | undefined> {
    return this.execute('DeleteItem', entity, async (tableName) => {
      const removed = await deleteItem(this.docClient, tableName, this.keyMapOf(entity, key));
      return removed === undefined ? undefined : this.fromStorage(entity, removed);
    });
  }

  async batchDelete(entity: EntityKeyMetadata, items: readonly Item[]): Promise<BatchDeleteResult> {
    const keyMaps = items.map((item) => this.keyMapOf(entity, this.keyOf(entity, item)));
    return this.execute('BatchWriteItem', entity, (tableName) => batchDelete(this.docClient, tableName, keyMaps));
  }

  private keyOf(entity: EntityKeyMetadata, item: Item): Key {
    const sortKey = sortKeyOf(entity);
    return {
      partitionKey: this.keyValue(entity, item, entity.partitionKey),
      sortKey: sortKey === undefined ? undefined : this.keyValue(entity, item, sortKey),
    };
  }

  private keyValue(entity: EntityKeyMetadata, item: Item, property: string): AttributeValue {
    const value = item[property];
    if (value === undefined || value === null) {
      throw new ParameterBindingError(`Item of ${entity.entityName} has no value for key property ${property}`, {
        details: { property },
      });
    }
    return value;
  }

  private keyMapOf(entity: EntityKeyMetadata, key: Key): Record<string, AttributeValue> {
    const sortKey = sortKeyOf(entity);
    return toKeyMap(
      key,
      attributeNameOf(entity, entity.partitionKey),
      sortKey === undefined ? undefined : attributeNameOf(entity, sortKey)
    );
  }

  private toStorage(entity: EntityKeyMetadata, item: Item): Item {
    if (entity.attributeNames.size === 0) {
      return item;
    }
    return Object.fromEntries(
      Object.entries(item).map(([property, value]) => [attributeNameOf(entity, property), value])
    );
  }

  private fromStorage(entity: EntityKeyMetadata, item: Item): Item {
    if (entity.attributeNames.size === 0) {
      return item;
    }
    const properties = new Map<string, string>();
    for (const [property, attribute] of entity.attributeNames) {
      properties.set(attribute, property);
    }
    return Object.fromEntries(
      Object.entries(item).map(([attribute, value]) => [properties.get(attribute) ?? attribute, value])
    );
  }

  private async execute<R>(
    operation: string,
    entity: EntityKeyMetadata,
    call: (tableName: string) => Promise<R>
  ): Promise<R> {
    const tableName = this.tableNameOf(entity);
    const labels = { operation, table: tableName };
    this.metrics.incrementCounter(RepositoryMetricNames.STORAGE_CALLS_TOTAL, 1, labels);

    try {
      const result = await call(tableName);
      this.logger.debug(`${operation} succeeded`, { tableName, entity: entity.entityName });
      return result;
    } catch (error) {
      this.metrics.incrementCounter(RepositoryMetricNames.ERRORS, 1, labels);
      logError(this.logger, operation, tableName, error);
      throw error;
    }
  }
}
