/**
 * DynamoDB Query Derivation
 *
 * Derives DynamoDB GetItem, Query and Scan requests from repository method
 * names such as `findByCustomerIdAndOrderDateAfterOrderByOrderDateDesc`,
 * choosing between a direct load, a query on the table or one of its
 * secondary indexes, and a scan.
 *
 * @example
 * ```typescript
 * import { DynamoDBTemplate, createRepository, defineEntity, loadConfigFromEnv } from 'dynamodb-query-derivation';
 *
 * const orders = defineEntity({
 *   name: 'Order',
 *   tableName: 'Orders',
 *   attributes: {
 *     customerId: { partitionKey: true },
 *     orderId: { sortKey: true },
 *     orderDate: { localIndex: 'orderDate-index' },
 *   },
 * });
 *
 * const repository = createRepository(DynamoDBTemplate.fromConfig(loadConfigFromEnv()), orders, {
 *   findByCustomerIdAndOrderDateAfter: { returns: 'many' },
 * });
 * ```
 *
 * @module dynamodb-query-derivation
 */

// ============================================================================
// Configuration
// ============================================================================

export type { RepositoryConfig, CredentialsConfig } from './config/index.js';
export {
  RepositoryConfigBuilder,
  resolveTableName,
  loadConfigFromEnv,
  validateConfig,
  DEFAULT_REGION,
  DEFAULT_LOCAL_ENDPOINT,
} from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Types
// ============================================================================

export * from './types/index.js';

// ============================================================================
// Entity Metadata
// ============================================================================

export * from './metadata/index.js';

// ============================================================================
// Method-Name Parsing
// ============================================================================

export * from './parser/index.js';

// ============================================================================
// Access-Path Resolution
// ============================================================================

export * from './resolver/index.js';

// ============================================================================
// Request Building
// ============================================================================

export type { RequestOptions, BuildContext } from './builders/index.js';
export { ConditionBuilder, buildLoadRequest, buildQueryRequest, buildScanRequest } from './builders/index.js';

// ============================================================================
// Storage
// ============================================================================

export type { DynamoDBOperations, DynamoDBTemplateOptions } from './client/index.js';
export { DynamoDBTemplate, createDocumentClient } from './client/index.js';
export { getItem, queryPage, countQuery, scanPage, countScan, putItem, deleteItem } from './operations/index.js';
export { batchDelete, chunk } from './batch/index.js';

// ============================================================================
// Execution
// ============================================================================

export * from './executor/index.js';

// ============================================================================
// Repository
// ============================================================================

export * from './repository/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Version
// ============================================================================

export const QUERY_DERIVATION_VERSION = '0.1.0';
