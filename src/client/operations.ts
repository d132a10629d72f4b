/**
 * Storage collaborator used by derived queries and repositories.
 *
 * Items crossing this interface are keyed by property name. Implementations
 * translate to wire attribute names and resolve the physical table name.
 */

import type { EntityKeyMetadata } from '../metadata/entity.js';
import type { AttributeValue, Key } from '../types/key.js';
import type { Item } from '../types/item.js';
import type { ConsistencyMode, QueryRequest, ScanRequest } from '../types/request.js';
import type { BatchDeleteResult, Page } from '../types/results.js';

export interface DynamoDBOperations {
  /** Single item by primary key, undefined on a miss */
  load(entity: EntityKeyMetadata, key: Key, consistency?: ConsistencyMode): Promise<Item | undefined>;

  /** One page of a query; `exclusiveStartKey` continues from a previous page */
  query(entity: EntityKeyMetadata, request: QueryRequest, exclusiveStartKey?: Record<string, AttributeValue>): Promise<Page>;

  /** One page of a scan */
  scan(entity: EntityKeyMetadata, request: ScanRequest, exclusiveStartKey?: Record<string, AttributeValue>): Promise<Page>;

  /** Number of matching items across all pages */
  count(entity: EntityKeyMetadata, request: QueryRequest | ScanRequest): Promise<number>;

  /** Creates or replaces an item and returns it */
  save(entity: EntityKeyMetadata, item: Item): Promise<Item>;

  /** Deletes by primary key and returns the removed item, if any */
  delete(entity: EntityKeyMetadata, key: Key): Promise<Item | undefined>;

  /** Deletes the given items by their key properties */
  batchDelete(entity: EntityKeyMetadata, items: readonly Item[]): Promise<BatchDeleteResult>;
}

/**
 * Narrows a count request to the query form.
 */
export function isQueryRequest(request: QueryRequest | ScanRequest): request is QueryRequest {
  return 'keyConditionExpression' in request;
}
