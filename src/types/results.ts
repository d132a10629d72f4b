/**
 * Result types returned by the storage collaborator.
 */

import type { AttributeValue } from './key.js';
import type { ConsumedCapacity, Item } from './item.js';

/**
 * One page of a query or scan.
 */
export interface Page {
  /** Items on this page (after filter) */
  items: Item[];
  /** Pagination token for the next page (undefined if no more results) */
  lastEvaluatedKey?: Record<string, AttributeValue>;
  /** Number of items returned (after filter) */
  count: number;
  /** Number of items examined (before filter) */
  scannedCount: number;
  /** Consumed read capacity information */
  consumedCapacity?: ConsumedCapacity;
}

/**
 * Outcome of a batch delete.
 */
export interface BatchDeleteResult {
  /** Number of delete requests the service accepted */
  processedCount: number;
  /** Number of BatchWriteItem calls issued */
  batches: number;
}
