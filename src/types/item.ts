/**
 * Item types.
 */

import type { AttributeValue } from './key.js';

/**
 * A single stored item - a record with string keys and attribute values.
 *
 * Items handed to and returned from the storage collaborator are keyed by
 * property name; the wire attribute names only appear inside requests.
 */
export type Item = Record<string, AttributeValue>;

/**
 * Consumed capacity information reported with a page of results.
 */
export interface ConsumedCapacity {
  /** Capacity consumed at the table level */
  tableCapacity?: number;
  /** Capacity units consumed in total */
  capacityUnits?: number;
}
