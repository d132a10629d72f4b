/**
 * Key types and utilities for entity items.
 *
 * Defines attribute value types and the primary key structure used when
 * loading or deleting single items.
 */

// ============================================================================
// Attribute Value Types
// ============================================================================

/**
 * DynamoDB attribute value as seen through the document client.
 *
 * Represents any valid DynamoDB attribute value including:
 * - Primitive types: string, number, boolean, null
 * - Binary data: Uint8Array
 * - Sets: Set<string>, Set<number>
 * - Complex types: arrays and nested objects
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | Uint8Array
  | AttributeValueSet
  | AttributeValueArray
  | AttributeValueMap;

/**
 * Set attribute value types.
 */
export type AttributeValueSet = Set<string> | Set<number>;

/**
 * Array attribute value type.
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface AttributeValueArray extends Array<AttributeValue> {}

/**
 * Map attribute value type (nested object).
 */
export interface AttributeValueMap {
  [key: string]: AttributeValue;
}

// ============================================================================
// Key Types
// ============================================================================

/**
 * Primary key of a single item.
 *
 * The sort key is present only for entities with a composite primary key.
 */
export interface Key {
  /** Partition key (hash key) value */
  partitionKey: AttributeValue;
  /** Sort key (range key) value */
  sortKey?: AttributeValue;
}

/**
 * Converts a Key object to a DynamoDB key attribute map.
 *
 * @param key - Key object to convert
 * @param pkName - Wire name of the partition key attribute
 * @param skName - Wire name of the sort key attribute (optional)
 *
 * @example
 * ```typescript
 * const keyMap = toKeyMap({ partitionKey: 'c-1', sortKey: 'o-7' }, 'customerId', 'orderId');
 * // { customerId: 'c-1', orderId: 'o-7' }
 * ```
 */
export function toKeyMap(
  key: Key,
  pkName: string,
  skName?: string
): Record<string, AttributeValue> {
  const keyMap: Record<string, AttributeValue> = {
    [pkName]: key.partitionKey,
  };

  if (key.sortKey !== undefined && skName) {
    keyMap[skName] = key.sortKey;
  }

  return keyMap;
}
