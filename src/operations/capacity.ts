import type { ConsumedCapacity as SdkConsumedCapacity } from '@aws-sdk/client-dynamodb';
import type { ConsumedCapacity } from '../types/item.js';

/**
 * Converts the SDK's consumed capacity into the result shape.
 */
export function toConsumedCapacity(capacity: SdkConsumedCapacity | undefined): ConsumedCapacity | undefined {
  if (!capacity) {
    return undefined;
  }
  return {
    tableCapacity: capacity.Table?.CapacityUnits,
    capacityUnits: capacity.CapacityUnits,
  };
}

/**
 * Drops an empty placeholder map, which DynamoDB rejects.
 */
export function nonEmpty<V>(map: Record<string, V>): Record<string, V> | undefined {
  return Object.keys(map).length > 0 ? map : undefined;
}
