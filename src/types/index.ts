/**
 * Shared type definitions.
 *
 * Attribute values, keys, items and the request/result shapes exchanged
 * with the storage collaborator.
 */

// ============================================================================
// Key and Attribute Types
// ============================================================================

export type {
  AttributeValue,
  AttributeValueSet,
  AttributeValueArray,
  AttributeValueMap,
  Key,
} from './key.js';
export { toKeyMap } from './key.js';

// ============================================================================
// Item Types
// ============================================================================

export type { Item, ConsumedCapacity } from './item.js';

// ============================================================================
// Requests
// ============================================================================

export type {
  ConsistencyMode,
  LoadRequest,
  ExpressionAttributes,
  QueryRequest,
  ScanRequest,
} from './request.js';
export { toConsistentRead } from './request.js';

// ============================================================================
// Results
// ============================================================================

export type { Page, BatchDeleteResult } from './results.js';
