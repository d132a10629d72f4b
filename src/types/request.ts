/**
 * Request shapes handed to the storage collaborator.
 *
 * These are plain values produced by the request builder: expressions are
 * already rendered with placeholders and every attribute reference uses the
 * wire attribute name.
 */

import type { AttributeValue, Key } from './key.js';

// ============================================================================
// Consistency
// ============================================================================

/**
 * Read-consistency mode declared on a query method.
 *
 * DEFAULT leaves the consistency flag unset so the service default
 * (eventually consistent) applies.
 */
export type ConsistencyMode = 'DEFAULT' | 'CONSISTENT' | 'EVENTUAL';

/**
 * Maps a consistency mode to the request's ConsistentRead flag.
 */
export function toConsistentRead(mode: ConsistencyMode): boolean | undefined {
  switch (mode) {
    case 'CONSISTENT':
      return true;
    case 'EVENTUAL':
      return false;
    case 'DEFAULT':
      return undefined;
  }
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Single-item lookup by primary key.
 */
export interface LoadRequest {
  key: Key;
  consistency: ConsistencyMode;
}

/**
 * Attribute placeholders shared by every expression of a request.
 */
export interface ExpressionAttributes {
  /** Placeholder (`#k0`) to wire attribute name */
  expressionAttributeNames: Record<string, string>;
  /** Placeholder (`:v0`) to bound value */
  expressionAttributeValues: Record<string, AttributeValue>;
}

/**
 * Query against the table or one of its secondary indexes.
 */
export interface QueryRequest extends ExpressionAttributes {
  /** Secondary index to query, absent for the table itself */
  indexName?: string;
  keyConditionExpression: string;
  filterExpression?: string;
  projectionExpression?: string;
  consistency: ConsistencyMode;
  /** false for descending order on the range key */
  scanIndexForward?: boolean;
  /** Page size */
  limit?: number;
}

/**
 * Full-table scan with an optional filter.
 */
export interface ScanRequest extends ExpressionAttributes {
  filterExpression?: string;
  projectionExpression?: string;
  consistency: ConsistencyMode;
  /** Page size */
  limit?: number;
}
