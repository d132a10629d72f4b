/**
 * Access paths a derived query can be served by.
 */

import type { Predicate } from '../parser/types.js';

export type AccessPathKind =
  | 'DIRECT_LOAD'
  | 'PRIMARY_SORT_QUERY'
  | 'LOCAL_INDEX_QUERY'
  | 'GLOBAL_INDEX_QUERY'
  | 'SCAN';

/**
 * Whether a method may fall back to a full table scan.
 */
export interface ScanPolicy {
  /** Allows scans for find, exists and delete methods */
  enableScan: boolean;
  /** Allows scans for count methods */
  enableScanCount: boolean;
}

/**
 * Outcome of access-path resolution.
 *
 * Every predicate of the method appears exactly once, either in
 * `keyConditions` or in `residualFilters`.
 */
export interface ResolvedAccessPath {
  readonly kind: AccessPathKind;
  /** Secondary index, for LOCAL_INDEX_QUERY and GLOBAL_INDEX_QUERY */
  readonly indexName?: string;
  /** Hash key equality first, then the range key condition if any */
  readonly keyConditions: readonly Predicate[];
  /** Everything else, AND-combined into the filter expression */
  readonly residualFilters: readonly Predicate[];
  /** DIRECT_LOAD through the composite id object */
  readonly compositeIdLoad: boolean;
  /** Range key of the queried table or index */
  readonly rangeKey?: string;
  /** Set only when the method orders its results */
  readonly scanIndexForward?: boolean;
}

/**
 * Short human-readable form used in log lines, e.g. `GLOBAL_INDEX_QUERY(status-index)`.
 */
export function describeAccessPath(path: ResolvedAccessPath): string {
  return path.indexName === undefined ? path.kind : `${path.kind}(${path.indexName})`;
}
