/**
 * Parsed and bound method-name trees.
 */

import type { Operator, SegmentReading } from './operators.js';

/**
 * What a method does with the matches: return them, count them, test for
 * their existence, or delete them.
 */
export type QuerySubject = 'find' | 'count' | 'exists' | 'delete';

export type SortDirection = 'ASC' | 'DESC';

// ============================================================================
// Parsed (entity independent)
// ============================================================================

/**
 * A criteria segment before it is matched against an entity.
 */
export interface ParsedPredicate {
  /** Segment text, e.g. `OrderDateBetween` */
  readonly source: string;
  /** Candidate readings, preferred first */
  readonly readings: readonly SegmentReading[];
}

export interface ParsedOrderBy {
  readonly propertyPath: string;
  readonly direction: SortDirection;
}

export interface ParsedMethodName {
  readonly methodName: string;
  readonly subject: QuerySubject;
  /** Result limit from `Top{N}` / `First{N}` */
  readonly limit?: number;
  readonly predicates: readonly ParsedPredicate[];
  readonly orderBy?: ParsedOrderBy;
}

// ============================================================================
// Bound (resolved against entity metadata)
// ============================================================================

/**
 * One predicate of a method name, resolved against an entity.
 */
export interface Predicate {
  /** Property path segments, e.g. ['playlistId', 'userName'] */
  readonly propertyPath: readonly string[];
  /** Leaf property the condition applies to */
  readonly property: string;
  readonly operator: Operator;
  /** Method arguments this predicate consumes */
  readonly argumentCount: number;
  /** Position of its first argument in the method's argument list */
  readonly argumentOffset: number;
}

export interface OrderBy {
  readonly property: string;
  readonly direction: SortDirection;
}

/**
 * AND-combined predicates of a method plus its qualifiers.
 */
export interface PredicateTree {
  readonly methodName: string;
  readonly subject: QuerySubject;
  readonly limit?: number;
  readonly predicates: readonly Predicate[];
  readonly orderBy?: OrderBy;
  /** Total number of arguments the predicates consume */
  readonly parameterCount: number;
}
