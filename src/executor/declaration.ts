/**
 * Repository method declarations.
 */

import type { RequestOptions } from '../builders/request.js';
import type { Item } from '../types/item.js';
import type { PagedItems } from './paged-items.js';

/**
 * What a method hands back.
 *
 * - `one`: the first match or undefined
 * - `many`: every match
 * - `stream`: a lazy PagedItems sequence
 * - `count`: the number of matches
 * - `exists`: whether there is a match
 * - `delete`: the removed items
 */
export type ResultShape = 'one' | 'many' | 'stream' | 'count' | 'exists' | 'delete';

/**
 * Declaration of a derived query method. The method name carries the
 * criteria; the declaration carries its return shape and request options.
 *
 * @example
 * ```typescript
 * const declaration: MethodDeclaration = {
 *   returns: 'many',
 *   parameterCount: 2,
 *   consistency: 'CONSISTENT',
 *   projection: ['orderId', 'total'],
 * };
 * ```
 */
export interface MethodDeclaration extends RequestOptions {
  returns: ResultShape;
  /** Number of parameters the method is declared with; checked when the repository is built */
  parameterCount?: number;
  /** Overrides the repository's scan permission for this method */
  enableScan?: boolean;
  /** Overrides the repository's scan-count permission for this method */
  enableScanCount?: boolean;
}

/**
 * Result of an invocation, tagged by its shape.
 */
export type QueryResult<T = Item> =
  | { shape: 'one'; value: T | undefined }
  | { shape: 'many'; value: T[] }
  | { shape: 'stream'; value: PagedItems<T> }
  | { shape: 'count'; value: number }
  | { shape: 'exists'; value: boolean }
  | { shape: 'delete'; value: T[] };
