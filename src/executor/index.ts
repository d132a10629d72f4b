/**
 * Query execution.
 */

export type { ResultShape, MethodDeclaration, QueryResult } from './declaration.js';
export type { PageFetcher, PagedItemsOptions } from './paged-items.js';
export { PagedItems } from './paged-items.js';
export type { DerivedQueryOptions } from './derived-query.js';
export { DerivedQuery, asEntity } from './derived-query.js';
