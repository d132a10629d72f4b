/**
 * Access-path resolution.
 */

export type { AccessPathKind, ScanPolicy, ResolvedAccessPath } from './access-path.js';
export { describeAccessPath } from './access-path.js';
export { resolveAccessPath } from './resolver.js';
