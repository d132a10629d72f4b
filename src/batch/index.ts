/**
 * Batch operations.
 */

export { chunk } from './chunker.js';
export { batchDelete } from './delete.js';
