/**
 * Free functions over the DynamoDB document client.
 */

export { getItem } from './get.js';
export { queryPage, countQuery } from './query.js';
export { scanPage, countScan } from './scan.js';
export { putItem } from './put.js';
export { deleteItem } from './delete.js';
