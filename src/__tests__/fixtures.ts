/**
 * Entity schemas shared by the tests.
 */

import type { EntitySchema } from '../metadata/schema.js';
import type { Item } from '../types/item.js';
import type { Page } from '../types/results.js';

/** Partition key only, one global index */
export const customerSchema: EntitySchema = {
  name: 'Customer',
  tableName: 'Customers',
  attributes: {
    customerId: { partitionKey: true },
    email: { globalIndexHashKey: ['email-index'] },
    name: {},
    domain: {},
    checkIn: {},
  },
};

/** Partition and sort key, two local and three global indexes */
export const orderSchema: EntitySchema = {
  name: 'Order',
  tableName: 'Orders',
  attributes: {
    customerId: { partitionKey: true },
    orderId: { sortKey: true },
    status: { globalIndexHashKey: ['status-index', 'status-date-index'], attributeName: 'order_status' },
    orderDate: { localIndex: 'orderDate-index', globalIndexRangeKey: ['status-date-index'] },
    total: { localIndex: 'total-index' },
    region: { globalIndexHashKey: ['region-index'] },
    tags: {},
    shipped: {},
    note: {},
    channel: {},
  },
};

/** Composite key reachable through an id object */
export const playlistSchema: EntitySchema = {
  name: 'Playlist',
  tableName: 'Playlists',
  attributes: {
    userName: { partitionKey: true },
    playlistName: { sortKey: true },
    displayName: {},
  },
  compositeId: { property: 'playlistId', partitionKey: 'userName', sortKey: 'playlistName' },
};

/**
 * Chains item lists into pages; every page but the last carries a
 * `lastEvaluatedKey` of `{ page: <index of the next page> }`.
 */
export function pagesOf(...itemLists: Item[][]): Page[] {
  return itemLists.map((items, index) => ({
    items,
    count: items.length,
    scannedCount: items.length,
    lastEvaluatedKey: index < itemLists.length - 1 ? { page: index + 1 } : undefined,
  }));
}
