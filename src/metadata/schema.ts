/**
 * Entity schema declarations.
 *
 * An entity schema is the declaration input from which key metadata is
 * built: one entry per stored property, in declaration order, marking the
 * primary key and secondary index roles the property plays.
 *
 * @example
 * ```typescript
 * const orders = defineEntity({
 *   name: 'Order',
 *   tableName: 'Orders',
 *   attributes: {
 *     customerId: { partitionKey: true },
 *     orderId: { sortKey: true },
 *     orderDate: { localIndex: 'orderDate-index' },
 *     status: { globalIndexHashKey: ['status-index'], attributeName: 'order_status' },
 *   },
 * });
 * ```
 */

/**
 * Roles and wire name of a single stored property.
 */
export interface AttributeDeclaration {
  /** Stored attribute name when it differs from the property name */
  attributeName?: string;
  /** Table partition (hash) key */
  partitionKey?: boolean;
  /** Table sort (range) key */
  sortKey?: boolean;
  /** Local secondary index using this property as its range key */
  localIndex?: string;
  /** Global secondary indexes using this property as their hash key */
  globalIndexHashKey?: readonly string[];
  /** Global secondary indexes using this property as their range key */
  globalIndexRangeKey?: readonly string[];
}

/**
 * Id-object property whose two fields hold the partition and sort key.
 */
export interface CompositeIdDeclaration {
  /** Property holding the id object, e.g. 'playlistId' */
  property: string;
  /** Field of the id object that carries the partition key */
  partitionKey: string;
  /** Field of the id object that carries the sort key */
  sortKey: string;
}

export interface EntitySchema {
  /** Entity name used in messages and logs */
  name: string;
  /** Declared table name, before any prefix or override */
  tableName: string;
  attributes: Readonly<Record<string, AttributeDeclaration>>;
  compositeId?: CompositeIdDeclaration;
}
