/**
 * Entity key metadata.
 *
 * Built once per entity from its schema declaration, validated, frozen and
 * shared read-only by every repository method of that entity. The metadata
 * is a tagged variant: `simple` entities have a partition key only,
 * `composite` entities also carry a sort key and, optionally, an id object
 * holding both key values.
 */

import type { EntitySchema } from './schema.js';
import { validateEntitySchema } from './validation.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';

// ============================================================================
// Metadata Types
// ============================================================================

/**
 * Key pair of a global secondary index.
 */
export interface GlobalIndexKeys {
  readonly hashKey: string;
  readonly rangeKey?: string;
}

/**
 * Id object property whose two fields map onto the partition and sort key.
 */
export interface CompositeIdMetadata {
  readonly property: string;
  readonly partitionKey: string;
  readonly sortKey: string;
}

interface KeyMetadataBase {
  readonly entityName: string;
  readonly tableName: string;
  readonly partitionKey: string;
  /** Every property a method name may reference */
  readonly properties: ReadonlySet<string>;
  /** LSI range property to index name */
  readonly localIndexes: ReadonlyMap<string, string>;
  /** GSI hash property to index names, in declaration order */
  readonly globalIndexHashKeys: ReadonlyMap<string, readonly string[]>;
  /** GSI range property to index names, in declaration order */
  readonly globalIndexRangeKeys: ReadonlyMap<string, readonly string[]>;
  /** GSI name to its key pair; iteration follows declaration order */
  readonly globalIndexes: ReadonlyMap<string, GlobalIndexKeys>;
  /** Property to stored attribute name, only for overridden properties */
  readonly attributeNames: ReadonlyMap<string, string>;
}

export interface SimpleKeyMetadata extends KeyMetadataBase {
  readonly kind: 'simple';
}

export interface CompositeKeyMetadata extends KeyMetadataBase {
  readonly kind: 'composite';
  readonly sortKey: string;
  readonly compositeId?: CompositeIdMetadata;
}

export type EntityKeyMetadata = SimpleKeyMetadata | CompositeKeyMetadata;

// ============================================================================
// Construction
// ============================================================================

export interface DefineEntityOptions {
  /** Receives validation warnings */
  logger?: Logger;
}

/**
 * Validates an entity schema and builds its key metadata.
 *
 * @throws {EntityValidationError} If the key or index declarations are inconsistent
 */
export function defineEntity(schema: EntitySchema, options: DefineEntityOptions = {}): EntityKeyMetadata {
  validateEntitySchema(schema, options.logger ?? new NoopLogger());

  let partitionKey = '';
  let sortKey: string | undefined;
  const properties = new Set<string>();
  const localIndexes = new Map<string, string>();
  const globalIndexHashKeys = new Map<string, readonly string[]>();
  const globalIndexRangeKeys = new Map<string, readonly string[]>();
  const globalHashByIndex = new Map<string, string>();
  const globalRangeByIndex = new Map<string, string>();
  const indexOrder: string[] = [];
  const attributeNames = new Map<string, string>();

  for (const [property, declaration] of Object.entries(schema.attributes)) {
    properties.add(property);
    if (declaration.partitionKey) {
      partitionKey = property;
    }
    if (declaration.sortKey) {
      sortKey = property;
    }
    if (declaration.attributeName !== undefined && declaration.attributeName !== property) {
      attributeNames.set(property, declaration.attributeName);
    }
    if (declaration.localIndex !== undefined) {
      localIndexes.set(property, declaration.localIndex);
    }
    if (declaration.globalIndexHashKey && declaration.globalIndexHashKey.length > 0) {
      globalIndexHashKeys.set(property, [...declaration.globalIndexHashKey]);
      for (const indexName of declaration.globalIndexHashKey) {
        globalHashByIndex.set(indexName, property);
        if (!indexOrder.includes(indexName)) {
          indexOrder.push(indexName);
        }
      }
    }
    if (declaration.globalIndexRangeKey && declaration.globalIndexRangeKey.length > 0) {
      globalIndexRangeKeys.set(property, [...declaration.globalIndexRangeKey]);
      for (const indexName of declaration.globalIndexRangeKey) {
        globalRangeByIndex.set(indexName, property);
        if (!indexOrder.includes(indexName)) {
          indexOrder.push(indexName);
        }
      }
    }
  }

  const globalIndexes = new Map<string, GlobalIndexKeys>();
  for (const indexName of indexOrder) {
    const hashKey = globalHashByIndex.get(indexName);
    if (hashKey !== undefined) {
      globalIndexes.set(indexName, { hashKey, rangeKey: globalRangeByIndex.get(indexName) });
    }
  }

  const base = {
    entityName: schema.name,
    tableName: schema.tableName,
    partitionKey,
    localIndexes,
    globalIndexHashKeys,
    globalIndexRangeKeys,
    globalIndexes,
    attributeNames,
  };

  if (sortKey === undefined) {
    const simple: SimpleKeyMetadata = { ...base, kind: 'simple', properties };
    return Object.freeze(simple);
  }

  const compositeId = schema.compositeId ? { ...schema.compositeId } : undefined;
  if (compositeId) {
    properties.add(compositeId.property);
  }
  const composite: CompositeKeyMetadata = { ...base, kind: 'composite', sortKey, compositeId, properties };
  return Object.freeze(composite);
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Stored attribute name of a property.
 */
export function attributeNameOf(metadata: EntityKeyMetadata, property: string): string {
  return metadata.attributeNames.get(property) ?? property;
}

/**
 * Table sort key property, if the entity has one.
 */
export function sortKeyOf(metadata: EntityKeyMetadata): string | undefined {
  return metadata.kind === 'composite' ? metadata.sortKey : undefined;
}
