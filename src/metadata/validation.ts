/**
 * Consistency checks run on an entity schema before metadata is built.
 */

import type { EntitySchema } from './schema.js';
import { EntityValidationError } from '../error/index.js';
import type { Logger } from '../observability/logging.js';

/**
 * Validates the key and index declarations of an entity schema.
 *
 * @throws {EntityValidationError} On the first inconsistent declaration
 */
export function validateEntitySchema(schema: EntitySchema, logger: Logger): void {
  const fail = (message: string): never => {
    throw new EntityValidationError(schema.name, message);
  };

  if (schema.tableName.trim().length === 0) {
    fail('table name must be a non-empty string');
  }

  const partitionKeys: string[] = [];
  const sortKeys: string[] = [];
  const localIndexes = new Map<string, string[]>();
  const globalHashKeys = new Map<string, string[]>();
  const globalRangeKeys = new Map<string, string[]>();

  const claim = (claims: Map<string, string[]>, indexName: string, property: string): void => {
    if (indexName.trim().length === 0) {
      fail(`empty index name declared on property ${property}`);
    }
    claims.set(indexName, [...(claims.get(indexName) ?? []), property]);
  };

  for (const [property, declaration] of Object.entries(schema.attributes)) {
    if (declaration.attributeName !== undefined && declaration.attributeName.trim().length === 0) {
      fail(`empty attribute name declared on property ${property}`);
    }
    if (declaration.partitionKey) {
      partitionKeys.push(property);
    }
    if (declaration.sortKey) {
      sortKeys.push(property);
    }
    if (declaration.localIndex !== undefined) {
      claim(localIndexes, declaration.localIndex, property);
    }
    for (const indexName of declaration.globalIndexHashKey ?? []) {
      claim(globalHashKeys, indexName, property);
    }
    for (const indexName of declaration.globalIndexRangeKey ?? []) {
      claim(globalRangeKeys, indexName, property);
    }
  }

  if (partitionKeys.length === 0) {
    fail('no partition key declared');
  }
  if (partitionKeys.length > 1) {
    fail(`multiple partition keys declared: ${partitionKeys.join(', ')}`);
  }
  if (sortKeys.length > 1) {
    fail(`multiple sort keys declared: ${sortKeys.join(', ')}`);
  }
  if (partitionKeys[0] === sortKeys[0]) {
    fail(`property ${partitionKeys[0]} cannot be both partition key and sort key`);
  }

  for (const [indexName, properties] of globalHashKeys) {
    if (properties.length > 1) {
      fail(`global index ${indexName} declares multiple hash keys: ${properties.join(', ')}`);
    }
  }
  for (const [indexName, properties] of globalRangeKeys) {
    if (properties.length > 1) {
      fail(`global index ${indexName} declares multiple range keys: ${properties.join(', ')}`);
    }
    if (!globalHashKeys.has(indexName)) {
      fail(`global index ${indexName} declares a range key but no hash key`);
    }
  }

  const sortKey: string | undefined = sortKeys[0];
  for (const [indexName, properties] of localIndexes) {
    if (properties.length > 1) {
      fail(`local index ${indexName} declared on multiple properties: ${properties.join(', ')}`);
    }
    if (globalHashKeys.has(indexName) || globalRangeKeys.has(indexName)) {
      fail(`index name ${indexName} is used for both a local and a global index`);
    }
    if (sortKey === undefined) {
      fail(`local index ${indexName} requires the table to declare a sort key`);
    }
    if (properties[0] === sortKey) {
      logger.warn('Local index range key is the table sort key', {
        entity: schema.name,
        indexName,
        property: sortKey,
      });
    }
  }

  const compositeId = schema.compositeId;
  if (compositeId) {
    if (sortKey === undefined) {
      fail(`composite id ${compositeId.property} requires the table to declare a sort key`);
    }
    if (compositeId.partitionKey !== partitionKeys[0] || compositeId.sortKey !== sortKey) {
      fail(
        `composite id ${compositeId.property} must map ${partitionKeys[0]} and ${sortKey}, ` +
          `not ${compositeId.partitionKey} and ${compositeId.sortKey}`
      );
    }
    if (compositeId.property in schema.attributes) {
      fail(`composite id property ${compositeId.property} must not be a stored attribute`);
    }
  }
}
