/**
 * Request Builder
 *
 * Materializes a resolved access path and the method's arguments into the
 * load, query or scan request handed to the storage collaborator. Pure: no
 * I/O, no state kept between calls.
 */

import type { AttributeValue, Key } from '../types/key.js';
import type { ConsistencyMode, ExpressionAttributes, LoadRequest, QueryRequest, ScanRequest } from '../types/request.js';
import type { Predicate } from '../parser/types.js';
import type { ResolvedAccessPath } from '../resolver/access-path.js';
import type { EntityKeyMetadata } from '../metadata/entity.js';
import { attributeNameOf } from '../metadata/entity.js';
import {
  ConditionBuilder,
  FILTER_PLACEHOLDERS,
  KEY_PLACEHOLDERS,
  PROJECTION_PLACEHOLDERS,
  emptyExpressionAttributes,
} from './condition.js';
import { argumentOf, collectionArgumentOf, containsArgumentOf, isRecord, requireValue } from './arguments.js';
import { ConfigurationError, ParameterBindingError } from '../error/index.js';

/**
 * Per-method request options declared alongside the method.
 */
export interface RequestOptions {
  /** Page size of each query or scan call */
  limit?: number;
  /** Properties to return; all when absent */
  projection?: readonly string[];
  /** Extra filter AND-combined with the derived one */
  filterExpression?: string;
  /** Placeholders used by `filterExpression` */
  expressionAttributeNames?: Readonly<Record<string, string>>;
  /** Values used by `filterExpression` */
  expressionAttributeValues?: Readonly<Record<string, AttributeValue>>;
  consistency?: ConsistencyMode;
}

/**
 * What every build call needs besides the path and the arguments.
 */
export interface BuildContext {
  metadata: EntityKeyMetadata;
  methodName: string;
  options?: RequestOptions;
}

function applyCondition(
  builder: ConditionBuilder,
  predicate: Predicate,
  args: readonly unknown[],
  context: BuildContext
): void {
  const attribute = attributeNameOf(context.metadata, predicate.property);
  const { methodName } = context;
  const value = (index: number): AttributeValue => argumentOf(args, predicate, index, methodName);

  switch (predicate.operator) {
    case 'EQUALS':
      builder.equals(attribute, value(0));
      break;
    case 'NOT_EQUALS':
      builder.notEquals(attribute, value(0));
      break;
    case 'LESS_THAN':
      builder.lessThan(attribute, value(0));
      break;
    case 'LESS_THAN_EQUAL':
      builder.lessThanOrEqual(attribute, value(0));
      break;
    case 'GREATER_THAN':
      builder.greaterThan(attribute, value(0));
      break;
    case 'GREATER_THAN_EQUAL':
      builder.greaterThanOrEqual(attribute, value(0));
      break;
    case 'BETWEEN':
      builder.between(attribute, value(0), value(1));
      break;
    case 'IN':
      builder.in(attribute, collectionArgumentOf(args, predicate, methodName));
      break;
    case 'STARTING_WITH':
      builder.beginsWith(attribute, value(0));
      break;
    case 'CONTAINING':
      builder.contains(attribute, containsArgumentOf(args, predicate, methodName));
      break;
    case 'NOT_CONTAINING':
      builder.notContains(attribute, containsArgumentOf(args, predicate, methodName));
      break;
    case 'IS_NULL':
      builder.attributeNotExists(attribute);
      break;
    case 'IS_NOT_NULL':
      builder.attributeExists(attribute);
      break;
    case 'TRUE':
      builder.equals(attribute, true);
      break;
    case 'FALSE':
      builder.equals(attribute, false);
      break;
  }
}

function mergeInto<V>(target: Record<string, V>, source: Readonly<Record<string, V>>, methodName: string): void {
  for (const [placeholder, value] of Object.entries(source)) {
    if (placeholder in target) {
      throw new ConfigurationError(
        `Placeholder ${placeholder} of the filter expression of ${methodName} collides with a derived placeholder`,
        { methodName, details: { placeholder } }
      );
    }
    target[placeholder] = value;
  }
}

function buildFilterExpression(
  predicates: readonly Predicate[],
  args: readonly unknown[],
  attributes: ExpressionAttributes,
  context: BuildContext
): string | undefined {
  const builder = new ConditionBuilder(FILTER_PLACEHOLDERS, attributes);
  for (const predicate of predicates) {
    applyCondition(builder, predicate, args, context);
  }
  const derived = builder.build();

  const options = context.options ?? {};
  if (options.filterExpression === undefined || options.filterExpression === '') {
    return derived;
  }
  mergeInto(attributes.expressionAttributeNames, options.expressionAttributeNames ?? {}, context.methodName);
  mergeInto(attributes.expressionAttributeValues, options.expressionAttributeValues ?? {}, context.methodName);
  return derived === undefined ? options.filterExpression : `${derived} AND (${options.filterExpression})`;
}

function buildProjectionExpression(attributes: ExpressionAttributes, context: BuildContext): string | undefined {
  const projection = context.options?.projection;
  if (!projection || projection.length === 0) {
    return undefined;
  }
  const builder = new ConditionBuilder(PROJECTION_PLACEHOLDERS, attributes);
  return projection.map((property) => builder.name(attributeNameOf(context.metadata, property))).join(', ');
}

function loadCompositeId(path: ResolvedAccessPath, args: readonly unknown[], context: BuildContext): Key {
  const { metadata, methodName } = context;
  if (metadata.kind !== 'composite' || !metadata.compositeId) {
    throw new ConfigurationError(`Entity ${metadata.entityName} declares no composite id`, { methodName });
  }
  const { property, partitionKey, sortKey } = metadata.compositeId;
  const id = args[path.keyConditions[0].argumentOffset];
  if (!isRecord(id)) {
    throw new ParameterBindingError(`Argument for ${property} must be an object holding ${partitionKey} and ${sortKey}`, {
      methodName,
      details: { property },
    });
  }
  return {
    partitionKey: requireValue(id[partitionKey], partitionKey, methodName),
    sortKey: requireValue(id[sortKey], sortKey, methodName),
  };
}

/**
 * Builds the key lookup of a DIRECT_LOAD path.
 *
 * @throws {ParameterBindingError} If a key value is null or not storable
 */
export function buildLoadRequest(path: ResolvedAccessPath, args: readonly unknown[], context: BuildContext): LoadRequest {
  const consistency = context.options?.consistency ?? 'DEFAULT';
  if (path.compositeIdLoad) {
    return { key: loadCompositeId(path, args, context), consistency };
  }

  const hash = path.keyConditions[0];
  const range: Predicate | undefined = path.keyConditions[1];
  return {
    key: {
      partitionKey: argumentOf(args, hash, 0, context.methodName),
      sortKey: range ? argumentOf(args, range, 0, context.methodName) : undefined,
    },
    consistency,
  };
}

/**
 * Builds a query on the table or the path's index.
 *
 * @throws {ParameterBindingError} If an argument cannot be bound
 */
export function buildQueryRequest(path: ResolvedAccessPath, args: readonly unknown[], context: BuildContext): QueryRequest {
  const attributes = emptyExpressionAttributes();
  const keyBuilder = new ConditionBuilder(KEY_PLACEHOLDERS, attributes);
  for (const predicate of path.keyConditions) {
    applyCondition(keyBuilder, predicate, args, context);
  }
  const keyConditionExpression = keyBuilder.build();
  if (keyConditionExpression === undefined) {
    throw new ConfigurationError(`${path.kind} of ${context.methodName} has no key condition`, {
      methodName: context.methodName,
    });
  }

  const filterExpression = buildFilterExpression(path.residualFilters, args, attributes, context);
  const projectionExpression = buildProjectionExpression(attributes, context);

  return {
    indexName: path.indexName,
    keyConditionExpression,
    filterExpression,
    projectionExpression,
    consistency: context.options?.consistency ?? 'DEFAULT',
    scanIndexForward: path.scanIndexForward,
    limit: context.options?.limit,
    ...attributes,
  };
}

/**
 * Builds a full-table scan filtered by every predicate of the path.
 *
 * @throws {ParameterBindingError} If an argument cannot be bound
 */
export function buildScanRequest(path: ResolvedAccessPath, args: readonly unknown[], context: BuildContext): ScanRequest {
  const attributes = emptyExpressionAttributes();
  const filterExpression = buildFilterExpression(path.residualFilters, args, attributes, context);
  const projectionExpression = buildProjectionExpression(attributes, context);

  return {
    filterExpression,
    projectionExpression,
    consistency: context.options?.consistency ?? 'DEFAULT',
    limit: context.options?.limit,
    ...attributes,
  };
}
