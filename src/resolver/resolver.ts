/**
 * Access-Path Resolver
 *
 * Chooses how a bound method is served. Rules are tried in order and the
 * first that applies wins:
 *
 * 1. direct load by the full primary key
 * 2. direct load through the composite id object
 * 3. query on the table with a sort key condition
 * 4. query on a local secondary index
 * 5. query on a global secondary index
 * 6. query on the partition alone
 * 7. scan, when the scan policy allows it
 */

import type { OrderBy, Predicate, PredicateTree } from '../parser/types.js';
import { isKeyConditionOperator } from '../parser/operators.js';
import type { EntityKeyMetadata, GlobalIndexKeys } from '../metadata/entity.js';
import { sortKeyOf } from '../metadata/entity.js';
import type { AccessPathKind, ResolvedAccessPath, ScanPolicy } from './access-path.js';
import {
  ScanCountNotEnabledError,
  ScanNotEnabledError,
  UnsupportedOperationError,
} from '../error/index.js';

function isEquality(predicate: Predicate, property: string): boolean {
  return predicate.property === property && predicate.operator === 'EQUALS';
}

function isRangeCondition(predicate: Predicate, property: string): boolean {
  return predicate.property === property && isKeyConditionOperator(predicate.operator);
}

function isCompositeIdReference(predicate: Predicate, metadata: EntityKeyMetadata): boolean {
  return (
    metadata.kind === 'composite' &&
    metadata.compositeId !== undefined &&
    predicate.propertyPath.length === 1 &&
    predicate.property === metadata.compositeId.property
  );
}

/**
 * Splits predicates into the hash equality, the optional range condition and
 * the residual filters, keeping method order among the filters.
 */
function splitKeyConditions(
  predicates: readonly Predicate[],
  hashKey: string,
  rangeKey: string | undefined
): { keyConditions: Predicate[]; residualFilters: Predicate[] } {
  const hash = predicates.find((predicate) => isEquality(predicate, hashKey));
  const range =
    rangeKey === undefined
      ? undefined
      : predicates.find((predicate) => predicate !== hash && isRangeCondition(predicate, rangeKey));

  const keyConditions: Predicate[] = [];
  if (hash) {
    keyConditions.push(hash);
  }
  if (range) {
    keyConditions.push(range);
  }
  return {
    keyConditions,
    residualFilters: predicates.filter((predicate) => predicate !== hash && predicate !== range),
  };
}

function queryPath(
  tree: PredicateTree,
  kind: AccessPathKind,
  hashKey: string,
  keyRange: string | undefined,
  rangeKey: string | undefined,
  indexName?: string
): ResolvedAccessPath {
  const { keyConditions, residualFilters } = splitKeyConditions(tree.predicates, hashKey, keyRange);
  return {
    kind,
    indexName,
    keyConditions,
    residualFilters,
    compositeIdLoad: false,
    rangeKey,
    scanIndexForward: checkOrderBy(tree, rangeKey),
  };
}

function checkOrderBy(tree: PredicateTree, rangeKey: string | undefined): boolean | undefined {
  const orderBy: OrderBy | undefined = tree.orderBy;
  if (!orderBy) {
    return undefined;
  }
  if (orderBy.property !== rangeKey) {
    throw new UnsupportedOperationError(
      `Sorting only possible by [${rangeKey ?? ''}] for the criteria specified and not for ${orderBy.property}`,
      { methodName: tree.methodName }
    );
  }
  return orderBy.direction === 'ASC';
}

function resolveDirectLoad(tree: PredicateTree, metadata: EntityKeyMetadata): ResolvedAccessPath | undefined {
  if (tree.orderBy || tree.limit !== undefined) {
    return undefined;
  }
  const { predicates } = tree;

  if (metadata.kind === 'simple') {
    if (predicates.length === 1 && isEquality(predicates[0], metadata.partitionKey)) {
      return { kind: 'DIRECT_LOAD', keyConditions: [...predicates], residualFilters: [], compositeIdLoad: false };
    }
    return undefined;
  }

  if (predicates.length !== 2) {
    return undefined;
  }
  const hash = predicates.find((predicate) => isEquality(predicate, metadata.partitionKey));
  const range = predicates.find((predicate) => predicate !== hash && isEquality(predicate, metadata.sortKey));
  if (hash && range) {
    return { kind: 'DIRECT_LOAD', keyConditions: [hash, range], residualFilters: [], compositeIdLoad: false };
  }
  return undefined;
}

function resolveCompositeIdLoad(tree: PredicateTree, metadata: EntityKeyMetadata): ResolvedAccessPath | undefined {
  const references = tree.predicates.filter((predicate) => isCompositeIdReference(predicate, metadata));
  if (references.length === 0) {
    return undefined;
  }
  const [reference] = references;
  if (
    tree.predicates.length !== 1 ||
    reference.operator !== 'EQUALS' ||
    tree.orderBy !== undefined ||
    tree.limit !== undefined
  ) {
    throw new UnsupportedOperationError(
      `Id property ${reference.property} can only be used alone with an equality condition`,
      { methodName: tree.methodName }
    );
  }
  return { kind: 'DIRECT_LOAD', keyConditions: [reference], residualFilters: [], compositeIdLoad: true };
}

function rankGlobalIndexes(
  tree: PredicateTree,
  candidates: Array<[string, GlobalIndexKeys]>
): Array<[string, GlobalIndexKeys, boolean]> {
  const hasRangeCondition = ([, keys]: [string, GlobalIndexKeys]): boolean => {
    const { rangeKey } = keys;
    if (rangeKey === undefined) {
      return false;
    }
    const hash = tree.predicates.find((predicate) => isEquality(predicate, keys.hashKey));
    return tree.predicates.some((predicate) => predicate !== hash && isRangeCondition(predicate, rangeKey));
  };
  const ordersByRange = ([, keys]: [string, GlobalIndexKeys]): boolean =>
    tree.orderBy !== undefined && keys.rangeKey === tree.orderBy.property;

  // Array.prototype.sort is stable, so declaration order breaks ties.
  return candidates
    .map((candidate): [string, GlobalIndexKeys, boolean, boolean] => [
      candidate[0],
      candidate[1],
      hasRangeCondition(candidate),
      ordersByRange(candidate),
    ])
    .sort((a, b) => Number(b[2]) - Number(a[2]) || Number(b[3]) - Number(a[3]))
    .map(([indexName, keys, full]) => [indexName, keys, full]);
}

function resolveGlobalIndexQuery(tree: PredicateTree, metadata: EntityKeyMetadata): ResolvedAccessPath | undefined {
  const candidates = [...metadata.globalIndexes].filter(([, keys]) =>
    tree.predicates.some((predicate) => isEquality(predicate, keys.hashKey))
  );

  if (candidates.length === 0) {
    const misused = tree.predicates.find(
      (predicate) => metadata.globalIndexHashKeys.has(predicate.property) && predicate.operator !== 'EQUALS'
    );
    if (misused) {
      throw new UnsupportedOperationError(
        `Only equality conditions are supported on index hash key ${misused.property}, not ${misused.operator}`,
        { methodName: tree.methodName }
      );
    }
    return undefined;
  }

  const [indexName, keys, full] = rankGlobalIndexes(tree, candidates)[0];
  return queryPath(
    tree,
    'GLOBAL_INDEX_QUERY',
    keys.hashKey,
    full ? keys.rangeKey : undefined,
    keys.rangeKey,
    indexName
  );
}

/**
 * Resolves the access path of a bound method.
 *
 * @throws {UnsupportedOperationError} For an OrderBy the chosen path cannot serve
 * @throws {ScanNotEnabledError} If only a scan applies and scanning is disabled
 * @throws {ScanCountNotEnabledError} Likewise for count methods
 */
export function resolveAccessPath(
  tree: PredicateTree,
  metadata: EntityKeyMetadata,
  scanPolicy: ScanPolicy
): ResolvedAccessPath {
  const direct = resolveDirectLoad(tree, metadata);
  if (direct) {
    return direct;
  }

  const compositeIdLoad = resolveCompositeIdLoad(tree, metadata);
  if (compositeIdLoad) {
    return compositeIdLoad;
  }

  const { partitionKey } = metadata;
  const sortKey = sortKeyOf(metadata);
  const hasPartitionEquality = tree.predicates.some((predicate) => isEquality(predicate, partitionKey));

  if (hasPartitionEquality && sortKey !== undefined) {
    const hash = tree.predicates.find((predicate) => isEquality(predicate, partitionKey));
    const candidates = tree.predicates.filter((predicate) => predicate !== hash);

    if (candidates.some((predicate) => isRangeCondition(predicate, sortKey))) {
      return queryPath(tree, 'PRIMARY_SORT_QUERY', partitionKey, sortKey, sortKey);
    }

    const local = candidates.find(
      (predicate) => metadata.localIndexes.has(predicate.property) && isKeyConditionOperator(predicate.operator)
    );
    const localIndex = local ? metadata.localIndexes.get(local.property) : undefined;
    if (local && localIndex !== undefined) {
      return queryPath(tree, 'LOCAL_INDEX_QUERY', partitionKey, local.property, local.property, localIndex);
    }
  }

  const global = resolveGlobalIndexQuery(tree, metadata);
  if (global) {
    return global;
  }

  if (hasPartitionEquality) {
    const orderedIndex = tree.orderBy ? metadata.localIndexes.get(tree.orderBy.property) : undefined;
    if (tree.orderBy && orderedIndex !== undefined) {
      return queryPath(tree, 'LOCAL_INDEX_QUERY', partitionKey, undefined, tree.orderBy.property, orderedIndex);
    }
    return queryPath(tree, 'PRIMARY_SORT_QUERY', partitionKey, undefined, sortKey);
  }

  if (tree.subject === 'count') {
    if (!scanPolicy.enableScanCount) {
      throw new ScanCountNotEnabledError(tree.methodName);
    }
  } else if (!scanPolicy.enableScan) {
    throw new ScanNotEnabledError(tree.methodName);
  }
  if (tree.orderBy) {
    throw new UnsupportedOperationError('Sorting not possible for scan operations', {
      methodName: tree.methodName,
    });
  }

  return {
    kind: 'SCAN',
    keyConditions: [],
    residualFilters: [...tree.predicates],
    compositeIdLoad: false,
  };
}
