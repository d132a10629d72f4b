/**
 * Query Executor
 *
 * A DerivedQuery is built once per repository method: the name is parsed,
 * bound to the entity and resolved to an access path when the repository is
 * created, so that misdeclared methods fail early. Each invocation then
 * binds its arguments, builds the request and adapts the storage response
 * to the declared result shape.
 */

import type { DynamoDBOperations } from '../client/operations.js';
import type { EntityKeyMetadata } from '../metadata/entity.js';
import type { Item } from '../types/item.js';
import type { QueryRequest, ScanRequest } from '../types/request.js';
import type { PredicateTree, QuerySubject } from '../parser/types.js';
import { parseMethodName } from '../parser/method-name.js';
import { bindPredicateTree } from '../parser/binding.js';
import type { ResolvedAccessPath, ScanPolicy } from '../resolver/access-path.js';
import { describeAccessPath } from '../resolver/access-path.js';
import { resolveAccessPath } from '../resolver/resolver.js';
import type { BuildContext } from '../builders/request.js';
import { buildLoadRequest, buildQueryRequest, buildScanRequest } from '../builders/request.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { NoopMetricsCollector, RepositoryMetricNames } from '../observability/metrics.js';
import {
  ConfigurationError,
  ParameterCountMismatchError,
  PropertyResolutionError,
} from '../error/index.js';
import type { MethodDeclaration, QueryResult, ResultShape } from './declaration.js';
import { PagedItems } from './paged-items.js';

const SHAPES_BY_SUBJECT: Readonly<Record<QuerySubject, readonly ResultShape[]>> = {
  find: ['one', 'many', 'stream'],
  count: ['count'],
  exists: ['exists'],
  delete: ['delete'],
};

const GENERATED_NAME = /^#[knp]\d+$/;
const GENERATED_VALUE = /^:[kv]\d+$/;

export interface DerivedQueryOptions {
  /** Repository-wide scan permissions; the declaration may override them */
  scanPolicy?: Partial<ScanPolicy>;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Stored items become entities here and nowhere else. The storage
 * collaborator returns items keyed by property name, which is the entity's
 * own shape.
 */
export function asEntity<T>(item: Item): T {
  return item as T;
}

function checkDeclaration(tree: PredicateTree, declaration: MethodDeclaration, metadata: EntityKeyMetadata): void {
  const { methodName } = tree;

  const allowed = SHAPES_BY_SUBJECT[tree.subject];
  if (!allowed.includes(declaration.returns)) {
    throw new ConfigurationError(
      `Method ${methodName} must return ${allowed.join(' or ')}, not ${declaration.returns}`,
      { methodName, details: { subject: tree.subject, returns: declaration.returns } }
    );
  }

  if (declaration.parameterCount !== undefined && declaration.parameterCount !== tree.parameterCount) {
    throw new ParameterCountMismatchError(methodName, tree.parameterCount, declaration.parameterCount);
  }

  if (declaration.limit !== undefined && (!Number.isInteger(declaration.limit) || declaration.limit < 1)) {
    throw new ConfigurationError(`Page size of ${methodName} must be a positive integer`, { methodName });
  }

  for (const property of declaration.projection ?? []) {
    if (!metadata.properties.has(property)) {
      throw new PropertyResolutionError(property, metadata.entityName, methodName);
    }
  }

  const generated = [
    ...Object.keys(declaration.expressionAttributeNames ?? {}).filter((name) => GENERATED_NAME.test(name)),
    ...Object.keys(declaration.expressionAttributeValues ?? {}).filter((value) => GENERATED_VALUE.test(value)),
  ];
  if (generated.length > 0) {
    throw new ConfigurationError(
      `Filter expression placeholders of ${methodName} clash with derived placeholders: ${generated.join(', ')}`,
      { methodName, details: { placeholders: generated } }
    );
  }
}

/**
 * Executable form of one repository method.
 *
 * @example
 * ```typescript
 * const query = new DerivedQuery<Order>(template, orders, 'findByCustomerIdAndOrderDateAfter', {
 *   returns: 'many',
 * });
 * const result = await query.many(['c-1', '2024-01-01']);
 * ```
 */
export class DerivedQuery<T = Item> {
  readonly tree: PredicateTree;
  readonly accessPath: ResolvedAccessPath;
  private readonly context: BuildContext;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  /**
   * @throws {ConfigurationError} If the name, its properties or the declaration are invalid
   * @throws {UnsupportedOperationError} If the name uses a feature that cannot be served
   */
  constructor(
    private readonly operations: DynamoDBOperations,
    private readonly metadata: EntityKeyMetadata,
    readonly methodName: string,
    private readonly declaration: MethodDeclaration,
    options: DerivedQueryOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();

    this.tree = bindPredicateTree(parseMethodName(methodName), metadata);
    checkDeclaration(this.tree, declaration, metadata);

    this.accessPath = resolveAccessPath(this.tree, metadata, {
      enableScan: declaration.enableScan ?? options.scanPolicy?.enableScan ?? false,
      enableScanCount: declaration.enableScanCount ?? options.scanPolicy?.enableScanCount ?? false,
    });
    this.context = { metadata, methodName, options: declaration };

    this.logger.debug('Resolved derived query', {
      entity: metadata.entityName,
      method: methodName,
      accessPath: describeAccessPath(this.accessPath),
      keyConditions: this.accessPath.keyConditions.map((predicate) => predicate.property),
      residualFilters: this.accessPath.residualFilters.map((predicate) => predicate.property),
    });
  }

  get shape(): ResultShape {
    return this.declaration.returns;
  }

  /**
   * Runs the method and tags the result with its shape.
   */
  async execute(args: readonly unknown[]): Promise<QueryResult<T>> {
    switch (this.declaration.returns) {
      case 'one':
        return { shape: 'one', value: await this.one(args) };
      case 'many':
        return { shape: 'many', value: await this.many(args) };
      case 'stream':
        return { shape: 'stream', value: await this.stream(args) };
      case 'count':
        return { shape: 'count', value: await this.count(args) };
      case 'exists':
        return { shape: 'exists', value: await this.exists(args) };
      case 'delete':
        return { shape: 'delete', value: await this.delete(args) };
    }
  }

  async one(args: readonly unknown[]): Promise<T | undefined> {
    this.begin('one', args);
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      const item = await this.load(args);
      this.recordItems(item === undefined ? 0 : 1);
      return item;
    }
    const item = await this.pages(args).first();
    this.recordItems(item === undefined ? 0 : 1);
    return item;
  }

  async many(args: readonly unknown[]): Promise<T[]> {
    this.begin('many', args);
    const items = await this.collect(args);
    this.recordItems(items.length);
    return items;
  }

  /**
   * Lazy sequence of the matches. Pages are only requested while the
   * sequence is being consumed.
   */
  async stream(args: readonly unknown[]): Promise<PagedItems<T>> {
    this.begin('stream', args);
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      const item = await this.loadItem(args);
      const items = item === undefined ? [] : [item];
      return new PagedItems<T>(
        async () => ({ items, count: items.length, scannedCount: items.length }),
        { convert: asEntity }
      );
    }
    return this.pages(args);
  }

  async count(args: readonly unknown[]): Promise<number> {
    this.begin('count', args);
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      return (await this.load(args)) === undefined ? 0 : 1;
    }
    return this.operations.count(this.metadata, this.buildPagedRequest(args));
  }

  async exists(args: readonly unknown[]): Promise<boolean> {
    this.begin('exists', args);
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      return (await this.load(args)) !== undefined;
    }
    return (await this.pages(args).first()) !== undefined;
  }

  /**
   * Removes every match and returns the removed items.
   */
  async delete(args: readonly unknown[]): Promise<T[]> {
    this.begin('delete', args);
    const items = await this.collectItems(args);
    if (items.length > 0) {
      await this.operations.batchDelete(this.metadata, items);
    }
    this.recordItems(items.length);
    return items.map((item) => asEntity<T>(item));
  }

  private begin(shape: ResultShape, args: readonly unknown[]): void {
    if (shape !== this.declaration.returns) {
      throw new ConfigurationError(
        `Method ${this.methodName} is declared to return ${this.declaration.returns}, not ${shape}`,
        { methodName: this.methodName }
      );
    }
    if (args.length !== this.tree.parameterCount) {
      throw new ParameterCountMismatchError(this.methodName, this.tree.parameterCount, args.length);
    }
    this.metrics.incrementCounter(RepositoryMetricNames.QUERIES_TOTAL, 1, {
      method: this.methodName,
      accessPath: this.accessPath.kind,
    });
  }

  private recordItems(count: number): void {
    this.metrics.recordHistogram(RepositoryMetricNames.ITEMS_RETURNED, count, { method: this.methodName });
  }

  private async loadItem(args: readonly unknown[]): Promise<Item | undefined> {
    const request = buildLoadRequest(this.accessPath, args, this.context);
    return this.operations.load(this.metadata, request.key, request.consistency);
  }

  private async load(args: readonly unknown[]): Promise<T | undefined> {
    const item = await this.loadItem(args);
    return item === undefined ? undefined : asEntity<T>(item);
  }

  private async collect(args: readonly unknown[]): Promise<T[]> {
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      const item = await this.load(args);
      return item === undefined ? [] : [item];
    }
    return this.pages(args).toArray();
  }

  private async collectItems(args: readonly unknown[]): Promise<Item[]> {
    if (this.accessPath.kind === 'DIRECT_LOAD') {
      const item = await this.loadItem(args);
      return item === undefined ? [] : [item];
    }
    return this.itemPages(args).toArray();
  }

  private buildPagedRequest(args: readonly unknown[]): QueryRequest | ScanRequest {
    return this.accessPath.kind === 'SCAN'
      ? buildScanRequest(this.accessPath, args, this.context)
      : buildQueryRequest(this.accessPath, args, this.context);
  }

  private pages(args: readonly unknown[]): PagedItems<T> {
    return this.pagedItems<T>(args, asEntity);
  }

  private itemPages(args: readonly unknown[]): PagedItems<Item> {
    return this.pagedItems<Item>(args, (item) => item);
  }

  private pagedItems<R>(args: readonly unknown[], convert: (item: Item) => R): PagedItems<R> {
    const onPage = (): void => {
      this.metrics.incrementCounter(RepositoryMetricNames.PAGES_FETCHED, 1, { method: this.methodName });
    };
    const limit = this.tree.limit;

    if (this.accessPath.kind === 'SCAN') {
      const request = buildScanRequest(this.accessPath, args, this.context);
      return new PagedItems<R>((startKey) => this.operations.scan(this.metadata, request, startKey), {
        convert,
        limit,
        onPage,
      });
    }
    const request = buildQueryRequest(this.accessPath, args, this.context);
    return new PagedItems<R>((startKey) => this.operations.query(this.metadata, request, startKey), {
      convert,
      limit,
      onPage,
    });
  }
}
