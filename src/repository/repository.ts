/**
 * Repository
 *
 * Holds one DerivedQuery per declared method, built eagerly so that a
 * misdeclared method fails when the repository is created, plus the CRUD
 * base methods every repository has.
 */

import type { DynamoDBOperations } from '../client/operations.js';
import type { EntityKeyMetadata } from '../metadata/entity.js';
import { sortKeyOf } from '../metadata/entity.js';
import type { Key } from '../types/key.js';
import type { Item } from '../types/item.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { NoopMetricsCollector } from '../observability/metrics.js';
import { isAttributeValue } from '../builders/arguments.js';
import { ConfigurationError, ParameterBindingError } from '../error/index.js';
import type { MethodDeclaration, QueryResult } from '../executor/declaration.js';
import { DerivedQuery, asEntity } from '../executor/derived-query.js';

export type MethodDeclarations = Readonly<Record<string, MethodDeclaration>>;

export interface RepositoryOptions {
  /** Default scan permission for find, exists and delete methods */
  enableScan?: boolean;
  /** Default scan permission for count methods */
  enableScanCount?: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Repository over one entity.
 *
 * @example
 * ```typescript
 * const repository = createRepository<Order>(template, orders, {
 *   findByCustomerIdAndOrderDateAfter: { returns: 'many' },
 *   countByStatus: { returns: 'count' },
 * });
 * const recent = await repository.query('findByCustomerIdAndOrderDateAfter').many(['c-1', '2024-01-01']);
 * ```
 */
export class Repository<T extends object = Item> {
  private readonly queries = new Map<string, DerivedQuery<T>>();
  private readonly baseQueries = new Map<string, DerivedQuery<T>>();
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  /**
   * @throws {ConfigurationError} On the first misdeclared method
   */
  constructor(
    private readonly operations: DynamoDBOperations,
    readonly metadata: EntityKeyMetadata,
    declarations: MethodDeclarations,
    private readonly options: RepositoryOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();

    for (const [methodName, declaration] of Object.entries(declarations)) {
      this.queries.set(methodName, this.derive(methodName, declaration));
    }

    this.logger.info('Repository created', {
      entity: metadata.entityName,
      methods: this.queries.size,
    });
  }

  /**
   * Names of the declared query methods, in declaration order.
   */
  get methodNames(): string[] {
    return [...this.queries.keys()];
  }

  /**
   * The executable form of a declared method.
   *
   * @throws {ConfigurationError} If no such method was declared
   */
  query(methodName: string): DerivedQuery<T> {
    const query = this.queries.get(methodName);
    if (!query) {
      throw new ConfigurationError(`No method ${methodName} declared on the ${this.metadata.entityName} repository`, {
        methodName,
      });
    }
    return query;
  }

  /**
   * Invokes a declared method by name.
   */
  async invoke(methodName: string, ...args: unknown[]): Promise<QueryResult<T>> {
    return this.query(methodName).execute(args);
  }

  // ==========================================================================
  // CRUD base methods
  // ==========================================================================

  async findById(key: Key): Promise<T | undefined> {
    const item = await this.operations.load(this.metadata, this.checkKey(key));
    return item === undefined ? undefined : asEntity<T>(item);
  }

  async existsById(key: Key): Promise<boolean> {
    return (await this.operations.load(this.metadata, this.checkKey(key))) !== undefined;
  }

  /**
   * Every item of the table. Needs the repository's scan permission.
   *
   * @throws {ScanNotEnabledError} If scanning is not enabled
   */
  async findAll(): Promise<T[]> {
    return this.baseQuery('findAll', 'many').many([]);
  }

  /**
   * Number of items in the table. Needs the repository's scan-count permission.
   *
   * @throws {ScanCountNotEnabledError} If scan counts are not enabled
   */
  async count(): Promise<number> {
    return this.baseQuery('count', 'count').count([]);
  }

  /**
   * Creates or replaces an entity.
   *
   * @throws {ParameterBindingError} If a property holds a value that cannot be stored
   */
  async save(entity: T): Promise<T> {
    await this.operations.save(this.metadata, this.toItem(entity));
    return entity;
  }

  /**
   * Deletes by primary key and returns the removed entity, if there was one.
   */
  async deleteById(key: Key): Promise<T | undefined> {
    const removed = await this.operations.delete(this.metadata, this.checkKey(key));
    return removed === undefined ? undefined : asEntity<T>(removed);
  }

  private derive(methodName: string, declaration: MethodDeclaration): DerivedQuery<T> {
    return new DerivedQuery<T>(this.operations, this.metadata, methodName, declaration, {
      scanPolicy: {
        enableScan: this.options.enableScan,
        enableScanCount: this.options.enableScanCount,
      },
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  /**
   * Base queries are derived on first use; a disabled scan therefore only
   * fails the call that needs it.
   */
  private baseQuery(methodName: 'findAll' | 'count', returns: 'many' | 'count'): DerivedQuery<T> {
    const cached = this.baseQueries.get(methodName);
    if (cached) {
      return cached;
    }
    const query = this.derive(methodName, { returns });
    this.baseQueries.set(methodName, query);
    return query;
  }

  private checkKey(key: Key): Key {
    const { partitionKey, sortKey } = key;
    if (partitionKey === null || partitionKey === undefined) {
      throw new ParameterBindingError(`Key of ${this.metadata.entityName} has no partition key value`);
    }
    if (sortKeyOf(this.metadata) !== undefined && (sortKey === null || sortKey === undefined)) {
      throw new ParameterBindingError(`Key of ${this.metadata.entityName} has no sort key value`);
    }
    return key;
  }

  private toItem(entity: T): Item {
    const item: Item = {};
    for (const [property, value] of Object.entries(entity)) {
      if (value === undefined) {
        continue;
      }
      if (!isAttributeValue(value)) {
        throw new ParameterBindingError(
          `Property ${property} of ${this.metadata.entityName} holds a value that cannot be stored`,
          { details: { property } }
        );
      }
      item[property] = value;
    }
    return item;
  }
}

/**
 * Creates a repository for one entity from its method declarations.
 */
export function createRepository<T extends object = Item>(
  operations: DynamoDBOperations,
  metadata: EntityKeyMetadata,
  declarations: MethodDeclarations,
  options: RepositoryOptions = {}
): Repository<T> {
  return new Repository<T>(operations, metadata, declarations, options);
}
