import { RepositoryError } from './error.js';

/**
 * Context attached to an error raised for a specific repository method.
 */
export interface ErrorContext {
  methodName?: string;
  details?: Record<string, unknown>;
}

/**
 * Error thrown when an entity schema or a repository method declaration is
 * invalid. Raised while the repository is being built, never per call.
 */
export class ConfigurationError extends RepositoryError {
  constructor(message: string, context: ErrorContext = {}) {
    super({
      code: 'ConfigurationError',
      message,
      methodName: context.methodName,
      details: context.details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for an entity schema whose key or index declarations are inconsistent
 */
export class EntityValidationError extends ConfigurationError {
  public readonly entityName: string;

  constructor(entityName: string, message: string) {
    super(`Invalid entity ${entityName}: ${message}`, { details: { entityName } });
    this.name = 'EntityValidationError';
    this.entityName = entityName;
  }
}

/**
 * Error for a method-name property that does not match any declared property
 */
export class PropertyResolutionError extends ConfigurationError {
  constructor(propertyPath: string, entityName: string, methodName?: string) {
    super(`No property ${propertyPath} found on entity ${entityName}`, {
      methodName,
      details: { propertyPath, entityName },
    });
    this.name = 'PropertyResolutionError';
  }
}

/**
 * Error for a method whose declared or supplied arguments do not match
 * the number of values its predicates bind
 */
export class ParameterCountMismatchError extends ConfigurationError {
  constructor(methodName: string, expected: number, actual: number) {
    super(
      `Method ${methodName} binds ${expected} parameter(s) but ${actual} ${actual === 1 ? 'was' : 'were'} supplied`,
      { methodName, details: { expected, actual } }
    );
    this.name = 'ParameterCountMismatchError';
  }
}

/**
 * Error for a method that can only be served by a table scan while
 * scanning is not enabled for it
 */
export class ScanNotEnabledError extends ConfigurationError {
  constructor(methodName: string) {
    super(
      'Scanning for this query is not enabled. To enable, set enableScan on the method ' +
        'declaration, or enable scanning for all methods with the repository enableScan option',
      { methodName }
    );
    this.name = 'ScanNotEnabledError';
  }
}

/**
 * Error for a count method that can only be served by a table scan while
 * scan-based counting is not enabled for it
 */
export class ScanCountNotEnabledError extends ConfigurationError {
  constructor(methodName: string) {
    super(
      'Scanning for the total count of this query is not enabled. To enable, set enableScanCount ' +
        'on the method declaration, or enable it for all methods with the repository enableScanCount option',
      { methodName }
    );
    this.name = 'ScanCountNotEnabledError';
  }
}

/**
 * Error thrown when a method name asks for something DynamoDB cannot serve
 * (ordering by a non-key attribute, Or clauses, range conditions on hash keys)
 */
export class UnsupportedOperationError extends RepositoryError {
  constructor(message: string, context: ErrorContext = {}) {
    super({
      code: 'UnsupportedOperation',
      message,
      methodName: context.methodName,
      details: context.details,
    });
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Error thrown when an argument cannot be bound to its predicate
 */
export class ParameterBindingError extends RepositoryError {
  constructor(message: string, context: ErrorContext = {}) {
    super({
      code: 'ParameterBinding',
      message,
      methodName: context.methodName,
      details: context.details,
    });
    this.name = 'ParameterBindingError';
  }
}

/**
 * Error thrown by the storage collaborator when a batch delete leaves
 * unprocessed items behind
 */
export class BatchDeleteError extends RepositoryError {
  public readonly unprocessedCount: number;

  constructor(tableName: string, unprocessedCount: number) {
    super({
      code: 'BatchDeleteFailed',
      message: `Batch delete on ${tableName} left ${unprocessedCount} item(s) unprocessed`,
      details: { tableName, unprocessedCount },
    });
    this.name = 'BatchDeleteError';
    this.unprocessedCount = unprocessedCount;
  }
}
