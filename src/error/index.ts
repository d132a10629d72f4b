/**
 * Error Handling
 *
 * Error classes raised while building repositories and executing derived queries.
 */

export { RepositoryError } from './error.js';

// Error categories
export type { ErrorContext } from './categories.js';
export {
  ConfigurationError,
  EntityValidationError,
  PropertyResolutionError,
  ParameterCountMismatchError,
  ScanNotEnabledError,
  ScanCountNotEnabledError,
  UnsupportedOperationError,
  ParameterBindingError,
  BatchDeleteError,
} from './categories.js';
