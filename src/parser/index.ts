/**
 * Method-name parsing and binding.
 */

export type { Operator, SegmentReading, UnsupportedReading } from './operators.js';
export { OPERATOR_ARITY, isKeyConditionOperator, readSegment, readUnsupportedKeyword } from './operators.js';

export type {
  QuerySubject,
  SortDirection,
  ParsedPredicate,
  ParsedOrderBy,
  ParsedMethodName,
  Predicate,
  OrderBy,
  PredicateTree,
} from './types.js';

export { parseMethodName } from './method-name.js';

export type { PropertyPath } from './binding.js';
export { bindPredicateTree, resolvePropertyPath, decapitalize } from './binding.js';
