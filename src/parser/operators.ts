/**
 * Comparison operators recognized in method names.
 */

export type Operator =
  | 'EQUALS'
  | 'NOT_EQUALS'
  | 'GREATER_THAN'
  | 'GREATER_THAN_EQUAL'
  | 'LESS_THAN'
  | 'LESS_THAN_EQUAL'
  | 'BETWEEN'
  | 'IN'
  | 'STARTING_WITH'
  | 'CONTAINING'
  | 'NOT_CONTAINING'
  | 'IS_NULL'
  | 'IS_NOT_NULL'
  | 'TRUE'
  | 'FALSE';

/**
 * Number of method arguments each operator consumes. IN consumes a single
 * collection argument.
 */
export const OPERATOR_ARITY: Readonly<Record<Operator, number>> = {
  EQUALS: 1,
  NOT_EQUALS: 1,
  GREATER_THAN: 1,
  GREATER_THAN_EQUAL: 1,
  LESS_THAN: 1,
  LESS_THAN_EQUAL: 1,
  BETWEEN: 2,
  IN: 1,
  STARTING_WITH: 1,
  CONTAINING: 1,
  NOT_CONTAINING: 1,
  IS_NULL: 0,
  IS_NOT_NULL: 0,
  TRUE: 0,
  FALSE: 0,
};

const KEY_CONDITION_OPERATORS: ReadonlySet<Operator> = new Set<Operator>([
  'EQUALS',
  'GREATER_THAN',
  'GREATER_THAN_EQUAL',
  'LESS_THAN',
  'LESS_THAN_EQUAL',
  'BETWEEN',
]);

/**
 * Whether the operator may be used in a key condition on a range key.
 * Everything else is only valid in a filter expression.
 */
export function isKeyConditionOperator(operator: Operator): boolean {
  return KEY_CONDITION_OPERATORS.has(operator);
}

/**
 * Keyword suffixes, longest first so that `IsNotNull` wins over `NotNull`
 * and `NotContaining` over `Containing`.
 */
const KEYWORDS: Array<[string, Operator]> = [
  ['IsGreaterThanEqual', 'GREATER_THAN_EQUAL'],
  ['GreaterThanEqual', 'GREATER_THAN_EQUAL'],
  ['IsLessThanEqual', 'LESS_THAN_EQUAL'],
  ['LessThanEqual', 'LESS_THAN_EQUAL'],
  ['IsGreaterThan', 'GREATER_THAN'],
  ['GreaterThan', 'GREATER_THAN'],
  ['IsLessThan', 'LESS_THAN'],
  ['LessThan', 'LESS_THAN'],
  ['IsAfter', 'GREATER_THAN'],
  ['After', 'GREATER_THAN'],
  ['IsBefore', 'LESS_THAN'],
  ['Before', 'LESS_THAN'],
  ['IsBetween', 'BETWEEN'],
  ['Between', 'BETWEEN'],
  ['IsIn', 'IN'],
  ['In', 'IN'],
  ['IsStartingWith', 'STARTING_WITH'],
  ['StartingWith', 'STARTING_WITH'],
  ['StartsWith', 'STARTING_WITH'],
  ['IsNotContaining', 'NOT_CONTAINING'],
  ['NotContaining', 'NOT_CONTAINING'],
  ['NotContains', 'NOT_CONTAINING'],
  ['IsContaining', 'CONTAINING'],
  ['Containing', 'CONTAINING'],
  ['Contains', 'CONTAINING'],
  ['IsNotNull', 'IS_NOT_NULL'],
  ['NotNull', 'IS_NOT_NULL'],
  ['Exists', 'IS_NOT_NULL'],
  ['IsNull', 'IS_NULL'],
  ['Null', 'IS_NULL'],
  ['IsTrue', 'TRUE'],
  ['True', 'TRUE'],
  ['IsFalse', 'FALSE'],
  ['False', 'FALSE'],
  ['IsNot', 'NOT_EQUALS'],
  ['Not', 'NOT_EQUALS'],
  ['Equals', 'EQUALS'],
  ['Is', 'EQUALS'],
];

const OPERATOR_KEYWORDS: ReadonlyArray<readonly [string, Operator]> = [...KEYWORDS].sort(
  ([a], [b]) => b.length - a.length
);

/**
 * One way of reading a criteria segment: the property text before the
 * operator keyword and the operator it names.
 */
export interface SegmentReading {
  readonly propertyPath: string;
  readonly operator: Operator;
}

/**
 * Lists every reading of a criteria segment such as `OrderDateBetween`.
 *
 * Readings that strip a keyword come first, longest keyword first; the
 * plain EQUALS reading of the whole segment comes last. A property whose
 * name happens to end in a keyword (`CheckIn` ends in `In`) is resolved by
 * trying the readings in order against the entity's properties.
 */
export function readSegment(segment: string): SegmentReading[] {
  const readings: SegmentReading[] = [];
  for (const [keyword, operator] of OPERATOR_KEYWORDS) {
    if (segment.length > keyword.length && segment.endsWith(keyword)) {
      readings.push({ propertyPath: segment.slice(0, -keyword.length), operator });
    }
  }
  readings.push({ propertyPath: segment, operator: 'EQUALS' });
  return readings;
}

/**
 * Keywords of the method-name grammar that map to no DynamoDB condition.
 * They are recognized only to report them by name.
 */
const UNSUPPORTED_KEYWORDS: readonly string[] = [
  'IsNotIn',
  'NotIn',
  'IsLike',
  'Like',
  'IsNotLike',
  'NotLike',
  'IsEndingWith',
  'EndingWith',
  'EndsWith',
  'MatchesRegex',
  'Matches',
  'Regex',
  'IsEmpty',
  'Empty',
  'IsNotEmpty',
  'NotEmpty',
  'IsNear',
  'Near',
  'IsWithin',
  'Within',
].slice().sort((a, b) => b.length - a.length);

export interface UnsupportedReading {
  readonly propertyPath: string;
  readonly keyword: string;
}

/**
 * Lists readings of a segment that strip an unsupported keyword, longest
 * keyword first.
 */
export function readUnsupportedKeyword(segment: string): UnsupportedReading[] {
  return UNSUPPORTED_KEYWORDS.filter(
    (keyword) => segment.length > keyword.length && segment.endsWith(keyword)
  ).map((keyword) => ({ propertyPath: segment.slice(0, -keyword.length), keyword }));
}
