/**
 * Method Name Parser
 *
 * Turns a repository method name into a ParsedMethodName. The grammar is
 *
 *   {find|get|read|query|count|exists|delete}[Distinct][Top{N}|First{N}]...
 *     [By{Criteria}][OrderBy{Property}[Asc|Desc]]
 *
 * where Criteria is a list of `{Property}{Operator?}` segments joined by
 * `And`. Parsing does not look at any entity; property names are matched
 * later by bindPredicateTree.
 */

import type { ParsedMethodName, ParsedOrderBy, ParsedPredicate, QuerySubject, SortDirection } from './types.js';
import { readSegment } from './operators.js';
import { ConfigurationError, UnsupportedOperationError } from '../error/index.js';

const PREFIX_PATTERN = /^(find|get|read|query|count|exists|delete)(?=[A-Z]|$)/;
const LIMIT_PATTERN = /(First|Top)(\d*)/;
const OR_SEPARATOR = /Or(?=[A-Z])/;
const AND_SEPARATOR = /And(?=[A-Z])/;
const MULTIPLE_ORDER = /(Asc|Desc)(?=[A-Z])/;
const IGNORE_CASE_SUFFIXES = ['AllIgnoreCase', 'AllIgnoringCase', 'IgnoreCase', 'IgnoringCase'];

const SUBJECTS: Readonly<Record<string, QuerySubject>> = {
  find: 'find',
  get: 'find',
  read: 'find',
  query: 'find',
  count: 'count',
  exists: 'exists',
  delete: 'delete',
};

/**
 * Index of a keyword that is followed by an upper-case letter or the end of
 * the text, or -1.
 */
function indexOfKeyword(text: string, keyword: string): number {
  let from = 0;
  while (from <= text.length - keyword.length) {
    const index = text.indexOf(keyword, from);
    if (index < 0) {
      return -1;
    }
    const next = text.charAt(index + keyword.length);
    if (next === '' || (next >= 'A' && next <= 'Z')) {
      return index;
    }
    from = index + 1;
  }
  return -1;
}

function rejectIgnoreCase(text: string, methodName: string): void {
  if (IGNORE_CASE_SUFFIXES.some((suffix) => text.endsWith(suffix))) {
    throw new UnsupportedOperationError('Case insensitivity not supported', { methodName });
  }
}

function parseLimit(subjectText: string, methodName: string): number | undefined {
  const match = LIMIT_PATTERN.exec(subjectText);
  if (!match) {
    return undefined;
  }
  const limit = match[2] === '' ? 1 : Number.parseInt(match[2], 10);
  if (limit < 1) {
    throw new ConfigurationError(`Result limit of ${methodName} must be at least 1`, { methodName });
  }
  return limit;
}

function parseCriteria(criteriaText: string, methodName: string): ParsedPredicate[] {
  if (criteriaText === '') {
    return [];
  }
  rejectIgnoreCase(criteriaText, methodName);
  if (criteriaText.split(OR_SEPARATOR).length > 1) {
    throw new UnsupportedOperationError('Or queries not supported', { methodName });
  }

  return criteriaText.split(AND_SEPARATOR).map((segment) => {
    if (segment === '') {
      throw new ConfigurationError(`Empty criteria segment in ${methodName}`, { methodName });
    }
    rejectIgnoreCase(segment, methodName);
    return { source: segment, readings: readSegment(segment) };
  });
}

function parseOrderBy(orderText: string, methodName: string): ParsedOrderBy {
  if (MULTIPLE_ORDER.test(orderText)) {
    throw new UnsupportedOperationError('Sorting by multiple attributes not possible', { methodName });
  }

  let propertyPath = orderText;
  let direction: SortDirection = 'ASC';
  if (orderText.endsWith('Desc')) {
    propertyPath = orderText.slice(0, -'Desc'.length);
    direction = 'DESC';
  } else if (orderText.endsWith('Asc')) {
    propertyPath = orderText.slice(0, -'Asc'.length);
  }

  if (propertyPath === '') {
    throw new ConfigurationError(`OrderBy clause of ${methodName} names no property`, { methodName });
  }
  return { propertyPath, direction };
}

/**
 * Parses a repository method name.
 *
 * @throws {ConfigurationError} If the name does not follow the grammar
 * @throws {UnsupportedOperationError} For `Or`, `IgnoreCase` or multi-property ordering
 *
 * @example
 * ```typescript
 * parseMethodName('findTop3ByCustomerIdAndOrderDateAfterOrderByOrderDateDesc');
 * // subject 'find', limit 3, two predicates, orderBy OrderDate DESC
 * ```
 */
export function parseMethodName(methodName: string): ParsedMethodName {
  const prefixMatch = PREFIX_PATTERN.exec(methodName);
  if (!prefixMatch) {
    throw new ConfigurationError(
      `Method name ${methodName} must start with find, get, read, query, count, exists or delete`,
      { methodName }
    );
  }

  const prefix = prefixMatch[1];
  const remainder = methodName.slice(prefix.length);

  const orderIndex = indexOfKeyword(remainder, 'OrderBy');
  const head = orderIndex < 0 ? remainder : remainder.slice(0, orderIndex);
  const orderText = orderIndex < 0 ? undefined : remainder.slice(orderIndex + 'OrderBy'.length);

  const byIndex = indexOfKeyword(head, 'By');
  const subjectText = byIndex < 0 ? head : head.slice(0, byIndex);
  const criteriaText = byIndex < 0 ? '' : head.slice(byIndex + 'By'.length);

  if (byIndex >= 0 && criteriaText === '' && orderText === undefined) {
    throw new ConfigurationError(`Method name ${methodName} has no criteria after By`, { methodName });
  }

  return {
    methodName,
    subject: SUBJECTS[prefix],
    limit: parseLimit(subjectText, methodName),
    predicates: parseCriteria(criteriaText, methodName),
    orderBy: orderText === undefined ? undefined : parseOrderBy(orderText, methodName),
  };
}
