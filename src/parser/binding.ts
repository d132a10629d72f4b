/**
 * Binds a parsed method name to an entity: every criteria segment and the
 * OrderBy clause are matched against the entity's properties.
 */

import type { OrderBy, ParsedMethodName, ParsedOrderBy, ParsedPredicate, Predicate, PredicateTree } from './types.js';
import { OPERATOR_ARITY, readUnsupportedKeyword } from './operators.js';
import type { EntityKeyMetadata } from '../metadata/entity.js';
import { PropertyResolutionError, UnsupportedOperationError } from '../error/index.js';

/**
 * Resolved property reference.
 */
export interface PropertyPath {
  readonly segments: readonly string[];
  readonly leaf: string;
}

/**
 * Lower-cases the first character unless the first two characters are both
 * upper case (`URL` stays `URL`, `OrderDate` becomes `orderDate`).
 */
export function decapitalize(text: string): string {
  if (text.length > 1 && isUpperCase(text.charAt(0)) && isUpperCase(text.charAt(1))) {
    return text;
  }
  return text.charAt(0).toLowerCase() + text.slice(1);
}

function isUpperCase(char: string): boolean {
  return char >= 'A' && char <= 'Z';
}

function compositeIdFields(metadata: EntityKeyMetadata): { property: string; fields: readonly string[] } | undefined {
  if (metadata.kind !== 'composite' || !metadata.compositeId) {
    return undefined;
  }
  const { property, partitionKey, sortKey } = metadata.compositeId;
  return { property, fields: [partitionKey, sortKey] };
}

/**
 * Resolves property text from a method name, such as `OrderDate`,
 * `PlaylistIdUserName` or `PlaylistId_UserName`.
 *
 * Nested paths only reach into the composite id; the leaf is then the key
 * property the id field maps to.
 */
export function resolvePropertyPath(text: string, metadata: EntityKeyMetadata): PropertyPath | undefined {
  if (text === '') {
    return undefined;
  }
  const compositeId = compositeIdFields(metadata);

  if (text.includes('_')) {
    const parts = text.split('_').map(decapitalize);
    if (
      compositeId &&
      parts.length === 2 &&
      parts[0] === compositeId.property &&
      compositeId.fields.includes(parts[1])
    ) {
      return { segments: parts, leaf: parts[1] };
    }
    return undefined;
  }

  const property = decapitalize(text);
  if (metadata.properties.has(property)) {
    return { segments: [property], leaf: property };
  }

  if (compositeId) {
    for (let i = 1; i < text.length; i++) {
      if (!isUpperCase(text.charAt(i))) {
        continue;
      }
      const head = decapitalize(text.slice(0, i));
      const tail = decapitalize(text.slice(i));
      if (head === compositeId.property && compositeId.fields.includes(tail)) {
        return { segments: [head, tail], leaf: tail };
      }
    }
  }
  return undefined;
}

function bindPredicate(
  parsed: ParsedPredicate,
  argumentOffset: number,
  metadata: EntityKeyMetadata,
  methodName: string
): Predicate {
  for (const reading of parsed.readings) {
    const path = resolvePropertyPath(reading.propertyPath, metadata);
    if (path) {
      return {
        propertyPath: path.segments,
        property: path.leaf,
        operator: reading.operator,
        argumentCount: OPERATOR_ARITY[reading.operator],
        argumentOffset,
      };
    }
  }
  for (const unsupported of readUnsupportedKeyword(parsed.source)) {
    if (resolvePropertyPath(unsupported.propertyPath, metadata)) {
      throw new UnsupportedOperationError(`Unsupported keyword ${unsupported.keyword}`, { methodName });
    }
  }
  const preferred = parsed.readings[0]?.propertyPath ?? parsed.source;
  throw new PropertyResolutionError(decapitalize(preferred), metadata.entityName, methodName);
}

function bindOrderBy(parsed: ParsedOrderBy, metadata: EntityKeyMetadata, methodName: string): OrderBy {
  const path = resolvePropertyPath(parsed.propertyPath, metadata);
  if (!path) {
    throw new PropertyResolutionError(decapitalize(parsed.propertyPath), metadata.entityName, methodName);
  }
  return { property: path.leaf, direction: parsed.direction };
}

/**
 * Binds a parsed method name to entity metadata.
 *
 * @throws {PropertyResolutionError} If a segment or the OrderBy clause names no property of the entity
 * @throws {UnsupportedOperationError} If a segment names a property through an unsupported keyword
 */
export function bindPredicateTree(parsed: ParsedMethodName, metadata: EntityKeyMetadata): PredicateTree {
  const predicates: Predicate[] = [];
  let parameterCount = 0;
  for (const parsedPredicate of parsed.predicates) {
    const predicate = bindPredicate(parsedPredicate, parameterCount, metadata, parsed.methodName);
    predicates.push(predicate);
    parameterCount += predicate.argumentCount;
  }

  return {
    methodName: parsed.methodName,
    subject: parsed.subject,
    limit: parsed.limit,
    predicates,
    orderBy: parsed.orderBy ? bindOrderBy(parsed.orderBy, metadata, parsed.methodName) : undefined,
    parameterCount,
  };
}
