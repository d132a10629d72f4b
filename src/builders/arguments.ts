/**
 * Method argument validation.
 *
 * Arguments arrive untyped from the repository method call and are checked
 * against what the document client can marshal before they are placed in
 * a request.
 */

import type { AttributeValue } from '../types/key.js';
import type { Predicate } from '../parser/types.js';
import { ParameterBindingError } from '../error/index.js';

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Whether a value can be stored as an attribute value.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      break;
    default:
      return false;
  }
  if (value instanceof Uint8Array) {
    return true;
  }
  if (value instanceof Set) {
    const elements: unknown[] = [...value];
    return (
      elements.every((element) => typeof element === 'string') ||
      elements.every((element) => typeof element === 'number')
    );
  }
  if (Array.isArray(value)) {
    return value.every((element: unknown) => isAttributeValue(element));
  }
  return isPlainObject(value) && Object.values(value).every((element: unknown) => isAttributeValue(element));
}

/**
 * Whether a value is an argument object such as a composite id.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isPlainObject(value);
}

function toCollection(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) {
    return [...value];
  }
  if (value instanceof Set) {
    return [...value];
  }
  return undefined;
}

function nullArgument(property: string, methodName: string): ParameterBindingError {
  return new ParameterBindingError('Creating conditions on null parameters not supported', {
    methodName,
    details: { property },
  });
}

/**
 * Checks a single non-null argument value.
 */
export function requireValue(value: unknown, property: string, methodName: string): AttributeValue {
  if (value === null || value === undefined) {
    throw nullArgument(property, methodName);
  }
  if (!isAttributeValue(value)) {
    throw new ParameterBindingError(`Argument for property ${property} is not a storable value`, {
      methodName,
      details: { property, type: typeof value },
    });
  }
  return value;
}

/**
 * Argument `index` (0-based within the predicate) of a predicate.
 */
export function argumentOf(
  args: readonly unknown[],
  predicate: Predicate,
  index: number,
  methodName: string
): AttributeValue {
  return requireValue(args[predicate.argumentOffset + index], predicate.property, methodName);
}

/**
 * Elements of an IN argument, which must be a non-empty array or set.
 */
export function collectionArgumentOf(
  args: readonly unknown[],
  predicate: Predicate,
  methodName: string
): AttributeValue[] {
  const raw = args[predicate.argumentOffset];
  if (raw === null || raw === undefined) {
    throw nullArgument(predicate.property, methodName);
  }
  const elements = toCollection(raw);
  if (!elements || elements.length === 0) {
    throw new ParameterBindingError(`IN on property ${predicate.property} requires a non-empty collection`, {
      methodName,
      details: { property: predicate.property },
    });
  }
  return elements.map((element) => requireValue(element, predicate.property, methodName));
}

/**
 * Operand of CONTAINING / NOT_CONTAINING: a single value, or a collection
 * holding exactly one value.
 */
export function containsArgumentOf(
  args: readonly unknown[],
  predicate: Predicate,
  methodName: string
): AttributeValue {
  const raw = args[predicate.argumentOffset];
  const elements = toCollection(raw);
  if (!elements) {
    return requireValue(raw, predicate.property, methodName);
  }
  if (elements.length !== 1) {
    throw new ParameterBindingError(
      `Only a single value or a one-element collection can be used with ${predicate.operator} on property ${predicate.property}`,
      { methodName, details: { property: predicate.property, size: elements.length } }
    );
  }
  return requireValue(elements[0], predicate.property, methodName);
}
