/**
 * Condition Expression Builder
 *
 * Renders conditions into DynamoDB expression syntax with placeholder
 * attribute names and values. Several builders of one request share the
 * same placeholder maps and differ by their prefixes: key conditions use
 * `#k0`/`:k0`, filters `#n0`/`:v0` and projections `#p0`.
 */

import type { AttributeValue } from '../types/key.js';
import type { ExpressionAttributes } from '../types/request.js';

/**
 * Placeholder prefixes of one builder.
 */
export interface PlaceholderPrefixes {
  /** Name placeholder prefix including `#` */
  name: string;
  /** Value placeholder prefix including `:` */
  value: string;
}

export const KEY_PLACEHOLDERS: PlaceholderPrefixes = { name: '#k', value: ':k' };
export const FILTER_PLACEHOLDERS: PlaceholderPrefixes = { name: '#n', value: ':v' };
export const PROJECTION_PLACEHOLDERS: PlaceholderPrefixes = { name: '#p', value: ':p' };

/**
 * Creates empty placeholder maps for a request.
 */
export function emptyExpressionAttributes(): ExpressionAttributes {
  return { expressionAttributeNames: {}, expressionAttributeValues: {} };
}

/**
 * Builder for AND-combined condition expressions.
 *
 * @example
 * ```typescript
 * const attributes = emptyExpressionAttributes();
 * const filter = new ConditionBuilder(FILTER_PLACEHOLDERS, attributes)
 *   .attributeExists('email')
 *   .equals('order_status', 'OPEN')
 *   .build();
 * // 'attribute_exists(#n0) AND #n1 = :v0'
 * ```
 */
export class ConditionBuilder {
  private conditions: string[] = [];
  private nameCounter = 0;
  private valueCounter = 0;

  constructor(
    private readonly prefixes: PlaceholderPrefixes,
    private readonly attributes: ExpressionAttributes
  ) {}

  /**
   * Registers an attribute name and returns its placeholder.
   */
  name(attribute: string): string {
    const nameKey = `${this.prefixes.name}${this.nameCounter}`;
    this.nameCounter++;
    this.attributes.expressionAttributeNames[nameKey] = attribute;
    return nameKey;
  }

  /**
   * Registers a value and returns its placeholder.
   */
  value(value: AttributeValue): string {
    const valueKey = `${this.prefixes.value}${this.valueCounter}`;
    this.valueCounter++;
    this.attributes.expressionAttributeValues[valueKey] = value;
    return valueKey;
  }

  private compare(attribute: string, comparator: string, value: AttributeValue): this {
    const nameKey = this.name(attribute);
    this.conditions.push(`${nameKey} ${comparator} ${this.value(value)}`);
    return this;
  }

  /** attribute_exists(path) */
  attributeExists(attribute: string): this {
    this.conditions.push(`attribute_exists(${this.name(attribute)})`);
    return this;
  }

  /** attribute_not_exists(path) */
  attributeNotExists(attribute: string): this {
    this.conditions.push(`attribute_not_exists(${this.name(attribute)})`);
    return this;
  }

  equals(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '=', value);
  }

  notEquals(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '<>', value);
  }

  lessThan(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '<', value);
  }

  lessThanOrEqual(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '<=', value);
  }

  greaterThan(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '>', value);
  }

  greaterThanOrEqual(attribute: string, value: AttributeValue): this {
    return this.compare(attribute, '>=', value);
  }

  /**
   * attribute BETWEEN low AND high (inclusive)
   */
  between(attribute: string, low: AttributeValue, high: AttributeValue): this {
    const nameKey = this.name(attribute);
    const lowKey = this.value(low);
    const highKey = this.value(high);
    this.conditions.push(`${nameKey} BETWEEN ${lowKey} AND ${highKey}`);
    return this;
  }

  /**
   * attribute IN (value1, value2, ...), one placeholder per value
   */
  in(attribute: string, values: readonly AttributeValue[]): this {
    const nameKey = this.name(attribute);
    const valueKeys = values.map((value) => this.value(value));
    this.conditions.push(`${nameKey} IN (${valueKeys.join(', ')})`);
    return this;
  }

  /** begins_with(path, prefix) */
  beginsWith(attribute: string, prefix: AttributeValue): this {
    const nameKey = this.name(attribute);
    this.conditions.push(`begins_with(${nameKey}, ${this.value(prefix)})`);
    return this;
  }

  /**
   * contains(path, operand)
   *
   * Substring match on strings, membership on sets and lists.
   */
  contains(attribute: string, value: AttributeValue): this {
    const nameKey = this.name(attribute);
    this.conditions.push(`contains(${nameKey}, ${this.value(value)})`);
    return this;
  }

  /** NOT contains(path, operand) */
  notContains(attribute: string, value: AttributeValue): this {
    const nameKey = this.name(attribute);
    this.conditions.push(`NOT contains(${nameKey}, ${this.value(value)})`);
    return this;
  }

  /**
   * Joins the conditions with AND, or returns undefined when there are none.
   */
  build(): string | undefined {
    return this.conditions.length === 0 ? undefined : this.conditions.join(' AND ');
  }
}
