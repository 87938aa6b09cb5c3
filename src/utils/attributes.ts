/**
 * Attribute Value Utilities
 * @module utils/attributes
 */

import { type AttributeMap, type AttributeValue, isAttributeMap } from '../types/graph';

/**
 * A scalar leaf found while walking an attribute tree
 */
export interface AttributeLeaf {
  /** Key path from the map root, e.g. `['ingress', '0', 'cidr_blocks']` */
  readonly path: readonly string[];
  readonly value: string | number | boolean | null;
}

export function cloneAttributeValue<T extends AttributeValue>(value: T): T {
  return structuredClone(value);
}

export function cloneAttributeMap(map: AttributeMap): AttributeMap {
  return structuredClone(map);
}

/**
 * Recursively freeze an attribute tree
 */
export function deepFreeze<T extends AttributeValue>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach((item) => deepFreeze(item));
    Object.freeze(value);
  } else if (isAttributeMap(value)) {
    Object.values(value).forEach((item) => deepFreeze(item));
    Object.freeze(value);
  }
  return value;
}

/**
 * Depth-first walk over every scalar leaf
 */
export function* walkLeaves(
  value: AttributeValue,
  path: readonly string[] = []
): Generator<AttributeLeaf> {
  if (Array.isArray(value)) {
    for (let index = 0; index < value.length; index++) {
      yield* walkLeaves(value[index], [...path, String(index)]);
    }
    return;
  }
  if (isAttributeMap(value)) {
    for (const [key, child] of Object.entries(value)) {
      yield* walkLeaves(child, [...path, key]);
    }
    return;
  }
  yield { path, value };
}

/**
 * Render a value for substring searches. Strings are returned as-is,
 * everything else as JSON.
 */
export function attributeToSearchText(value: AttributeValue | undefined): string {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Interpret a metadata value as a positive instance count.
 * Accepts numbers, numeric strings, lists and maps (for_each).
 */
export function toInstanceCount(value: AttributeValue | undefined): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  if (Array.isArray(value)) {
    return value.length;
  }
  if (isAttributeMap(value)) {
    return Object.keys(value).length;
  }
  return null;
}

/**
 * Normalize a value to a list of strings (single strings become one-item lists)
 */
export function toStringList(value: AttributeValue | undefined): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item) => toStringList(item));
  }
  if (isAttributeMap(value)) {
    return [JSON.stringify(value)];
  }
  return [String(value)];
}
