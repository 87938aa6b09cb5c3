/**
 * Attribute Utility Tests
 * @module tests/utils/attributes
 */

import { describe, it, expect } from 'vitest';
import {
  attributeToSearchText,
  deepFreeze,
  toInstanceCount,
  toStringList,
  walkLeaves,
} from '@/utils/attributes';

describe('attribute utilities', () => {
  it('should walk every scalar leaf with its path', () => {
    const leaves = [...walkLeaves({ ingress: [{ port: 443 }], name: 'web' })];

    expect(leaves).toEqual([
      { path: ['ingress', '0', 'port'], value: 443 },
      { path: ['name'], value: 'web' },
    ]);
  });

  it('should freeze nested values', () => {
    const value = deepFreeze({ list: [1, 2], nested: { a: 'b' } });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.nested)).toBe(true);
  });

  it('should render search text as JSON for non-strings', () => {
    expect(attributeToSearchText('plain')).toBe('plain');
    expect(attributeToSearchText(['a', 1])).toBe('["a",1]');
    expect(attributeToSearchText(undefined)).toBe('');
  });

  it('should read instance counts from numbers, strings and collections', () => {
    expect(toInstanceCount(3)).toBe(3);
    expect(toInstanceCount(' 4 ')).toBe(4);
    expect(toInstanceCount(['a', 'b'])).toBe(2);
    expect(toInstanceCount({ a: 1 })).toBe(1);
    expect(toInstanceCount('UNKNOWN')).toBeNull();
    expect(toInstanceCount(1.5)).toBeNull();
  });

  it('should flatten values to string lists', () => {
    expect(toStringList(undefined)).toEqual([]);
    expect(toStringList('a')).toEqual(['a']);
    expect(toStringList(['a', ['b', 3]])).toEqual(['a', 'b', '3']);
  });
});
