/**
 * Terraform Function Tests
 * @module tests/parsers/functions
 */

import { describe, it, expect } from 'vitest';
import { callTerraformFunction, isTerraformFunction } from '@/parsers/terraform/functions';

describe('Terraform functions', () => {
  // ==========================================================================
  // Collections
  // ==========================================================================

  describe('collection functions', () => {
    it('should pick an element with a wrapping index', () => {
      expect(callTerraformFunction('element', [['a', 'b', 'c'], 4])).toBe('b');
      expect(callTerraformFunction('element', [[], 0])).toBeUndefined();
      expect(callTerraformFunction('element', [['a'], -1])).toBeUndefined();
    });

    it('should concatenate lists only', () => {
      expect(callTerraformFunction('concat', [['a'], ['b', 'c']])).toEqual(['a', 'b', 'c']);
      expect(callTerraformFunction('concat', [['a'], 'b'])).toBeUndefined();
    });

    it('should look up a key with an optional default', () => {
      expect(callTerraformFunction('lookup', [{ a: 1 }, 'a'])).toBe(1);
      expect(callTerraformFunction('lookup', [{ a: 1 }, 'b', 'none'])).toBe('none');
      expect(callTerraformFunction('lookup', [{ a: 1 }, 'b'])).toBeUndefined();
    });

    it('should flatten nested lists and keep the first of each duplicate', () => {
      expect(callTerraformFunction('flatten', [[['a', ['b']], 'c']])).toEqual(['a', 'b', 'c']);
      expect(callTerraformFunction('distinct', [['a', 'b', 'a']])).toEqual(['a', 'b']);
    });

    it('should list map keys and values in key order', () => {
      expect(callTerraformFunction('keys', [{ b: 1, a: 2 }])).toEqual(['a', 'b']);
      expect(callTerraformFunction('values', [{ b: 1, a: 2 }])).toEqual([2, 1]);
    });

    it('should take the maximum of numbers or a number list', () => {
      expect(callTerraformFunction('max', [3, 7, 5])).toBe(7);
      expect(callTerraformFunction('max', [[1, 9]])).toBe(9);
      expect(callTerraformFunction('min', [2, 'x'])).toBeUndefined();
    });

    it('should return the first non-empty list or value', () => {
      expect(callTerraformFunction('coalescelist', [[], ['x']])).toEqual(['x']);
      expect(callTerraformFunction('coalesce', [null, '', 'v'])).toBe('v');
    });

    it('should test membership by value', () => {
      expect(callTerraformFunction('contains', [['a', 'b'], 'b'])).toBe(true);
      expect(callTerraformFunction('contains', [['a'], 'z'])).toBe(false);
    });

    it('should build the cartesian product of lists', () => {
      expect(callTerraformFunction('setproduct', [['a', 'b'], [1, 2]])).toEqual([
        ['a', 1],
        ['a', 2],
        ['b', 1],
        ['b', 2],
      ]);
    });
  });

  // ==========================================================================
  // Strings
  // ==========================================================================

  describe('string functions', () => {
    it('should replace substrings and slash-delimited patterns', () => {
      expect(callTerraformFunction('replace', ['a-b-c', '-', '_'])).toBe('a_b_c');
      expect(callTerraformFunction('replace', ['web01', '/[0-9]+/', 'N'])).toBe('webN');
    });

    it('should return every regex match', () => {
      expect(callTerraformFunction('regexall', ['[a-z]+', 'ab 12 cd'])).toEqual(['ab', 'cd']);
      expect(callTerraformFunction('regexall', ['(\\d)-(\\d)', '1-2 3-4'])).toEqual([
        ['1', '2'],
        ['3', '4'],
      ]);
    });

    it('should join and split', () => {
      expect(callTerraformFunction('join', ['-', ['a', 'b']])).toBe('a-b');
      expect(callTerraformFunction('split', [',', 'a,b'])).toEqual(['a', 'b']);
    });
  });

  describe('lookup by name', () => {
    it('should only know the built-ins', () => {
      expect(isTerraformFunction('element')).toBe(true);
      expect(isTerraformFunction('nope')).toBe(false);
      expect(callTerraformFunction('nope', [])).toBeUndefined();
    });
  });
});
