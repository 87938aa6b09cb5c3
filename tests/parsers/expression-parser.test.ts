/**
 * Reference Expression Parser Tests
 * @module tests/parsers/expression-parser
 */

import { describe, it, expect } from 'vitest';
import {
  containsReference,
  extractReferences,
  findInterpolations,
  foldLiteralInterpolations,
  parseFunctionCall,
  parseLiteral,
  renderLiteral,
  renderText,
} from '@/parsers/terraform/expression-parser';

describe('expression parser', () => {
  // ==========================================================================
  // Reference Tokens
  // ==========================================================================

  describe('extractReferences', () => {
    it('should parse a variable with a quoted key', () => {
      expect(extractReferences('${var.settings["region"]}-x')).toEqual([
        { kind: 'var', text: 'var.settings["region"]', name: 'settings', path: ['region'], start: 2, end: 24 },
      ]);
    });

    it('should split module references into module, output and path', () => {
      const [token] = extractReferences('module.net.vpc_id[0]');

      expect(token).toMatchObject({ kind: 'module', name: 'net', output: 'vpc_id', path: [0] });
    });

    it('should name data sources by type and name', () => {
      const [token] = extractReferences('${data.aws_ami.ubuntu.id}');

      expect(token).toMatchObject({ kind: 'data', name: 'aws_ami.ubuntu', path: ['id'] });
    });

    it('should ignore tokens that are part of a longer identifier', () => {
      expect(extractReferences('my_var.x aws_vpc.main.var.x data.only')).toEqual([]);
      expect(containsReference('10.0.0.0/16')).toBe(false);
      expect(containsReference('${local.name}')).toBe(true);
    });
  });

  // ==========================================================================
  // Interpolations
  // ==========================================================================

  describe('findInterpolations', () => {
    it('should honour nested braces', () => {
      expect(findInterpolations('x${ {a = 1} }y')).toEqual([{ start: 1, end: 13, inner: ' {a = 1} ' }]);
    });

    it('should ignore braces inside quoted strings', () => {
      expect(findInterpolations('${"}"}')).toEqual([{ start: 0, end: 6, inner: '"}"' }]);
    });

    it('should stop at an unterminated interpolation', () => {
      expect(findInterpolations('${var.x')).toEqual([]);
    });
  });

  // ==========================================================================
  // Literals
  // ==========================================================================

  describe('parseLiteral', () => {
    it('should parse literal scalars, lists and length calls', () => {
      expect(parseLiteral('"abc"')).toBe('abc');
      expect(parseLiteral(' 42 ')).toBe(42);
      expect(parseLiteral('length(["a", "b"])')).toBe(2);
      expect(parseLiteral('{"k": [true, null]}')).toEqual({ k: [true, null] });
    });

    it('should reject expressions that are not literals', () => {
      expect(parseLiteral('var.x')).toBeUndefined();
      expect(parseLiteral('"a" == "b" ? 1 : 2')).toBeUndefined();
      expect(parseLiteral('length(var.zones)')).toBeUndefined();
      expect(parseLiteral('unknownfn(1)')).toBeUndefined();
    });

    it('should evaluate nested built-in calls over literals', () => {
      expect(parseLiteral('element(concat(["a"], ["b", "c"]), 4)')).toBe('b');
      expect(parseLiteral('lookup({"web": 3}, "web", 1)')).toBe(3);
      expect(parseLiteral('length(distinct(["a", "a", "b"]))')).toBe(2);
    });
  });

  describe('parseFunctionCall', () => {
    it('should split a call into its name and top-level arguments', () => {
      expect(parseFunctionCall('lookup({"a": [1, 2]}, "a,b", 0)')).toEqual({
        name: 'lookup',
        args: ['{"a": [1, 2]}', '"a,b"', '0'],
      });
    });

    it('should reject two calls joined by an operator', () => {
      expect(parseFunctionCall('length(a) + length(b)')).toBeNull();
      expect(parseFunctionCall('"x"')).toBeNull();
    });
  });

  describe('foldLiteralInterpolations', () => {
    it('should turn a whole literal interpolation into its value', () => {
      expect(foldLiteralInterpolations('${["a", "b"]}')).toEqual(['a', 'b']);
    });

    it('should fold a function call once its arguments are literals', () => {
      expect(foldLiteralInterpolations('web-${element(["x", "y"], 1)}')).toBe('web-y');
    });

    it('should splice literal interpolations and keep the rest', () => {
      expect(foldLiteralInterpolations('n-${2}-${var.x}')).toBe('n-2-${var.x}');
      expect(foldLiteralInterpolations('plain')).toBe('plain');
    });
  });

  describe('rendering', () => {
    it('should quote strings only as literals', () => {
      expect(renderLiteral('a')).toBe('"a"');
      expect(renderLiteral(3)).toBe('3');
      expect(renderText('a')).toBe('a');
      expect(renderText({ a: 1 })).toBe('{"a":1}');
    });
  });
});
