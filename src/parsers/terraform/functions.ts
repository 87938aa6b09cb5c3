/**
 * Terraform Built-in Functions
 * @module parsers/terraform/functions
 *
 * Evaluators for the collection and string functions that decide counts and
 * names in resource attributes. Arguments are literal values; a call that
 * cannot be evaluated returns undefined and stays in the text unchanged.
 */

import { isAttributeMap, type AttributeMap, type AttributeValue } from '../../types/graph';

// ============================================================================
// Types
// ============================================================================

export type TerraformFunction = (args: readonly AttributeValue[]) => AttributeValue | undefined;

// ============================================================================
// Value Helpers
// ============================================================================

function isList(value: AttributeValue | undefined): value is AttributeValue[] {
  return Array.isArray(value);
}

function isInteger(value: AttributeValue | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function sameValue(a: AttributeValue, b: AttributeValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function sortedKeys(map: AttributeMap): string[] {
  return Object.keys(map).sort();
}

function uniqueValues(list: readonly AttributeValue[]): AttributeValue[] {
  const result: AttributeValue[] = [];
  for (const item of list) {
    if (!result.some((seen) => sameValue(seen, item))) {
      result.push(item);
    }
  }
  return result;
}

function flattenDeep(list: readonly AttributeValue[]): AttributeValue[] {
  return list.flatMap((item) => (isList(item) ? flattenDeep(item) : [item]));
}

function numbers(args: readonly AttributeValue[]): number[] | undefined {
  const values = args.length === 1 && isList(args[0]) ? args[0] : args;
  if (values.length === 0) {
    return undefined;
  }
  const result: number[] = [];
  for (const value of values) {
    if (typeof value !== 'number') {
      return undefined;
    }
    result.push(value);
  }
  return result;
}

/**
 * A `/.../` argument is a regular expression, anything else a plain substring
 */
function compilePattern(pattern: string, flags: string): RegExp | undefined {
  const source = pattern.length > 1 && pattern.startsWith('/') && pattern.endsWith('/') ? pattern.slice(1, -1) : null;
  try {
    return new RegExp(source ?? escapeForRegExp(pattern), flags);
  } catch {
    // not a pattern JavaScript can compile; the call stays unevaluated
    return undefined;
  }
}

function escapeForRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ============================================================================
// Collection Functions
// ============================================================================

const length: TerraformFunction = ([value]) => {
  if (typeof value === 'string' || isList(value)) {
    return value.length;
  }
  if (isAttributeMap(value)) {
    return Object.keys(value).length;
  }
  return undefined;
};

/** Index wraps around the list, as Terraform does */
const element: TerraformFunction = ([list, index]) => {
  if (!isList(list) || list.length === 0 || !isInteger(index) || index < 0) {
    return undefined;
  }
  return list[index % list.length];
};

const concat: TerraformFunction = (args) => {
  const result: AttributeValue[] = [];
  for (const arg of args) {
    if (!isList(arg)) {
      return undefined;
    }
    result.push(...arg);
  }
  return result;
};

const lookup: TerraformFunction = ([map, key, fallback]) => {
  if (!isAttributeMap(map) || typeof key !== 'string') {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : fallback;
};

const flatten: TerraformFunction = ([list]) => (isList(list) ? flattenDeep(list) : undefined);

const distinct: TerraformFunction = ([list]) => (isList(list) ? uniqueValues(list) : undefined);

const keys: TerraformFunction = ([map]) => (isAttributeMap(map) ? sortedKeys(map) : undefined);

const values: TerraformFunction = ([map]) =>
  isAttributeMap(map) ? sortedKeys(map).map((key) => map[key]) : undefined;

const contains: TerraformFunction = ([list, value]) => {
  if (!isList(list) || value === undefined) {
    return undefined;
  }
  return list.some((item) => sameValue(item, value));
};

/** First non-empty list */
const coalescelist: TerraformFunction = (args) => {
  if (!args.every(isList)) {
    return undefined;
  }
  return args.find((arg) => isList(arg) && arg.length > 0);
};

/** First argument that is neither null nor an empty string */
const coalesce: TerraformFunction = (args) => args.find((arg) => arg !== null && arg !== '');

const setproduct: TerraformFunction = (args) => {
  if (args.length < 2 || !args.every(isList)) {
    return undefined;
  }
  let product: AttributeValue[][] = [[]];
  for (const arg of args) {
    if (!isList(arg)) {
      return undefined;
    }
    product = product.flatMap((prefix) => arg.map((item) => [...prefix, item]));
  }
  return product;
};

const max: TerraformFunction = (args) => {
  const list = numbers(args);
  return list === undefined ? undefined : Math.max(...list);
};

const min: TerraformFunction = (args) => {
  const list = numbers(args);
  return list === undefined ? undefined : Math.min(...list);
};

const toset: TerraformFunction = ([list]) => (isList(list) ? uniqueValues(list) : undefined);

const tolist: TerraformFunction = ([list]) => (isList(list) ? [...list] : undefined);

// ============================================================================
// String Functions
// ============================================================================

const replace: TerraformFunction = ([text, search, replacement]) => {
  if (typeof text !== 'string' || typeof search !== 'string' || typeof replacement !== 'string') {
    return undefined;
  }
  const pattern = compilePattern(search, 'g');
  return pattern === undefined ? undefined : text.replace(pattern, replacement);
};

/**
 * Every match of a pattern: whole matches without capture groups, a list of
 * captures with unnamed groups, a map per match with named groups
 */
const regexall: TerraformFunction = ([pattern, text]) => {
  if (typeof pattern !== 'string' || typeof text !== 'string') {
    return undefined;
  }
  const compiled = compilePattern(`/${pattern}/`, 'g');
  if (compiled === undefined) {
    return undefined;
  }
  const result: AttributeValue[] = [];
  for (const match of text.matchAll(compiled)) {
    if (match.groups) {
      const named: AttributeMap = {};
      for (const [name, value] of Object.entries(match.groups)) {
        named[name] = value ?? null;
      }
      result.push(named);
    } else if (match.length > 1) {
      result.push(match.slice(1).map((value) => value ?? null));
    } else {
      result.push(match[0]);
    }
  }
  return result;
};

const join: TerraformFunction = ([separator, list]) => {
  if (typeof separator !== 'string' || !isList(list) || !list.every((item) => typeof item === 'string')) {
    return undefined;
  }
  return list.join(separator);
};

const split: TerraformFunction = ([separator, text]) => {
  if (typeof separator !== 'string' || typeof text !== 'string') {
    return undefined;
  }
  return text.split(separator);
};

const lower: TerraformFunction = ([text]) => (typeof text === 'string' ? text.toLowerCase() : undefined);

const upper: TerraformFunction = ([text]) => (typeof text === 'string' ? text.toUpperCase() : undefined);

// ============================================================================
// Registry
// ============================================================================

const FUNCTIONS: Readonly<Record<string, TerraformFunction>> = {
  length,
  element,
  concat,
  lookup,
  flatten,
  distinct,
  keys,
  values,
  contains,
  coalescelist,
  coalesce,
  setproduct,
  max,
  min,
  toset,
  tolist,
  replace,
  regexall,
  join,
  split,
  lower,
  upper,
};

export function isTerraformFunction(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(FUNCTIONS, name);
}

/**
 * Evaluate a built-in over literal arguments. Unknown names, wrong argument
 * types and out-of-range indexes give undefined.
 */
export function callTerraformFunction(name: string, args: readonly AttributeValue[]): AttributeValue | undefined {
  if (!isTerraformFunction(name)) {
    return undefined;
  }
  return FUNCTIONS[name](args);
}
