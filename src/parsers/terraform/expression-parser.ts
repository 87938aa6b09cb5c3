/**
 * Reference Expression Parser
 * @module parsers/terraform/expression-parser
 *
 * Finds `var.*`, `local.*`, `module.*` and `data.*` reference tokens inside
 * attribute strings, locates `${...}` interpolations, and folds
 * interpolations that have been reduced to literals or to built-in function
 * calls over literals.
 */

import type { AttributeValue } from '../../types/graph';
import { callTerraformFunction, isTerraformFunction } from './functions';

// ============================================================================
// Types
// ============================================================================

export type ReferenceKind = 'var' | 'local' | 'module' | 'data';

/**
 * A reference token found in a string
 */
export interface ReferenceToken {
  readonly kind: ReferenceKind;
  /** Exact token text, e.g. `var.settings.region` */
  readonly text: string;
  /**
   * Binding name: the variable or local name, the module name, or
   * `TYPE.NAME` for data sources
   */
  readonly name: string;
  /** Output name for module references */
  readonly output?: string;
  /** Remaining attribute/index path after the binding */
  readonly path: readonly (string | number)[];
  readonly start: number;
  readonly end: number;
}

/**
 * A `${...}` span in a string
 */
export interface Interpolation {
  readonly start: number;
  /** Offset just past the closing brace */
  readonly end: number;
  readonly inner: string;
}

// ============================================================================
// Patterns
// ============================================================================

const PATTERNS = {
  // var.name, local.name, module.name.output, data.type.name, with .key / [0] / ["key"] suffixes
  token: /(?<![\w.$-])(var|local|module|data)((?:\.[A-Za-z_][\w-]*|\[\d+\]|\["[^"\]]*"\])+)/g,

  segment: /\.([A-Za-z_][\w-]*)|\[(\d+)\]|\["([^"\]]*)"\]/g,

  // name(args); the parentheses are checked for balance separately
  functionCall: /^([A-Za-z_]\w*)\s*\(([\s\S]*)\)$/,

  number: /^-?\d+(\.\d+)?$/,
};

// ============================================================================
// Reference Extraction
// ============================================================================

function parseSegments(text: string): (string | number)[] {
  const segments: (string | number)[] = [];
  for (const match of text.matchAll(PATTERNS.segment)) {
    if (match[1] !== undefined) {
      segments.push(match[1]);
    } else if (match[2] !== undefined) {
      segments.push(parseInt(match[2], 10));
    } else if (match[3] !== undefined) {
      segments.push(match[3]);
    }
  }
  return segments;
}

function isReferenceKind(value: string): value is ReferenceKind {
  return value === 'var' || value === 'local' || value === 'module' || value === 'data';
}

/**
 * Extract every reference token from a string, in order of appearance
 */
export function extractReferences(text: string): ReferenceToken[] {
  const tokens: ReferenceToken[] = [];

  for (const match of text.matchAll(PATTERNS.token)) {
    const kind = match[1];
    const start = match.index ?? 0;
    if (!isReferenceKind(kind)) {
      continue;
    }
    const segments = parseSegments(match[2]);
    const [first, second, ...rest] = segments;
    if (typeof first !== 'string') {
      continue;
    }

    const base = { kind, text: match[0], start, end: start + match[0].length };

    switch (kind) {
      case 'var':
      case 'local':
        tokens.push({ ...base, name: first, path: segments.slice(1) });
        break;
      case 'module':
        tokens.push({
          ...base,
          name: first,
          output: typeof second === 'string' ? second : undefined,
          path: typeof second === 'string' ? rest : segments.slice(1),
        });
        break;
      case 'data':
        if (typeof second === 'string') {
          tokens.push({ ...base, name: `${first}.${second}`, path: rest });
        }
        break;
    }
  }

  return tokens;
}

/**
 * Check whether a string contains any reference token
 */
export function containsReference(text: string): boolean {
  return extractReferences(text).length > 0;
}

// ============================================================================
// Interpolations
// ============================================================================

/**
 * Locate `${...}` spans, honouring nested braces and quoted strings
 */
export function findInterpolations(text: string): Interpolation[] {
  const spans: Interpolation[] = [];
  let index = text.indexOf('${');

  while (index !== -1) {
    let depth = 0;
    let inString = false;
    let end = -1;

    for (let cursor = index + 2; cursor < text.length; cursor++) {
      const char = text[cursor];
      if (inString) {
        if (char === '\\') {
          cursor++;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }
      if (char === '"') {
        inString = true;
      } else if (char === '{') {
        depth++;
      } else if (char === '}') {
        if (depth === 0) {
          end = cursor + 1;
          break;
        }
        depth--;
      }
    }

    if (end === -1) {
      break;
    }
    spans.push({ start: index, end, inner: text.slice(index + 2, end - 1) });
    index = text.indexOf('${', end);
  }

  return spans;
}

/**
 * The interpolation containing a character offset, if any
 */
export function interpolationAt(spans: readonly Interpolation[], offset: number): Interpolation | undefined {
  return spans.find((span) => offset >= span.start && offset < span.end);
}

// ============================================================================
// Literal Rendering and Folding
// ============================================================================

/**
 * Render a value as an expression literal for use inside a larger expression
 */
export function renderLiteral(value: AttributeValue): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (value === null || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Render a value as plain text, for substitution outside expressions
 */
export function renderText(value: AttributeValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Convert parsed JSON to an attribute value, rejecting anything else
 */
export function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: AttributeValue[] = [];
    for (const item of value) {
      const converted = toAttributeValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: { [key: string]: AttributeValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toAttributeValue(item);
      if (converted === undefined) {
        return undefined;
      }
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

// ============================================================================
// Function Calls
// ============================================================================

/**
 * A call whose parentheses enclose the whole expression
 */
export interface FunctionCall {
  readonly name: string;
  readonly args: readonly string[];
}

/**
 * Split on top-level commas, outside strings and brackets
 */
function splitArguments(input: string): string[] {
  const result: string[] = [];
  let current = '';
  let depth = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inString) {
      current += char;
      if (char === '\\') {
        current += input[i + 1] ?? '';
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '[' || char === '{' || char === '(') {
      depth++;
    } else if (char === ']' || char === '}' || char === ')') {
      depth--;
    } else if (char === ',' && depth === 0) {
      result.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }

  if (current.trim()) {
    result.push(current.trim());
  }
  return result;
}

/**
 * Offset of the parenthesis closing the one at `open`, or -1
 */
function closingParen(text: string, open: number): number {
  let depth = 0;
  let inString = false;

  for (let i = open; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (char === '\\') {
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * `name(a, b)` split into its name and argument texts. `f(a) + g(b)` is not
 * a single call and gives null.
 */
export function parseFunctionCall(expression: string): FunctionCall | null {
  const trimmed = expression.trim();
  const match = PATTERNS.functionCall.exec(trimmed);
  if (!match) {
    return null;
  }
  const open = trimmed.indexOf('(');
  if (closingParen(trimmed, open) !== trimmed.length - 1) {
    return null;
  }
  return { name: match[1], args: splitArguments(match[2]) };
}

/**
 * Evaluate a built-in call whose arguments all reduce to literals
 */
function evaluateCall(call: FunctionCall): AttributeValue | undefined {
  if (!isTerraformFunction(call.name)) {
    return undefined;
  }
  const args: AttributeValue[] = [];
  for (const text of call.args) {
    const value = parseLiteral(text);
    if (value === undefined) {
      return undefined;
    }
    args.push(value);
  }
  return callTerraformFunction(call.name, args);
}

// ============================================================================
// Literals
// ============================================================================

/**
 * Parse an expression that is a literal (JSON scalar, list or map) or a
 * built-in function call over literals. Returns undefined for anything else.
 */
export function parseLiteral(expression: string): AttributeValue | undefined {
  const trimmed = expression.trim();
  if (trimmed === '') {
    return undefined;
  }

  const call = parseFunctionCall(trimmed);
  if (call) {
    return evaluateCall(call);
  }

  const first = trimmed[0];
  const looksLiteral =
    first === '"' ||
    first === '[' ||
    first === '{' ||
    PATTERNS.number.test(trimmed) ||
    trimmed === 'true' ||
    trimmed === 'false' ||
    trimmed === 'null';
  if (!looksLiteral) {
    return undefined;
  }

  try {
    return toAttributeValue(JSON.parse(trimmed));
  } catch {
    // an expression such as `"a" == "b" ? 1 : 2`
    return undefined;
  }
}

/**
 * Fold interpolations that are now literals. A string that is exactly one
 * literal interpolation becomes that literal's value (lists and maps
 * included); otherwise literal interpolations are spliced in as text.
 */
export function foldLiteralInterpolations(text: string): AttributeValue {
  const spans = findInterpolations(text);
  if (spans.length === 0) {
    return text;
  }

  if (spans.length === 1 && spans[0].start === 0 && spans[0].end === text.length) {
    const literal = parseLiteral(spans[0].inner);
    if (literal !== undefined) {
      return literal;
    }
    return text;
  }

  let result = '';
  let cursor = 0;
  for (const span of spans) {
    const literal = parseLiteral(span.inner);
    result += text.slice(cursor, span.start);
    result += literal === undefined ? text.slice(span.start, span.end) : renderText(literal);
    cursor = span.end;
  }
  return result + text.slice(cursor);
}
