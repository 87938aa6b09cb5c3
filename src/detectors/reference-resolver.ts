/**
 * Reference Resolver
 * @module detectors/reference-resolver
 *
 * Resolves `var.*`, `local.*`, `module.*` and `data.*` references in node
 * attributes by repeated substitution over every binding and every node until
 * a round replaces nothing, or until the iteration cap is reached.
 */

import {
  ResolutionDidNotConvergeError,
  ResolutionErrorCodes,
  UnresolvedReferenceError,
  type PipelineWarning,
} from '../errors';
import type { ResourceGraph } from '../graph/resource-graph';
import { createModuleLogger } from '../logging';
import {
  extractReferences,
  findInterpolations,
  foldLiteralInterpolations,
  interpolationAt,
  renderLiteral,
  renderText,
  type ReferenceToken,
} from '../parsers/terraform/expression-parser';
import type {
  LocalDeclaration,
  ModuleCall,
  OutputDeclaration,
  VariableDeclaration,
} from '../parsers/terraform/types';
import { type AttributeMap, type AttributeValue, isAttributeMap, ROOT_MODULE } from '../types/graph';
import { cloneAttributeValue } from '../utils/attributes';
import {
  childModulePath,
  localIdOf,
  modulePathOf,
  removeInstanceSuffix,
} from '../utils/node-id';

const logger = createModuleLogger('reference-resolver');

// ============================================================================
// Types
// ============================================================================

/**
 * Everything the resolver reads. Node metadata in `graph` is rewritten in place.
 */
export interface ReferenceResolverInput {
  readonly graph: ResourceGraph;
  readonly variables: readonly VariableDeclaration[];
  /** Root-module overrides */
  readonly variableValues: Readonly<Record<string, AttributeValue>>;
  readonly locals: readonly LocalDeclaration[];
  readonly modules: readonly ModuleCall[];
  readonly outputs: readonly OutputDeclaration[];
  /** `data.*` prefix to literal replacement, from the provider contexts */
  readonly dataReplacements?: Readonly<Record<string, AttributeValue>>;
}

export interface ReferenceResolverOptions {
  readonly maxIterations: number;
  readonly placeholder: string;
  readonly maxValueLength: number;
  /** Top-level attribute keys never substituted */
  readonly skipKeys: readonly string[];
}

export const DEFAULT_REFERENCE_RESOLVER_OPTIONS: ReferenceResolverOptions = {
  maxIterations: 100,
  placeholder: 'UNKNOWN',
  maxValueLength: 65536,
  skipKeys: ['depends_on'],
};

export interface ResolutionStats {
  readonly bindings: number;
  readonly iterations: number;
  readonly substitutions: number;
  readonly unresolved: number;
}

export interface ResolutionResult {
  readonly converged: boolean;
  readonly stats: ResolutionStats;
  /** One error per node and reference left as the placeholder */
  readonly unresolved: readonly UnresolvedReferenceError[];
  /** Set when the iteration cap was reached */
  readonly divergence: ResolutionDidNotConvergeError | null;
  readonly warnings: readonly PipelineWarning[];
}

type BindingKind = 'var' | 'local' | 'output';

interface Binding {
  readonly kind: BindingKind;
  readonly scope: string;
  readonly name: string;
  /** Module path the value's own references are evaluated in */
  readonly evalScope: string;
  value: AttributeValue;
}

type Lookup =
  | { readonly status: 'resolved'; readonly value: AttributeValue }
  | { readonly status: 'pending' }
  | { readonly status: 'missing' };

interface Substitution {
  readonly value: AttributeValue;
  readonly replaced: number;
}

interface QualifiedId {
  readonly local: RegExp;
  readonly full: string;
}

const PENDING: Lookup = { status: 'pending' };
const MISSING: Lookup = { status: 'missing' };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function bindingKey(kind: BindingKind, scope: string, name: string): string {
  return `${kind}:${scope}:${name}`;
}

function navigate(value: AttributeValue, path: readonly (string | number)[]): AttributeValue | undefined {
  let current: AttributeValue | undefined = value;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isAttributeMap(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

// ============================================================================
// Reference Resolver
// ============================================================================

export class ReferenceResolver {
  private readonly options: ReferenceResolverOptions;

  private bindings = new Map<string, Binding>();
  private dataReplacements: [string, AttributeValue][] = [];
  /** Module-qualified resource addresses, suffix stripped */
  private resourceAddresses = new Set<string>();
  private qualifiedIds = new Map<string, QualifiedId[]>();
  private oversized = new Set<string>();

  constructor(options: Partial<ReferenceResolverOptions> = {}) {
    this.options = { ...DEFAULT_REFERENCE_RESOLVER_OPTIONS, ...options };
  }

  /**
   * Resolve every reference in the graph's metadata
   */
  resolve(input: ReferenceResolverInput): ResolutionResult {
    this.prepare(input);
    const graph = input.graph;

    let iterations = 0;
    let substitutions = 0;
    let converged = false;

    while (iterations < this.options.maxIterations) {
      iterations++;
      const replaced = this.runRound(graph);
      substitutions += replaced;
      if (replaced === 0) {
        converged = true;
        break;
      }
    }

    const pendingTokens = converged ? [] : this.pendingTokens(graph);
    const unresolved = this.applyPlaceholders(graph);
    const divergence = converged ? null : new ResolutionDidNotConvergeError(iterations, pendingTokens);

    const warnings: PipelineWarning[] = [];
    if (divergence) {
      warnings.push(this.toWarning(divergence));
    }
    for (const error of unresolved) {
      warnings.push(this.toWarning(error));
    }
    for (const text of this.oversized) {
      warnings.push({
        code: ResolutionErrorCodes.VALUE_TOO_LARGE,
        message: `Substitution of '${text}' exceeded ${this.options.maxValueLength} characters and was skipped`,
        stage: 'resolution',
        details: { reference: text },
      });
    }

    logger.resolutionCompleted(iterations, converged, unresolved.length);

    return {
      converged,
      stats: {
        bindings: this.bindings.size,
        iterations,
        substitutions,
        unresolved: unresolved.length,
      },
      unresolved,
      divergence,
      warnings,
    };
  }

  // ==========================================================================
  // Binding Table
  // ==========================================================================

  private prepare(input: ReferenceResolverInput): void {
    this.bindings = new Map();
    this.oversized = new Set();
    this.dataReplacements = Object.entries(input.dataReplacements ?? {}).sort(
      ([a], [b]) => b.length - a.length
    );
    this.indexNodes(input.graph);

    // Module inputs become the child's variables, evaluated in the caller
    for (const call of input.modules) {
      const childPath = childModulePath(call.parent, call.name);
      for (const [name, expression] of Object.entries(call.inputs)) {
        this.bind({ kind: 'var', scope: childPath, name, evalScope: call.parent, value: expression });
      }
    }

    for (const [name, value] of Object.entries(input.variableValues)) {
      this.bind({ kind: 'var', scope: ROOT_MODULE, name, evalScope: ROOT_MODULE, value });
    }

    for (const variable of input.variables) {
      if (variable.default === undefined) {
        continue;
      }
      this.bind({
        kind: 'var',
        scope: variable.module,
        name: variable.name,
        evalScope: variable.module,
        value: variable.default,
      });
    }

    for (const local of input.locals) {
      this.bind({ kind: 'local', scope: local.module, name: local.name, evalScope: local.module, value: local.value });
    }

    for (const output of input.outputs) {
      this.bind({ kind: 'output', scope: output.module, name: output.name, evalScope: output.module, value: output.value });
    }
  }

  /**
   * First binding for a key wins: module inputs and overrides are bound
   * before declared defaults.
   */
  private bind(binding: Binding): void {
    const key = bindingKey(binding.kind, binding.scope, binding.name);
    if (!this.bindings.has(key)) {
      this.bindings.set(key, { ...binding, value: cloneAttributeValue(binding.value) });
    }
  }

  private indexNodes(graph: ResourceGraph): void {
    this.resourceAddresses = new Set();
    this.qualifiedIds = new Map();

    for (const id of graph.nodeIds()) {
      const address = removeInstanceSuffix(id);
      if (address.startsWith('module.')) {
        this.resourceAddresses.add(address);
      }

      const scope = modulePathOf(id);
      if (scope === ROOT_MODULE) {
        continue;
      }
      const local = localIdOf(id);
      const entries = this.qualifiedIds.get(scope) ?? [];
      if (!entries.some((entry) => entry.full === address)) {
        entries.push({
          local: new RegExp(`(?<![\\w.-])${escapeRegExp(local)}(?![\\w-])`, 'g'),
          full: address,
        });
      }
      this.qualifiedIds.set(scope, entries);
    }

    for (const entries of this.qualifiedIds.values()) {
      entries.sort((a, b) => b.full.length - a.full.length);
    }
  }

  // ==========================================================================
  // Substitution Rounds
  // ==========================================================================

  private runRound(graph: ResourceGraph): number {
    let replaced = 0;

    for (const binding of this.bindings.values()) {
      const result = this.substituteValue(binding.value, binding.evalScope);
      if (result.replaced > 0) {
        binding.value = result.value;
        replaced += result.replaced;
      }
    }

    for (const id of graph.nodeIds()) {
      const scope = modulePathOf(id);
      const metadata = graph.getMetadata(id);
      let changed = false;
      const next: AttributeMap = {};

      for (const [key, value] of Object.entries(metadata)) {
        if (this.options.skipKeys.includes(key)) {
          next[key] = value;
          continue;
        }
        const result = this.substituteValue(value, scope);
        next[key] = result.value;
        if (result.replaced > 0) {
          replaced += result.replaced;
          changed = true;
        }
      }

      if (changed) {
        graph.setMetadata(id, next);
      }
    }

    return replaced;
  }

  private substituteValue(value: AttributeValue, scope: string): Substitution {
    if (typeof value === 'string') {
      return this.substituteString(value, scope);
    }
    if (Array.isArray(value)) {
      let replaced = 0;
      const items = value.map((item) => {
        const result = this.substituteValue(item, scope);
        replaced += result.replaced;
        return result.value;
      });
      return replaced > 0 ? { value: items, replaced } : { value, replaced: 0 };
    }
    if (isAttributeMap(value)) {
      let replaced = 0;
      const entries: AttributeMap = {};
      for (const [key, item] of Object.entries(value)) {
        const result = this.substituteValue(item, scope);
        replaced += result.replaced;
        entries[key] = result.value;
      }
      return replaced > 0 ? { value: entries, replaced } : { value, replaced: 0 };
    }
    return { value, replaced: 0 };
  }

  private substituteString(text: string, scope: string): Substitution {
    const tokens = this.referenceTokens(text);
    if (tokens.length === 0) {
      return { value: text, replaced: 0 };
    }

    const spans = findInterpolations(text);

    // The whole attribute is one reference: take the bound value as-is
    if (tokens.length === 1) {
      const token = tokens[0];
      const whole =
        text.trim() === token.text ||
        (spans.length === 1 &&
          spans[0].start === 0 &&
          spans[0].end === text.length &&
          spans[0].inner.trim() === token.text);
      if (whole) {
        const lookup = this.lookup(token, scope);
        if (lookup.status !== 'resolved') {
          return { value: text, replaced: 0 };
        }
        const value = typeof lookup.value === 'string' ? foldLiteralInterpolations(lookup.value) : lookup.value;
        return this.guardLength(text, value, token);
      }
    }

    let result = text;
    let replaced = 0;
    let lastToken = tokens[0];

    // Right to left so earlier offsets stay valid
    for (const token of [...tokens].reverse()) {
      const lookup = this.lookup(token, scope);
      if (lookup.status !== 'resolved') {
        continue;
      }
      const span = interpolationAt(spans, token.start);

      if (span && span.inner.trim() === token.text) {
        result = result.slice(0, span.start) + renderText(lookup.value) + result.slice(span.end);
      } else if (span) {
        // Inside a larger expression only literal values can be spliced in
        if (!this.isClosed(lookup.value) || this.hasInterpolation(lookup.value)) {
          continue;
        }
        result = result.slice(0, token.start) + renderLiteral(lookup.value) + result.slice(token.end);
      } else {
        result = result.slice(0, token.start) + renderText(lookup.value) + result.slice(token.end);
      }
      replaced++;
      lastToken = token;
    }

    if (replaced === 0) {
      return { value: text, replaced: 0 };
    }
    const guarded = this.guardLength(text, foldLiteralInterpolations(result), lastToken);
    return guarded.replaced === 0 ? guarded : { value: guarded.value, replaced };
  }

  private guardLength(original: string, value: AttributeValue, token: ReferenceToken): Substitution {
    if (renderText(value).length > this.options.maxValueLength) {
      this.oversized.add(token.text);
      return { value: original, replaced: 0 };
    }
    return { value, replaced: 1 };
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Reference tokens in a string, without module-qualified resource
   * addresses such as `module.vpc.aws_vpc.main.id`
   */
  private referenceTokens(text: string): ReferenceToken[] {
    return extractReferences(text).filter(
      (token) => !(token.kind === 'module' && this.isResourceAddress(token.text))
    );
  }

  private isResourceAddress(text: string): boolean {
    if (this.resourceAddresses.has(text)) {
      return true;
    }
    for (let index = text.length - 1; index > 0; index--) {
      const char = text[index];
      if ((char === '.' || char === '[') && this.resourceAddresses.has(text.slice(0, index))) {
        return true;
      }
    }
    return false;
  }

  private lookup(token: ReferenceToken, scope: string): Lookup {
    if (token.kind === 'data') {
      return this.lookupData(token);
    }

    const binding = this.findBinding(token, scope);
    if (!binding) {
      return MISSING;
    }

    let value = binding.value;
    if (binding.evalScope !== scope) {
      if (!this.isClosed(value)) {
        return PENDING;
      }
      value = this.qualifyResources(value, binding.evalScope);
    }

    if (token.path.length > 0) {
      const nested = navigate(value, token.path);
      if (nested === undefined) {
        return this.isClosed(value) ? MISSING : PENDING;
      }
      value = nested;
    }

    return { status: 'resolved', value: cloneAttributeValue(value) };
  }

  private findBinding(token: ReferenceToken, scope: string): Binding | undefined {
    switch (token.kind) {
      case 'var':
      case 'local':
        return (
          this.bindings.get(bindingKey(token.kind, scope, token.name)) ??
          this.bindings.get(bindingKey(token.kind, ROOT_MODULE, token.name))
        );
      case 'module': {
        if (token.output === undefined) {
          return undefined;
        }
        return (
          this.bindings.get(bindingKey('output', childModulePath(scope, token.name), token.output)) ??
          this.bindings.get(bindingKey('output', childModulePath(ROOT_MODULE, token.name), token.output))
        );
      }
      case 'data':
        return undefined;
    }
  }

  private lookupData(token: ReferenceToken): Lookup {
    const match = this.dataReplacements.find(([prefix]) => token.text.startsWith(prefix));
    if (!match) {
      return MISSING;
    }
    const [, replacement] = match;
    const nested = token.path.length > 0 ? navigate(replacement, token.path) : undefined;
    return { status: 'resolved', value: cloneAttributeValue(nested ?? replacement) };
  }

  /**
   * True when a value holds no scope-relative references
   */
  private isClosed(value: AttributeValue): boolean {
    if (typeof value === 'string') {
      return this.referenceTokens(value).every((token) => token.kind === 'data');
    }
    if (Array.isArray(value)) {
      return value.every((item) => this.isClosed(item));
    }
    if (isAttributeMap(value)) {
      return Object.values(value).every((item) => this.isClosed(item));
    }
    return true;
  }

  private hasInterpolation(value: AttributeValue): boolean {
    if (typeof value === 'string') {
      return value.includes('${');
    }
    if (Array.isArray(value)) {
      return value.some((item) => this.hasInterpolation(item));
    }
    if (isAttributeMap(value)) {
      return Object.values(value).some((item) => this.hasInterpolation(item));
    }
    return false;
  }

  /**
   * Prefix resource references in a value lifted out of a module with that
   * module's address
   */
  private qualifyResources(value: AttributeValue, evalScope: string): AttributeValue {
    const entries = this.qualifiedIds.get(evalScope);
    if (!entries || entries.length === 0) {
      return value;
    }
    if (typeof value === 'string') {
      let result = value;
      for (const entry of entries) {
        result = result.replace(entry.local, entry.full);
      }
      return this.unwrapAddress(result);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.qualifyResources(item, evalScope));
    }
    if (isAttributeMap(value)) {
      const result: AttributeMap = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.qualifyResources(item, evalScope);
      }
      return result;
    }
    return value;
  }

  /**
   * `${module.a.type.name.attr}` becomes the bare address, the form root
   * resources reference each other in
   */
  private unwrapAddress(text: string): string {
    const spans = findInterpolations(text);
    if (spans.length !== 1 || spans[0].start !== 0 || spans[0].end !== text.length) {
      return text;
    }
    const inner = spans[0].inner.trim();
    return this.isResourceAddress(inner) ? inner : text;
  }

  // ==========================================================================
  // Placeholders
  // ==========================================================================

  private pendingTokens(graph: ResourceGraph): string[] {
    const pending = new Set<string>();
    const collect = (value: AttributeValue): void => {
      if (typeof value === 'string') {
        this.referenceTokens(value).forEach((token) => pending.add(token.text));
      } else if (Array.isArray(value)) {
        value.forEach(collect);
      } else if (isAttributeMap(value)) {
        Object.values(value).forEach(collect);
      }
    };
    for (const binding of this.bindings.values()) {
      collect(binding.value);
    }
    for (const id of graph.nodeIds()) {
      collect(graph.getMetadata(id));
    }
    return [...pending].sort();
  }

  /**
   * Replace every remaining token in node metadata with the placeholder
   */
  private applyPlaceholders(graph: ResourceGraph): UnresolvedReferenceError[] {
    const errors: UnresolvedReferenceError[] = [];

    for (const id of graph.nodeIds()) {
      const seen = new Set<string>();
      const metadata = graph.getMetadata(id);
      let changed = false;
      const next: AttributeMap = {};

      for (const [key, value] of Object.entries(metadata)) {
        if (this.options.skipKeys.includes(key)) {
          next[key] = value;
          continue;
        }
        next[key] = this.replaceUnresolved(value, (token) => {
          changed = true;
          if (!seen.has(token.text)) {
            seen.add(token.text);
            errors.push(new UnresolvedReferenceError(token.text, `${id}.${key}`, { nodeId: id, stage: 'resolution' }));
          }
        });
      }

      if (changed) {
        graph.setMetadata(id, next);
      }
    }

    return errors;
  }

  private replaceUnresolved(value: AttributeValue, onToken: (token: ReferenceToken) => void): AttributeValue {
    if (Array.isArray(value)) {
      return value.map((item) => this.replaceUnresolved(item, onToken));
    }
    if (isAttributeMap(value)) {
      const result: AttributeMap = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.replaceUnresolved(item, onToken);
      }
      return result;
    }
    if (typeof value !== 'string') {
      return value;
    }

    const tokens = this.referenceTokens(value);
    if (tokens.length === 0) {
      return value;
    }
    const spans = findInterpolations(value);
    const placeholder = this.options.placeholder;
    let result = value;

    for (const token of [...tokens].reverse()) {
      onToken(token);
      const span = interpolationAt(spans, token.start);
      if (span && span.inner.trim() === token.text) {
        result = result.slice(0, span.start) + placeholder + result.slice(span.end);
      } else if (span) {
        result = result.slice(0, token.start) + JSON.stringify(placeholder) + result.slice(token.end);
      } else {
        result = result.slice(0, token.start) + placeholder + result.slice(token.end);
      }
    }

    return foldLiteralInterpolations(result);
  }

  private toWarning(error: UnresolvedReferenceError | ResolutionDidNotConvergeError): PipelineWarning {
    return {
      code: error.code,
      message: error.message,
      stage: 'resolution',
      nodeId: error.context.nodeId,
      details: error.context.details,
    };
  }
}

/**
 * Create a reference resolver
 */
export function createReferenceResolver(options: Partial<ReferenceResolverOptions> = {}): ReferenceResolver {
  return new ReferenceResolver(options);
}
