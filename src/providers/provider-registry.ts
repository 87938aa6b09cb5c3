/**
 * Provider Config Registry
 * @module providers/provider-registry
 *
 * Loads provider definitions once, validates them with zod, resolves every
 * function name against the function registry, and hands out immutable
 * Provider Contexts in registration order.
 */

import { readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { parse as parseYaml } from 'yaml';

import type { InferenceRules } from '../detectors/relationship-inferencer';
import {
  DuplicateProviderError,
  ProviderConfigError,
  ProviderNotFoundError,
  UnknownHandlerFunctionError,
} from '../errors';
import type { ReadableGraph } from '../graph/resource-graph';
import { createModuleLogger } from '../logging';
import type { NameGenerator } from '../transformers/types';
import { stripModulePrefix } from '../utils/node-id';
import { createDefaultFunctionRegistry, type FunctionRegistry } from './function-registry';
import {
  type ProviderContext,
  type ProviderDefinition,
  ProviderDefinitionSchema,
  type ResolvedHandler,
} from './types';

const logger = createModuleLogger('provider-registry');

/**
 * Directory holding the shipped provider definitions
 */
export const BUILTIN_DEFINITIONS_DIR = fileURLToPath(new URL('./definitions', import.meta.url));

/**
 * Shipped providers, in the order they are registered
 */
export const BUILTIN_PROVIDER_IDS = ['aws', 'gcp', 'azure'] as const;

// ============================================================================
// Definition Resolution
// ============================================================================

function inferenceRulesOf(definition: ProviderDefinition): InferenceRules {
  return {
    skipRelationsFrom: definition.skipRelationsFrom,
    impliedConnections: definition.impliedConnections,
    reverseArrowPrefixes: definition.reverseArrowPrefixes,
    hiddenPrefixes: definition.hiddenPrefixes,
    inferenceSkipKeys: definition.inferenceSkipKeys,
  };
}

/**
 * Bind a validated definition to registered functions. Unknown names fail
 * here, at load time.
 */
export function resolveProviderContext(
  definition: ProviderDefinition,
  functions: FunctionRegistry
): ProviderContext {
  const nameGenerators = new Map<string, NameGenerator>();

  const handlers: ResolvedHandler[] = definition.handlers.map((handler) => {
    let customFunction: ResolvedHandler['customFunction'] = null;
    if (handler.customFunction !== undefined) {
      const run = functions.getHandler(handler.customFunction);
      if (!run) {
        throw new UnknownHandlerFunctionError(handler.customFunction, 'custom handler', definition.id);
      }
      customFunction = { name: handler.customFunction, run };
    }

    for (const step of handler.transformations) {
      if (step.operation !== 'insert_intermediate_node') {
        continue;
      }
      const name = step.params.nameGenerator;
      const generator = functions.getNameGenerator(name);
      if (!generator) {
        throw new UnknownHandlerFunctionError(name, 'name generator', definition.id);
      }
      nameGenerators.set(name, generator);
    }

    return {
      pattern: handler.pattern,
      description: handler.description,
      executionOrder: handler.executionOrder,
      customFunction,
      transformations: handler.transformations,
    };
  });

  return Object.freeze({
    id: definition.id,
    definition,
    handlers,
    inferenceRules: inferenceRulesOf(definition),
    resolveNameGenerator(name: string): NameGenerator {
      const generator = nameGenerators.get(name) ?? functions.getNameGenerator(name);
      if (!generator) {
        throw new UnknownHandlerFunctionError(name, 'name generator', definition.id);
      }
      return generator;
    },
  });
}

/**
 * Validate a raw definition document
 */
export function parseProviderDefinition(raw: unknown, source: string): ProviderDefinition {
  const result = ProviderDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw ProviderConfigError.fromValidation(source, result.error);
  }
  return result.data;
}

// ============================================================================
// Provider Registry
// ============================================================================

export class ProviderRegistry {
  private readonly contexts = new Map<string, ProviderContext>();

  constructor(private readonly functions: FunctionRegistry = createDefaultFunctionRegistry()) {}

  /**
   * Validate, resolve and store a definition
   */
  register(raw: unknown, source = 'inline'): ProviderContext {
    const definition = parseProviderDefinition(raw, source);
    if (this.contexts.has(definition.id)) {
      throw new DuplicateProviderError(definition.id);
    }

    const context = resolveProviderContext(definition, this.functions);
    this.contexts.set(definition.id, context);
    logger.debug(
      { provider: definition.id, source, handlers: context.handlers.length },
      'Provider registered'
    );
    return context;
  }

  /**
   * Load one YAML (or JSON) definition file
   */
  loadFile(filePath: string): ProviderContext {
    const source = basename(filePath, extname(filePath));
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderConfigError(source, `Failed to read provider definition ${filePath}: ${message}`);
    }
    return this.register(raw, source);
  }

  /**
   * Register the shipped aws, gcp and azure definitions
   */
  loadBuiltins(directory: string = BUILTIN_DEFINITIONS_DIR): this {
    for (const id of BUILTIN_PROVIDER_IDS) {
      if (!this.contexts.has(id)) {
        this.loadFile(join(directory, `${id}.yaml`));
      }
    }
    return this;
  }

  has(id: string): boolean {
    return this.contexts.has(id);
  }

  get(id: string): ProviderContext {
    const context = this.contexts.get(id);
    if (!context) {
      throw new ProviderNotFoundError(id, this.ids());
    }
    return context;
  }

  ids(): string[] {
    return [...this.contexts.keys()];
  }

  list(): ProviderContext[] {
    return [...this.contexts.values()];
  }

  /**
   * Providers with at least one node whose module-stripped identifier starts
   * with one of their prefixes, in registration order. Falls back to
   * `fallback` when nothing matches.
   */
  detect(graph: ReadableGraph, fallback?: string): ProviderContext[] {
    const localIds = graph.nodeIds().map((id) => stripModulePrefix(id));
    const detected = this.list().filter((context) =>
      localIds.some((id) => context.definition.prefixes.some((prefix) => id.startsWith(prefix)))
    );
    if (detected.length === 0 && fallback !== undefined) {
      return [this.get(fallback)];
    }
    return detected;
  }

  /**
   * Explicit provider ids when given, detection otherwise
   */
  select(graph: ReadableGraph, options: { providers?: readonly string[]; defaultProvider?: string }): ProviderContext[] {
    if (options.providers && options.providers.length > 0) {
      return options.providers.map((id) => this.get(id));
    }
    return this.detect(graph, options.defaultProvider);
  }
}

/**
 * Registry with the shipped providers loaded
 */
export function createProviderRegistry(functions: FunctionRegistry = createDefaultFunctionRegistry()): ProviderRegistry {
  return new ProviderRegistry(functions).loadBuiltins();
}
