/**
 * Provider Definition Types
 * @module providers/types
 *
 * Zod schemas for provider definition documents, and the runtime Provider
 * Context that carries one validated definition with its resolved functions
 * through every stage.
 */

import { z } from 'zod';

import type { InferenceRules } from '../detectors/relationship-inferencer';
import type { ReadableGraph, ResourceGraph } from '../graph/resource-graph';
import { AttributeValueSchema } from '../parsers/terraform/types';
import { type NameGenerator, type TransformationStep, TransformationStepSchema } from '../transformers/types';

// ============================================================================
// Definition Schemas
// ============================================================================

const Prefix = z.string().min(1);
const PrefixList = z.array(Prefix).default([]);

export const ConsolidationRuleSchema = z.object({
  /** Module-stripped identifier prefix */
  prefix: Prefix,
  /** Node every match is merged into */
  canonical: z.string().min(1),
});

export const VariantRuleSchema = z.object({
  prefix: Prefix,
  /** Metadata key to inspect; the whole metadata when omitted */
  metadataKey: z.string().min(1).optional(),
  /** Keyword to replacement type, first match wins */
  variants: z.record(z.string().min(1)),
});

export const AutoAnnotationRuleSchema = z.object({
  /** Module-stripped identifier prefix of the nodes the rule applies to */
  prefix: Prefix,
  /** Nodes to link; `type.*` means the first node of that type */
  link: z.array(z.string().min(1)).min(1),
  /** Connection prefixes removed from a node once linked */
  delete: PrefixList,
  /** Forward links node to target, reverse links target to node */
  arrow: z.enum(['forward', 'reverse']).default('forward'),
});

export const ExecutionOrderSchema = z.enum(['before', 'after']);

export const HandlerConfigSchema = z
  .object({
    pattern: z.string().min(1),
    description: z.string().optional(),
    executionOrder: ExecutionOrderSchema.default('after'),
    customFunction: z.string().min(1).optional(),
    transformations: z.array(TransformationStepSchema).default([]),
  })
  .refine((handler) => handler.customFunction !== undefined || handler.transformations.length > 0, {
    message: 'A handler needs a custom function or at least one transformation',
  });

export const ProviderDefinitionSchema = z
  .object({
    id: z.string().regex(/^[a-z][a-z0-9_-]*$/, 'Provider ids are lower-case identifiers'),
    name: z.string().optional(),
    /** Type prefixes that identify the provider's resources */
    prefixes: z.array(Prefix).min(1),
    consolidated: z.array(ConsolidationRuleSchema).default([]),
    variants: z.array(VariantRuleSchema).default([]),
    sharedServices: PrefixList,
    groupNodes: PrefixList,
    hiddenPrefixes: PrefixList,
    skipRelationsFrom: PrefixList,
    reverseArrowPrefixes: PrefixList,
    forcedDestination: PrefixList,
    forcedOrigin: PrefixList,
    impliedConnections: z.record(Prefix).default({}),
    dataReplacements: z.record(AttributeValueSchema).default({}),
    inferenceSkipKeys: PrefixList,
    autoAnnotations: z.array(AutoAnnotationRuleSchema).default([]),
    handlers: z.array(HandlerConfigSchema).default([]),
  })
  .superRefine((definition, ctx) => {
    const seen = new Set<string>();
    definition.handlers.forEach((handler, index) => {
      if (seen.has(handler.pattern)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['handlers', index, 'pattern'],
          message: `Duplicate handler pattern '${handler.pattern}'`,
        });
      }
      seen.add(handler.pattern);
    });
  });

export type ConsolidationRule = z.infer<typeof ConsolidationRuleSchema>;
export type VariantRule = z.infer<typeof VariantRuleSchema>;
export type AutoAnnotationRule = z.infer<typeof AutoAnnotationRuleSchema>;
export type ExecutionOrder = z.infer<typeof ExecutionOrderSchema>;
export type HandlerConfig = z.infer<typeof HandlerConfigSchema>;
export type ProviderDefinition = z.infer<typeof ProviderDefinitionSchema>;
export type ProviderDefinitionInput = z.input<typeof ProviderDefinitionSchema>;

// ============================================================================
// Custom Functions
// ============================================================================

/**
 * What a custom handler can see besides the live graph
 */
export interface CustomHandlerContext {
  /** Immutable pre-transformation graph */
  readonly snapshot: ReadableGraph;
  readonly provider: ProviderDefinition;
}

/**
 * Provider-specific graph rewrite run by a handler before or after its
 * declarative steps. Mutates the graph in place; throwing aborts only the
 * handler's own pattern.
 */
export type CustomHandler = (graph: ResourceGraph, context: CustomHandlerContext) => void;

// ============================================================================
// Provider Context
// ============================================================================

/**
 * A handler whose function names were checked against the registry
 */
export interface ResolvedHandler {
  readonly pattern: string;
  readonly description?: string;
  readonly executionOrder: ExecutionOrder;
  readonly customFunction: { readonly name: string; readonly run: CustomHandler } | null;
  readonly transformations: readonly TransformationStep[];
}

/**
 * One provider's validated configuration bundle, built once and passed
 * explicitly to every stage
 */
export interface ProviderContext {
  readonly id: string;
  readonly definition: ProviderDefinition;
  readonly handlers: readonly ResolvedHandler[];
  readonly inferenceRules: InferenceRules;
  resolveNameGenerator(name: string): NameGenerator;
}
