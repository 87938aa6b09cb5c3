/**
 * Raw Input Types
 * @module parsers/terraform/types
 *
 * Zod schemas for the raw infrastructure input handed over by the plan
 * generator and source parser, and for previously exported graph documents.
 */

import { z } from 'zod';

import { type AttributeMap, type AttributeValue, ROOT_MODULE } from '../../types/graph';
import { parseNodeId } from '../../utils/node-id';

// ============================================================================
// Attribute Values
// ============================================================================

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(AttributeValueSchema),
  ])
);

export const AttributeMapSchema: z.ZodType<AttributeMap> = z.record(AttributeValueSchema);

const NodeIdSchema = z
  .string()
  .min(1)
  .refine((id) => parseNodeId(id) !== null, {
    message: 'Node identifier must have the form <type>.<name>',
  });

// ============================================================================
// Declarations
// ============================================================================

export const RawNodeSchema = z.object({
  /** Module-qualified identifier, optionally `~N` suffixed */
  id: NodeIdSchema,
  attributes: AttributeMapSchema.default({}),
});

export type RawNode = z.infer<typeof RawNodeSchema>;

export const VariableDeclarationSchema = z.object({
  name: z.string().min(1),
  /** Declaring module path; `main` for the root module */
  module: z.string().min(1).default(ROOT_MODULE),
  default: AttributeValueSchema.optional(),
});

export type VariableDeclaration = z.infer<typeof VariableDeclarationSchema>;

export const LocalDeclarationSchema = z.object({
  name: z.string().min(1),
  module: z.string().min(1).default(ROOT_MODULE),
  value: AttributeValueSchema,
});

export type LocalDeclaration = z.infer<typeof LocalDeclarationSchema>;

export const ModuleCallSchema = z.object({
  name: z.string().min(1),
  /** Calling module path */
  parent: z.string().min(1).default(ROOT_MODULE),
  source: z.string().optional(),
  /** Input expressions, evaluated in the calling module */
  inputs: AttributeMapSchema.default({}),
});

export type ModuleCall = z.infer<typeof ModuleCallSchema>;

export const OutputDeclarationSchema = z.object({
  name: z.string().min(1),
  module: z.string().min(1).default(ROOT_MODULE),
  value: AttributeValueSchema,
});

export type OutputDeclaration = z.infer<typeof OutputDeclarationSchema>;

// ============================================================================
// Raw Infrastructure Input
// ============================================================================

export const RawInfrastructureSchema = z
  .object({
    nodes: z.array(RawNodeSchema),
    edges: z.record(z.array(z.string())).default({}),
    variables: z.array(VariableDeclarationSchema).default([]),
    /** Root-module overrides, e.g. from a varfile */
    variableValues: z.record(AttributeValueSchema).default({}),
    locals: z.array(LocalDeclarationSchema).default([]),
    modules: z.array(ModuleCallSchema).default([]),
    outputs: z.array(OutputDeclarationSchema).default([]),
    hidden: z.array(z.string()).default([]),
  })
  .superRefine((input, ctx) => {
    const seen = new Set<string>();
    input.nodes.forEach((node, index) => {
      if (seen.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'id'],
          message: `Duplicate node identifier '${node.id}'`,
        });
      }
      seen.add(node.id);
    });
  });

export type RawInfrastructure = z.infer<typeof RawInfrastructureSchema>;

/**
 * Input shape accepted before defaults are applied
 */
export type RawInfrastructureInput = z.input<typeof RawInfrastructureSchema>;

// ============================================================================
// Exported Graph Document
// ============================================================================

export const GraphDocumentSchema = z.object({
  graphdict: z.record(z.array(z.string())),
  meta_data: z.record(AttributeMapSchema).default({}),
  original_graphdict: z.record(z.array(z.string())).default({}),
  original_metadata: z.record(AttributeMapSchema).default({}),
});

export type ParsedGraphDocument = z.infer<typeof GraphDocumentSchema>;
