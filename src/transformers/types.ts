/**
 * Transformation Step Types
 * @module transformers/types
 *
 * The closed set of declarative graph-editing operations a handler can list.
 * Steps are validated with zod when a provider definition is loaded, so the
 * primitives only ever see well-formed parameters.
 */

import { z } from 'zod';

import type { MissingAnchorError } from '../errors/domain';
import type { ReadableGraph } from '../graph/resource-graph';
import type { AttributeMap, NodeId } from '../types/graph';

// ============================================================================
// Parameter Schemas
// ============================================================================

const Pattern = z.string().min(1);

export const ExpandToNumberedInstancesParamsSchema = z.object({
  pattern: Pattern,
  /** Metadata key listing the fan-out targets */
  fanOutKey: z.string().min(1).default('subnet_ids'),
  /** Restrict fan-out targets to nodes containing this text */
  targetPattern: z.string().min(1).optional(),
  /** Clones keep the base node's other edges */
  inheritConnections: z.boolean().default(true),
});

export const ConsolidateParamsSchema = z.object({
  /** Module-stripped identifier prefix */
  pattern: Pattern,
  canonical: Pattern,
});

export const InsertIntermediateNodeParamsSchema = z.object({
  parentPattern: Pattern,
  childPattern: Pattern,
  /** Registered name generator */
  nameGenerator: z.string().min(1),
  createIfMissing: z.boolean().default(true),
});

export const LinkParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
  bidirectional: z.boolean().default(false),
});

export const UnlinkParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
});

export const UnlinkFromParentsParamsSchema = z.object({
  pattern: Pattern,
  parentFilter: Pattern.optional(),
});

export const MoveToParentParamsSchema = z.object({
  pattern: Pattern,
  fromParent: Pattern,
  toParent: Pattern,
});

export const DeleteNodesParamsSchema = z.object({
  pattern: Pattern,
  removeFromParents: z.boolean().default(true),
});

export const GroupSharedParamsSchema = z.object({
  patterns: z.array(Pattern).min(1),
  groupName: Pattern,
});

export const PropagationDirection = z.enum(['forward', 'reverse', 'bidirectional']);
export type PropagationDirection = z.infer<typeof PropagationDirection>;

export const PropagateMetadataParamsSchema = z.object({
  source: Pattern,
  /** Empty matches every node, or every child with `toChildren` */
  target: z.string().default(''),
  /** Keys to copy; every source key when omitted */
  keys: z.array(z.string().min(1)).optional(),
  direction: PropagationDirection.default('forward'),
  /** Targets are the graph children of each source */
  toChildren: z.boolean().default(false),
  /** Fall back to the first connected node that has the key */
  copyFromConnections: z.boolean().default(false),
});

export const ApplyVariantsParamsSchema = z.object({
  pattern: Pattern,
  /** Keyword found in the metadata value to replacement type */
  variants: z.record(z.string().min(1)),
  /** Metadata key to inspect; the whole metadata when omitted */
  metadataKey: z.string().min(1).optional(),
});

export const BidirectionalLinkParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
  cleanupReverse: z.boolean().default(false),
});

export const LinkViaSharedChildParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
  removeIntermediate: z.boolean().default(true),
});

export const LinkViaCommonConnectionParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
  removeSharedConnection: z.boolean().default(false),
});

export const LinkByMetadataPatternParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
  metadataKey: z.string().min(1),
  valuePattern: z.string().min(1),
});

export const CreateTransitiveLinksParamsSchema = z.object({
  source: Pattern,
  intermediate: Pattern,
  target: Pattern,
  removeIntermediate: z.boolean().default(true),
});

export const LinkPeersViaIntermediaryParamsSchema = z.object({
  intermediary: Pattern,
  source: Pattern,
  target: Pattern,
  removeIntermediary: z.boolean().default(true),
});

export const MatchBySuffixParamsSchema = z.object({
  source: Pattern,
  target: Pattern,
});

export const RedirectConnectionsParamsSchema = z.object({
  from: Pattern,
  to: Pattern,
  parentFilter: Pattern.optional(),
});

export const ReplaceConnectionTargetsParamsSchema = z.object({
  source: Pattern,
  oldTarget: Pattern,
  newTarget: Pattern,
});

export const CloneWithSuffixParamsSchema = z.object({
  pattern: Pattern,
  count: z.number().int().min(1),
});

// ============================================================================
// Step Union
// ============================================================================

function step<Name extends string, Params extends z.ZodTypeAny>(operation: Name, params: Params) {
  return z.object({ operation: z.literal(operation), params });
}

export const TransformationStepSchema = z.discriminatedUnion('operation', [
  step('expand_to_numbered_instances', ExpandToNumberedInstancesParamsSchema),
  step('consolidate', ConsolidateParamsSchema),
  step('insert_intermediate_node', InsertIntermediateNodeParamsSchema),
  step('link', LinkParamsSchema),
  step('unlink', UnlinkParamsSchema),
  step('unlink_from_parents', UnlinkFromParentsParamsSchema),
  step('move_to_parent', MoveToParentParamsSchema),
  step('delete_nodes', DeleteNodesParamsSchema),
  step('group_shared', GroupSharedParamsSchema),
  step('propagate_metadata', PropagateMetadataParamsSchema),
  step('apply_variants', ApplyVariantsParamsSchema),
  step('bidirectional_link', BidirectionalLinkParamsSchema),
  step('link_via_shared_child', LinkViaSharedChildParamsSchema),
  step('link_via_common_connection', LinkViaCommonConnectionParamsSchema),
  step('link_by_metadata_pattern', LinkByMetadataPatternParamsSchema),
  step('create_transitive_links', CreateTransitiveLinksParamsSchema),
  step('link_peers_via_intermediary', LinkPeersViaIntermediaryParamsSchema),
  step('match_by_suffix', MatchBySuffixParamsSchema),
  step('redirect_connections', RedirectConnectionsParamsSchema),
  step('replace_connection_targets', ReplaceConnectionTargetsParamsSchema),
  step('clone_with_suffix', CloneWithSuffixParamsSchema),
]);

export type TransformationStep = z.infer<typeof TransformationStepSchema>;
export type TransformationStepInput = z.input<typeof TransformationStepSchema>;
export type TransformationOperation = TransformationStep['operation'];

/**
 * Validated parameters of one operation
 */
export type StepParams<Op extends TransformationOperation> = Extract<TransformationStep, { operation: Op }>['params'];

export type ExpandToNumberedInstancesParams = StepParams<'expand_to_numbered_instances'>;
export type ConsolidateParams = StepParams<'consolidate'>;
export type InsertIntermediateNodeParams = StepParams<'insert_intermediate_node'>;
export type LinkParams = StepParams<'link'>;
export type UnlinkParams = StepParams<'unlink'>;
export type UnlinkFromParentsParams = StepParams<'unlink_from_parents'>;
export type MoveToParentParams = StepParams<'move_to_parent'>;
export type DeleteNodesParams = StepParams<'delete_nodes'>;
export type GroupSharedParams = StepParams<'group_shared'>;
export type PropagateMetadataParams = StepParams<'propagate_metadata'>;
export type ApplyVariantsParams = StepParams<'apply_variants'>;
export type BidirectionalLinkParams = StepParams<'bidirectional_link'>;
export type LinkViaSharedChildParams = StepParams<'link_via_shared_child'>;
export type LinkViaCommonConnectionParams = StepParams<'link_via_common_connection'>;
export type LinkByMetadataPatternParams = StepParams<'link_by_metadata_pattern'>;
export type CreateTransitiveLinksParams = StepParams<'create_transitive_links'>;
export type LinkPeersViaIntermediaryParams = StepParams<'link_peers_via_intermediary'>;
export type MatchBySuffixParams = StepParams<'match_by_suffix'>;
export type RedirectConnectionsParams = StepParams<'redirect_connections'>;
export type ReplaceConnectionTargetsParams = StepParams<'replace_connection_targets'>;
export type CloneWithSuffixParams = StepParams<'clone_with_suffix'>;

// ============================================================================
// Execution Context
// ============================================================================

/**
 * Computes the intermediate node for a child. Returns null to leave the
 * child's edges alone.
 */
export type NameGenerator = (
  child: NodeId,
  metadata: Readonly<AttributeMap>,
  snapshot: ReadableGraph
) => NodeId | null;

/**
 * What a primitive can see besides the graph
 */
export interface TransformationContext {
  /** Immutable pre-transformation graph */
  readonly snapshot: ReadableGraph;
  resolveNameGenerator(name: string): NameGenerator;
  /** Container types whose edges survive re-parenting */
  readonly groupNodeTypes: readonly string[];
}

/**
 * Outcome of one primitive. No affected nodes means nothing matched.
 */
export interface TransformationResult {
  readonly operation: TransformationOperation;
  readonly affected: readonly NodeId[];
  /** Set when the step was a no-op because its anchor node or edge was absent */
  readonly missingAnchor?: MissingAnchorError;
}
