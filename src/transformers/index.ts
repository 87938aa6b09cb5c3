/**
 * Transformation Primitive Library
 * @module transformers
 *
 * Dispatch of validated transformation steps to the primitives.
 */

import { TransformationParameterError } from '../errors/domain';
import type { ResourceGraph } from '../graph/resource-graph';
import { consolidate } from './consolidation';
import {
  bidirectionalLink,
  createTransitiveLinks,
  link,
  linkByMetadataPattern,
  linkPeersViaIntermediary,
  linkViaCommonConnection,
  linkViaSharedChild,
  matchBySuffix,
  redirectConnections,
  replaceConnectionTargets,
  unlink,
  unlinkFromParents,
} from './linking';
import { applyVariants, propagateMetadata } from './metadata';
import {
  cloneWithSuffix,
  deleteNodes,
  expandToNumberedInstances,
  groupShared,
  insertIntermediateNode,
  moveToParent,
} from './structure';
import {
  type TransformationContext,
  type TransformationResult,
  type TransformationStep,
  type TransformationStepInput,
  TransformationStepSchema,
} from './types';

export * from './types';
export { consolidate, matchesConsolidationPrefix, mergeIntoCanonical } from './consolidation';
export {
  bidirectionalLink,
  createTransitiveLinks,
  link,
  linkByMetadataPattern,
  linkPeersViaIntermediary,
  linkViaCommonConnection,
  linkViaSharedChild,
  matchBySuffix,
  redirectConnections,
  replaceConnectionTargets,
  unlink,
  unlinkFromParents,
} from './linking';
export { applyVariants, propagateMetadata, selectVariant } from './metadata';
export {
  cloneWithSuffix,
  deleteNodes,
  expandToNumberedInstances,
  groupShared,
  insertIntermediateNode,
  moveToParent,
} from './structure';
export { anyMatching, findMatching, matchesPattern, mentionsNode } from './patterns';

/**
 * Validate a raw step (as written in a provider definition)
 */
export function parseTransformationStep(input: unknown): TransformationStep {
  const result = TransformationStepSchema.safeParse(input);
  if (!result.success) {
    const operation =
      typeof input === 'object' && input !== null && 'operation' in input && typeof input.operation === 'string'
        ? input.operation
        : 'unknown';
    throw TransformationParameterError.fromValidation(operation, result.error);
  }
  return result.data;
}

/**
 * Run one step against the graph
 */
export function applyTransformation(
  graph: ResourceGraph,
  step: TransformationStep,
  context: TransformationContext
): TransformationResult {
  switch (step.operation) {
    case 'expand_to_numbered_instances':
      return expandToNumberedInstances(graph, step.params);
    case 'consolidate':
      return consolidate(graph, step.params);
    case 'insert_intermediate_node':
      return insertIntermediateNode(graph, step.params, context);
    case 'link':
      return link(graph, step.params);
    case 'unlink':
      return unlink(graph, step.params);
    case 'unlink_from_parents':
      return unlinkFromParents(graph, step.params);
    case 'move_to_parent':
      return moveToParent(graph, step.params);
    case 'delete_nodes':
      return deleteNodes(graph, step.params);
    case 'group_shared':
      return groupShared(graph, step.params);
    case 'propagate_metadata':
      return propagateMetadata(graph, step.params);
    case 'apply_variants':
      return applyVariants(graph, step.params);
    case 'bidirectional_link':
      return bidirectionalLink(graph, step.params);
    case 'link_via_shared_child':
      return linkViaSharedChild(graph, step.params, context);
    case 'link_via_common_connection':
      return linkViaCommonConnection(graph, step.params);
    case 'link_by_metadata_pattern':
      return linkByMetadataPattern(graph, step.params);
    case 'create_transitive_links':
      return createTransitiveLinks(graph, step.params);
    case 'link_peers_via_intermediary':
      return linkPeersViaIntermediary(graph, step.params);
    case 'match_by_suffix':
      return matchBySuffix(graph, step.params);
    case 'redirect_connections':
      return redirectConnections(graph, step.params);
    case 'replace_connection_targets':
      return replaceConnectionTargets(graph, step.params);
    case 'clone_with_suffix':
      return cloneWithSuffix(graph, step.params);
    default: {
      const unreachable: never = step;
      return unreachable;
    }
  }
}

/**
 * Run steps in order. Accepts unvalidated steps, which are parsed first.
 */
export function applyTransformations(
  graph: ResourceGraph,
  steps: readonly (TransformationStep | TransformationStepInput)[],
  context: TransformationContext
): TransformationResult[] {
  return steps.map((step) => applyTransformation(graph, parseTransformationStep(step), context));
}
