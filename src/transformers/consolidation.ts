/**
 * Consolidation Primitive
 * @module transformers/consolidation
 *
 * Merges every node of a type family into one canonical node. Matching is
 * on the module-stripped identifier prefix, so `aws_lb` gathers
 * `module.web.aws_lb.front` and `aws_lb.back` alike.
 */

import type { ResourceGraph } from '../graph/resource-graph';
import type { NodeId } from '../types/graph';
import { cloneAttributeMap } from '../utils/attributes';
import { stripModulePrefix } from '../utils/node-id';
import { AffectedNodes } from './patterns';
import type { ConsolidateParams, TransformationResult } from './types';

/**
 * True when a node belongs to the family named by a consolidation prefix
 */
export function matchesConsolidationPrefix(id: NodeId, prefix: string): boolean {
  return stripModulePrefix(id).startsWith(prefix);
}

/**
 * Fold one node into `canonical`. Keys the canonical node already has win.
 */
export function mergeIntoCanonical(graph: ResourceGraph, node: NodeId, canonical: NodeId): void {
  if (graph.hasNode(canonical)) {
    graph.setMetadata(canonical, {
      ...cloneAttributeMap(graph.getMetadata(node)),
      ...graph.getMetadata(canonical),
    });
  }
  graph.renameNode(node, canonical);
  graph.removeEdge(canonical, canonical);
}

/**
 * Redirect every edge to or from a match onto `canonical`, then delete the
 * match. The canonical node is created at the first match's position when
 * absent. Its existing metadata keys win; keys it lacks are filled from the
 * matches in graph order. Running twice changes nothing, since the canonical
 * node never matches itself.
 */
export function consolidate(graph: ResourceGraph, params: ConsolidateParams): TransformationResult {
  const affected = new AffectedNodes();
  const matches = graph
    .nodeIds()
    .filter((id) => id !== params.canonical && matchesConsolidationPrefix(id, params.pattern));

  for (const match of matches) {
    mergeIntoCanonical(graph, match, params.canonical);
    affected.add(match);
  }

  if (matches.length > 0) {
    affected.add(params.canonical);
  }

  return { operation: 'consolidate', affected: affected.list() };
}
