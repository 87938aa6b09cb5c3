/**
 * Graph Post-Processing Stages
 * @module graph/post-processing
 *
 * Provider-table driven passes that run around the handler pipeline:
 * consolidation, variants, count expansion, forced edge directions and the
 * final invariant pass.
 */

import { ConsolidationAmbiguityError, type WarningCollector } from '../errors';
import type { ProviderContext, VariantRule } from '../providers/types';
import { matchesConsolidationPrefix, mergeIntoCanonical } from '../transformers/consolidation';
import { selectVariant } from '../transformers/metadata';
import { isGroupNode } from '../transformers/patterns';
import type { AttributeMap, NodeId } from '../types/graph';
import { cloneAttributeMap, toInstanceCount } from '../utils/attributes';
import {
  instanceNumberOf,
  isNumberedInstance,
  replaceResourceType,
  resourceTypeOf,
  stripModulePrefix,
  withInstanceSuffix,
} from '../utils/node-id';
import { ResourceGraph } from './resource-graph';

/**
 * Metadata keys that carry an instance count, in precedence order
 */
export const COUNT_KEYS = ['count', 'desired_count', 'for_each'] as const;

function startsWithAny(id: NodeId, prefixes: readonly string[]): boolean {
  const local = stripModulePrefix(id);
  return prefixes.some((prefix) => local.startsWith(prefix));
}

// ============================================================================
// Consolidation
// ============================================================================

export interface ConsolidationStageResult {
  /** Nodes folded into a canonical node */
  readonly merged: number;
  /** Nodes that matched more than one rule */
  readonly ambiguous: readonly NodeId[];
}

/**
 * Fold nodes into canonical nodes using every provider's consolidation
 * table. Rules are considered in provider order, then table order; the
 * first matching rule wins and every further match is reported as a
 * `CONSOLIDATION_AMBIGUITY` warning. Canonical nodes are never folded.
 */
export function consolidateByRules(
  graph: ResourceGraph,
  providers: readonly ProviderContext[],
  warnings: WarningCollector
): ConsolidationStageResult {
  const rules = providers.flatMap((provider) => provider.definition.consolidated);
  const canonicals = new Set(rules.map((rule) => rule.canonical));
  const ambiguous: NodeId[] = [];

  // Assign first, merge after the scan
  const assignments: [NodeId, NodeId][] = [];
  for (const id of graph.nodeIds()) {
    if (canonicals.has(id)) {
      continue;
    }
    const matching = rules.filter((rule) => matchesConsolidationPrefix(id, rule.prefix));
    const [chosen, ...others] = matching;
    if (!chosen) {
      continue;
    }
    const ignored = [...new Set(others.map((rule) => rule.canonical))].filter(
      (canonical) => canonical !== chosen.canonical
    );
    if (ignored.length > 0) {
      ambiguous.push(id);
      warnings.addError(new ConsolidationAmbiguityError(id, chosen.canonical, ignored), 'consolidation');
    }
    assignments.push([id, chosen.canonical]);
  }

  for (const [id, canonical] of assignments) {
    mergeIntoCanonical(graph, id, canonical);
  }

  return { merged: assignments.length, ambiguous };
}

// ============================================================================
// Variants
// ============================================================================

/**
 * Rename nodes to their variant type. The first rule whose prefix matches
 * and whose keyword is found decides; a node is renamed at most once.
 * Returns the new identifiers.
 */
export function applyVariantRules(graph: ResourceGraph, providers: readonly ProviderContext[]): NodeId[] {
  const rules: VariantRule[] = providers.flatMap((provider) => provider.definition.variants);
  const renamed: NodeId[] = [];

  for (const id of graph.nodeIds()) {
    for (const rule of rules) {
      if (!stripModulePrefix(id).startsWith(rule.prefix)) {
        continue;
      }
      const variant = selectVariant(graph.getMetadata(id), rule.variants, rule.metadataKey);
      if (variant === null) {
        continue;
      }
      if (resourceTypeOf(id) !== variant) {
        const target = replaceResourceType(id, variant);
        graph.renameNode(id, target);
        graph.removeEdge(target, target);
        renamed.push(target);
      }
      break;
    }
  }

  return renamed;
}

// ============================================================================
// Count Expansion
// ============================================================================

/**
 * Instance count from `count`, `desired_count` or `for_each`, the first
 * key present with a usable value
 */
export function instanceCountOf(metadata: Readonly<AttributeMap>): number | null {
  for (const key of COUNT_KEYS) {
    const count = toInstanceCount(metadata[key]);
    if (count !== null) {
      return count;
    }
  }
  return null;
}

function wrapInstance(instance: number, count: number): number {
  return ((instance - 1) % count) + 1;
}

/**
 * Replace every unnumbered node counted at two or more with `~1..~K`
 * instances carrying copies of its metadata. Shared services, canonical
 * nodes and nodes that already have numbered instances are left alone.
 *
 * Edges are rewired instance by instance. Between two expanded nodes
 * `a~i` points at `b~i`, wrapping when the counts differ. An edge from an
 * expanded node to a plain one is kept by every instance. A plain parent
 * points at every instance of an expanded child, and a numbered parent
 * `p~j` at instance `j` only. Returns the expanded nodes and their counts.
 */
export function expandCountedResources(
  graph: ResourceGraph,
  providers: readonly ProviderContext[]
): Map<NodeId, number> {
  const shared = providers.flatMap((provider) => provider.definition.sharedServices);
  const canonicals = new Set(
    providers.flatMap((provider) => provider.definition.consolidated.map((rule) => rule.canonical))
  );

  const counts = new Map<NodeId, number>();
  for (const id of graph.nodeIds()) {
    if (
      isNumberedInstance(id) ||
      canonicals.has(id) ||
      startsWithAny(id, shared) ||
      graph.hasNode(withInstanceSuffix(id, 1))
    ) {
      continue;
    }
    const count = instanceCountOf(graph.getMetadata(id));
    if (count !== null && count >= 2) {
      counts.set(id, count);
    }
  }

  if (counts.size === 0) {
    return counts;
  }

  const targetsOf = (sourceInstance: number | null, target: NodeId): NodeId[] => {
    const count = counts.get(target);
    if (count === undefined) {
      return [target];
    }
    if (sourceInstance === null) {
      return Array.from({ length: count }, (_, index) => withInstanceSuffix(target, index + 1));
    }
    return [withInstanceSuffix(target, wrapInstance(sourceInstance, count))];
  };

  const expanded = new ResourceGraph();
  for (const id of graph.nodeIds()) {
    const connections = graph.getConnections(id);
    const metadata = graph.getMetadata(id);
    const count = counts.get(id);

    if (count === undefined) {
      const instance = instanceNumberOf(id);
      expanded.addNode(id, cloneAttributeMap(metadata));
      expanded.setConnections(id, connections.flatMap((target) => targetsOf(instance, target)));
      continue;
    }

    for (let instance = 1; instance <= count; instance++) {
      const instanceId = withInstanceSuffix(id, instance);
      expanded.addNode(instanceId, cloneAttributeMap(metadata));
      expanded.setConnections(instanceId, connections.flatMap((target) => targetsOf(instance, target)));
    }
  }

  graph.restore(expanded);
  return counts;
}

// ============================================================================
// Forced Directions
// ============================================================================

/**
 * Reverse edges by provider rules. Every outgoing edge of a forced
 * destination is flipped; an edge into a forced origin is flipped unless
 * its source is a group container. Returns the number of flipped edges.
 */
export function applyForcedDirections(graph: ResourceGraph, providers: readonly ProviderContext[]): number {
  const destinations = providers.flatMap((provider) => provider.definition.forcedDestination);
  const origins = providers.flatMap((provider) => provider.definition.forcedOrigin);
  const groupTypes = providers.flatMap((provider) => provider.definition.groupNodes);
  let flipped = 0;

  for (const node of graph.nodeIds()) {
    const forcedDestination = startsWithAny(node, destinations);
    const isGroup = isGroupNode(node, groupTypes);

    for (const connection of [...graph.getConnections(node)]) {
      const reverse = forcedDestination || (!isGroup && startsWithAny(connection, origins));
      if (!reverse || connection === node) {
        continue;
      }
      graph.removeEdge(node, connection);
      graph.addEdge(connection, node);
      flipped++;
    }
  }

  return flipped;
}

// ============================================================================
// Final Invariant Pass
// ============================================================================

/**
 * Give dangling edge targets empty nodes and drop self-loops. Returns the
 * identifiers that were added.
 */
export function finalizeGraph(graph: ResourceGraph): NodeId[] {
  for (const id of graph.nodeIds()) {
    graph.removeEdge(id, id);
  }
  return graph.ensureEdgeTargets();
}
