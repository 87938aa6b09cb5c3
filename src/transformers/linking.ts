/**
 * Linking Primitives
 * @module transformers/linking
 *
 * Operations that add, remove or reroute edges without creating or
 * deleting nodes (except intermediaries that a step is asked to remove).
 */

import { MissingAnchorError } from '../errors/domain';
import type { ResourceGraph } from '../graph/resource-graph';
import type { NodeId } from '../types/graph';
import { attributeToSearchText } from '../utils/attributes';
import { instanceNumberOf } from '../utils/node-id';
import { AffectedNodes, findMatching, isGroupNode, matchesPattern } from './patterns';
import type {
  BidirectionalLinkParams,
  CreateTransitiveLinksParams,
  LinkByMetadataPatternParams,
  LinkParams,
  LinkPeersViaIntermediaryParams,
  LinkViaCommonConnectionParams,
  LinkViaSharedChildParams,
  MatchBySuffixParams,
  RedirectConnectionsParams,
  ReplaceConnectionTargetsParams,
  TransformationContext,
  TransformationResult,
  UnlinkFromParentsParams,
  UnlinkParams,
} from './types';

// ============================================================================
// Link / Unlink
// ============================================================================

/**
 * Add an edge from every source match to every target match
 */
export function link(graph: ResourceGraph, params: LinkParams): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    for (const target of targets) {
      if (source === target) {
        continue;
      }
      if (graph.addEdge(source, target)) {
        affected.add(source);
      }
      if (params.bidirectional && graph.addEdge(target, source)) {
        affected.add(target);
      }
    }
  }

  return { operation: 'link', affected: affected.list() };
}

export function unlink(graph: ResourceGraph, params: UnlinkParams): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    for (const target of targets) {
      if (graph.removeEdge(source, target)) {
        affected.add(source);
      }
    }
  }

  return { operation: 'unlink', affected: affected.list() };
}

/**
 * Remove matching nodes from their parents' edge lists, optionally only
 * from parents containing `parentFilter`. The nodes themselves stay.
 */
export function unlinkFromParents(graph: ResourceGraph, params: UnlinkFromParentsParams): TransformationResult {
  const affected = new AffectedNodes();

  for (const node of findMatching(graph, params.pattern)) {
    const parents = graph
      .parentsOf(node)
      .filter((parent) => params.parentFilter === undefined || matchesPattern(parent, params.parentFilter));
    for (const parent of parents) {
      graph.removeEdge(parent, node);
      affected.add(node);
    }
  }

  return { operation: 'unlink_from_parents', affected: affected.list() };
}

/**
 * Add source→target, optionally removing target→source
 */
export function bidirectionalLink(graph: ResourceGraph, params: BidirectionalLinkParams): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    for (const target of targets) {
      if (source === target) {
        continue;
      }
      if (graph.addEdge(source, target)) {
        affected.add(source);
      }
      if (params.cleanupReverse && graph.removeEdge(target, source)) {
        affected.add(target);
      }
    }
  }

  return { operation: 'bidirectional_link', affected: affected.list() };
}

// ============================================================================
// Links Through Other Nodes
// ============================================================================

/**
 * node→source and target→node give source→target. With
 * `removeIntermediate`, node→source is dropped and target leaves every
 * parent that is not a group container.
 */
export function linkViaSharedChild(
  graph: ResourceGraph,
  params: LinkViaSharedChildParams,
  context: TransformationContext
): TransformationResult {
  const affected = new AffectedNodes();
  const sources = findMatching(graph, params.source);
  const targets = findMatching(graph, params.target);

  for (const node of graph.nodeIds()) {
    for (const source of sources) {
      if (!graph.hasEdge(node, source)) {
        continue;
      }
      for (const target of targets) {
        if (target === source || !graph.hasEdge(target, node)) {
          continue;
        }
        graph.addEdge(source, target);
        affected.add(source);

        if (params.removeIntermediate) {
          graph.removeEdge(node, source);
          for (const parent of graph.parentsOf(target)) {
            if (parent !== source && !isGroupNode(parent, context.groupNodeTypes)) {
              graph.removeEdge(parent, target);
            }
          }
        }
      }
    }
  }

  return { operation: 'link_via_shared_child', affected: affected.list() };
}

/**
 * source→shared and target→shared give source→target
 */
export function linkViaCommonConnection(
  graph: ResourceGraph,
  params: LinkViaCommonConnectionParams
): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    for (const target of targets) {
      if (source === target) {
        continue;
      }
      const targetConnections = graph.getConnections(target);
      const shared = graph.getConnections(source).filter((id) => targetConnections.includes(id));
      if (shared.length === 0) {
        continue;
      }
      graph.addEdge(source, target);
      affected.add(source);
      if (params.removeSharedConnection) {
        shared.forEach((id) => graph.removeEdge(source, id));
      }
    }
  }

  return { operation: 'link_via_common_connection', affected: affected.list() };
}

/**
 * Link sources whose metadata value at `metadataKey` contains `valuePattern`
 * to every node matching `target`
 */
export function linkByMetadataPattern(
  graph: ResourceGraph,
  params: LinkByMetadataPatternParams
): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    const value = attributeToSearchText(graph.getMetadata(source)[params.metadataKey]);
    if (!value.includes(params.valuePattern)) {
      continue;
    }
    for (const target of targets) {
      if (target !== source && graph.addEdge(source, target)) {
        affected.add(source);
      }
    }
  }

  return { operation: 'link_by_metadata_pattern', affected: affected.list() };
}

/**
 * source→intermediate→target gives source→target. With
 * `removeIntermediate`, the intermediate node is deleted.
 */
export function createTransitiveLinks(
  graph: ResourceGraph,
  params: CreateTransitiveLinksParams
): TransformationResult {
  const affected = new AffectedNodes();
  const intermediates = findMatching(graph, params.intermediate);
  const targets = findMatching(graph, params.target);
  const removed: NodeId[] = [];

  for (const source of findMatching(graph, params.source)) {
    for (const intermediate of intermediates) {
      if (!graph.hasEdge(source, intermediate)) {
        continue;
      }
      for (const target of targets) {
        if (target === source || !graph.hasEdge(intermediate, target)) {
          continue;
        }
        graph.addEdge(source, target);
        affected.add(source);
        if (params.removeIntermediate && !removed.includes(intermediate)) {
          removed.push(intermediate);
        }
      }
    }
  }

  for (const intermediate of removed) {
    graph.removeNode(intermediate);
    affected.add(intermediate);
  }

  return { operation: 'create_transitive_links', affected: affected.list() };
}

/**
 * intermediary→source and intermediary→target give source→target. With
 * `removeIntermediary`, the intermediary node is deleted.
 */
export function linkPeersViaIntermediary(
  graph: ResourceGraph,
  params: LinkPeersViaIntermediaryParams
): TransformationResult {
  const affected = new AffectedNodes();

  for (const intermediary of findMatching(graph, params.intermediary)) {
    const connections = graph.getConnections(intermediary);
    const sources = connections.filter((id) => matchesPattern(id, params.source));
    const targets = connections.filter((id) => matchesPattern(id, params.target));
    if (sources.length === 0 || targets.length === 0) {
      continue;
    }

    for (const source of sources) {
      for (const target of targets) {
        if (source !== target && graph.addEdge(source, target)) {
          affected.add(source);
        }
      }
    }

    if (params.removeIntermediary) {
      graph.removeNode(intermediary);
      affected.add(intermediary);
    }
  }

  return { operation: 'link_peers_via_intermediary', affected: affected.list() };
}

/**
 * Link `~N` sources to targets carrying the same suffix
 */
export function matchBySuffix(graph: ResourceGraph, params: MatchBySuffixParams): TransformationResult {
  const affected = new AffectedNodes();
  const targets = findMatching(graph, params.target);

  for (const source of findMatching(graph, params.source)) {
    const instance = instanceNumberOf(source);
    if (instance === null) {
      continue;
    }
    for (const target of targets) {
      if (target !== source && instanceNumberOf(target) === instance && graph.addEdge(source, target)) {
        affected.add(source);
      }
    }
  }

  return { operation: 'match_by_suffix', affected: affected.list() };
}

// ============================================================================
// Rerouting
// ============================================================================

/**
 * Parents of `from` matches (optionally filtered) point at the first `to`
 * match instead
 */
export function redirectConnections(graph: ResourceGraph, params: RedirectConnectionsParams): TransformationResult {
  const affected = new AffectedNodes();
  const [destination] = findMatching(graph, params.to);
  if (destination === undefined) {
    return {
      operation: 'redirect_connections',
      affected: [],
      missingAnchor: new MissingAnchorError('redirect_connections', { to: params.to }),
    };
  }

  for (const from of findMatching(graph, params.from)) {
    if (from === destination) {
      continue;
    }
    const parents = graph
      .parentsOf(from)
      .filter((parent) => params.parentFilter === undefined || matchesPattern(parent, params.parentFilter));
    for (const parent of parents) {
      if (parent === destination) {
        graph.removeEdge(parent, from);
      } else {
        graph.replaceConnection(parent, from, [destination]);
      }
      affected.add(parent);
    }
  }

  return { operation: 'redirect_connections', affected: affected.list() };
}

/**
 * In each source's edge list, swap `oldTarget` matches for the first
 * `newTarget` match
 */
export function replaceConnectionTargets(
  graph: ResourceGraph,
  params: ReplaceConnectionTargetsParams
): TransformationResult {
  const affected = new AffectedNodes();
  const [replacement] = findMatching(graph, params.newTarget);
  if (replacement === undefined) {
    return {
      operation: 'replace_connection_targets',
      affected: [],
      missingAnchor: new MissingAnchorError('replace_connection_targets', { newTarget: params.newTarget }),
    };
  }
  const oldTargets = findMatching(graph, params.oldTarget);

  for (const source of findMatching(graph, params.source)) {
    for (const oldTarget of oldTargets) {
      if (oldTarget === replacement || !graph.hasEdge(source, oldTarget)) {
        continue;
      }
      if (source === replacement) {
        graph.removeEdge(source, oldTarget);
      } else {
        graph.replaceConnection(source, oldTarget, [replacement]);
      }
      affected.add(source);
    }
  }

  return { operation: 'replace_connection_targets', affected: affected.list() };
}
