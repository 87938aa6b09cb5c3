/**
 * Structural Primitives
 * @module transformers/structure
 *
 * Operations that create, clone, re-parent or delete nodes.
 */

import { MissingAnchorError } from '../errors/domain';
import type { ResourceGraph } from '../graph/resource-graph';
import type { AttributeMap, NodeId } from '../types/graph';
import { cloneAttributeMap, toStringList } from '../utils/attributes';
import { isNumberedInstance, withInstanceSuffix } from '../utils/node-id';
import { AffectedNodes, findMatching, matchesPattern, mentionsNode } from './patterns';
import type {
  CloneWithSuffixParams,
  DeleteNodesParams,
  ExpandToNumberedInstancesParams,
  GroupSharedParams,
  InsertIntermediateNodeParams,
  MoveToParentParams,
  TransformationContext,
  TransformationResult,
} from './types';

// ============================================================================
// Numbered Instances
// ============================================================================

/**
 * Targets named by a fan-out value list, in list order. A value names a node
 * through its identifier or through the node's `id` attribute.
 */
function resolveFanOutTargets(
  graph: ResourceGraph,
  base: NodeId,
  values: readonly string[],
  targetPattern: string | undefined
): NodeId[] {
  const candidates = graph
    .nodeIds()
    .filter((id) => id !== base && !isNumberedInstance(id))
    .filter((id) => targetPattern === undefined || matchesPattern(id, targetPattern));
  const targets: NodeId[] = [];

  for (const value of values) {
    for (const candidate of candidates) {
      if (targets.includes(candidate)) {
        continue;
      }
      const attributeId = graph.getMetadata(candidate)['id'];
      const byAttribute = typeof attributeId === 'string' && attributeId !== '' && value.includes(attributeId);
      if (mentionsNode(value, candidate) || byAttribute) {
        targets.push(candidate);
      }
    }
  }

  return targets;
}

/**
 * Replace each matching node whose fan-out key names K ≥ 2 targets with
 * clones `base~1..base~K`. Clone i keeps the edge to target i only, plus
 * every other edge of the base when `inheritConnections` is set. A target
 * that was a parent of the base keeps the direction: it points at its own
 * clone and the clone does not point back. Other parents point at every
 * clone. Numbered nodes are skipped, so re-running is a no-op.
 */
export function expandToNumberedInstances(
  graph: ResourceGraph,
  params: ExpandToNumberedInstancesParams
): TransformationResult {
  const affected = new AffectedNodes();

  for (const base of findMatching(graph, params.pattern)) {
    if (isNumberedInstance(base) || !graph.hasNode(base)) {
      continue;
    }
    const values = toStringList(graph.getMetadata(base)[params.fanOutKey]);
    const targets = resolveFanOutTargets(graph, base, values, params.targetPattern);

    if (targets.length === 1) {
      const [target] = targets;
      if (!graph.hasEdge(base, target) && !graph.hasEdge(target, base)) {
        graph.addEdge(base, target);
        affected.add(base);
      }
      continue;
    }
    if (targets.length < 2) {
      continue;
    }

    const connections = graph.getConnections(base);
    const metadata = graph.getMetadata(base);
    const parents = graph.parentsOf(base);
    const clones = targets.map((_, index) => withInstanceSuffix(base, index + 1));

    targets.forEach((target, index) => {
      const clone = clones[index];
      const kept = params.inheritConnections
        ? connections.filter((id) => !targets.includes(id) || id === target)
        : connections.filter((id) => id === target);
      graph.addNode(clone, cloneAttributeMap(metadata));
      if (parents.includes(target)) {
        // target contains the base: the edge stays target -> clone
        graph.setConnections(clone, kept.filter((id) => id !== target));
      } else {
        graph.setConnections(clone, kept.includes(target) ? kept : [...kept, target]);
      }
      affected.add(clone);
    });

    for (const parent of parents) {
      const targetIndex = targets.indexOf(parent);
      graph.replaceConnection(parent, base, targetIndex === -1 ? clones : [clones[targetIndex]]);
    }
    graph.removeNode(base);
    affected.add(base);
  }

  return { operation: 'expand_to_numbered_instances', affected: affected.list() };
}

/**
 * Replace each unnumbered match with `count` copies. Parents point at every copy.
 */
export function cloneWithSuffix(graph: ResourceGraph, params: CloneWithSuffixParams): TransformationResult {
  const affected = new AffectedNodes();

  for (const base of findMatching(graph, params.pattern)) {
    if (isNumberedInstance(base)) {
      continue;
    }
    const connections = graph.getConnections(base);
    const metadata = graph.getMetadata(base);
    const clones: NodeId[] = [];

    for (let instance = 1; instance <= params.count; instance++) {
      const clone = withInstanceSuffix(base, instance);
      graph.addNode(clone, cloneAttributeMap(metadata));
      graph.setConnections(clone, connections);
      clones.push(clone);
    }
    for (const parent of graph.parentsOf(base)) {
      graph.replaceConnection(parent, base, clones);
    }
    graph.removeNode(base);
    affected.add(base, ...clones);
  }

  return { operation: 'clone_with_suffix', affected: affected.list() };
}

// ============================================================================
// Intermediate Nodes
// ============================================================================

/**
 * Turn every parent→child edge into parent→name→child, where the name comes
 * from the configured generator. A created node carries the child's `count`.
 * Children without a matching parent edge are left alone.
 */
export function insertIntermediateNode(
  graph: ResourceGraph,
  params: InsertIntermediateNodeParams,
  context: TransformationContext
): TransformationResult {
  const affected = new AffectedNodes();
  const generate = context.resolveNameGenerator(params.nameGenerator);
  const parents = findMatching(graph, params.parentPattern);
  let anchored = false;

  for (const child of findMatching(graph, params.childPattern)) {
    const childParents = parents.filter((parent) => parent !== child && graph.hasEdge(parent, child));
    if (childParents.length === 0) {
      continue;
    }
    anchored = true;

    const metadata = graph.getMetadata(child);
    const intermediate = generate(child, metadata, context.snapshot);
    if (intermediate === null || intermediate === child) {
      continue;
    }

    if (!graph.hasNode(intermediate)) {
      if (!params.createIfMissing) {
        continue;
      }
      const initial: AttributeMap = {};
      if (metadata['count'] !== undefined) {
        initial['count'] = metadata['count'];
      }
      graph.addNode(intermediate, initial);
      affected.add(intermediate);
    }

    for (const parent of childParents) {
      if (parent === intermediate) {
        continue;
      }
      graph.replaceConnection(parent, child, [intermediate]);
      affected.add(parent);
    }
    graph.addEdge(intermediate, child);
  }

  if (!anchored) {
    return {
      operation: 'insert_intermediate_node',
      affected: [],
      missingAnchor: new MissingAnchorError('insert_intermediate_node', {
        parentPattern: params.parentPattern,
        childPattern: params.childPattern,
      }),
    };
  }
  return { operation: 'insert_intermediate_node', affected: affected.list() };
}

// ============================================================================
// Re-parenting
// ============================================================================

/**
 * Move matches out of parents containing `fromParent` into the first node
 * matching `toParent`
 */
export function moveToParent(graph: ResourceGraph, params: MoveToParentParams): TransformationResult {
  const affected = new AffectedNodes();
  const [destination] = findMatching(graph, params.toParent);
  if (destination === undefined) {
    return {
      operation: 'move_to_parent',
      affected: [],
      missingAnchor: new MissingAnchorError('move_to_parent', { toParent: params.toParent }),
    };
  }

  for (const node of findMatching(graph, params.pattern)) {
    if (node === destination) {
      continue;
    }
    const fromParents = graph
      .parentsOf(node)
      .filter((parent) => parent !== destination && matchesPattern(parent, params.fromParent));
    for (const parent of fromParents) {
      graph.removeEdge(parent, node);
      graph.addEdge(destination, node);
      affected.add(node);
    }
  }

  return { operation: 'move_to_parent', affected: affected.list() };
}

/**
 * Delete matches and their metadata; with `removeFromParents`, strip them
 * from every edge list as well
 */
export function deleteNodes(graph: ResourceGraph, params: DeleteNodesParams): TransformationResult {
  const affected = new AffectedNodes();

  for (const node of findMatching(graph, params.pattern)) {
    if (graph.removeNode(node, params.removeFromParents)) {
      affected.add(node);
    }
  }

  return { operation: 'delete_nodes', affected: affected.list() };
}

/**
 * Make every node matching one of the patterns a child of `groupName`
 * only, creating the group node when absent
 */
export function groupShared(graph: ResourceGraph, params: GroupSharedParams): TransformationResult {
  const affected = new AffectedNodes();
  const members = graph
    .nodeIds()
    .filter((id) => id !== params.groupName && params.patterns.some((pattern) => matchesPattern(id, pattern)));
  if (members.length === 0) {
    return { operation: 'group_shared', affected: [] };
  }

  if (graph.addNode(params.groupName)) {
    affected.add(params.groupName);
  }

  for (const member of members) {
    for (const parent of graph.parentsOf(member)) {
      if (parent !== params.groupName) {
        graph.removeEdge(parent, member);
      }
    }
    graph.addEdge(params.groupName, member);
    affected.add(member);
  }

  return { operation: 'group_shared', affected: affected.list() };
}

