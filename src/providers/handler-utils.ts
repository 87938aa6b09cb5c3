/**
 * Custom Handler Helpers
 * @module providers/handler-utils
 *
 * Lookups shared by the provider-specific custom handlers and name generators.
 */

import type { ReadableGraph, ResourceGraph } from '../graph/resource-graph';
import { mentionsNode } from '../transformers/patterns';
import { type AttributeMap, type AttributeValue, isAttributeMap, type NodeId } from '../types/graph';
import { cloneAttributeMap } from '../utils/attributes';
import { localIdOf, stripModulePrefix } from '../utils/node-id';
import type { ConsolidationRule } from './types';

/**
 * Nodes whose module-stripped identifier starts with `typePrefix`
 */
export function nodesOfType(graph: ReadableGraph, typePrefix: string): NodeId[] {
  return graph.nodeIds().filter((id) => stripModulePrefix(id).startsWith(typePrefix));
}

/**
 * A string attribute read from the snapshot first, then from live metadata.
 * Empty strings count as missing.
 */
export function originalString(
  snapshot: ReadableGraph,
  live: Readonly<AttributeMap>,
  node: NodeId,
  key: string
): string | null {
  const candidates: (AttributeValue | undefined)[] = [snapshot.getMetadata(node)[key], live[key]];
  for (const value of candidates) {
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return null;
}

/**
 * An attribute as it was before any transformation, falling back to live
 * metadata
 */
export function originalValue(
  snapshot: ReadableGraph,
  live: Readonly<AttributeMap>,
  node: NodeId,
  key: string
): AttributeValue | undefined {
  return snapshot.getMetadata(node)[key] ?? live[key];
}

/**
 * A nested block written either as a map or as a one-item list of maps
 */
export function firstBlock(value: AttributeValue | undefined): AttributeMap | null {
  const block = Array.isArray(value) ? value[0] : value;
  return isAttributeMap(block) ? block : null;
}

/**
 * Where a snapshot node lives now: itself, or the canonical node a
 * consolidation rule merged it into
 */
export function currentNodeOf(
  graph: ReadableGraph,
  consolidated: readonly ConsolidationRule[],
  original: NodeId
): NodeId | null {
  if (graph.hasNode(original)) {
    return original;
  }
  const stripped = stripModulePrefix(original);
  const rule = consolidated.find((candidate) => stripped.startsWith(candidate.prefix));
  return rule !== undefined && graph.hasNode(rule.canonical) ? rule.canonical : null;
}

/**
 * First node of a type that a reference text names, by identifier or by
 * the node's `name` attribute
 */
export function findReferencedNode(graph: ReadableGraph, reference: string, typePrefix: string): NodeId | null {
  for (const candidate of nodesOfType(graph, typePrefix)) {
    if (mentionsNode(reference, candidate) || reference === localIdOf(candidate)) {
      return candidate;
    }
    const name = graph.getMetadata(candidate)['name'];
    if (typeof name === 'string' && name !== '' && reference === name) {
      return candidate;
    }
  }
  return null;
}

/**
 * Identifier-safe form of a cloud location (`us-east-1a` → `us_east_1a`)
 */
export function locationToken(location: string): string {
  return location.trim().replace(/[^A-Za-z0-9_]/g, '_');
}

export interface TypedNodeOptions {
  /** Connections that stay on the original node */
  readonly keep?: (connection: NodeId) => boolean;
  /** Parents that should hold the typed node instead; all by default */
  readonly rewireParent?: (parent: NodeId) => boolean;
  /** Merged over the copied metadata when the typed node is created */
  readonly metadata?: AttributeMap;
}

/**
 * Hand a node's connections and parents over to a typed stand-in such as
 * `aws_alb.elb`. The original keeps what `keep` accepts plus an edge to
 * the stand-in.
 */
export function moveOntoTypedNode(
  graph: ResourceGraph,
  source: NodeId,
  typed: NodeId,
  options: TypedNodeOptions = {}
): void {
  if (typed === source) {
    return;
  }
  if (!graph.hasNode(typed)) {
    graph.addNode(typed, { ...cloneAttributeMap(graph.getMetadata(source)), ...options.metadata });
  }

  for (const connection of graph.getConnections(source)) {
    if (connection === typed || options.keep?.(connection)) {
      continue;
    }
    graph.addEdge(typed, connection);
    graph.removeEdge(source, connection);
  }

  for (const parent of graph.parentsOf(source)) {
    if (parent !== typed && (options.rewireParent?.(parent) ?? true)) {
      graph.replaceConnection(parent, source, [typed]);
    }
  }

  graph.addEdge(source, typed);
}
