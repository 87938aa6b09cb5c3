/**
 * Pattern Matching Helpers
 * @module transformers/patterns
 *
 * A node matches a pattern when its identifier contains the pattern.
 * Results follow graph insertion order.
 */

import type { ReadableGraph } from '../graph/resource-graph';
import type { NodeId } from '../types/graph';
import { localIdOf, resourceTypeOf } from '../utils/node-id';

export function matchesPattern(id: NodeId, pattern: string): boolean {
  return id.includes(pattern);
}

export function findMatching(graph: ReadableGraph, pattern: string): NodeId[] {
  return graph.nodeIds().filter((id) => matchesPattern(id, pattern));
}

/**
 * True when any node identifier contains the pattern
 */
export function anyMatching(graph: ReadableGraph, pattern: string): boolean {
  return graph.nodeIds().some((id) => matchesPattern(id, pattern));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `text` names the node as a whole token, by full or
 * module-stripped identifier
 */
export function mentionsNode(text: string, id: NodeId): boolean {
  if (text === id) {
    return true;
  }
  for (const key of new Set([id, localIdOf(id)])) {
    if (!text.includes(key)) {
      continue;
    }
    if (new RegExp(`(?<![\\w.-])${escapeRegExp(key)}(?![\\w~-])`).test(text)) {
      return true;
    }
  }
  return false;
}

/**
 * True when the node's resource type is one of the given container types
 */
export function isGroupNode(id: NodeId, groupNodeTypes: readonly string[]): boolean {
  return groupNodeTypes.includes(resourceTypeOf(id));
}

/**
 * Insertion-ordered set of nodes a primitive touched
 */
export class AffectedNodes {
  private readonly ids = new Set<NodeId>();

  add(...ids: NodeId[]): void {
    ids.forEach((id) => this.ids.add(id));
  }

  list(): NodeId[] {
    return [...this.ids];
  }
}
