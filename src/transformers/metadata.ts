/**
 * Metadata Primitives
 * @module transformers/metadata
 *
 * Copying attribute values between nodes, and switching a node's effective
 * type from one of its attribute values.
 */

import type { ResourceGraph } from '../graph/resource-graph';
import type { AttributeMap, AttributeValue, NodeId } from '../types/graph';
import { attributeToSearchText, cloneAttributeValue } from '../utils/attributes';
import { replaceResourceType, resourceTypeOf } from '../utils/node-id';
import { AffectedNodes, findMatching, matchesPattern } from './patterns';
import type {
  ApplyVariantsParams,
  PropagateMetadataParams,
  TransformationResult,
} from './types';

// ============================================================================
// Propagation
// ============================================================================

function isPresent(value: AttributeValue | undefined): value is AttributeValue {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Value of `key` on a node, or on the first of its connections that has it
 */
function lookupValue(
  graph: ResourceGraph,
  node: NodeId,
  key: string,
  fromConnections: boolean
): AttributeValue | undefined {
  const own = graph.getMetadata(node)[key];
  if (isPresent(own) || !fromConnections) {
    return own;
  }
  for (const connection of graph.getConnections(node)) {
    const value = graph.getMetadata(connection)[key];
    if (isPresent(value)) {
      return value;
    }
  }
  return own;
}

/**
 * Copy `keys` from one node into another. With `fillOnly`, keys the
 * destination already has are kept.
 */
function copyKeys(
  graph: ResourceGraph,
  from: NodeId,
  to: NodeId,
  keys: readonly string[],
  options: { fromConnections: boolean; fillOnly: boolean }
): boolean {
  const destination: AttributeMap = { ...graph.getMetadata(to) };
  let changed = false;

  for (const key of keys) {
    if (options.fillOnly && isPresent(destination[key])) {
      continue;
    }
    const value = lookupValue(graph, from, key, options.fromConnections);
    if (value === undefined) {
      continue;
    }
    destination[key] = cloneAttributeValue(value);
    changed = true;
  }

  if (changed) {
    graph.setMetadata(to, destination);
  }
  return changed;
}

function targetsFor(graph: ResourceGraph, source: NodeId, params: PropagateMetadataParams): NodeId[] {
  const candidates = params.toChildren ? [...graph.getConnections(source)] : findMatching(graph, params.target);
  return candidates.filter((id) => id !== source && matchesPattern(id, params.target));
}

/**
 * Copy metadata between each source match and its targets. Targets are the
 * nodes matching `target`, or with `toChildren` the source's children that
 * match it. `forward` writes source values into targets, `reverse` writes
 * target values into the source, and `bidirectional` fills the keys each
 * side lacks from the other. Without `keys`, every key of the side being
 * read is copied.
 */
export function propagateMetadata(graph: ResourceGraph, params: PropagateMetadataParams): TransformationResult {
  const affected = new AffectedNodes();
  const fromConnections = params.copyFromConnections;

  for (const source of findMatching(graph, params.source)) {
    for (const target of targetsFor(graph, source, params)) {
      if (!graph.hasNode(target)) {
        graph.addNode(target);
      }
      const sourceKeys = params.keys ?? Object.keys(graph.getMetadata(source));
      const targetKeys = params.keys ?? Object.keys(graph.getMetadata(target));

      if (params.direction === 'forward') {
        if (copyKeys(graph, source, target, sourceKeys, { fromConnections, fillOnly: false })) {
          affected.add(target);
        }
      } else if (params.direction === 'reverse') {
        if (copyKeys(graph, target, source, targetKeys, { fromConnections, fillOnly: false })) {
          affected.add(source);
        }
      } else {
        if (copyKeys(graph, source, target, sourceKeys, { fromConnections, fillOnly: true })) {
          affected.add(target);
        }
        if (copyKeys(graph, target, source, targetKeys, { fromConnections, fillOnly: true })) {
          affected.add(source);
        }
      }
    }
  }

  return { operation: 'propagate_metadata', affected: affected.list() };
}

// ============================================================================
// Variants
// ============================================================================

/**
 * Replacement type for a node, from the first variant keyword found in the
 * inspected metadata text (case-insensitive), or null
 */
export function selectVariant(
  metadata: Readonly<AttributeMap>,
  variants: Readonly<Record<string, string>>,
  metadataKey?: string
): string | null {
  const inspected = metadataKey === undefined ? metadata : metadata[metadataKey];
  const text = attributeToSearchText(inspected).toLowerCase();
  if (text === '') {
    return null;
  }
  for (const [keyword, replacement] of Object.entries(variants)) {
    if (text.includes(keyword.toLowerCase())) {
      return replacement;
    }
  }
  return null;
}

/**
 * Rename matching nodes to a variant type. The module prefix, name and
 * `~N` suffix are kept, and every edge to the node follows the rename.
 */
export function applyVariants(graph: ResourceGraph, params: ApplyVariantsParams): TransformationResult {
  const affected = new AffectedNodes();

  for (const node of findMatching(graph, params.pattern)) {
    const variant = selectVariant(graph.getMetadata(node), params.variants, params.metadataKey);
    if (variant === null || resourceTypeOf(node) === variant) {
      continue;
    }
    const renamed = replaceResourceType(node, variant);
    graph.renameNode(node, renamed);
    affected.add(renamed);
  }

  return { operation: 'apply_variants', affected: affected.list() };
}
