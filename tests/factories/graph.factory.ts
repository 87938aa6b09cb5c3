/**
 * Graph Test Factories
 * @module tests/factories/graph
 *
 * Builders for resource graphs, snapshots and transformation contexts.
 */

import { ResourceGraph } from '@/graph/resource-graph';
import { GraphSnapshot } from '@/graph/snapshot';
import type { NameGenerator, TransformationContext } from '@/transformers/types';
import type { AttributeMap, GraphDict, MetadataDict } from '@/types/graph';

// ============================================================================
// Graph Factories
// ============================================================================

/**
 * Build a graph from adjacency plus optional metadata
 */
export function createGraph(graphdict: GraphDict, metaData: MetadataDict = {}): ResourceGraph {
  return ResourceGraph.fromDicts(graphdict, metaData);
}

/**
 * Build a graph of unconnected nodes with the given metadata
 */
export function createGraphWithNodes(nodes: Record<string, AttributeMap>): ResourceGraph {
  const graph = new ResourceGraph();
  for (const [id, metadata] of Object.entries(nodes)) {
    graph.addNode(id, metadata);
  }
  return graph;
}

/**
 * Sorted edge list `a->b`, for order-insensitive comparisons
 */
export function edgeList(graph: ResourceGraph): string[] {
  return graph
    .nodeIds()
    .flatMap((id) => graph.getConnections(id).map((target) => `${id}->${target}`))
    .sort();
}

// ============================================================================
// Context Factories
// ============================================================================

export interface ContextOptions {
  readonly snapshot?: GraphSnapshot;
  readonly nameGenerators?: Record<string, NameGenerator>;
  readonly groupNodeTypes?: readonly string[];
}

/**
 * Transformation context over a graph's current state
 */
export function createContext(graph: ResourceGraph, options: ContextOptions = {}): TransformationContext {
  const generators = options.nameGenerators ?? {};
  return {
    snapshot: options.snapshot ?? GraphSnapshot.of(graph),
    groupNodeTypes: options.groupNodeTypes ?? [],
    resolveNameGenerator(name: string): NameGenerator {
      const generator = generators[name];
      if (!generator) {
        throw new Error(`No name generator '${name}'`);
      }
      return generator;
    },
  };
}
