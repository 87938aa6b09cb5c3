/**
 * Graph Builder
 * @module graph/graph-builder
 *
 * Builds the initial resource graph from validated raw input: one node per
 * resource instance in input order, then the plan graph's edges. Every edge
 * endpoint ends up with a metadata entry.
 */

import type { RawInfrastructure } from '../parsers/terraform/types';
import { cloneAttributeMap } from '../utils/attributes';
import { ResourceGraph } from './resource-graph';

/**
 * Graph builder options
 */
export interface GraphBuilderOptions {
  /** Create nodes for edge targets that are not declared as nodes */
  readonly createMissingTargets: boolean;
}

const DEFAULT_BUILDER_OPTIONS: GraphBuilderOptions = {
  createMissingTargets: true,
};

export interface GraphBuildResult {
  readonly graph: ResourceGraph;
  /** Edge endpoints that had no node of their own */
  readonly addedTargets: readonly string[];
}

export class GraphBuilder {
  private readonly options: GraphBuilderOptions;

  constructor(options: Partial<GraphBuilderOptions> = {}) {
    this.options = { ...DEFAULT_BUILDER_OPTIONS, ...options };
  }

  build(input: Pick<RawInfrastructure, 'nodes' | 'edges'>): GraphBuildResult {
    const graph = new ResourceGraph();

    for (const node of input.nodes) {
      graph.addNode(node.id, cloneAttributeMap(node.attributes));
    }

    for (const [source, targets] of Object.entries(input.edges)) {
      graph.setConnections(source, [
        ...graph.getConnections(source),
        ...targets.filter((target) => target !== source),
      ]);
    }

    const addedTargets = this.options.createMissingTargets ? graph.ensureEdgeTargets() : [];
    return { graph, addedTargets };
  }
}

export function createGraphBuilder(options: Partial<GraphBuilderOptions> = {}): GraphBuilder {
  return new GraphBuilder(options);
}
