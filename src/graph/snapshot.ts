/**
 * Graph Snapshot
 * @module graph/snapshot
 *
 * Immutable copy of the graph taken once after construction. Handlers read
 * pre-transformation values from it after later stages have overwritten them.
 */

import type { AttributeMap, GraphDict, MetadataDict, NodeId } from '../types/graph';
import { cloneAttributeMap, deepFreeze } from '../utils/attributes';
import type { ReadableGraph, ResourceGraph } from './resource-graph';

const EMPTY_METADATA: Readonly<AttributeMap> = Object.freeze({});

export class GraphSnapshot implements ReadableGraph {
  private readonly edges: ReadonlyMap<NodeId, readonly NodeId[]>;
  private readonly metadata: ReadonlyMap<NodeId, Readonly<AttributeMap>>;

  private constructor(graphdict: GraphDict, metaData: MetadataDict) {
    const edges = new Map<NodeId, readonly NodeId[]>();
    const metadata = new Map<NodeId, Readonly<AttributeMap>>();
    for (const [id, connections] of Object.entries(graphdict)) {
      edges.set(id, Object.freeze([...connections]));
    }
    for (const [id, attributes] of Object.entries(metaData)) {
      metadata.set(id, deepFreeze(cloneAttributeMap(attributes)));
    }
    this.edges = edges;
    this.metadata = metadata;
  }

  static of(graph: ResourceGraph): GraphSnapshot {
    return new GraphSnapshot(graph.toGraphDict(), graph.toMetadataDict());
  }

  static fromDicts(graphdict: GraphDict, metaData: MetadataDict): GraphSnapshot {
    return new GraphSnapshot(graphdict, metaData);
  }

  get size(): number {
    return this.edges.size;
  }

  hasNode(id: NodeId): boolean {
    return this.edges.has(id);
  }

  nodeIds(): NodeId[] {
    return [...this.edges.keys()];
  }

  getConnections(id: NodeId): readonly NodeId[] {
    return this.edges.get(id) ?? [];
  }

  getMetadata(id: NodeId): Readonly<AttributeMap> {
    return this.metadata.get(id) ?? EMPTY_METADATA;
  }

  parentsOf(id: NodeId): NodeId[] {
    const parents: NodeId[] = [];
    for (const [node, connections] of this.edges) {
      if (connections.includes(id)) {
        parents.push(node);
      }
    }
    return parents;
  }

  toGraphDict(): GraphDict {
    const result: GraphDict = {};
    for (const [id, connections] of this.edges) {
      result[id] = [...connections];
    }
    return result;
  }

  toMetadataDict(): MetadataDict {
    const result: MetadataDict = {};
    for (const [id, attributes] of this.metadata) {
      result[id] = cloneAttributeMap(attributes);
    }
    return result;
  }
}
