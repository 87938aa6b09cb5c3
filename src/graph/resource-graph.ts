/**
 * Resource Graph
 * @module graph/resource-graph
 *
 * Mutable graph of node identifiers to ordered dependency lists, paired with
 * per-node metadata. Every node created through this class gets a metadata
 * entry, and every edge list stays free of duplicates.
 */

import type { AttributeMap, GraphDict, MetadataDict, NodeId } from '../types/graph';
import { cloneAttributeMap } from '../utils/attributes';

// ============================================================================
// Types
// ============================================================================

/**
 * Read access shared by the live graph and the snapshot
 */
export interface ReadableGraph {
  hasNode(id: NodeId): boolean;
  nodeIds(): NodeId[];
  getConnections(id: NodeId): readonly NodeId[];
  getMetadata(id: NodeId): Readonly<AttributeMap>;
  parentsOf(id: NodeId): NodeId[];
  readonly size: number;
}

/**
 * Result of an invariant check
 */
export interface GraphValidationResult {
  readonly isValid: boolean;
  /** Nodes without a metadata entry */
  readonly missingMetadata: readonly NodeId[];
  /** Metadata entries without a node */
  readonly orphanMetadata: readonly NodeId[];
  /** Edge targets that are not nodes */
  readonly danglingTargets: readonly NodeId[];
  /** Nodes whose edge list holds duplicates */
  readonly duplicateEdges: readonly NodeId[];
}

function dedupe(ids: Iterable<NodeId>): NodeId[] {
  return [...new Set(ids)];
}

// ============================================================================
// Resource Graph
// ============================================================================

export class ResourceGraph implements ReadableGraph {
  private readonly edges = new Map<NodeId, NodeId[]>();
  private readonly metadata = new Map<NodeId, AttributeMap>();

  /**
   * Build from serialized adjacency and metadata. Edge targets that are
   * not keys become nodes with empty metadata.
   */
  static fromDicts(graphdict: GraphDict, metaData: MetadataDict = {}): ResourceGraph {
    const graph = new ResourceGraph();
    for (const [id, connections] of Object.entries(graphdict)) {
      graph.addNode(id, metaData[id] ? cloneAttributeMap(metaData[id]) : {});
      graph.setConnections(id, connections);
    }
    for (const [id, attributes] of Object.entries(metaData)) {
      if (!graph.hasNode(id)) {
        graph.addNode(id, cloneAttributeMap(attributes));
      }
    }
    graph.ensureEdgeTargets();
    return graph;
  }

  // --------------------------------------------------------------------------
  // Nodes
  // --------------------------------------------------------------------------

  get size(): number {
    return this.edges.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const connections of this.edges.values()) {
      count += connections.length;
    }
    return count;
  }

  hasNode(id: NodeId): boolean {
    return this.edges.has(id);
  }

  /**
   * Node identifiers in insertion order (a copy, safe to mutate the graph while iterating)
   */
  nodeIds(): NodeId[] {
    return [...this.edges.keys()];
  }

  /**
   * Create a node with its metadata entry. Existing nodes are left untouched.
   * Returns true when the node was created.
   */
  addNode(id: NodeId, metadata: AttributeMap = {}): boolean {
    if (this.edges.has(id)) {
      return false;
    }
    this.edges.set(id, []);
    this.metadata.set(id, metadata);
    return true;
  }

  /**
   * Delete a node and its metadata. With `detach`, also strip it from
   * every other node's edge list.
   */
  removeNode(id: NodeId, detach = true): boolean {
    if (!this.edges.has(id)) {
      return false;
    }
    this.edges.delete(id);
    this.metadata.delete(id);
    if (detach) {
      for (const parent of this.parentsOf(id)) {
        this.removeEdge(parent, id);
      }
    }
    return true;
  }

  /**
   * Rename a node in place: its edges, its metadata, and every reference to
   * it in other edge lists keep their positions. Renaming onto an existing
   * node merges the two edge lists without self edges.
   */
  renameNode(from: NodeId, to: NodeId): void {
    if (from === to || !this.edges.has(from)) {
      return;
    }
    const connections = this.getConnections(from);
    const metadata = this.getMetadata(from);

    if (this.edges.has(to)) {
      const merged = [...this.getConnections(to), ...connections].filter((id) => id !== to && id !== from);
      this.setConnections(to, merged);
      this.edges.delete(from);
      this.metadata.delete(from);
    } else {
      const entries = [...this.edges.entries()];
      this.edges.clear();
      for (const [id, list] of entries) {
        this.edges.set(id === from ? to : id, list);
      }
      this.metadata.delete(from);
      this.metadata.set(to, metadata);
    }

    for (const parent of this.parentsOf(from)) {
      if (parent === to) {
        this.removeEdge(parent, from);
      } else {
        this.replaceConnection(parent, from, [to]);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Edges
  // --------------------------------------------------------------------------

  getConnections(id: NodeId): readonly NodeId[] {
    return [...(this.edges.get(id) ?? [])];
  }

  /**
   * Replace a node's edge list, de-duplicated. Creates the node when absent.
   */
  setConnections(id: NodeId, connections: Iterable<NodeId>): void {
    this.addNode(id);
    this.edges.set(id, dedupe(connections));
  }

  hasEdge(from: NodeId, to: NodeId): boolean {
    return this.edges.get(from)?.includes(to) ?? false;
  }

  /**
   * Append `to` to `from`'s edge list. Creates `from` when absent.
   * Returns true when the edge is new.
   */
  addEdge(from: NodeId, to: NodeId): boolean {
    this.addNode(from);
    const list = this.edges.get(from) ?? [];
    if (list.includes(to)) {
      return false;
    }
    list.push(to);
    this.edges.set(from, list);
    return true;
  }

  removeEdge(from: NodeId, to: NodeId): boolean {
    const list = this.edges.get(from);
    if (!list) {
      return false;
    }
    const index = list.indexOf(to);
    if (index === -1) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  /**
   * Swap `target` in `from`'s edge list for `replacements`, at the same position
   */
  replaceConnection(from: NodeId, target: NodeId, replacements: readonly NodeId[]): void {
    const list = this.edges.get(from);
    if (!list) {
      return;
    }
    const index = list.indexOf(target);
    if (index === -1) {
      return;
    }
    const next = [...list.slice(0, index), ...replacements, ...list.slice(index + 1)];
    this.edges.set(from, dedupe(next));
  }

  /**
   * Nodes whose edge list contains `id`, in insertion order
   */
  parentsOf(id: NodeId): NodeId[] {
    const parents: NodeId[] = [];
    for (const [node, connections] of this.edges) {
      if (connections.includes(id)) {
        parents.push(node);
      }
    }
    return parents;
  }

  // --------------------------------------------------------------------------
  // Metadata
  // --------------------------------------------------------------------------

  /**
   * Live metadata of a node. Missing entries read as an empty map.
   */
  getMetadata(id: NodeId): AttributeMap {
    return this.metadata.get(id) ?? {};
  }

  setMetadata(id: NodeId, metadata: AttributeMap): void {
    this.addNode(id, metadata);
    this.metadata.set(id, metadata);
  }

  /**
   * Merge keys into a node's metadata
   */
  updateMetadata(id: NodeId, values: AttributeMap): void {
    this.setMetadata(id, { ...this.getMetadata(id), ...values });
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /**
   * Nodes whose identifier contains `pattern`, in insertion order
   */
  findNodes(pattern: string): NodeId[] {
    return this.nodeIds().filter((id) => id.includes(pattern));
  }

  // --------------------------------------------------------------------------
  // Invariants
  // --------------------------------------------------------------------------

  /**
   * Give every edge target that is not a node its own empty node.
   * Returns the identifiers that were added.
   */
  ensureEdgeTargets(): NodeId[] {
    const added: NodeId[] = [];
    for (const connections of [...this.edges.values()]) {
      for (const target of connections) {
        if (!this.edges.has(target)) {
          this.addNode(target);
          added.push(target);
        }
      }
    }
    return added;
  }

  validate(): GraphValidationResult {
    const missingMetadata = this.nodeIds().filter((id) => !this.metadata.has(id));
    const orphanMetadata = [...this.metadata.keys()].filter((id) => !this.edges.has(id));
    const danglingTargets = dedupe(
      [...this.edges.values()].flat().filter((target) => !this.edges.has(target))
    );
    const duplicateEdges = [...this.edges.entries()]
      .filter(([, list]) => new Set(list).size !== list.length)
      .map(([id]) => id);

    return {
      isValid:
        missingMetadata.length === 0 &&
        orphanMetadata.length === 0 &&
        duplicateEdges.length === 0,
      missingMetadata,
      orphanMetadata,
      danglingTargets,
      duplicateEdges,
    };
  }

  // --------------------------------------------------------------------------
  // Copies
  // --------------------------------------------------------------------------

  /**
   * Exact copy, dangling edge targets included
   */
  clone(): ResourceGraph {
    const copy = new ResourceGraph();
    copy.restore(this);
    return copy;
  }

  /**
   * Replace this graph's contents with another graph's
   */
  restore(from: ResourceGraph): void {
    this.edges.clear();
    this.metadata.clear();
    for (const id of from.nodeIds()) {
      this.edges.set(id, [...from.getConnections(id)]);
      this.metadata.set(id, cloneAttributeMap(from.getMetadata(id)));
    }
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
    for (const id of this.edges.keys()) {
      result[id] = cloneAttributeMap(this.getMetadata(id));
    }
    return result;
  }
}

/**
 * Create an empty graph, or one seeded from serialized dictionaries
 */
export function createResourceGraph(graphdict: GraphDict = {}, metaData: MetadataDict = {}): ResourceGraph {
  return ResourceGraph.fromDicts(graphdict, metaData);
}
