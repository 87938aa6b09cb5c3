/**
 * Graph Document Export
 * @module graph/graph-document
 *
 * The JSON contract shared with renderers: the enriched graph with its
 * metadata, and the snapshot it was derived from. Field names are stable.
 */

import type { ParsedGraphDocument } from '../parsers/terraform/types';
import type { GraphDocument } from '../types/graph';
import { ResourceGraph } from './resource-graph';
import { GraphSnapshot } from './snapshot';

/**
 * Build the export document for a graph and its snapshot
 */
export function toGraphDocument(graph: ResourceGraph, snapshot: GraphSnapshot): GraphDocument {
  return {
    graphdict: graph.toGraphDict(),
    meta_data: graph.toMetadataDict(),
    original_graphdict: snapshot.toGraphDict(),
    original_metadata: snapshot.toMetadataDict(),
  };
}

/**
 * Serialize a document as JSON
 */
export function serializeGraphDocument(document: GraphDocument, indent = 2): string {
  return JSON.stringify(document, null, indent);
}

/**
 * Rebuild the live graph and its snapshot from a validated document. A
 * document without `original_*` fields uses its own graph as the snapshot.
 */
export function fromGraphDocument(document: ParsedGraphDocument): {
  graph: ResourceGraph;
  snapshot: GraphSnapshot;
} {
  const graph = ResourceGraph.fromDicts(document.graphdict, document.meta_data);
  const hasOriginal = Object.keys(document.original_graphdict).length > 0;
  const snapshot = hasOriginal
    ? GraphSnapshot.fromDicts(document.original_graphdict, document.original_metadata)
    : GraphSnapshot.of(graph);
  return { graph, snapshot };
}
