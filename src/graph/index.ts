/**
 * Graph Module Exports
 * @module graph
 *
 * The mutable resource graph, its snapshot, the export document and the
 * provider-table driven stages.
 */

export {
  ResourceGraph,
  createResourceGraph,
  type ReadableGraph,
  type GraphValidationResult,
} from './resource-graph';
export { GraphSnapshot } from './snapshot';
export {
  GraphBuilder,
  createGraphBuilder,
  type GraphBuilderOptions,
  type GraphBuildResult,
} from './graph-builder';
export { toGraphDocument, fromGraphDocument, serializeGraphDocument } from './graph-document';
export {
  COUNT_KEYS,
  consolidateByRules,
  applyVariantRules,
  instanceCountOf,
  expandCountedResources,
  applyForcedDirections,
  finalizeGraph,
  type ConsolidationStageResult,
} from './post-processing';
