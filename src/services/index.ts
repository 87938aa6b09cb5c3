/**
 * Services Module Exports
 * @module services
 */

export {
  HandlerPipeline,
  createHandlerPipeline,
  type HandlerPipelineInput,
  type HandlerPipelineResult,
  type HandlerOutcome,
} from './handler-pipeline';

export {
  GraphEnrichmentService,
  createEnrichmentService,
  mergeDataReplacements,
  type EnrichmentResult,
  type EnrichmentServiceOptions,
  type EnrichOptions,
  type StageStats,
} from './enrichment-service';

export {
  AnnotationsSchema,
  annotateGraph,
  applyAutoAnnotations,
  applyUserAnnotations,
  parseAnnotations,
  type AnnotationResult,
  type Annotations,
  type AnnotationsInput,
} from './annotations';
