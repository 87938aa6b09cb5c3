/**
 * Detectors Module Exports
 * @module detectors
 *
 * Reference resolution and relationship inference over the resource graph.
 */

export {
  ReferenceResolver,
  createReferenceResolver,
  DEFAULT_REFERENCE_RESOLVER_OPTIONS,
  type ReferenceResolverInput,
  type ReferenceResolverOptions,
  type ResolutionResult,
  type ResolutionStats,
} from './reference-resolver';

export {
  RelationshipInferencer,
  createRelationshipInferencer,
  mergeInferenceRules,
  EMPTY_INFERENCE_RULES,
  DEFAULT_RELATIONSHIP_INFERENCE_OPTIONS,
  type InferenceRules,
  type RelationshipInferenceInput,
  type RelationshipInferenceOptions,
  type RelationshipInferenceResult,
} from './relationship-inferencer';
