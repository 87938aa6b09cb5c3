/**
 * IaC Graph Enrichment Engine
 * @module iac-graph-enrichment
 *
 * Reference resolution, relationship inference and provider-driven graph
 * transformation for infrastructure-as-code dependency diagrams.
 *
 * @example
 * ```typescript
 * import { createEnrichmentService } from 'iac-graph-enrichment';
 *
 * const service = createEnrichmentService({ config: { resolver: { strict: false } } });
 * const result = service.enrich({
 *   nodes: [{ id: 'aws_vpc.main', attributes: { cidr_block: '10.0.0.0/16' } }],
 * });
 * console.log(result.toJSON());
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type {
  AttributeValue,
  AttributeMap,
  NodeId,
  NodeIdParts,
  GraphDict,
  MetadataDict,
  GraphDocument,
} from './types/graph';
export { ROOT_MODULE, isAttributeMap, isAttributeList } from './types/graph';
export * from './utils';

// ============================================================================
// Configuration, Logging and Errors
// ============================================================================

export * from './config';
export * from './logging';
export * from './errors';

// ============================================================================
// Graph
// ============================================================================

export * from './graph';

// ============================================================================
// Input
// ============================================================================

export {
  parseInfrastructureInput,
  parseGraphDocument,
  parseStructuredText,
  isGraphDocument,
} from './parsers/terraform/input-parser';
export { callTerraformFunction, isTerraformFunction } from './parsers/terraform/functions';
export type { TerraformFunction } from './parsers/terraform/functions';
export {
  AttributeValueSchema,
  AttributeMapSchema,
  RawInfrastructureSchema,
  GraphDocumentSchema,
} from './parsers/terraform/types';
export type {
  RawInfrastructure,
  RawInfrastructureInput,
  RawNode,
  VariableDeclaration,
  LocalDeclaration,
  ModuleCall,
  OutputDeclaration,
  ParsedGraphDocument,
} from './parsers/terraform/types';

// ============================================================================
// Resolver and Inferencer
// ============================================================================

export * from './detectors';

// ============================================================================
// Transformations and Providers
// ============================================================================

export * from './transformers';
export * from './providers';

// ============================================================================
// Services
// ============================================================================

export * from './services';
