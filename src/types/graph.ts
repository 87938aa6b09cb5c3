/**
 * Graph Type Definitions
 * @module types/graph
 *
 * Core data model for the enrichment engine: attribute values, node
 * identifiers and the serialized graph document shared with renderers.
 */

// ============================================================================
// Attribute Values
// ============================================================================

/**
 * A metadata value as produced by the source parser: scalars, lists and
 * nested maps.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

/**
 * Attribute map attached to a single node
 */
export type AttributeMap = { [key: string]: AttributeValue };

// ============================================================================
// Node Identifiers
// ============================================================================

/**
 * Node identifier: `[module.<name>.]*<type>.<name>[~N]`
 */
export type NodeId = string;

/**
 * Decomposed node identifier
 */
export interface NodeIdParts {
  /** Module names from outermost to innermost */
  readonly modules: readonly string[];
  /** Resource type, e.g. `aws_instance` */
  readonly resourceType: string;
  /** Local name after the type */
  readonly name: string;
  /** Instance number when the id carries a `~N` suffix */
  readonly instance: number | null;
}

/**
 * Module path of the root module
 */
export const ROOT_MODULE = 'main';

// ============================================================================
// Graph Document
// ============================================================================

/**
 * Adjacency in serialized form
 */
export type GraphDict = Record<NodeId, NodeId[]>;

/**
 * Metadata in serialized form
 */
export type MetadataDict = Record<NodeId, AttributeMap>;

/**
 * JSON export contract consumed by renderers and by later runs.
 * Field names are stable.
 */
export interface GraphDocument {
  readonly graphdict: GraphDict;
  readonly meta_data: MetadataDict;
  readonly original_graphdict: GraphDict;
  readonly original_metadata: MetadataDict;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check whether a value is an attribute map (plain object, not a list)
 */
export function isAttributeMap(value: AttributeValue | undefined): value is AttributeMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check whether a value is a list
 */
export function isAttributeList(value: AttributeValue | undefined): value is AttributeValue[] {
  return Array.isArray(value);
}
