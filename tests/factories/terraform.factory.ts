/**
 * Terraform Test Factories
 * @module tests/factories/terraform
 *
 * Raw infrastructure inputs and resolver inputs for tests.
 */

import type { ReferenceResolverInput } from '@/detectors/reference-resolver';
import { createGraphBuilder } from '@/graph/graph-builder';
import { parseInfrastructureInput } from '@/parsers/terraform/input-parser';
import type { RawInfrastructure, RawInfrastructureInput } from '@/parsers/terraform/types';
import type { AttributeMap, AttributeValue } from '@/types/graph';

// ============================================================================
// Raw Input Factories
// ============================================================================

/**
 * One raw node
 */
export function createRawNode(id: string, attributes: AttributeMap = {}): { id: string; attributes: AttributeMap } {
  return { id, attributes };
}

/**
 * Raw input with defaults for every optional section
 */
export function createRawInput(overrides: Partial<RawInfrastructureInput> = {}): RawInfrastructureInput {
  return {
    nodes: [],
    ...overrides,
  };
}

// ============================================================================
// Resolver Input Factories
// ============================================================================

/**
 * Validated input plus its built graph, ready for the resolver
 */
export function createResolverInput(
  overrides: Partial<RawInfrastructureInput> = {},
  dataReplacements: Record<string, AttributeValue> = {}
): ReferenceResolverInput & { raw: RawInfrastructure } {
  const raw = parseInfrastructureInput(createRawInput(overrides));
  const { graph } = createGraphBuilder().build(raw);
  return {
    raw,
    graph,
    variables: raw.variables,
    variableValues: raw.variableValues,
    locals: raw.locals,
    modules: raw.modules,
    outputs: raw.outputs,
    dataReplacements,
  };
}
