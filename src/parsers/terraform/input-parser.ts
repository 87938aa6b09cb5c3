/**
 * Raw Input Parser
 * @module parsers/terraform/input-parser
 *
 * Validates raw infrastructure input and exported graph documents. Any
 * structural problem is fatal and raised as a ParseInputError before the
 * pipeline starts.
 */

import { parse as parseYaml } from 'yaml';

import { ParseInputError } from '../../errors';
import {
  GraphDocumentSchema,
  type ParsedGraphDocument,
  type RawInfrastructure,
  RawInfrastructureSchema,
} from './types';

/**
 * Validate a raw infrastructure object
 */
export function parseInfrastructureInput(raw: unknown): RawInfrastructure {
  const result = RawInfrastructureSchema.safeParse(raw);
  if (!result.success) {
    throw ParseInputError.fromValidation('infrastructure input', result.error);
  }
  return result.data;
}

/**
 * Validate an exported graph document
 */
export function parseGraphDocument(raw: unknown): ParsedGraphDocument {
  const result = GraphDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw ParseInputError.fromValidation('graph document', result.error);
  }
  return result.data;
}

/**
 * Parse JSON or YAML text into a plain value
 */
export function parseStructuredText(text: string, label = 'input'): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    throw new ParseInputError(
      `Could not parse ${label}: ${error instanceof Error ? error.message : String(error)}`,
      [],
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Check whether a raw value looks like an exported graph document
 */
export function isGraphDocument(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'graphdict' in raw;
}
