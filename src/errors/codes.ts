/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the graph enrichment engine.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Raw input validation codes
 */
export const InputErrorCodes = {
  PARSE_INPUT_ERROR: 'PARSE_INPUT_ERROR',
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',
} as const;

export type InputErrorCode = typeof InputErrorCodes[keyof typeof InputErrorCodes];

/**
 * Reference resolution codes
 */
export const ResolutionErrorCodes = {
  UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
  RESOLUTION_DID_NOT_CONVERGE: 'RESOLUTION_DID_NOT_CONVERGE',
  VALUE_TOO_LARGE: 'VALUE_TOO_LARGE',
} as const;

export type ResolutionErrorCode = typeof ResolutionErrorCodes[keyof typeof ResolutionErrorCodes];

/**
 * Graph transformation codes
 */
export const TransformationErrorCodes = {
  CONSOLIDATION_AMBIGUITY: 'CONSOLIDATION_AMBIGUITY',
  HANDLER_STEP_ERROR: 'HANDLER_STEP_ERROR',
  MISSING_ANCHOR: 'MISSING_ANCHOR',
  INVALID_PARAMETERS: 'INVALID_PARAMETERS',
  DANGLING_EDGE: 'DANGLING_EDGE',
  ANNOTATION_NODE_MISSING: 'ANNOTATION_NODE_MISSING',
} as const;

export type TransformationErrorCode =
  typeof TransformationErrorCodes[keyof typeof TransformationErrorCodes];

/**
 * Provider configuration codes
 */
export const ProviderErrorCodes = {
  UNKNOWN_HANDLER_FUNCTION: 'UNKNOWN_HANDLER_FUNCTION',
  INVALID_PROVIDER_CONFIG: 'INVALID_PROVIDER_CONFIG',
  PROVIDER_NOT_FOUND: 'PROVIDER_NOT_FOUND',
  DUPLICATE_PROVIDER: 'DUPLICATE_PROVIDER',
} as const;

export type ProviderErrorCode = typeof ProviderErrorCodes[keyof typeof ProviderErrorCodes];

/**
 * Engine configuration codes
 */
export const ConfigErrorCodes = {
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  CONFIG_FILE_ERROR: 'CONFIG_FILE_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...InputErrorCodes,
  ...ResolutionErrorCodes,
  ...TransformationErrorCodes,
  ...ProviderErrorCodes,
  ...ConfigErrorCodes,
  ...GeneralErrorCodes,
} as const;

export type ErrorCode =
  | InputErrorCode
  | ResolutionErrorCode
  | TransformationErrorCode
  | ProviderErrorCode
  | ConfigErrorCode
  | GeneralErrorCode;

// ============================================================================
// Severity Mapping
// ============================================================================

/**
 * Fatal errors abort a run; warnings are collected; info is logged only.
 */
export type ErrorSeverity = 'fatal' | 'warning' | 'info';

const errorCodeToSeverity: Record<ErrorCode, ErrorSeverity> = {
  PARSE_INPUT_ERROR: 'fatal',
  INVALID_DOCUMENT: 'fatal',

  UNRESOLVED_REFERENCE: 'warning',
  RESOLUTION_DID_NOT_CONVERGE: 'warning',
  VALUE_TOO_LARGE: 'warning',

  CONSOLIDATION_AMBIGUITY: 'warning',
  HANDLER_STEP_ERROR: 'warning',
  MISSING_ANCHOR: 'info',
  INVALID_PARAMETERS: 'fatal',
  DANGLING_EDGE: 'info',
  ANNOTATION_NODE_MISSING: 'warning',

  UNKNOWN_HANDLER_FUNCTION: 'fatal',
  INVALID_PROVIDER_CONFIG: 'fatal',
  PROVIDER_NOT_FOUND: 'fatal',
  DUPLICATE_PROVIDER: 'fatal',

  CONFIG_VALIDATION_ERROR: 'fatal',
  CONFIG_FILE_ERROR: 'fatal',

  INTERNAL_ERROR: 'fatal',
};

export function getSeverityForCode(code: ErrorCode): ErrorSeverity {
  return errorCodeToSeverity[code];
}

/**
 * Check if an error code only ever produces a collected warning
 */
export function isWarningCode(code: ErrorCode): boolean {
  return getSeverityForCode(code) !== 'fatal';
}
