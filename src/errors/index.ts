/**
 * Error Handling Module
 * @module errors
 *
 * Error classes, codes and the warning collector used by every pipeline stage.
 *
 * @example
 * ```typescript
 * import { ParseInputError, WarningCollector } from './errors';
 *
 * const warnings = new WarningCollector();
 * warnings.addError(new HandlerStepError('aws_subnet', 'custom function', err), 'handlers');
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  InputErrorCodes,
  ResolutionErrorCodes,
  TransformationErrorCodes,
  ProviderErrorCodes,
  ConfigErrorCodes,
  GeneralErrorCodes,
  ErrorCodes,
  getSeverityForCode,
  isWarningCode,
} from './codes';
export type {
  ErrorCode,
  ErrorSeverity,
  InputErrorCode,
  ResolutionErrorCode,
  TransformationErrorCode,
  ProviderErrorCode,
  ConfigErrorCode,
  GeneralErrorCode,
} from './codes';

// ============================================================================
// Base Error Classes
// ============================================================================

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
} from './base';
export type { ErrorContext, SerializedError } from './base';

// ============================================================================
// Domain Errors
// ============================================================================

export {
  ParseInputError,
  UnresolvedReferenceError,
  ResolutionDidNotConvergeError,
  ConsolidationAmbiguityError,
  HandlerStepError,
  MissingAnchorError,
  TransformationParameterError,
  UnknownHandlerFunctionError,
  ProviderConfigError,
  ProviderNotFoundError,
  DuplicateProviderError,
  ConfigValidationError,
  ConfigurationError,
} from './domain';
export type { ValidationIssue } from './domain';

// ============================================================================
// Warnings
// ============================================================================

export { WarningCollector } from './warnings';
export type { PipelineWarning, PipelineStage } from './warnings';
