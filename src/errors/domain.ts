/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by the resolver, the transformation primitives, the handler
 * pipeline and the provider registry. Most of them are caught at a stage
 * boundary and turned into collected warnings.
 */

import { BaseError, type ErrorContext } from './base';
import {
  ConfigErrorCodes,
  InputErrorCodes,
  ProviderErrorCodes,
  ResolutionErrorCodes,
  TransformationErrorCodes,
} from './codes';

/**
 * A single validation problem at a path in a structured document
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Minimal shape of a zod error, kept structural so this module
 * does not depend on the validation library.
 */
interface IssueSource {
  readonly issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>;
}

function toValidationIssues(source: IssueSource): ValidationIssue[] {
  return source.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
}

// ============================================================================
// Input Errors
// ============================================================================

/**
 * Raw input is structurally invalid. Fatal: raised before any stage runs.
 */
export class ParseInputError extends BaseError {
  public readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = [], context: ErrorContext = {}) {
    super(message, InputErrorCodes.PARSE_INPUT_ERROR, {
      ...context,
      details: { ...context.details, issues },
    });
    this.name = 'ParseInputError';
    this.issues = issues;
  }

  static fromValidation(subject: string, source: IssueSource): ParseInputError {
    const issues = toValidationIssues(source);
    return new ParseInputError(`Invalid ${subject}:\n${formatIssues(issues)}`, issues);
  }
}

// ============================================================================
// Resolution Errors
// ============================================================================

/**
 * A reference token had no binding. Collected as a warning; thrown only in
 * strict mode.
 */
export class UnresolvedReferenceError extends BaseError {
  public readonly reference: string;
  public readonly location: string;

  constructor(reference: string, location: string, context: ErrorContext = {}) {
    super(
      `Unresolved reference '${reference}' in ${location}`,
      ResolutionErrorCodes.UNRESOLVED_REFERENCE,
      { ...context, details: { ...context.details, reference, location } }
    );
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
    this.location = location;
  }
}

/**
 * The resolver hit its iteration cap
 */
export class ResolutionDidNotConvergeError extends BaseError {
  public readonly iterations: number;

  constructor(iterations: number, pendingTokens: readonly string[], context: ErrorContext = {}) {
    super(
      `Reference resolution did not converge after ${iterations} iterations`,
      ResolutionErrorCodes.RESOLUTION_DID_NOT_CONVERGE,
      { ...context, details: { ...context.details, iterations, pendingTokens } }
    );
    this.name = 'ResolutionDidNotConvergeError';
    this.iterations = iterations;
  }
}

// ============================================================================
// Transformation Errors
// ============================================================================

/**
 * A node matched more than one consolidation rule; the first rule won
 */
export class ConsolidationAmbiguityError extends BaseError {
  constructor(nodeId: string, chosen: string, ignored: readonly string[]) {
    super(
      `Node '${nodeId}' matches several consolidation rules; using '${chosen}'`,
      TransformationErrorCodes.CONSOLIDATION_AMBIGUITY,
      { nodeId, details: { chosen, ignored } }
    );
    this.name = 'ConsolidationAmbiguityError';
  }
}

/**
 * A transformation step or custom function failed inside one handler pattern
 */
export class HandlerStepError extends BaseError {
  public readonly pattern: string;
  public readonly step: string;

  constructor(pattern: string, step: string, cause: Error) {
    super(
      `Handler '${pattern}' failed at ${step}: ${cause.message}`,
      TransformationErrorCodes.HANDLER_STEP_ERROR,
      { pattern, cause, details: { step } }
    );
    this.name = 'HandlerStepError';
    this.pattern = pattern;
    this.step = step;
  }
}

/**
 * A primitive found nothing to anchor on. Never thrown by the primitives
 * themselves; used to describe the no-op in debug output.
 */
export class MissingAnchorError extends BaseError {
  constructor(operation: string, details: Record<string, unknown> = {}) {
    super(
      `No matching anchor for ${operation}`,
      TransformationErrorCodes.MISSING_ANCHOR,
      { details: { operation, ...details } }
    );
    this.name = 'MissingAnchorError';
  }
}

/**
 * Transformation step parameters failed validation
 */
export class TransformationParameterError extends BaseError {
  public readonly issues: readonly ValidationIssue[];

  constructor(operation: string, issues: readonly ValidationIssue[]) {
    super(
      `Invalid parameters for '${operation}':\n${formatIssues(issues)}`,
      TransformationErrorCodes.INVALID_PARAMETERS,
      { details: { operation, issues } }
    );
    this.name = 'TransformationParameterError';
    this.issues = issues;
  }

  static fromValidation(operation: string, source: IssueSource): TransformationParameterError {
    return new TransformationParameterError(operation, toValidationIssues(source));
  }
}

// ============================================================================
// Provider Errors
// ============================================================================

/**
 * A handler config names a function that is not registered
 */
export class UnknownHandlerFunctionError extends BaseError {
  public readonly functionName: string;

  constructor(functionName: string, kind: 'custom handler' | 'name generator', providerId: string) {
    super(
      `Provider '${providerId}' references unknown ${kind} '${functionName}'`,
      ProviderErrorCodes.UNKNOWN_HANDLER_FUNCTION,
      { details: { functionName, kind, providerId } }
    );
    this.name = 'UnknownHandlerFunctionError';
    this.functionName = functionName;
  }
}

/**
 * A provider definition is malformed
 */
export class ProviderConfigError extends BaseError {
  public readonly providerId: string;

  constructor(providerId: string, message: string, issues: readonly ValidationIssue[] = []) {
    super(
      issues.length > 0 ? `${message}:\n${formatIssues(issues)}` : message,
      ProviderErrorCodes.INVALID_PROVIDER_CONFIG,
      { details: { providerId, issues } }
    );
    this.name = 'ProviderConfigError';
    this.providerId = providerId;
  }

  static fromValidation(providerId: string, source: IssueSource): ProviderConfigError {
    return new ProviderConfigError(
      providerId,
      `Invalid provider definition '${providerId}'`,
      toValidationIssues(source)
    );
  }
}

export class ProviderNotFoundError extends BaseError {
  constructor(providerId: string, available: readonly string[]) {
    super(
      `Unknown provider '${providerId}' (available: ${available.join(', ') || 'none'})`,
      ProviderErrorCodes.PROVIDER_NOT_FOUND,
      { details: { providerId, available } }
    );
    this.name = 'ProviderNotFoundError';
  }
}

export class DuplicateProviderError extends BaseError {
  constructor(providerId: string) {
    super(
      `Provider '${providerId}' is already registered`,
      ProviderErrorCodes.DUPLICATE_PROVIDER,
      { details: { providerId } }
    );
    this.name = 'DuplicateProviderError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Engine configuration failed validation
 */
export class ConfigValidationError extends BaseError {
  public readonly issues: readonly ValidationIssue[];

  constructor(source: IssueSource) {
    const issues = toValidationIssues(source);
    super(
      `Configuration validation failed:\n${formatIssues(issues)}`,
      ConfigErrorCodes.CONFIG_VALIDATION_ERROR,
      { details: { issues } }
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * A configuration source could not be read
 */
export class ConfigurationError extends BaseError {
  constructor(source: string, message: string, cause?: Error) {
    super(message, ConfigErrorCodes.CONFIG_FILE_ERROR, { cause, details: { source } });
    this.name = 'ConfigurationError';
  }
}
