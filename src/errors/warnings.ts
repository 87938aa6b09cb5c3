/**
 * Pipeline Warnings
 * @module errors/warnings
 *
 * Non-fatal problems are recorded here instead of being thrown, and returned
 * as a summary list alongside the final graph.
 */

import type { BaseError } from './base';
import type { ErrorCode } from './codes';

/**
 * Stage that produced a warning
 */
export type PipelineStage =
  | 'input'
  | 'resolution'
  | 'inference'
  | 'consolidation'
  | 'handlers'
  | 'annotations'
  | 'variants'
  | 'expansion'
  | 'finalize';

/**
 * A collected, non-fatal problem
 */
export interface PipelineWarning {
  readonly code: ErrorCode;
  readonly message: string;
  readonly stage: PipelineStage;
  /** Node the warning is about, when there is one */
  readonly nodeId?: string;
  /** Handler pattern being processed */
  readonly pattern?: string;
  readonly details?: Record<string, unknown>;
}

/**
 * Accumulates warnings across all stages of one run
 */
export class WarningCollector {
  private readonly warnings: PipelineWarning[] = [];

  add(warning: PipelineWarning): PipelineWarning {
    this.warnings.push(warning);
    return warning;
  }

  /**
   * Record a caught error as a warning for the given stage
   */
  addError(error: BaseError, stage: PipelineStage): PipelineWarning {
    return this.add({
      code: error.code,
      message: error.message,
      stage,
      nodeId: error.context.nodeId,
      pattern: error.context.pattern,
      details: error.context.details,
    });
  }

  list(): readonly PipelineWarning[] {
    return [...this.warnings];
  }

  byCode(code: ErrorCode): PipelineWarning[] {
    return this.warnings.filter((warning) => warning.code === code);
  }

  hasCode(code: ErrorCode): boolean {
    return this.warnings.some((warning) => warning.code === code);
  }

  get count(): number {
    return this.warnings.length;
  }
}
