/**
 * Handler Pipeline
 * @module services/handler-pipeline
 *
 * Runs one provider's handlers over the live graph, pattern by pattern, in
 * configuration order. Each pattern is an error boundary: a failing step or
 * custom function rolls the graph back to its state before the pattern and
 * is recorded as a warning, and the next pattern still runs.
 */

import { HandlerStepError, type PipelineWarning, WarningCollector } from '../errors';
import type { ResourceGraph, ReadableGraph } from '../graph/resource-graph';
import { createModuleLogger, timed } from '../logging';
import type { ProviderContext, ResolvedHandler } from '../providers/types';
import { applyTransformation } from '../transformers';
import { anyMatching } from '../transformers/patterns';
import type { TransformationContext, TransformationResult } from '../transformers/types';

const logger = createModuleLogger('handler-pipeline');

// ============================================================================
// Types
// ============================================================================

export interface HandlerPipelineInput {
  readonly graph: ResourceGraph;
  readonly snapshot: ReadableGraph;
  readonly provider: ProviderContext;
  /** Warnings are appended here when given */
  readonly warnings?: WarningCollector;
}

/**
 * What happened to one handler pattern
 */
export type HandlerOutcome =
  | { readonly pattern: string; readonly status: 'skipped' }
  | {
      readonly pattern: string;
      readonly status: 'completed';
      readonly results: readonly TransformationResult[];
      readonly duration: number;
    }
  | { readonly pattern: string; readonly status: 'failed'; readonly error: HandlerStepError };

export interface HandlerPipelineResult {
  readonly provider: string;
  readonly outcomes: readonly HandlerOutcome[];
  readonly warnings: readonly PipelineWarning[];
}

/**
 * Labels one unit of work inside a pattern, for error reporting
 */
type HandlerTask = { readonly label: string; readonly run: () => TransformationResult | null };

// ============================================================================
// Handler Pipeline
// ============================================================================

export class HandlerPipeline {
  run(input: HandlerPipelineInput): HandlerPipelineResult {
    const { graph, provider } = input;
    const warnings = input.warnings ?? new WarningCollector();
    const startCount = warnings.count;

    const context: TransformationContext = {
      snapshot: input.snapshot,
      resolveNameGenerator: (name) => provider.resolveNameGenerator(name),
      groupNodeTypes: provider.definition.groupNodes,
    };

    const outcomes = provider.handlers.map((handler) =>
      this.runHandler(graph, handler, input, context, warnings)
    );

    return {
      provider: provider.id,
      outcomes,
      warnings: warnings.list().slice(startCount),
    };
  }

  private runHandler(
    graph: ResourceGraph,
    handler: ResolvedHandler,
    input: HandlerPipelineInput,
    context: TransformationContext,
    warnings: WarningCollector
  ): HandlerOutcome {
    if (!anyMatching(graph, handler.pattern)) {
      logger.handlerSkipped(handler.pattern, 'no matching nodes');
      return { pattern: handler.pattern, status: 'skipped' };
    }

    logger.handlerStarted(handler.pattern, handler.executionOrder);
    const checkpoint = graph.clone();
    const { result: outcome, duration } = timed(() =>
      this.runTasks(this.tasksFor(graph, handler, input, context), handler.pattern)
    );

    if (outcome.status === 'failed') {
      graph.restore(checkpoint);
      warnings.addError(outcome.error, 'handlers');
      logger.handlerFailed(handler.pattern, outcome.error.step, outcome.cause);
      logger.warningRecorded(outcome.error.code, outcome.error.message, { pattern: handler.pattern });
      return { pattern: handler.pattern, status: 'failed', error: outcome.error };
    }

    logger.handlerCompleted(handler.pattern, duration);
    return { pattern: handler.pattern, status: 'completed', results: outcome.results, duration };
  }

  /**
   * Run tasks until one throws
   */
  private runTasks(
    tasks: readonly HandlerTask[],
    pattern: string
  ):
    | { readonly status: 'completed'; readonly results: TransformationResult[] }
    | { readonly status: 'failed'; readonly error: HandlerStepError; readonly cause: Error } {
    const results: TransformationResult[] = [];

    for (const task of tasks) {
      let result: TransformationResult | null;
      try {
        result = task.run();
      } catch (caught) {
        const cause = caught instanceof Error ? caught : new Error(String(caught));
        return { status: 'failed', error: new HandlerStepError(pattern, task.label, cause), cause };
      }
      if (!result) {
        continue;
      }
      results.push(result);
      if (result.missingAnchor) {
        logger.debug(
          { pattern, step: task.label, ...result.missingAnchor.context.details },
          result.missingAnchor.message
        );
      }
    }

    return { status: 'completed', results };
  }

  /**
   * Ordered work for one pattern: the custom function before or after the
   * declarative steps
   */
  private tasksFor(
    graph: ResourceGraph,
    handler: ResolvedHandler,
    input: HandlerPipelineInput,
    context: TransformationContext
  ): HandlerTask[] {
    const steps: HandlerTask[] = handler.transformations.map((step, index) => ({
      label: `step ${index + 1} (${step.operation})`,
      run: () => applyTransformation(graph, step, context),
    }));

    const custom = handler.customFunction;
    if (!custom) {
      return steps;
    }
    const customTask: HandlerTask = {
      label: `custom function ${custom.name}`,
      run: () => {
        custom.run(graph, { snapshot: input.snapshot, provider: input.provider.definition });
        return null;
      },
    };
    return handler.executionOrder === 'before' ? [customTask, ...steps] : [...steps, customTask];
  }
}

export function createHandlerPipeline(): HandlerPipeline {
  return new HandlerPipeline();
}
