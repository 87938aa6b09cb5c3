/**
 * Graph Enrichment Service
 * @module services/enrichment-service
 *
 * Runs the whole pipeline over one raw input: build, resolve, infer,
 * snapshot, consolidate, handlers, annotations, variants, count expansion,
 * forced directions and the final invariant pass. Only structurally invalid input
 * and strict-mode resolution failures are fatal; everything else is
 * collected as a warning and returned with the graph.
 */

import { validateConfig, type EngineConfig, type LoggingConfig, type PartialEngineConfig } from '../config';
import {
  createRelationshipInferencer,
  mergeInferenceRules,
  type RelationshipInferenceResult,
} from '../detectors/relationship-inferencer';
import {
  createReferenceResolver,
  type ResolutionResult,
  type ResolutionStats,
} from '../detectors/reference-resolver';
import {
  type PipelineStage,
  type PipelineWarning,
  TransformationErrorCodes,
  WarningCollector,
} from '../errors';
import { createGraphBuilder } from '../graph/graph-builder';
import { fromGraphDocument, serializeGraphDocument, toGraphDocument } from '../graph/graph-document';
import {
  applyForcedDirections,
  applyVariantRules,
  consolidateByRules,
  expandCountedResources,
  finalizeGraph,
} from '../graph/post-processing';
import type { ResourceGraph } from '../graph/resource-graph';
import { GraphSnapshot } from '../graph/snapshot';
import { createLogger, type LoggerConfig, type StructuredLogger, timed } from '../logging';
import { isGraphDocument, parseGraphDocument, parseInfrastructureInput } from '../parsers/terraform/input-parser';
import { createProviderRegistry, type ProviderRegistry } from '../providers/provider-registry';
import type { ProviderContext } from '../providers/types';
import type { AttributeValue, GraphDocument } from '../types/graph';
import { type Annotations, annotateGraph, parseAnnotations } from './annotations';
import { createHandlerPipeline, type HandlerOutcome } from './handler-pipeline';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing and size after one stage
 */
export interface StageStats {
  readonly stage: PipelineStage;
  readonly nodes: number;
  readonly edges: number;
  readonly duration: number;
}

export interface EnrichmentResult {
  readonly graph: ResourceGraph;
  readonly snapshot: GraphSnapshot;
  /** Provider ids in the order their rules were applied */
  readonly providers: readonly string[];
  readonly warnings: readonly PipelineWarning[];
  readonly stages: readonly StageStats[];
  /** Absent when the run started from an exported document */
  readonly resolution?: ResolutionStats;
  readonly inference?: RelationshipInferenceResult;
  readonly handlers: readonly HandlerOutcome[];
  /** Title from the user annotations */
  readonly title?: string;
  toDocument(): GraphDocument;
  toJSON(): string;
}

/**
 * Per-run input besides the infrastructure itself
 */
export interface EnrichOptions {
  /** User annotations, as an object or YAML/JSON text */
  readonly annotations?: unknown;
}

export interface EnrichmentServiceOptions {
  readonly config?: EngineConfig | PartialEngineConfig;
  readonly registry?: ProviderRegistry;
}

/**
 * State shared by the stages of one run
 */
interface RunState {
  readonly graph: ResourceGraph;
  readonly annotations?: Annotations;
  readonly warnings: WarningCollector;
  readonly stages: StageStats[];
}

// ============================================================================
// Enrichment Service
// ============================================================================

export class GraphEnrichmentService {
  readonly config: EngineConfig;
  readonly registry: ProviderRegistry;
  private readonly logger: StructuredLogger;

  constructor(options: EnrichmentServiceOptions = {}) {
    this.config = validateConfig(options.config ?? {});
    this.registry = options.registry ?? createProviderRegistry();
    this.logger = createLogger(
      'iac-graph-enrichment',
      { module: 'enrichment-service' },
      loggerOverrides(this.config.logging)
    );
  }

  /**
   * Enrich raw infrastructure input. An exported graph document is
   * accepted too and re-enters at the transformation stages.
   */
  enrich(raw: unknown, options: EnrichOptions = {}): EnrichmentResult {
    if (isGraphDocument(raw)) {
      return this.transformDocument(raw, options);
    }

    const { result, duration } = timed(() => this.runFromInput(raw, userAnnotations(options)));
    this.logger.pipelineCompleted(result.graph.size, result.graph.edgeCount, result.warnings.length, duration);
    return result;
  }

  /**
   * Re-run the transformation stages over an exported document, using its
   * `original_*` fields as the snapshot
   */
  transformDocument(raw: unknown, options: EnrichOptions = {}): EnrichmentResult {
    const { result, duration } = timed(() => {
      const annotations = userAnnotations(options);
      const document = parseGraphDocument(raw);
      const { graph, snapshot } = fromGraphDocument(document);
      const state: RunState = { graph, annotations, warnings: new WarningCollector(), stages: [] };
      const providers = this.selectProviders(graph);
      return this.transform(state, snapshot, providers, {});
    });
    this.logger.pipelineCompleted(result.graph.size, result.graph.edgeCount, result.warnings.length, duration);
    return result;
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private runFromInput(raw: unknown, annotations: Annotations | undefined): EnrichmentResult {
    const { result: built, duration } = timed(() => {
      const parsed = parseInfrastructureInput(raw);
      return { input: parsed, graph: createGraphBuilder().build(parsed).graph };
    });
    const { input, graph } = built;
    const state: RunState = { graph, annotations, warnings: new WarningCollector(), stages: [] };
    this.record(state, 'input', duration);

    const providers = this.selectProviders(graph);
    this.logger.info({ providers: providers.map((provider) => provider.id) }, 'Providers selected');

    const resolution = this.stage(state, 'resolution', () =>
      createReferenceResolver({
        maxIterations: this.config.resolver.maxIterations,
        placeholder: this.config.resolver.placeholder,
        maxValueLength: this.config.resolver.maxValueLength,
      }).resolve({
        graph,
        variables: input.variables,
        variableValues: input.variableValues,
        locals: input.locals,
        modules: input.modules,
        outputs: input.outputs,
        dataReplacements: mergeDataReplacements(providers),
      })
    );
    this.collect(state, resolution.warnings);
    this.enforceStrictness(resolution);

    const inference = this.stage(state, 'inference', () =>
      createRelationshipInferencer({ hideNodes: this.config.pipeline.hideNodes }).infer({
        graph,
        rules: mergeInferenceRules(providers.map((provider) => provider.inferenceRules)),
        hidden: input.hidden,
      })
    );

    const snapshot = GraphSnapshot.of(graph);
    return this.transform(state, snapshot, providers, { resolution: resolution.stats, inference });
  }

  private transform(
    state: RunState,
    snapshot: GraphSnapshot,
    providers: readonly ProviderContext[],
    extra: { resolution?: ResolutionStats; inference?: RelationshipInferenceResult }
  ): EnrichmentResult {
    const { graph, warnings } = state;
    const pipeline = createHandlerPipeline();

    this.stage(state, 'consolidation', () => consolidateByRules(graph, providers, warnings));

    const handlers = this.stage(state, 'handlers', () =>
      providers.flatMap((provider) => pipeline.run({ graph, snapshot, provider, warnings }).outcomes)
    );

    const annotated = this.stage(state, 'annotations', () => annotateGraph(graph, providers, state.annotations));
    this.collect(state, annotated.warnings);

    this.stage(state, 'variants', () => applyVariantRules(graph, providers));

    if (this.config.pipeline.expandCounts) {
      this.stage(state, 'expansion', () => expandCountedResources(graph, providers));
    }

    this.stage(state, 'finalize', () => {
      if (this.config.pipeline.applyForcedDirections) {
        applyForcedDirections(graph, providers);
      }
      const added = finalizeGraph(graph);
      if (added.length > 0) {
        this.collect(state, [
          {
            code: TransformationErrorCodes.DANGLING_EDGE,
            message: `Created empty nodes for ${added.length} dangling edge targets`,
            stage: 'finalize',
            details: { targets: added },
          },
        ]);
      }
    });

    const collected = warnings.list();
    return {
      graph,
      snapshot,
      providers: providers.map((provider) => provider.id),
      warnings: collected,
      stages: state.stages,
      resolution: extra.resolution,
      inference: extra.inference,
      handlers,
      title: annotated.title,
      toDocument: () => toGraphDocument(graph, snapshot),
      toJSON: () => serializeGraphDocument(toGraphDocument(graph, snapshot)),
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private selectProviders(graph: ResourceGraph): ProviderContext[] {
    return this.registry.select(graph, {
      providers: this.config.pipeline.providers,
      defaultProvider: this.config.pipeline.defaultProvider,
    });
  }

  /**
   * Strict mode turns the first resolution problem into a fatal error
   */
  private enforceStrictness(resolution: ResolutionResult): void {
    if (!this.config.resolver.strict) {
      return;
    }
    if (resolution.divergence) {
      throw resolution.divergence;
    }
    const [first] = resolution.unresolved;
    if (first) {
      throw first;
    }
  }

  private stage<T>(state: RunState, stage: PipelineStage, fn: () => T): T {
    const { result, duration } = timed(fn);
    this.record(state, stage, duration);
    return result;
  }

  private record(state: RunState, stage: PipelineStage, duration: number): void {
    const stats = { stage, nodes: state.graph.size, edges: state.graph.edgeCount, duration };
    state.stages.push(stats);
    this.logger.stageCompleted(stage, stats.nodes, stats.edges, duration);
  }

  private collect(state: RunState, warnings: readonly PipelineWarning[]): void {
    for (const warning of warnings) {
      state.warnings.add(warning);
      this.logger.warningRecorded(warning.code, warning.message, { stage: warning.stage, nodeId: warning.nodeId });
    }
  }
}

function userAnnotations(options: EnrichOptions): Annotations | undefined {
  return options.annotations === undefined ? undefined : parseAnnotations(options.annotations);
}

/**
 * Logger settings the configuration sets explicitly
 */
function loggerOverrides(logging: LoggingConfig): Partial<LoggerConfig> {
  const overrides: Partial<LoggerConfig> = {};
  if (logging.level !== undefined) {
    overrides.level = logging.level;
  }
  if (logging.pretty !== undefined) {
    overrides.pretty = logging.pretty;
  }
  return overrides;
}

/**
 * Data replacement tables of every provider; earlier providers win
 */
export function mergeDataReplacements(providers: readonly ProviderContext[]): Record<string, AttributeValue> {
  const merged: Record<string, AttributeValue> = {};
  for (const provider of providers) {
    for (const [prefix, value] of Object.entries(provider.definition.dataReplacements)) {
      if (!(prefix in merged)) {
        merged[prefix] = value;
      }
    }
  }
  return merged;
}

export function createEnrichmentService(options: EnrichmentServiceOptions = {}): GraphEnrichmentService {
  return new GraphEnrichmentService(options);
}
