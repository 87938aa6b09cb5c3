/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino. Adds domain methods for resolver, inferencer,
 * handler and pipeline events so every stage logs the same event shapes.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  runId?: string;
  stage?: string;
  provider?: string;
  pattern?: string;
  module?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  withContext(context: LogContext): StructuredLogger;

  // Resolver
  resolutionCompleted(iterations: number, converged: boolean, unresolved: number): void;

  // Inferencer
  inferenceCompleted(edgesCreated: number, duration: number): void;

  // Handler pipeline
  handlerStarted(pattern: string, executionOrder: string): void;
  handlerCompleted(pattern: string, duration: number): void;
  handlerFailed(pattern: string, step: string, error: Error): void;
  handlerSkipped(pattern: string, reason: string): void;

  // Pipeline
  stageCompleted(stage: string, nodeCount: number, edgeCount: number, duration: number): void;
  pipelineCompleted(nodeCount: number, edgeCount: number, warningCount: number, duration: number): void;
  warningRecorded(code: string, message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain methods
 */
export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    service: process.env.SERVICE_NAME || 'iac-graph-enrichment',
    version: process.env.SERVICE_VERSION || '0.1.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    resolutionCompleted(iterations: number, converged: boolean, unresolved: number) {
      logger.info(
        {
          event: 'resolution_completed',
          iterations,
          converged,
          unresolved,
        },
        `Reference resolution ${converged ? 'converged' : 'stopped at cap'} after ${iterations} iterations`
      );
    },

    inferenceCompleted(edgesCreated: number, duration: number) {
      logger.info(
        {
          event: 'inference_completed',
          edgesCreated,
          durationMs: duration,
        },
        `Relationship inference created ${edgesCreated} edges in ${duration}ms`
      );
    },

    handlerStarted(pattern: string, executionOrder: string) {
      logger.debug(
        {
          event: 'handler_started',
          pattern,
          executionOrder,
        },
        `Handler ${pattern} started`
      );
    },

    handlerCompleted(pattern: string, duration: number) {
      logger.debug(
        {
          event: 'handler_completed',
          pattern,
          durationMs: duration,
        },
        `Handler ${pattern} completed in ${duration}ms`
      );
    },

    handlerFailed(pattern: string, step: string, error: Error) {
      logger.warn(
        {
          event: 'handler_failed',
          pattern,
          step,
          err: error,
        },
        `Handler ${pattern} failed at ${step}: ${error.message}`
      );
    },

    handlerSkipped(pattern: string, reason: string) {
      logger.trace(
        {
          event: 'handler_skipped',
          pattern,
          reason,
        },
        `Handler ${pattern} skipped: ${reason}`
      );
    },

    stageCompleted(stage: string, nodeCount: number, edgeCount: number, duration: number) {
      logger.debug(
        {
          event: 'stage_completed',
          stage,
          nodeCount,
          edgeCount,
          durationMs: duration,
        },
        `Stage ${stage} completed: ${nodeCount} nodes, ${edgeCount} edges`
      );
    },

    pipelineCompleted(nodeCount: number, edgeCount: number, warningCount: number, duration: number) {
      logger.info(
        {
          event: 'pipeline_completed',
          nodeCount,
          edgeCount,
          warningCount,
          durationMs: duration,
        },
        `Pipeline completed: ${nodeCount} nodes, ${edgeCount} edges, ${warningCount} warnings in ${duration}ms`
      );
    },

    warningRecorded(code: string, message: string, metadata?: Record<string, unknown>) {
      logger.warn(
        {
          event: 'warning_recorded',
          code,
          ...metadata,
        },
        message
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('iac-graph-enrichment');
  }
  return rootLogger;
}

/**
 * Initializes the root logger with explicit level and pretty settings
 */
export function initLogger(overrides: Partial<LoggerConfig>, context?: LogContext): StructuredLogger {
  rootLogger = createLogger('iac-graph-enrichment', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}

/**
 * Times a synchronous operation
 */
export function timed<T>(fn: () => T): { result: T; duration: number } {
  const startTime = Date.now();
  const result = fn();
  return { result, duration: Date.now() - startTime };
}
