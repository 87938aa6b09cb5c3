/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for the engine configuration. Every field has a default so an
 * empty object is a valid configuration.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'test', 'production']);
export type Environment = z.infer<typeof Environment>;

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LoggingConfigSchema = z.object({
  /** Minimum level written; LOG_LEVEL when unset */
  level: LogLevel.optional(),
  /** Pretty-print through pino-pretty; LOG_PRETTY when unset */
  pretty: z.boolean().optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Resolver Configuration
// ============================================================================

export const ResolverConfigSchema = z.object({
  /** Maximum substitution rounds before giving up */
  maxIterations: z.coerce.number().int().min(1).max(10000).default(100),
  /** Raise instead of warn when a reference stays unresolved */
  strict: z.boolean().default(false),
  /** Text left in place of an unresolvable reference */
  placeholder: z.string().min(1).default('UNKNOWN'),
  /** Values longer than this stop being substituted */
  maxValueLength: z.coerce.number().int().min(256).default(65536),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

// ============================================================================
// Pipeline Configuration
// ============================================================================

export const PipelineConfigSchema = z.object({
  /** Explicit provider ids; detected from node types when omitted */
  providers: z.array(z.string().min(1)).optional(),
  /** Provider used when no node type matches any provider prefix */
  defaultProvider: z.string().min(1).default('aws'),
  /** Expand `count`/`for_each` resources into numbered instances */
  expandCounts: z.boolean().default(true),
  /** Apply forced destination/origin edge directions */
  applyForcedDirections: z.boolean().default(true),
  /** Remove hidden nodes after inference */
  hideNodes: z.boolean().default(true),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ============================================================================
// Root Configuration
// ============================================================================

export const EngineConfigSchema = z.object({
  env: Environment.default('development'),
  logging: LoggingConfigSchema.default({}),
  resolver: ResolverConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Recursive partial used by configuration sources
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type PartialEngineConfig = DeepPartial<EngineConfig>;

/**
 * Defaults produced by the schema alone
 */
export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}
