/**
 * Configuration Module
 * @module config
 */

export {
  Environment,
  LogLevel,
  LoggingConfigSchema,
  ResolverConfigSchema,
  PipelineConfigSchema,
  EngineConfigSchema,
  defaultEngineConfig,
} from './schema';
export type {
  LoggingConfig,
  ResolverConfig,
  PipelineConfig,
  EngineConfig,
  PartialEngineConfig,
  DeepPartial,
} from './schema';

export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  OverrideConfigSource,
  mergeConfig,
  validateConfig,
  loadConfig,
} from './loader';
export type { ConfigSource, ConfigLoaderOptions } from './loader';
