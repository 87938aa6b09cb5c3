/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading: a YAML file, environment variables and
 * explicit overrides are merged by priority and validated with zod.
 */

import { existsSync, readFileSync } from 'node:fs';

import { parse as parseYaml } from 'yaml';

import { ConfigurationError, ConfigValidationError } from '../errors';
import { createModuleLogger } from '../logging';
import { type EngineConfig, EngineConfigSchema, type PartialEngineConfig } from './schema';

const logger = createModuleLogger('config');

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * A source of partial configuration. Higher priority wins.
 */
export interface ConfigSource {
  readonly name: string;
  readonly priority: number;
  isAvailable(): boolean;
  load(): Promise<ConfigRecord>;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively remove undefined values from an object
 */
function filterUndefined(obj: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isRecord(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Deep merge: records merge key by key, everything else is replaced
 */
export function mergeConfig(base: ConfigRecord, overlay: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return result;
}

// ============================================================================
// Environment Configuration Source
// ============================================================================

/**
 * Reads engine settings from environment variables
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority: number;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    priority = 10
  ) {
    this.priority = priority;
  }

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigRecord> {
    const env = this.env;
    const flag = (value: string | undefined): boolean | undefined =>
      value === undefined ? undefined : value === 'true';

    return filterUndefined({
      env: env.NODE_ENV,
      logging: {
        level: env.LOG_LEVEL,
        pretty: flag(env.LOG_PRETTY),
      },
      resolver: {
        maxIterations: env.RESOLVER_MAX_ITERATIONS,
        strict: flag(env.RESOLVER_STRICT),
        placeholder: env.RESOLVER_PLACEHOLDER,
      },
      pipeline: {
        providers: env.PIPELINE_PROVIDERS
          ? env.PIPELINE_PROVIDERS.split(',').map((id) => id.trim()).filter(Boolean)
          : undefined,
        defaultProvider: env.PIPELINE_DEFAULT_PROVIDER,
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML (or JSON, which YAML parses) configuration file
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<ConfigRecord> {
    if (!this.isAvailable()) {
      logger.debug({ filePath: this.filePath }, 'Config file not found, skipping');
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigurationError(
        this.name,
        `Failed to load configuration file: ${cause?.message ?? String(error)}`,
        cause
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(this.name, 'Configuration file must contain a mapping');
    }

    logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

/**
 * Fixed overrides supplied by the caller
 */
export class OverrideConfigSource implements ConfigSource {
  public readonly name = 'overrides';
  public readonly priority: number;

  constructor(
    private readonly overrides: PartialEngineConfig,
    priority = 100
  ) {
    this.priority = priority;
  }

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigRecord> {
    return filterUndefined(this.overrides);
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Path to a YAML configuration file */
  configFile?: string;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Overrides applied last */
  overrides?: PartialEngineConfig;
  /** Custom config sources, replacing the defaults */
  sources?: ConfigSource[];
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private readonly sources: ConfigSource[];

  constructor(options: ConfigLoaderOptions = {}) {
    this.sources = options.sources ?? ConfigLoader.defaultSources(options);
  }

  static defaultSources(options: ConfigLoaderOptions): ConfigSource[] {
    const sources: ConfigSource[] = [new EnvironmentConfigSource(options.env)];
    if (options.configFile) {
      sources.push(new FileConfigSource(options.configFile));
    }
    if (options.overrides) {
      sources.push(new OverrideConfigSource(options.overrides));
    }
    return sources;
  }

  async load(): Promise<EngineConfig> {
    const ordered = [...this.sources].sort((a, b) => a.priority - b.priority);

    let merged: ConfigRecord = {};
    for (const source of ordered) {
      if (!source.isAvailable()) {
        continue;
      }
      merged = mergeConfig(merged, await source.load());
    }

    return validateConfig(merged);
  }
}

/**
 * Validate a merged configuration record
 */
export function validateConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(result.error);
  }
  return result.data;
}

/**
 * Load the engine configuration from the default sources
 */
export function loadConfig(options: ConfigLoaderOptions = {}): Promise<EngineConfig> {
  return new ConfigLoader(options).load();
}
