/**
 * Configuration System Tests
 * @module tests/config
 *
 * Schema defaults, validation errors, and source priority in the loader.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  defaultEngineConfig,
  mergeConfig,
  validateConfig,
} from '@/config';
import { ConfigurationError, ConfigValidationError } from '@/errors';

describe('Configuration', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'engine-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  // ==========================================================================
  // Schema
  // ==========================================================================

  describe('schema', () => {
    it('should accept an empty object and fill every default', () => {
      expect(validateConfig({})).toEqual({
        env: 'development',
        logging: {},
        resolver: { maxIterations: 100, strict: false, placeholder: 'UNKNOWN', maxValueLength: 65536 },
        pipeline: { defaultProvider: 'aws', expandCounts: true, applyForcedDirections: true, hideNodes: true },
      });
      expect(defaultEngineConfig()).toEqual(validateConfig({}));
    });

    it('should coerce numeric strings', () => {
      expect(validateConfig({ resolver: { maxIterations: '25' } }).resolver.maxIterations).toBe(25);
    });

    it('should report every invalid field by path', () => {
      try {
        validateConfig({ resolver: { maxIterations: 0 }, logging: { level: 'loud' } });
        expect.unreachable('invalid configuration was accepted');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.issues.map((issue) => issue.path).sort()).toEqual(['logging.level', 'resolver.maxIterations']);
        }
      }
    });
  });

  // ==========================================================================
  // Sources
  // ==========================================================================

  describe('EnvironmentConfigSource', () => {
    it('should read known variables and drop the rest', async () => {
      const source = new EnvironmentConfigSource({
        RESOLVER_MAX_ITERATIONS: '25',
        RESOLVER_STRICT: 'true',
        PIPELINE_PROVIDERS: 'aws, gcp,',
        UNRELATED: 'x',
      });

      expect(await source.load()).toEqual({
        resolver: { maxIterations: '25', strict: true },
        pipeline: { providers: ['aws', 'gcp'] },
      });
    });
  });

  describe('FileConfigSource', () => {
    it('should load a YAML mapping', async () => {
      const source = new FileConfigSource(writeConfig('engine.yaml', 'pipeline:\n  expandCounts: false\n'));

      expect(await source.load()).toEqual({ pipeline: { expandCounts: false } });
    });

    it('should reject a file that is not a mapping', async () => {
      const source = new FileConfigSource(writeConfig('list.yaml', '- a\n- b\n'));

      await expect(source.load()).rejects.toThrow(ConfigurationError);
    });

    it('should report a missing file as unavailable', () => {
      expect(new FileConfigSource(join(dir, 'missing.yaml')).isAvailable()).toBe(false);
    });
  });

  // ==========================================================================
  // Loader
  // ==========================================================================

  describe('ConfigLoader', () => {
    it('should let the environment beat the file and overrides beat both', async () => {
      const configFile = writeConfig('priority.yaml', 'resolver:\n  placeholder: FILE\n  maxIterations: 10\n');

      const config = await new ConfigLoader({
        configFile,
        env: { RESOLVER_PLACEHOLDER: 'ENV' },
        overrides: { resolver: { maxIterations: 20 } },
      }).load();

      expect(config.resolver.placeholder).toBe('ENV');
      expect(config.resolver.maxIterations).toBe(20);
    });

    it('should fall back to defaults when the file is missing', async () => {
      const config = await new ConfigLoader({ configFile: join(dir, 'missing.yaml'), env: {} }).load();

      expect(config).toEqual(defaultEngineConfig());
    });
  });

  describe('mergeConfig', () => {
    it('should merge records and replace lists', () => {
      expect(
        mergeConfig(
          { pipeline: { providers: ['aws'], hideNodes: false } },
          { pipeline: { providers: ['gcp'] }, env: 'test' }
        )
      ).toEqual({ pipeline: { providers: ['gcp'], hideNodes: false }, env: 'test' });
    });
  });
});
