/**
 * Graph Enrichment Service Tests
 * @module tests/services/enrichment-service
 *
 * Whole-pipeline runs against a small test provider, so every stage's
 * effect can be traced.
 */

import { describe, it, expect } from 'vitest';
import {
  ParseInputError,
  ResolutionErrorCodes,
  TransformationErrorCodes,
  UnresolvedReferenceError,
} from '@/errors';
import { FunctionRegistry } from '@/providers/function-registry';
import { ProviderRegistry } from '@/providers/provider-registry';
import { createEnrichmentService, mergeDataReplacements } from '@/services/enrichment-service';
import type { PartialEngineConfig } from '@/config';
import { createProviderContext, createProviderDefinition, createRawInput, createRawNode } from '../factories';

function testRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry(new FunctionRegistry());
  registry.register(
    createProviderDefinition({
      hiddenPrefixes: ['test_null'],
      consolidated: [{ prefix: 'test_log.', canonical: 'test_log.all' }],
      handlers: [
        {
          pattern: 'test_log',
          transformations: [{ operation: 'link', params: { source: 'test_log.all', target: 'test_net' } }],
        },
      ],
    })
  );
  return registry;
}

function testInput() {
  return createRawInput({
    nodes: [
      createRawNode('test_net.core', { cidr: '${var.cidr}' }),
      createRawNode('test_app.web', { network: 'test_net.core.id', count: 2 }),
      createRawNode('test_log.a'),
      createRawNode('test_log.b'),
      createRawNode('test_null.x'),
    ],
    edges: { 'test_app.web': ['test_log.a', 'test_log.b'] },
    variables: [{ name: 'cidr', default: '10.0.0.0/16' }],
  });
}

function service(config: PartialEngineConfig = {}) {
  return createEnrichmentService({ config, registry: testRegistry() });
}

describe('GraphEnrichmentService', () => {
  // ==========================================================================
  // Full Pipeline
  // ==========================================================================

  describe('enrich', () => {
    it('should run every stage over raw input', () => {
      const result = service().enrich(testInput());

      expect(result.graph.toGraphDict()).toEqual({
        'test_net.core': [],
        'test_app.web~1': ['test_log.all', 'test_net.core'],
        'test_app.web~2': ['test_log.all', 'test_net.core'],
        'test_log.all': ['test_net.core'],
      });
      expect(result.graph.getMetadata('test_net.core')).toEqual({ cidr: '10.0.0.0/16' });
      expect(result.graph.getMetadata('test_app.web~2')).toEqual({ network: 'test_net.core.id', count: 2 });
      expect(result.providers).toEqual(['test']);
      expect(result.warnings).toEqual([]);
    });

    it('should take the snapshot after inference and hiding', () => {
      const result = service().enrich(testInput());

      expect(result.snapshot.toGraphDict()).toEqual({
        'test_net.core': [],
        'test_app.web': ['test_log.a', 'test_log.b', 'test_net.core'],
        'test_log.a': [],
        'test_log.b': [],
      });
      expect(result.inference?.hiddenNodes).toEqual(['test_null.x']);
      expect(result.inference?.edgesCreated).toBe(1);
    });

    it('should record stages in pipeline order', () => {
      const result = service().enrich(testInput());

      expect(result.stages.map((stage) => stage.stage)).toEqual([
        'input',
        'resolution',
        'inference',
        'consolidation',
        'handlers',
        'annotations',
        'variants',
        'expansion',
        'finalize',
      ]);
      expect(result.stages[0]).toMatchObject({ nodes: 5, edges: 2 });
      expect(result.handlers.map((outcome) => outcome.status)).toEqual(['completed']);
    });

    it('should skip count expansion when disabled', () => {
      const result = service({ pipeline: { expandCounts: false } }).enrich(testInput());

      expect(result.graph.nodeIds()).toEqual(['test_net.core', 'test_app.web', 'test_log.all']);
      expect(result.stages.map((stage) => stage.stage)).not.toContain('expansion');
    });

    it('should keep hidden nodes when hiding is disabled', () => {
      const result = service({ pipeline: { hideNodes: false } }).enrich(testInput());

      expect(result.graph.hasNode('test_null.x')).toBe(true);
    });

    it('should reject structurally invalid input', () => {
      expect(() => service().enrich({ nodes: [{ id: '' }] })).toThrow(ParseInputError);
    });
  });

  // ==========================================================================
  // Resolution Strictness
  // ==========================================================================

  describe('unresolved references', () => {
    const input = createRawInput({ nodes: [createRawNode('test_app.web', { name: '${var.missing}-app' })] });

    it('should warn and leave the placeholder by default', () => {
      const result = service().enrich(input);

      expect(result.graph.getMetadata('test_app.web')).toEqual({ name: 'UNKNOWN-app' });
      expect(result.warnings.map((warning) => [warning.code, warning.stage])).toEqual([
        [ResolutionErrorCodes.UNRESOLVED_REFERENCE, 'resolution'],
      ]);
    });

    it('should throw in strict mode', () => {
      expect(() => service({ resolver: { strict: true } }).enrich(input)).toThrow(UnresolvedReferenceError);
    });
  });

  // ==========================================================================
  // Annotations
  // ==========================================================================

  describe('annotations', () => {
    it('should apply user annotations to consolidated nodes', () => {
      const result = service().enrich(testInput(), {
        annotations: {
          title: 'Ops',
          add: { 'test_user.ops': {} },
          connect: { 'test_user.ops': ['test_log.all'] },
          update: { 'test_log*': { retention: 30 } },
        },
      });

      expect(result.title).toBe('Ops');
      expect(result.graph.getConnections('test_user.ops')).toEqual(['test_log.all']);
      expect(result.graph.getMetadata('test_log.all')).toMatchObject({ retention: 30 });
      expect(result.warnings).toEqual([]);
    });

    it('should warn about a missing annotation node', () => {
      const result = service().enrich(testInput(), {
        annotations: 'disconnect:\n  test_app.gone: [test_net.core]\n',
      });

      expect(result.warnings.map((warning) => [warning.code, warning.stage])).toEqual([
        [TransformationErrorCodes.ANNOTATION_NODE_MISSING, 'annotations'],
      ]);
    });

    it('should reject invalid annotations before running', () => {
      expect(() => service().enrich(testInput(), { annotations: 'remove: 5' })).toThrow(ParseInputError);
    });
  });

  // ==========================================================================
  // Document Re-entry
  // ==========================================================================

  describe('graph documents', () => {
    it('should re-enter at the transformation stages and keep the original snapshot', () => {
      const first = service().enrich(testInput());

      const second = service().enrich(first.toDocument());

      expect(second.graph.toGraphDict()).toEqual(first.graph.toGraphDict());
      expect(second.snapshot.toGraphDict()).toEqual(first.snapshot.toGraphDict());
      expect(second.resolution).toBeUndefined();
      expect(second.stages.map((stage) => stage.stage)).toEqual([
        'consolidation',
        'handlers',
        'annotations',
        'variants',
        'expansion',
        'finalize',
      ]);
    });

    it('should serialize the same document it exports', () => {
      const result = service().enrich(testInput());

      expect(JSON.parse(result.toJSON())).toEqual(result.toDocument());
    });
  });

  // ==========================================================================
  // Provider Selection
  // ==========================================================================

  describe('provider selection', () => {
    it('should detect the built-in providers from node types', () => {
      const result = createEnrichmentService().enrich(
        createRawInput({
          nodes: [createRawNode('aws_vpc.main'), createRawNode('aws_subnet.a', { vpc_id: 'aws_vpc.main.id' })],
        })
      );

      expect(result.providers).toEqual(['aws']);
      expect(result.graph.validate().isValid).toBe(true);
    });

    it('should fall back to the default provider', () => {
      const result = createEnrichmentService({ config: { pipeline: { defaultProvider: 'gcp' } } }).enrich(
        createRawInput({ nodes: [createRawNode('random_string.suffix')] })
      );

      expect(result.providers).toEqual(['gcp']);
    });
  });

  describe('mergeDataReplacements', () => {
    it('should let earlier providers win', () => {
      const first = createProviderContext({ id: 'one', dataReplacements: { 'data.x': 'first' } });
      const second = createProviderContext({
        id: 'two',
        dataReplacements: { 'data.x': 'second', 'data.y': ['a', 'b'] },
      });

      expect(mergeDataReplacements([first, second])).toEqual({ 'data.x': 'first', 'data.y': ['a', 'b'] });
    });
  });
});
