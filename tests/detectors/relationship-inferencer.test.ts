/**
 * Relationship Inferencer Tests
 * @module tests/detectors/relationship-inferencer
 */

import { describe, it, expect } from 'vitest';
import {
  createRelationshipInferencer,
  EMPTY_INFERENCE_RULES,
  mergeInferenceRules,
  type InferenceRules,
} from '@/detectors/relationship-inferencer';
import { createGraphWithNodes, edgeList } from '../factories';

function rules(overrides: Partial<InferenceRules> = {}): InferenceRules {
  return { ...EMPTY_INFERENCE_RULES, ...overrides };
}

describe('RelationshipInferencer', () => {
  describe('identifier matching', () => {
    it('should add an edge to a node named in metadata', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { subnet_id: 'aws_subnet.a.id' },
        'aws_subnet.a': {},
      });

      const result = createRelationshipInferencer().infer({ graph, rules: rules() });

      expect(edgeList(graph)).toEqual(['aws_instance.web->aws_subnet.a']);
      expect(result.edgesCreated).toBe(1);
    });

    it('should not count an edge that already exists', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { subnet_id: 'aws_subnet.a.id' },
        'aws_subnet.a': {},
      });
      graph.addEdge('aws_instance.web', 'aws_subnet.a');

      const result = createRelationshipInferencer().infer({ graph, rules: rules() });

      expect(result.edgesCreated).toBe(0);
      expect(graph.getConnections('aws_instance.web')).toEqual(['aws_subnet.a']);
    });

    it('should search nested lists and maps', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { network: [{ groups: ['aws_security_group.web.id'] }] },
        'aws_security_group.web': {},
      });

      createRelationshipInferencer().infer({ graph, rules: rules() });

      expect(edgeList(graph)).toEqual(['aws_instance.web->aws_security_group.web']);
    });

    it('should ignore skipped metadata keys', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { tags: { Subnet: 'aws_subnet.a' } },
        'aws_subnet.a': {},
      });

      createRelationshipInferencer().infer({ graph, rules: rules({ inferenceSkipKeys: ['tags'] }) });

      expect(edgeList(graph)).toEqual([]);
    });

    it('should prefer a node in the same module for a local identifier', () => {
      const graph = createGraphWithNodes({
        'module.app.aws_instance.web': { subnet_id: 'aws_subnet.a.id' },
        'module.app.aws_subnet.a': {},
        'module.db.aws_subnet.a': {},
      });

      createRelationshipInferencer().infer({ graph, rules: rules() });

      expect(edgeList(graph)).toEqual(['module.app.aws_instance.web->module.app.aws_subnet.a']);
    });

    it('should select the numbered instance for an indexed reference', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { subnet_id: 'aws_subnet.a[1].id' },
        'aws_subnet.a~1': {},
        'aws_subnet.a~2': {},
      });

      createRelationshipInferencer().infer({ graph, rules: rules() });

      expect(edgeList(graph)).toEqual(['aws_instance.web->aws_subnet.a~2']);
    });

    it('should not link sources in skipRelationsFrom', () => {
      const graph = createGraphWithNodes({
        'aws_iam_policy.read': { resource: 'aws_s3_bucket.data' },
        'aws_s3_bucket.data': {},
      });

      createRelationshipInferencer().infer({
        graph,
        rules: rules({ skipRelationsFrom: ['aws_iam_policy'] }),
      });

      expect(edgeList(graph)).toEqual([]);
    });
  });

  describe('direction and implied connections', () => {
    it('should reverse an edge when the text names a reverse-arrow prefix', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { target_group: 'aws_lb.front.arn' },
        'aws_lb.front': {},
      });

      const result = createRelationshipInferencer().infer({
        graph,
        rules: rules({ reverseArrowPrefixes: ['aws_lb.'] }),
      });

      expect(edgeList(graph)).toEqual(['aws_lb.front->aws_instance.web']);
      expect(result.reversedEdges).toBe(1);
    });

    it('should connect to the implied target type when a keyword appears', () => {
      const graph = createGraphWithNodes({
        'aws_lambda_function.fn': { logging: 'cloudwatch enabled' },
        'aws_cloudwatch_log_group.logs': {},
      });

      const result = createRelationshipInferencer().infer({
        graph,
        rules: rules({ impliedConnections: { cloudwatch: 'aws_cloudwatch_log_group' } }),
      });

      expect(edgeList(graph)).toEqual(['aws_lambda_function.fn->aws_cloudwatch_log_group.logs']);
      expect(result.impliedEdges).toBe(1);
    });
  });

  describe('hidden nodes', () => {
    it('should remove hidden prefixes and listed nodes after inference', () => {
      const graph = createGraphWithNodes({
        'aws_instance.web': { role: 'aws_iam_role.app' },
        'aws_iam_role.app': {},
        'aws_iam_role_policy_attachment.app': {},
        'aws_s3_bucket.scratch': {},
      });

      const result = createRelationshipInferencer().infer({
        graph,
        rules: rules({ hiddenPrefixes: ['aws_iam_role_policy_attachment'] }),
        hidden: ['aws_s3_bucket.scratch'],
      });

      expect(result.hiddenNodes).toEqual(['aws_iam_role_policy_attachment.app', 'aws_s3_bucket.scratch']);
      expect(graph.nodeIds()).toEqual(['aws_instance.web', 'aws_iam_role.app']);
      expect(edgeList(graph)).toEqual(['aws_instance.web->aws_iam_role.app']);
    });

    it('should keep hidden nodes when hiding is disabled', () => {
      const graph = createGraphWithNodes({ 'aws_iam_role_policy_attachment.app': {} });

      const result = createRelationshipInferencer({ hideNodes: false }).infer({
        graph,
        rules: rules({ hiddenPrefixes: ['aws_iam_role_policy_attachment'] }),
      });

      expect(result.hiddenNodes).toEqual([]);
      expect(graph.hasNode('aws_iam_role_policy_attachment.app')).toBe(true);
    });
  });

  describe('mergeInferenceRules', () => {
    it('should keep the first implied target for a keyword and de-duplicate lists', () => {
      const merged = mergeInferenceRules([
        rules({ impliedConnections: { logs: 'aws_cloudwatch_log_group' }, inferenceSkipKeys: ['tags'] }),
        rules({ impliedConnections: { logs: 'google_logging_sink' }, inferenceSkipKeys: ['tags', 'labels'] }),
      ]);

      expect(merged.impliedConnections).toEqual({ logs: 'aws_cloudwatch_log_group' });
      expect(merged.inferenceSkipKeys).toEqual(['tags', 'labels']);
    });
  });
});
