/**
 * Annotation Tests
 * @module tests/services/annotations
 *
 * Provider auto-annotation rules and user annotation documents.
 */

import { describe, it, expect } from 'vitest';
import { ParseInputError, TransformationErrorCodes } from '@/errors';
import { createProviderRegistry } from '@/providers/provider-registry';
import {
  annotateGraph,
  applyAutoAnnotations,
  applyUserAnnotations,
  parseAnnotations,
} from '@/services/annotations';
import { createGraph, createProviderContext, edgeList } from '../factories';

const registry = createProviderRegistry();

describe('Annotations', () => {
  // ==========================================================================
  // Auto-annotations
  // ==========================================================================

  describe('applyAutoAnnotations', () => {
    it('should link forward and drop connections under a delete prefix', () => {
      const graph = createGraph({
        'aws_internet_gateway.gw': ['aws_nat_gateway.a', 'aws_vpc.main'],
        'aws_nat_gateway.a': [],
        'aws_vpc.main': [],
      });

      const linked = applyAutoAnnotations(graph, [registry.get('aws')]);

      expect(linked).toBe(2);
      expect(edgeList(graph)).toEqual([
        'aws_internet_gateway.gw->aws_vpc.main',
        'aws_internet_gateway.gw->tv_aws_internet.internet',
        'aws_nat_gateway.a->aws_internet_gateway.gw',
      ]);
      expect(graph.getMetadata('tv_aws_internet.internet')).toEqual({});
    });

    it('should link reverse rules from the target and fall back to a .this node', () => {
      const graph = createGraph({ 'test_dns.zone': [], 'test_nat.a': [] });
      const provider = createProviderContext({
        autoAnnotations: [
          { prefix: 'test_dns', link: ['test_users.users'], arrow: 'reverse' },
          { prefix: 'test_nat', link: ['test_gw.*'] },
        ],
      });

      const linked = applyAutoAnnotations(graph, [provider]);

      expect(linked).toBe(2);
      expect(edgeList(graph)).toEqual(['test_nat.a->test_gw.this', 'test_users.users->test_dns.zone']);
      expect(graph.hasNode('test_gw.this')).toBe(true);
    });

    it('should apply rules to nodes created by earlier rules', () => {
      const graph = createGraph({ 'azurerm_public_ip.pip': [] });

      const linked = applyAutoAnnotations(graph, [registry.get('azure')]);

      expect(linked).toBe(3);
      expect(edgeList(graph)).toEqual([
        'azurerm_public_ip.pip->tv_azurerm_internet.internet',
        'azurerm_public_ip.pip->tv_azurerm_users.users',
        'tv_azurerm_users.users->tv_azurerm_internet.internet',
      ]);
    });

    it('should never link a node to itself', () => {
      const graph = createGraph({ 'aws_ecs_cluster.ecs': [], 'aws_ecs_service.api': [] });

      applyAutoAnnotations(graph, [registry.get('aws')]);

      expect(graph.hasEdge('aws_ecs_cluster.ecs', 'aws_ecs_cluster.ecs')).toBe(false);
      expect(edgeList(graph)).toEqual([
        'aws_ecs_service.api->aws_ecr_repository.ecr',
        'aws_ecs_service.api->aws_ecs_cluster.ecs',
      ]);
    });

    it('should match rule prefixes on module-stripped identifiers', () => {
      const graph = createGraph({ 'module.app.aws_lambda_function.fn': [] });

      applyAutoAnnotations(graph, [registry.get('aws')]);

      expect(graph.getConnections('module.app.aws_lambda_function.fn')).toEqual([
        'aws_cloudwatch_log_group.cloudwatch',
      ]);
    });
  });

  // ==========================================================================
  // User Annotations
  // ==========================================================================

  describe('applyUserAnnotations', () => {
    it('should add, connect, disconnect and update in order', () => {
      const graph = createGraph({
        'aws_lambda_function.a': ['aws_s3_bucket.data'],
        'module.x.aws_lambda_function.b': [],
        'aws_s3_bucket.data': ['aws_kms_key.k'],
        'aws_kms_key.k': [],
        'aws_sqs_queue.q': [],
      });
      const annotations = parseAnnotations({
        add: { 'tv_aws_users.users': { label: 'Customers' }, 'aws_s3_bucket.data': { owner: 'data-team' } },
        connect: {
          'aws_lambda*': [{ 'aws_sqs_queue.q': 'Publishes' }],
          'tv_aws_users.users': ['aws_lambda_function.a'],
        },
        disconnect: { 'aws_lambda_function.a': ['aws_s3_bucket.data'] },
        update: { 'aws_lambda*': { runtime: 'nodejs20.x' } },
      });

      const warnings = applyUserAnnotations(graph, annotations);

      expect(warnings).toEqual([]);
      expect(edgeList(graph)).toEqual([
        'aws_lambda_function.a->aws_sqs_queue.q',
        'aws_s3_bucket.data->aws_kms_key.k',
        'module.x.aws_lambda_function.b->aws_sqs_queue.q',
        'tv_aws_users.users->aws_lambda_function.a',
      ]);
      expect(graph.getMetadata('aws_lambda_function.a')).toEqual({
        edge_labels: [{ 'aws_sqs_queue.q': 'Publishes' }],
        runtime: 'nodejs20.x',
      });
      expect(graph.getMetadata('aws_s3_bucket.data')).toEqual({ owner: 'data-team' });
      expect(graph.getMetadata('tv_aws_users.users')).toEqual({ label: 'Customers' });
    });

    it('should only set edge labels from labelled targets', () => {
      const graph = createGraph({ 'aws_instance.web': [], 'aws_db_instance.db': [] });

      applyUserAnnotations(graph, parseAnnotations({ connect: { 'aws_instance.web': ['aws_db_instance.db'] } }));

      expect(graph.getConnections('aws_instance.web')).toEqual(['aws_db_instance.db']);
      expect(graph.getMetadata('aws_instance.web')).toEqual({});
    });

    it('should remove wildcard matches and report a missing exact node', () => {
      const graph = createGraph({
        'aws_vpc.main': ['aws_subnet.a', 'aws_subnet.b'],
        'aws_subnet.a': [],
        'aws_subnet.b': [],
      });

      const warnings = applyUserAnnotations(
        graph,
        parseAnnotations({ remove: ['aws_subnet*', 'aws_nat_gateway.x'] })
      );

      expect(graph.toGraphDict()).toEqual({ 'aws_vpc.main': [] });
      expect(warnings).toEqual([
        {
          code: TransformationErrorCodes.ANNOTATION_NODE_MISSING,
          message: "Annotation remove names missing node 'aws_nat_gateway.x'",
          stage: 'annotations',
          nodeId: 'aws_nat_gateway.x',
          details: { operation: 'remove' },
        },
      ]);
    });
  });

  // ==========================================================================
  // Parsing
  // ==========================================================================

  describe('parseAnnotations', () => {
    it('should read YAML text and fill in empty sections', () => {
      const text = ['title: Demo', 'connect:', '  aws_lambda*:', '    - aws_sqs_queue.q: Publishes'].join('\n');

      expect(parseAnnotations(text)).toEqual({
        title: 'Demo',
        add: {},
        connect: { 'aws_lambda*': [{ 'aws_sqs_queue.q': 'Publishes' }] },
        disconnect: {},
        remove: [],
        update: {},
      });
    });

    it('should reject malformed sections and unknown keys', () => {
      expect(() => parseAnnotations({ connect: { 'aws_instance.web': 'aws_db_instance.db' } })).toThrow(
        ParseInputError
      );
      expect(() => parseAnnotations({ colour: 'red' })).toThrow(ParseInputError);
    });
  });

  describe('annotateGraph', () => {
    it('should run user edits after the provider rules and return the title', () => {
      const graph = createGraph({ 'aws_route53_zone.main': [] });

      const result = annotateGraph(
        graph,
        [registry.get('aws')],
        parseAnnotations({ title: 'Edge', remove: ['tv_aws_users.users'] })
      );

      expect(result).toEqual({ title: 'Edge', autoLinks: 1, warnings: [] });
      expect(graph.toGraphDict()).toEqual({ 'aws_route53_zone.main': [] });
    });
  });
});
