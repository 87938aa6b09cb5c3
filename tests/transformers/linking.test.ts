/**
 * Linking Primitive Tests
 * @module tests/transformers/linking
 */

import { describe, it, expect } from 'vitest';
import {
  bidirectionalLink,
  createTransitiveLinks,
  link,
  linkByMetadataPattern,
  linkPeersViaIntermediary,
  linkViaCommonConnection,
  linkViaSharedChild,
  matchBySuffix,
  redirectConnections,
  replaceConnectionTargets,
  unlink,
  unlinkFromParents,
} from '@/transformers';
import { createContext, createGraph, edgeList } from '../factories';

describe('linking primitives', () => {
  describe('link and unlink', () => {
    it('should link every source match to every target match', () => {
      const graph = createGraph({ 'aws_instance.a': [], 'aws_instance.b': [], 'aws_efs_file_system.data': [] });

      const result = link(graph, { source: 'aws_instance', target: 'aws_efs', bidirectional: false });

      expect(edgeList(graph)).toEqual([
        'aws_instance.a->aws_efs_file_system.data',
        'aws_instance.b->aws_efs_file_system.data',
      ]);
      expect(result.affected).toEqual(['aws_instance.a', 'aws_instance.b']);
    });

    it('should add the reverse edge when bidirectional', () => {
      const graph = createGraph({ 'aws_instance.a': [], 'aws_efs_file_system.data': [] });

      link(graph, { source: 'aws_instance', target: 'aws_efs', bidirectional: true });

      expect(edgeList(graph)).toEqual([
        'aws_efs_file_system.data->aws_instance.a',
        'aws_instance.a->aws_efs_file_system.data',
      ]);
    });

    it('should remove edges between matches', () => {
      const graph = createGraph({ 'aws_instance.a': ['aws_subnet.a', 'aws_iam_role.app'] });

      unlink(graph, { source: 'aws_instance', target: 'aws_iam_role' });

      expect(graph.getConnections('aws_instance.a')).toEqual(['aws_subnet.a']);
    });

    it('should unlink a node only from filtered parents', () => {
      const graph = createGraph({
        'aws_vpc.main': ['aws_route_table.rt'],
        'aws_subnet.a': ['aws_route_table.rt'],
      });

      unlinkFromParents(graph, { pattern: 'aws_route_table', parentFilter: 'aws_vpc' });

      expect(edgeList(graph)).toEqual(['aws_subnet.a->aws_route_table.rt']);
      expect(graph.hasNode('aws_route_table.rt')).toBe(true);
    });

    it('should drop the reverse edge when cleanupReverse is set', () => {
      const graph = createGraph({ 'aws_lb.front': [], 'aws_instance.web': ['aws_lb.front'] });

      bidirectionalLink(graph, { source: 'aws_lb', target: 'aws_instance', cleanupReverse: true });

      expect(edgeList(graph)).toEqual(['aws_lb.front->aws_instance.web']);
    });
  });

  describe('links through other nodes', () => {
    it('should link through a shared child and remove the intermediate edges', () => {
      const graph = createGraph({
        'aws_ecs_service.api': ['aws_lb.front'],
        'aws_lb_target_group.tg': ['aws_ecs_service.api'],
        'aws_group.shared': ['aws_lb_target_group.tg'],
        'aws_vpc.main': ['aws_lb_target_group.tg'],
        'aws_lb.front': [],
      });

      linkViaSharedChild(
        graph,
        { source: 'aws_lb.', target: 'aws_lb_target_group', removeIntermediate: true },
        createContext(graph, { groupNodeTypes: ['aws_group'] })
      );

      expect(edgeList(graph)).toEqual([
        'aws_group.shared->aws_lb_target_group.tg',
        'aws_lb.front->aws_lb_target_group.tg',
        'aws_lb_target_group.tg->aws_ecs_service.api',
      ]);
    });

    it('should link nodes that share a connection', () => {
      const graph = createGraph({
        'aws_lambda_function.fn': ['aws_sqs_queue.jobs'],
        'aws_sns_topic.alerts': ['aws_sqs_queue.jobs'],
      });

      linkViaCommonConnection(graph, {
        source: 'aws_sns_topic',
        target: 'aws_lambda_function',
        removeSharedConnection: true,
      });

      expect(edgeList(graph)).toEqual([
        'aws_lambda_function.fn->aws_sqs_queue.jobs',
        'aws_sns_topic.alerts->aws_lambda_function.fn',
      ]);
    });

    it('should link sources whose metadata value contains the pattern', () => {
      const graph = createGraph(
        { 'aws_instance.a': [], 'aws_instance.b': [], 'aws_efs_file_system.data': [] },
        { 'aws_instance.a': { user_data: 'mount -t efs fs-123' }, 'aws_instance.b': { user_data: 'echo hi' } }
      );

      linkByMetadataPattern(graph, {
        source: 'aws_instance',
        target: 'aws_efs_file_system',
        metadataKey: 'user_data',
        valuePattern: 'efs',
      });

      expect(edgeList(graph)).toEqual(['aws_instance.a->aws_efs_file_system.data']);
    });

    it('should shortcut source->intermediate->target and delete the intermediate', () => {
      const graph = createGraph({
        'aws_cloudfront_distribution.cdn': ['aws_cloudfront_origin_access_identity.oai'],
        'aws_cloudfront_origin_access_identity.oai': ['aws_s3_bucket.site'],
      });

      const result = createTransitiveLinks(graph, {
        source: 'aws_cloudfront_distribution',
        intermediate: 'aws_cloudfront_origin_access_identity',
        target: 'aws_s3_bucket',
        removeIntermediate: true,
      });

      expect(graph.toGraphDict()).toEqual({
        'aws_cloudfront_distribution.cdn': ['aws_s3_bucket.site'],
        'aws_s3_bucket.site': [],
      });
      expect(result.affected).toEqual([
        'aws_cloudfront_distribution.cdn',
        'aws_cloudfront_origin_access_identity.oai',
      ]);
    });

    it('should link peers of an intermediary', () => {
      const graph = createGraph({
        'aws_lambda_event_source_mapping.m': ['aws_sqs_queue.jobs', 'aws_lambda_function.fn'],
      });

      linkPeersViaIntermediary(graph, {
        intermediary: 'aws_lambda_event_source_mapping',
        source: 'aws_sqs_queue',
        target: 'aws_lambda_function',
        removeIntermediary: true,
      });

      expect(graph.toGraphDict()).toEqual({
        'aws_sqs_queue.jobs': ['aws_lambda_function.fn'],
        'aws_lambda_function.fn': [],
      });
    });

    it('should link instances with the same suffix', () => {
      const graph = createGraph({
        'aws_instance.web~1': [],
        'aws_instance.web~2': [],
        'aws_ebs_volume.data~1': [],
        'aws_ebs_volume.data~2': [],
      });

      matchBySuffix(graph, { source: 'aws_instance', target: 'aws_ebs_volume' });

      expect(edgeList(graph)).toEqual([
        'aws_instance.web~1->aws_ebs_volume.data~1',
        'aws_instance.web~2->aws_ebs_volume.data~2',
      ]);
    });
  });

  describe('rerouting', () => {
    it('should point parents of the old node at the destination', () => {
      const graph = createGraph({
        'aws_route53_record.www': ['aws_lb_listener.https'],
        'aws_lb.front': [],
        'aws_lb_listener.https': [],
      });

      redirectConnections(graph, { from: 'aws_lb_listener', to: 'aws_lb.front' });

      expect(graph.getConnections('aws_route53_record.www')).toEqual(['aws_lb.front']);
    });

    it('should report a missing destination', () => {
      const graph = createGraph({ 'aws_route53_record.www': ['aws_lb_listener.https'] });

      const result = redirectConnections(graph, { from: 'aws_lb_listener', to: 'aws_lb.front' });

      expect(result.missingAnchor?.code).toBe('MISSING_ANCHOR');
    });

    it('should swap old targets for the replacement in place', () => {
      const graph = createGraph({
        'aws_instance.web': ['aws_subnet.a', 'aws_network_interface.eni', 'aws_iam_role.app'],
        'aws_security_group.web': [],
      });

      replaceConnectionTargets(graph, {
        source: 'aws_instance',
        oldTarget: 'aws_network_interface',
        newTarget: 'aws_security_group',
      });

      expect(graph.getConnections('aws_instance.web')).toEqual([
        'aws_subnet.a',
        'aws_security_group.web',
        'aws_iam_role.app',
      ]);
    });
  });
});
