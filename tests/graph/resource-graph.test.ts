/**
 * Resource Graph Tests
 * @module tests/graph/resource-graph
 */

import { describe, it, expect } from 'vitest';
import { ResourceGraph } from '@/graph/resource-graph';
import { GraphSnapshot } from '@/graph/snapshot';
import { createGraph } from '../factories';

describe('ResourceGraph', () => {
  // ==========================================================================
  // Construction
  // ==========================================================================

  describe('fromDicts', () => {
    it('should give every edge target and metadata-only entry a node', () => {
      const graph = ResourceGraph.fromDicts({ 'aws_vpc.main': ['aws_subnet.a'] }, { 'aws_kms_key.main': { rotation: true } });

      expect(graph.nodeIds()).toEqual(['aws_vpc.main', 'aws_kms_key.main', 'aws_subnet.a']);
      expect(graph.validate()).toEqual({
        isValid: true,
        missingMetadata: [],
        orphanMetadata: [],
        danglingTargets: [],
        duplicateEdges: [],
      });
    });

    it('should drop duplicate connections', () => {
      const graph = ResourceGraph.fromDicts({ 'aws_vpc.main': ['aws_subnet.a', 'aws_subnet.a'] });

      expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_subnet.a']);
    });
  });

  // ==========================================================================
  // Mutation
  // ==========================================================================

  describe('mutation', () => {
    it('should detach a removed node from its parents', () => {
      const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a', 'aws_subnet.b'], 'aws_subnet.a': [] });

      graph.removeNode('aws_subnet.a');

      expect(graph.toGraphDict()).toEqual({ 'aws_vpc.main': ['aws_subnet.b'], 'aws_subnet.b': [] });
      expect(graph.toMetadataDict()).toEqual({ 'aws_vpc.main': {}, 'aws_subnet.b': {} });
    });

    it('should rename a node in place and follow it from every parent', () => {
      const graph = createGraph({
        'aws_vpc.main': ['aws_lb.front', 'aws_subnet.a'],
        'aws_lb.front': ['aws_instance.web'],
        'aws_subnet.a': [],
      });

      graph.renameNode('aws_lb.front', 'aws_nlb.front');

      expect(graph.nodeIds()).toEqual(['aws_vpc.main', 'aws_nlb.front', 'aws_subnet.a', 'aws_instance.web']);
      expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_nlb.front', 'aws_subnet.a']);
      expect(graph.getConnections('aws_nlb.front')).toEqual(['aws_instance.web']);
    });

    it('should merge edges when renaming onto an existing node', () => {
      const graph = createGraph({
        'aws_vpc.main': ['aws_subnet.a', 'aws_subnet.b'],
        'aws_subnet.a': ['aws_instance.x'],
        'aws_subnet.b': ['aws_instance.y'],
      });

      graph.renameNode('aws_subnet.a', 'aws_subnet.b');

      expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_subnet.b']);
      expect(graph.getConnections('aws_subnet.b')).toEqual(['aws_instance.y', 'aws_instance.x']);
      expect(graph.hasNode('aws_subnet.a')).toBe(false);
    });

    it('should not leave a self edge when renaming onto a node it points at', () => {
      const graph = createGraph({
        'aws_vpc.main': ['aws_lb.elb'],
        'aws_lb.elb': ['aws_acm_certificate.acm', 'aws_alb.elb'],
        'aws_alb.elb': ['aws_instance.web'],
      });

      graph.renameNode('aws_lb.elb', 'aws_alb.elb');

      expect(graph.getConnections('aws_alb.elb')).toEqual(['aws_instance.web', 'aws_acm_certificate.acm']);
      expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_alb.elb']);
    });

    it('should swap a connection for replacements at the same position', () => {
      const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a', 'aws_subnet.b', 'aws_subnet.c'] });

      graph.replaceConnection('aws_vpc.main', 'aws_subnet.b', ['aws_subnet.c', 'aws_az.one']);

      expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_subnet.a', 'aws_subnet.c', 'aws_az.one']);
    });

    it('should merge metadata keys', () => {
      const graph = createGraph({}, { 'aws_vpc.main': { name: 'main', cidr_block: '10.0.0.0/16' } });

      graph.updateMetadata('aws_vpc.main', { name: 'core' });

      expect(graph.getMetadata('aws_vpc.main')).toEqual({ name: 'core', cidr_block: '10.0.0.0/16' });
    });
  });

  // ==========================================================================
  // Copies
  // ==========================================================================

  describe('copies', () => {
    it('should restore an earlier clone', () => {
      const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a'] }, { 'aws_subnet.a': { tags: { env: 'dev' } } });
      const checkpoint = graph.clone();

      graph.removeNode('aws_vpc.main');
      graph.updateMetadata('aws_subnet.a', { tags: { env: 'prod' } });
      graph.restore(checkpoint);

      expect(graph.toGraphDict()).toEqual({ 'aws_vpc.main': ['aws_subnet.a'], 'aws_subnet.a': [] });
      expect(graph.getMetadata('aws_subnet.a')).toEqual({ tags: { env: 'dev' } });
    });

    it('should clone dangling edge targets without turning them into nodes', () => {
      const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a'], 'aws_subnet.a': [] });
      graph.removeNode('aws_subnet.a', false);

      const checkpoint = graph.clone();

      expect(checkpoint.hasNode('aws_subnet.a')).toBe(false);
      expect(checkpoint.toGraphDict()).toEqual({ 'aws_vpc.main': ['aws_subnet.a'] });
      expect(checkpoint.validate().danglingTargets).toEqual(['aws_subnet.a']);
    });

    it('should keep snapshots independent of later edits', () => {
      const graph = createGraph({ 'aws_vpc.main': [] }, { 'aws_vpc.main': { tags: { env: 'dev' } } });
      const snapshot = GraphSnapshot.of(graph);

      graph.setMetadata('aws_vpc.main', { tags: { env: 'prod' } });
      graph.addEdge('aws_vpc.main', 'aws_subnet.a');

      expect(snapshot.getMetadata('aws_vpc.main')).toEqual({ tags: { env: 'dev' } });
      expect(snapshot.getConnections('aws_vpc.main')).toEqual([]);
      expect(Object.isFrozen(snapshot.getMetadata('aws_vpc.main'))).toBe(true);
    });

    it('should report dangling targets without failing validation', () => {
      const graph = new ResourceGraph();
      graph.addEdge('aws_vpc.main', 'aws_subnet.a');

      const validation = graph.validate();

      expect(validation.isValid).toBe(true);
      expect(validation.danglingTargets).toEqual(['aws_subnet.a']);
    });
  });
});
