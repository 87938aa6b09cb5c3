/**
 * Graph Document Tests
 * @module tests/graph/graph-document
 */

import { describe, it, expect } from 'vitest';
import { fromGraphDocument, serializeGraphDocument, toGraphDocument } from '@/graph/graph-document';
import { GraphSnapshot } from '@/graph/snapshot';
import { parseGraphDocument } from '@/parsers/terraform/input-parser';
import { createGraph } from '../factories';

describe('graph document', () => {
  it('should export the live graph beside its snapshot', () => {
    const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a'] }, { 'aws_vpc.main': { cidr_block: '10.0.0.0/16' } });
    const snapshot = GraphSnapshot.of(graph);
    graph.removeNode('aws_subnet.a');

    expect(toGraphDocument(graph, snapshot)).toEqual({
      graphdict: { 'aws_vpc.main': [] },
      meta_data: { 'aws_vpc.main': { cidr_block: '10.0.0.0/16' } },
      original_graphdict: { 'aws_vpc.main': ['aws_subnet.a'], 'aws_subnet.a': [] },
      original_metadata: { 'aws_vpc.main': { cidr_block: '10.0.0.0/16' }, 'aws_subnet.a': {} },
    });
  });

  it('should rebuild graph and snapshot from serialized text', () => {
    const graph = createGraph({ 'aws_vpc.main': ['aws_subnet.a'] }, { 'aws_subnet.a': { name: 'a' } });
    const snapshot = GraphSnapshot.of(graph);
    graph.updateMetadata('aws_subnet.a', { name: 'a-1a' });
    const text = serializeGraphDocument(toGraphDocument(graph, snapshot));

    const rebuilt = fromGraphDocument(parseGraphDocument(JSON.parse(text)));

    expect(rebuilt.graph.toGraphDict()).toEqual(graph.toGraphDict());
    expect(rebuilt.graph.getMetadata('aws_subnet.a')).toEqual({ name: 'a-1a' });
    expect(rebuilt.snapshot.getMetadata('aws_subnet.a')).toEqual({ name: 'a' });
  });

  it('should use the graph itself as snapshot when no original is given', () => {
    const { graph, snapshot } = fromGraphDocument(
      parseGraphDocument({ graphdict: { 'aws_vpc.main': [] }, meta_data: { 'aws_vpc.main': { name: 'main' } } })
    );

    expect(snapshot.toGraphDict()).toEqual({ 'aws_vpc.main': [] });
    expect(snapshot.getMetadata('aws_vpc.main')).toEqual({ name: 'main' });
    graph.updateMetadata('aws_vpc.main', { name: 'changed' });
    expect(snapshot.getMetadata('aws_vpc.main')).toEqual({ name: 'main' });
  });

  it('should indent serialized output', () => {
    const graph = createGraph({ 'aws_vpc.main': [] });

    expect(serializeGraphDocument(toGraphDocument(graph, GraphSnapshot.of(graph)), 0)).toBe(
      '{"graphdict":{"aws_vpc.main":[]},"meta_data":{"aws_vpc.main":{}},"original_graphdict":{"aws_vpc.main":[]},"original_metadata":{"aws_vpc.main":{}}}'
    );
  });
});
