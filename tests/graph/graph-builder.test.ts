/**
 * Graph Builder Tests
 * @module tests/graph/graph-builder
 */

import { describe, it, expect } from 'vitest';
import { createGraphBuilder } from '@/graph/graph-builder';
import { parseInfrastructureInput } from '@/parsers/terraform/input-parser';
import { createRawInput, createRawNode } from '../factories';

describe('GraphBuilder', () => {
  const raw = parseInfrastructureInput(
    createRawInput({
      nodes: [createRawNode('aws_vpc.main', { cidr_block: '10.0.0.0/16' }), createRawNode('aws_subnet.a')],
      edges: { 'aws_vpc.main': ['aws_subnet.a', 'aws_vpc.main', 'aws_route_table.rt'] },
    })
  );

  it('should create nodes in input order with their attributes', () => {
    const { graph } = createGraphBuilder().build(raw);

    expect(graph.nodeIds()).toEqual(['aws_vpc.main', 'aws_subnet.a', 'aws_route_table.rt']);
    expect(graph.getMetadata('aws_vpc.main')).toEqual({ cidr_block: '10.0.0.0/16' });
  });

  it('should drop self-loops and report added edge targets', () => {
    const { graph, addedTargets } = createGraphBuilder().build(raw);

    expect(graph.getConnections('aws_vpc.main')).toEqual(['aws_subnet.a', 'aws_route_table.rt']);
    expect(addedTargets).toEqual(['aws_route_table.rt']);
  });

  it('should leave dangling targets when asked to', () => {
    const { graph, addedTargets } = createGraphBuilder({ createMissingTargets: false }).build(raw);

    expect(addedTargets).toEqual([]);
    expect(graph.validate().danglingTargets).toEqual(['aws_route_table.rt']);
  });

  it('should not share attribute objects with the input', () => {
    const { graph } = createGraphBuilder().build(raw);

    graph.updateMetadata('aws_vpc.main', { cidr_block: '10.1.0.0/16' });

    expect(raw.nodes[0].attributes).toEqual({ cidr_block: '10.0.0.0/16' });
  });
});
