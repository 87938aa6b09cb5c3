/**
 * AWS Custom Handlers
 * @module providers/aws/handlers
 *
 * Rewrites for AWS resources that the declarative steps cannot express.
 * Registered by name and referenced from the `aws` provider definition.
 */

import type { ResourceGraph } from '../../graph/resource-graph';
import { selectVariant } from '../../transformers/metadata';
import { mentionsNode } from '../../transformers/patterns';
import type { NameGenerator } from '../../transformers/types';
import { type AttributeMap, isAttributeMap, type NodeId } from '../../types/graph';
import { attributeToSearchText, toInstanceCount } from '../../utils/attributes';
import { resourceTypeOf } from '../../utils/node-id';
import {
  findReferencedNode,
  locationToken,
  moveOntoTypedNode,
  nodesOfType,
  originalString,
  originalValue,
} from '../handler-utils';
import type { CustomHandler, CustomHandlerContext } from '../types';

const EVENT_SOURCE_TYPES = [
  'aws_sqs_queue',
  'aws_kinesis_stream',
  'aws_dynamodb_table',
  'aws_msk_cluster',
  'aws_mq_broker',
];

const CLUSTER_PARENT_TYPES = ['aws_vpc', 'aws_subnet', 'aws_az'];

// ============================================================================
// Availability Zones
// ============================================================================

/**
 * Instance number for an AZ name from its trailing letter (`a` → 1).
 * Returns null when the zone does not end in a letter.
 */
export function availabilityZoneInstance(zone: string): number | null {
  const last = zone.trim().slice(-1).toLowerCase();
  if (!/^[a-z]$/.test(last)) {
    return null;
  }
  return last.charCodeAt(0) - 'a'.charCodeAt(0) + 1;
}

/**
 * `aws_az.availability_zone_<zone>~N` for a subnet's availability zone.
 * The zone comes from the snapshot, falling back to current metadata.
 */
export const generateAzNodeName: NameGenerator = (child, metadata, snapshot) => {
  const zone = originalString(snapshot, metadata, child, 'availability_zone');
  if (zone === null) {
    return null;
  }
  const base = `aws_az.availability_zone_${locationToken(zone)}`;
  const instance = availabilityZoneInstance(zone);
  return instance === null ? base : `${base}~${instance}`;
};

/**
 * Restore each subnet's `availability_zone` from the snapshot and append
 * the zone suffix (`1a` for `us-east-1a`) to its display name
 */
export const prepareSubnetAzMetadata: CustomHandler = (graph, context) => {
  for (const subnet of nodesOfType(graph, 'aws_subnet.')) {
    const metadata = graph.getMetadata(subnet);
    const zone = originalString(context.snapshot, metadata, subnet, 'availability_zone');
    if (zone === null) {
      continue;
    }
    const updates: Record<string, string> = { availability_zone: zone };
    const name = metadata['name'];
    const suffix = zone.includes('-') ? zone.split('-').pop() : undefined;
    if (typeof name === 'string' && suffix && !name.includes(suffix)) {
      updates['name'] = `${name}-${suffix}`;
    }
    graph.updateMetadata(subnet, updates);
  }
};

// ============================================================================
// Security Groups
// ============================================================================

function isGroupType(id: string, context: CustomHandlerContext): boolean {
  const type = resourceTypeOf(id);
  return context.provider.groupNodes.some((group) => type.startsWith(group));
}

/**
 * Security groups wrap the resources they protect:
 *  - a resource pointing at a security group is moved inside it
 *  - a subnet holding a protected resource holds the security group instead
 *  - security groups leave VPC level, and orphans are removed
 */
export const handleSecurityGroups: CustomHandler = (graph, context) => {
  const groups = nodesOfType(graph, 'aws_security_group.');

  for (const node of graph.nodeIds()) {
    if (groups.includes(node) || isGroupType(node, context)) {
      continue;
    }
    for (const group of graph.getConnections(node)) {
      if (groups.includes(group)) {
        graph.removeEdge(node, group);
        graph.addEdge(group, node);
      }
    }
  }

  for (const group of groups) {
    for (const member of graph.getConnections(group)) {
      for (const parent of graph.parentsOf(member)) {
        if (parent !== group && resourceTypeOf(parent) === 'aws_subnet') {
          graph.replaceConnection(parent, member, [group]);
        }
      }
    }
    for (const parent of graph.parentsOf(group)) {
      if (resourceTypeOf(parent) === 'aws_vpc') {
        graph.removeEdge(parent, group);
      }
    }
  }

  for (const group of groups) {
    if (graph.getConnections(group).length === 0 && graph.parentsOf(group).length === 0) {
      graph.removeNode(group);
    }
  }
};

// ============================================================================
// Storage and Scaling
// ============================================================================

/**
 * Mount targets sit under their file system, and every file system carries
 * a count
 */
export const handleEfs: CustomHandler = (graph) => {
  for (const target of nodesOfType(graph, 'aws_efs_mount_target')) {
    for (const connection of graph.getConnections(target)) {
      if (resourceTypeOf(connection) === 'aws_efs_file_system') {
        graph.addEdge(connection, target);
        graph.removeEdge(target, connection);
      }
    }
  }
  for (const fileSystem of nodesOfType(graph, 'aws_efs_file_system')) {
    if (graph.getMetadata(fileSystem)['count'] === undefined) {
      graph.updateMetadata(fileSystem, { count: 1 });
    }
  }
};

/**
 * Subnets that hold a scaled service hold its scaling target instead, and
 * the target and service take the subnet's count
 */
export const handleAutoscaling: CustomHandler = (graph) => {
  for (const target of nodesOfType(graph, 'aws_appautoscaling_target')) {
    for (const service of graph.getConnections(target)) {
      for (const subnet of graph.parentsOf(service)) {
        if (resourceTypeOf(subnet) !== 'aws_subnet') {
          continue;
        }
        const count = graph.getMetadata(subnet)['count'];
        if (count !== undefined && graph.getMetadata(target)['count'] === undefined) {
          graph.updateMetadata(target, { count });
          graph.updateMetadata(service, { count });
        }
        graph.replaceConnection(subnet, service, [target]);
      }
    }
  }
};

// ============================================================================
// Load Balancers
// ============================================================================

function isSharedService(id: NodeId, context: CustomHandlerContext): boolean {
  const type = resourceTypeOf(id);
  return context.provider.sharedServices.some((shared) => type.startsWith(shared));
}

function instanceCount(metadata: Readonly<AttributeMap>): number | null {
  return toInstanceCount(metadata['count']) ?? toInstanceCount(metadata['desired_count']);
}

/**
 * Move a load balancer's targets onto its typed node. Subnets and other
 * groups below VPC level hold the typed node instead, and the typed node
 * takes the largest count among its targets.
 */
function splitLoadBalancer(graph: ResourceGraph, context: CustomHandlerContext, lb: NodeId, typed: NodeId): void {
  moveOntoTypedNode(graph, lb, typed, {
    keep: (connection) => isSharedService(connection, context),
    rewireParent: (parent) =>
      isGroupType(parent, context) && !isSharedService(parent, context) && resourceTypeOf(parent) !== 'aws_vpc',
  });

  const current = instanceCount(graph.getMetadata(typed)) ?? 1;
  const largest = Math.max(
    current,
    ...graph.getConnections(typed).map((target) => instanceCount(graph.getMetadata(target)) ?? 0)
  );
  if (largest > current) {
    graph.updateMetadata(typed, { count: largest });
  }
}

/**
 * `aws_lb` nodes hand their targets to `<variant>.elb`, the variant picked
 * by the provider's `aws_lb` rule (`aws_alb.elb`, `aws_nlb.elb`)
 */
export const handleLoadBalancers: CustomHandler = (graph, context) => {
  const rule = context.provider.variants.find((variant) => variant.prefix === 'aws_lb');
  for (const lb of nodesOfType(graph, 'aws_lb.')) {
    const variant = rule ? selectVariant(graph.getMetadata(lb), rule.variants, rule.metadataKey) : null;
    splitLoadBalancer(graph, context, lb, `${variant ?? 'aws_lb'}.elb`);
  }
};

export const handleClassicLoadBalancers: CustomHandler = (graph, context) => {
  for (const lb of nodesOfType(graph, 'aws_elb.')) {
    splitLoadBalancer(graph, context, lb, 'aws_elb.elb');
  }
};

// ============================================================================
// Containers
// ============================================================================

/**
 * EC2-launched services run inside the autoscaling groups that supply
 * their instances. A subnet holding one of those groups drops its direct
 * edge to the service. Fargate services are left alone.
 */
export const handleEcs: CustomHandler = (graph, context) => {
  const groups = nodesOfType(graph, 'aws_autoscaling_group.');
  if (groups.length === 0) {
    return;
  }

  for (const service of nodesOfType(graph, 'aws_ecs_service.')) {
    const launchType = attributeToSearchText(
      originalValue(context.snapshot, graph.getMetadata(service), service, 'launch_type')
    );
    if (launchType.toUpperCase() !== 'EC2') {
      continue;
    }
    for (const group of groups) {
      graph.addEdge(group, service);
    }
    for (const parent of graph.parentsOf(service)) {
      const holdsGroup = graph.getConnections(parent).some((connection) => groups.includes(connection));
      if (resourceTypeOf(parent) === 'aws_subnet' && holdsGroup) {
        graph.removeEdge(parent, service);
      }
    }
  }
};

/**
 * Auto mode is on when `compute_config` is enabled or runs the `system`
 * node pool
 */
export function isEksAutoMode(metadata: Readonly<AttributeMap>): boolean {
  const raw = metadata['compute_config'];
  const config = Array.isArray(raw) ? raw[0] : raw;
  if (!isAttributeMap(config)) {
    return false;
  }
  const pools = config['node_pools'];
  if (Array.isArray(pools) && pools.length > 0) {
    return pools.includes('system');
  }
  return config['enabled'] === true;
}

/**
 * Each cluster's control plane sits in its own `aws_account` group and
 * points at the node groups that name it. While node groups or Fargate
 * profiles carry the workload, the control plane leaves the VPC, its
 * zones and its subnets, unless the cluster runs in auto mode.
 */
export const handleEks: CustomHandler = (graph) => {
  const nodeGroups = nodesOfType(graph, 'aws_eks_node_group.');
  const hasWorkers = nodeGroups.length > 0 || nodesOfType(graph, 'aws_eks_fargate_profile.').length > 0;

  for (const cluster of nodesOfType(graph, 'aws_eks_cluster.')) {
    const name = cluster.split('.').pop() ?? cluster;
    const group = `aws_account.eks_control_plane_${name}`;
    graph.addNode(group, { type: 'eks_service', name: `EKS Service - ${name}` });
    graph.addEdge(group, cluster);

    if (hasWorkers && !isEksAutoMode(graph.getMetadata(cluster))) {
      for (const parent of graph.parentsOf(cluster)) {
        if (CLUSTER_PARENT_TYPES.includes(resourceTypeOf(parent))) {
          graph.removeEdge(parent, cluster);
        }
      }
    }

    for (const nodeGroup of nodeGroups) {
      const reference = attributeToSearchText(graph.getMetadata(nodeGroup)['cluster_name']);
      if (mentionsNode(reference, cluster) || reference === name) {
        graph.addEdge(cluster, nodeGroup);
        graph.removeEdge(nodeGroup, cluster);
      }
    }
  }
};

// ============================================================================
// Serverless
// ============================================================================

/**
 * Event source mappings become direct source → function edges for every
 * stream or queue type, and the mapping nodes are removed. A mapping whose
 * function or source cannot be found is kept.
 */
export const handleLambdaEventSourceMappings: CustomHandler = (graph, context) => {
  for (const mapping of nodesOfType(graph, 'aws_lambda_event_source_mapping')) {
    const live = graph.getMetadata(mapping);
    const connections = graph.getConnections(mapping);
    const sourceText = attributeToSearchText(originalValue(context.snapshot, live, mapping, 'event_source_arn'));
    const functionText = attributeToSearchText(originalValue(context.snapshot, live, mapping, 'function_name'));

    const fn =
      findReferencedNode(graph, functionText, 'aws_lambda_function.') ??
      connections.find((connection) => resourceTypeOf(connection) === 'aws_lambda_function');
    const sources = graph.nodeIds().filter((id) => {
      const isSource = EVENT_SOURCE_TYPES.includes(resourceTypeOf(id));
      return isSource && (mentionsNode(sourceText, id) || connections.includes(id));
    });
    if (fn === undefined || sources.length === 0) {
      continue;
    }

    for (const source of sources) {
      graph.addEdge(source, fn);
      graph.removeEdge(fn, source);
    }
    graph.removeNode(mapping);
  }
};

// ============================================================================
// Edge Services
// ============================================================================

/**
 * A distribution points at every resource its origins' `domain_name`
 * names, such as a bucket or a load balancer
 */
export const handleCloudfrontOrigins: CustomHandler = (graph, context) => {
  for (const distribution of nodesOfType(graph, 'aws_cloudfront_distribution.')) {
    const origin = originalValue(context.snapshot, graph.getMetadata(distribution), distribution, 'origin');
    const origins = Array.isArray(origin) ? origin : [origin];
    for (const entry of origins) {
      if (!isAttributeMap(entry)) {
        continue;
      }
      const domain = attributeToSearchText(entry['domain_name']);
      for (const node of graph.nodeIds()) {
        if (node !== distribution && domain !== '' && mentionsNode(domain, node)) {
          graph.addEdge(distribution, node);
          graph.removeEdge(node, distribution);
        }
      }
    }
  }
};

/**
 * WAF associations become direct web ACL → protected resource edges, and
 * the association nodes are removed
 */
export const handleWafAssociations: CustomHandler = (graph, context) => {
  const acls = nodesOfType(graph, 'aws_wafv2_web_acl.');

  for (const association of nodesOfType(graph, 'aws_wafv2_web_acl_association')) {
    const original = { ...graph.getMetadata(association), ...context.snapshot.getMetadata(association) };
    const aclText = attributeToSearchText(original['web_acl_arn']);
    const resourceText = attributeToSearchText(original['resource_arn']);
    const acl = acls.find((id) => mentionsNode(aclText, id)) ?? acls[0];
    if (acl === undefined) {
      continue;
    }
    for (const resource of graph.nodeIds()) {
      if (resource !== association && resource !== acl && mentionsNode(resourceText, resource)) {
        graph.addEdge(acl, resource);
      }
    }
    graph.removeNode(association);
  }
};

// ============================================================================
// Registrations
// ============================================================================

export const awsCustomHandlers = {
  aws_prepare_subnet_az_metadata: prepareSubnetAzMetadata,
  aws_handle_sg: handleSecurityGroups,
  aws_handle_efs: handleEfs,
  aws_handle_autoscaling: handleAutoscaling,
  aws_handle_waf_associations: handleWafAssociations,
  aws_handle_lb: handleLoadBalancers,
  aws_handle_classic_lb: handleClassicLoadBalancers,
  aws_handle_ecs: handleEcs,
  aws_handle_eks: handleEks,
  aws_handle_lambda_event_source_mapping: handleLambdaEventSourceMappings,
  aws_handle_cf_origins: handleCloudfrontOrigins,
} satisfies Record<string, CustomHandler>;

export const awsNameGenerators = {
  generate_az_node_name: generateAzNodeName,
} satisfies Record<string, NameGenerator>;

