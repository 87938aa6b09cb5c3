/**
 * GCP Custom Handlers
 * @module providers/gcp/handlers
 *
 * Regions and zones are drawn as container nodes between networks,
 * subnetworks and instances. Firewalls, load balancers and DNS zones read
 * their settings from the snapshot, since consolidation may have merged
 * the original resources away.
 */

import { mentionsNode } from '../../transformers/patterns';
import type { NameGenerator } from '../../transformers/types';
import type { NodeId } from '../../types/graph';
import { attributeToSearchText, toStringList } from '../../utils/attributes';
import { stripModulePrefix } from '../../utils/node-id';
import {
  currentNodeOf,
  findReferencedNode,
  firstBlock,
  locationToken,
  moveOntoTypedNode,
  nodesOfType,
  originalString,
  originalValue,
} from '../handler-utils';
import type { CustomHandler } from '../types';

const REGIONAL_TYPES = [
  'google_compute_subnetwork',
  'google_container_cluster',
  'google_compute_region_instance_group_manager',
];

/**
 * Region of a zonal location (`us-central1-a` → `us-central1`)
 */
export function regionOfZone(zone: string): string {
  const parts = zone.split('-');
  return parts.length > 2 ? parts.slice(0, -1).join('-') : zone;
}

export const generateRegionNodeName: NameGenerator = (child, metadata, snapshot) => {
  const region =
    originalString(snapshot, metadata, child, 'region') ?? originalString(snapshot, metadata, child, 'location');
  return region === null ? null : `google_compute_region.${locationToken(region)}`;
};

export const generateZoneNodeName: NameGenerator = (child, metadata, snapshot) => {
  const zone = originalString(snapshot, metadata, child, 'zone');
  return zone === null ? null : `google_compute_zone.${locationToken(zone)}`;
};

/**
 * Give regional resources a `region`, from their own attributes or from
 * a zonal `location`
 */
export const prepareRegionMetadata: CustomHandler = (graph, context) => {
  for (const type of REGIONAL_TYPES) {
    for (const node of nodesOfType(graph, `${type}.`)) {
      const metadata = graph.getMetadata(node);
      const region = originalString(context.snapshot, metadata, node, 'region');
      const location = originalString(context.snapshot, metadata, node, 'location');
      if (region !== null) {
        graph.updateMetadata(node, { region });
      } else if (location !== null) {
        graph.updateMetadata(node, { region: regionOfZone(location) });
      }
    }
  }
};

/**
 * Restore each instance's `zone` from the snapshot
 */
export const prepareZoneMetadata: CustomHandler = (graph, context) => {
  for (const instance of nodesOfType(graph, 'google_compute_instance.')) {
    const zone = originalString(context.snapshot, graph.getMetadata(instance), instance, 'zone');
    if (zone !== null) {
      graph.updateMetadata(instance, { zone });
    }
  }
};

/**
 * Place each subnetwork under the network its `network` attribute names.
 * Throws when subnetworks exist without any network to hold them.
 */
export const handleNetworkSubnets: CustomHandler = (graph, context) => {
  const subnets = nodesOfType(graph, 'google_compute_subnetwork.');
  if (subnets.length > 0 && nodesOfType(graph, 'google_compute_network.').length === 0) {
    throw new Error(`Found ${subnets.length} subnetworks but no google_compute_network to attach them to`);
  }

  for (const subnet of subnets) {
    const reference = originalString(context.snapshot, graph.getMetadata(subnet), subnet, 'network');
    if (reference === null) {
      continue;
    }
    const network = findReferencedNode(graph, reference, 'google_compute_network.');
    if (network === null) {
      continue;
    }
    graph.removeEdge(subnet, network);
    graph.addEdge(network, subnet);
    const autoMode = context.snapshot.getMetadata(network)['auto_create_subnetworks'] === true;
    graph.updateMetadata(subnet, { mode: autoMode ? 'auto' : 'custom' });
  }
};

// ============================================================================
// Firewalls
// ============================================================================

/**
 * Firewall rules wrap the instances they apply to: instances on the rule's
 * network whose tags meet its `target_tags`, or every instance on the
 * network when it names none. Rules are read from the snapshot, so merged
 * rules each still apply through the node they were merged into.
 */
export const handleFirewalls: CustomHandler = (graph, context) => {
  const { snapshot } = context;
  const instances = nodesOfType(graph, 'google_compute_instance.');

  for (const rule of nodesOfType(snapshot, 'google_compute_firewall.')) {
    const firewall = currentNodeOf(graph, context.provider.consolidated, rule);
    const ruleMetadata = snapshot.getMetadata(rule);
    const networkReference = originalString(snapshot, ruleMetadata, rule, 'network');
    if (firewall === null || networkReference === null) {
      continue;
    }
    const network = findReferencedNode(graph, networkReference, 'google_compute_network.');
    if (network === null) {
      continue;
    }

    const targetTags = toStringList(ruleMetadata['target_tags']);
    graph.updateMetadata(firewall, {
      direction: originalString(snapshot, ruleMetadata, rule, 'direction') ?? 'INGRESS',
      network: stripModulePrefix(network),
      ...(targetTags.length > 0 ? { target_tags: targetTags } : {}),
    });

    for (const instance of instances) {
      const live = graph.getMetadata(instance);
      const instanceNetwork = attributeToSearchText(
        originalValue(snapshot, live, instance, 'network') ?? originalValue(snapshot, live, instance, 'network_interface')
      );
      const onNetwork = instanceNetwork.includes(networkReference) || mentionsNode(instanceNetwork, network);
      const tags = toStringList(originalValue(snapshot, live, instance, 'tags'));
      const tagged = targetTags.length === 0 || targetTags.some((tag) => tags.includes(tag));
      if (onNetwork && tagged) {
        graph.addEdge(firewall, instance);
        graph.removeEdge(instance, firewall);
      }
    }
  }
};

// ============================================================================
// Load Balancers
// ============================================================================

/**
 * Load balancer type from a backend service's scheme and protocol
 */
export function loadBalancerTypeOf(scheme: string, protocol: string): string {
  if (scheme === 'INTERNAL') {
    return 'google_compute_internal_lb';
  }
  if (protocol === 'HTTP' || protocol === 'HTTPS') {
    return 'google_compute_http_lb';
  }
  if (protocol === 'SSL' || protocol === 'TCP') {
    return 'google_compute_tcp_lb';
  }
  return 'google_compute_network_lb';
}

/**
 * Backend services hand their connections and parents to a typed load
 * balancer node, and forwarding rules hang off the backend they target
 */
export const handleLoadBalancers: CustomHandler = (graph, context) => {
  const { snapshot } = context;
  const backends = nodesOfType(graph, 'google_compute_backend_service.').sort();

  for (const backend of backends) {
    const live = graph.getMetadata(backend);
    const scheme = originalString(snapshot, live, backend, 'load_balancing_scheme') ?? 'EXTERNAL';
    const protocol = originalString(snapshot, live, backend, 'protocol') ?? 'HTTP';
    moveOntoTypedNode(graph, backend, `${loadBalancerTypeOf(scheme, protocol)}.lb`);
  }

  for (const original of nodesOfType(snapshot, 'google_compute_forwarding_rule.')) {
    const rule = currentNodeOf(graph, context.provider.consolidated, original);
    const metadata = snapshot.getMetadata(original);
    const reference =
      originalString(snapshot, metadata, original, 'backend_service') ??
      originalString(snapshot, metadata, original, 'target');
    if (rule === null || reference === null) {
      continue;
    }
    const backend = backends.find((candidate) => mentionsNode(reference, candidate));
    if (backend !== undefined) {
      graph.addEdge(backend, rule);
    }
  }
};

// ============================================================================
// Cloud DNS
// ============================================================================

type ZoneType = 'public' | 'private' | 'peering' | 'forwarding';

function zoneTypeOf(visibility: string, peering: boolean, forwarding: boolean): ZoneType {
  if (peering) {
    return 'peering';
  }
  if (forwarding) {
    return 'forwarding';
  }
  return visibility === 'private' ? 'private' : 'public';
}

/**
 * Managed zones record their type and DNSSEC state, private zones sit
 * inside the networks that can see them, and record sets sit inside
 * their zone
 */
export const handleCloudDns: CustomHandler = (graph, context) => {
  const { snapshot } = context;
  const zones = nodesOfType(graph, 'google_dns_managed_zone.').sort();
  if (zones.length === 0) {
    return;
  }

  for (const zone of zones) {
    const live = graph.getMetadata(zone);
    const visibility = originalString(snapshot, live, zone, 'visibility') ?? 'public';
    const zoneType = zoneTypeOf(
      visibility,
      firstBlock(originalValue(snapshot, live, zone, 'peering_config')) !== null,
      firstBlock(originalValue(snapshot, live, zone, 'forwarding_config')) !== null
    );
    graph.updateMetadata(zone, { zone_type: zoneType, visibility });

    const dnssec = firstBlock(originalValue(snapshot, live, zone, 'dnssec_config'));
    if (dnssec !== null) {
      graph.updateMetadata(zone, { dnssec_enabled: dnssec['state'] === 'on' });
    }

    if (zoneType !== 'private') {
      continue;
    }
    const visibilityConfig = firstBlock(originalValue(snapshot, live, zone, 'private_visibility_config'));
    const networks = visibilityConfig?.['networks'];
    for (const entry of Array.isArray(networks) ? networks : [networks]) {
      const url = attributeToSearchText(firstBlock(entry)?.['network_url']);
      const network: NodeId | null = url === '' ? null : findReferencedNode(graph, url, 'google_compute_network.');
      if (network !== null) {
        graph.addEdge(network, zone);
      }
    }
  }

  for (const record of nodesOfType(graph, 'google_dns_record_set.')) {
    const live = graph.getMetadata(record);
    const reference = originalString(snapshot, live, record, 'managed_zone');
    const zone = reference === null ? undefined : zones.find((candidate) => mentionsNode(reference, candidate));
    if (zone === undefined) {
      continue;
    }
    graph.addEdge(zone, record);
    graph.updateMetadata(record, {
      record_type: originalString(snapshot, live, record, 'type') ?? 'A',
      managed_zone: stripModulePrefix(zone),
    });
  }
};

export const gcpCustomHandlers = {
  gcp_prepare_subnet_region_metadata: prepareRegionMetadata,
  gcp_prepare_zone_metadata: prepareZoneMetadata,
  gcp_handle_network_subnets: handleNetworkSubnets,
  gcp_handle_firewall: handleFirewalls,
  gcp_handle_lb: handleLoadBalancers,
  gcp_handle_cloud_dns: handleCloudDns,
} satisfies Record<string, CustomHandler>;

export const gcpNameGenerators = {
  generate_region_node_name: generateRegionNodeName,
  generate_zone_node_name: generateZoneNodeName,
} satisfies Record<string, NameGenerator>;
