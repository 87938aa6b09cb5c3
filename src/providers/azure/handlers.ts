/**
 * Azure Custom Handlers
 * @module providers/azure/handlers
 */

import type { ResourceGraph } from '../../graph/resource-graph';
import { mentionsNode } from '../../transformers/patterns';
import type { AttributeValue } from '../../types/graph';
import {
  currentNodeOf,
  findReferencedNode,
  firstBlock,
  moveOntoTypedNode,
  nodesOfType,
  originalString,
  originalValue,
} from '../handler-utils';
import type { CustomHandler, CustomHandlerContext } from '../types';

/**
 * Place each subnet under the virtual network its `virtual_network_name`
 * names, recording the network on the subnet as `vnet`
 */
export const handleVnetSubnets: CustomHandler = (graph, context) => {
  const subnets = nodesOfType(graph, 'azurerm_subnet.');
  if (subnets.length > 0 && nodesOfType(graph, 'azurerm_virtual_network.').length === 0) {
    throw new Error(`Found ${subnets.length} subnets but no azurerm_virtual_network to attach them to`);
  }

  for (const subnet of subnets) {
    const reference = originalString(context.snapshot, graph.getMetadata(subnet), subnet, 'virtual_network_name');
    if (reference === null) {
      continue;
    }
    const vnet = findReferencedNode(graph, reference, 'azurerm_virtual_network.');
    if (vnet === null) {
      continue;
    }
    graph.removeEdge(subnet, vnet);
    graph.addEdge(vnet, subnet);
    graph.updateMetadata(subnet, { vnet });
  }
};

/**
 * Turn one association type into NSG → member edges
 */
function applyNsgAssociations(
  graph: ResourceGraph,
  context: CustomHandlerContext,
  associationType: string,
  memberKey: string,
  memberType: string
): void {
  for (const association of nodesOfType(graph, associationType)) {
    const metadata = graph.getMetadata(association);
    const nsgReference = originalString(context.snapshot, metadata, association, 'network_security_group_id');
    const memberReference = originalString(context.snapshot, metadata, association, memberKey);
    if (nsgReference === null || memberReference === null) {
      continue;
    }
    const nsg = findReferencedNode(graph, nsgReference, 'azurerm_network_security_group.');
    const member = findReferencedNode(graph, memberReference, memberType);
    if (nsg === null || member === null) {
      continue;
    }
    graph.removeEdge(member, nsg);
    graph.addEdge(nsg, member);
  }
}

/**
 * Network security groups wrap the subnets and network interfaces they
 * are associated with
 */
export const handleNsg: CustomHandler = (graph, context) => {
  applyNsgAssociations(
    graph,
    context,
    'azurerm_subnet_network_security_group_association',
    'subnet_id',
    'azurerm_subnet.'
  );
  applyNsgAssociations(
    graph,
    context,
    'azurerm_network_interface_security_group_association',
    'network_interface_id',
    'azurerm_network_interface.'
  );
};

// ============================================================================
// Load Balancers
// ============================================================================

/** `sku` is written as a bare name or as a block with a `name` */
function skuName(value: AttributeValue | undefined): string {
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  const name = firstBlock(value)?.['name'];
  return typeof name === 'string' && name !== '' ? name : 'Basic';
}

/**
 * Load balancers hand their connections to a SKU-typed node such as
 * `azurerm_lb_standard.lb`; backend pools hang off the balancer their
 * `loadbalancer_id` names
 */
export const handleLoadBalancers: CustomHandler = (graph, context) => {
  const { snapshot } = context;
  const balancers = nodesOfType(graph, 'azurerm_lb.').sort();

  for (const balancer of balancers) {
    const sku = skuName(originalValue(snapshot, graph.getMetadata(balancer), balancer, 'sku'));
    moveOntoTypedNode(graph, balancer, `azurerm_lb_${sku.toLowerCase()}.lb`);
  }

  for (const pool of nodesOfType(graph, 'azurerm_lb_backend_address_pool.')) {
    const reference = originalString(snapshot, graph.getMetadata(pool), pool, 'loadbalancer_id');
    const balancer = reference === null ? undefined : balancers.find((candidate) => mentionsNode(reference, candidate));
    if (balancer !== undefined) {
      graph.addEdge(balancer, pool);
    }
  }
};

// ============================================================================
// Application Gateways
// ============================================================================

/**
 * Application gateways become a tier-typed node, with WAF tiers sharing
 * `azurerm_application_gateway_waf.appgw`. The tier is read from each
 * gateway in the snapshot and applied to the node it was merged into.
 */
export const handleAppGateways: CustomHandler = (graph, context) => {
  const { snapshot } = context;

  for (const original of nodesOfType(snapshot, 'azurerm_application_gateway.').sort()) {
    const gateway = currentNodeOf(graph, context.provider.consolidated, original);
    if (gateway === null) {
      continue;
    }
    const metadata = snapshot.getMetadata(original);
    const tierValue = firstBlock(metadata['sku'])?.['tier'];
    const tier = typeof tierValue === 'string' && tierValue !== '' ? tierValue : 'Standard_v2';
    const waf = tier.toLowerCase().includes('waf');
    const typed = waf
      ? 'azurerm_application_gateway_waf.appgw'
      : `azurerm_application_gateway_${tier.toLowerCase().replace(/_/g, '')}.appgw`;

    moveOntoTypedNode(graph, gateway, typed, { metadata: { tier, waf_enabled: waf } });

    const wafConfig = waf ? firstBlock(metadata['waf_configuration']) : null;
    if (wafConfig !== null) {
      graph.updateMetadata(typed, {
        waf_mode: wafConfig['firewall_mode'] ?? 'Detection',
        waf_enabled: wafConfig['enabled'] ?? true,
      });
    }
  }
};

export const azureCustomHandlers = {
  azure_handle_vnet_subnets: handleVnetSubnets,
  azure_handle_nsg: handleNsg,
  azure_handle_lb: handleLoadBalancers,
  azure_handle_app_gateway: handleAppGateways,
} satisfies Record<string, CustomHandler>;
