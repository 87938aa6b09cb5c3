/**
 * Node Identifier Utilities
 * @module utils/node-id
 *
 * Parsing and composing node identifiers with module prefixes and
 * numbered-instance suffixes.
 */

import { type NodeId, type NodeIdParts, ROOT_MODULE } from '../types/graph';

const INSTANCE_SUFFIX = /~(\d+)$/;
const MODULE_PREFIX = /^(?:module\.[^.]+\.)+/;

/**
 * Split an identifier into module path, type, name and instance number.
 * Returns null when the identifier has no `<type>.<name>` part.
 */
export function parseNodeId(id: NodeId): NodeIdParts | null {
  const instanceMatch = INSTANCE_SUFFIX.exec(id);
  const instance = instanceMatch ? parseInt(instanceMatch[1], 10) : null;
  const withoutSuffix = instanceMatch ? id.slice(0, instanceMatch.index) : id;

  const segments = withoutSuffix.split('.');
  const modules: string[] = [];
  let index = 0;
  while (index + 1 < segments.length && segments[index] === 'module') {
    modules.push(segments[index + 1]);
    index += 2;
  }

  const remainder = segments.slice(index);
  if (remainder.length < 2) {
    return null;
  }

  return {
    modules,
    resourceType: remainder[0],
    name: remainder.slice(1).join('.'),
    instance,
  };
}

/**
 * Remove every leading `module.<name>.` segment
 */
export function stripModulePrefix(id: NodeId): string {
  return id.replace(MODULE_PREFIX, '');
}

/**
 * The `module.a.module.b.` prefix of an identifier, or '' at root
 */
export function modulePrefixOf(id: NodeId): string {
  const match = MODULE_PREFIX.exec(id);
  return match ? match[0] : '';
}

/**
 * Module path in dotted form (`vpc.subnets`), or `main` for root nodes
 */
export function modulePathOf(id: NodeId): string {
  const parts = parseNodeId(id);
  if (!parts || parts.modules.length === 0) {
    return ROOT_MODULE;
  }
  return parts.modules.join('.');
}

/**
 * Convert a module path back into an identifier prefix
 */
export function modulePathToPrefix(modulePath: string): string {
  if (modulePath === ROOT_MODULE || modulePath === '') {
    return '';
  }
  return modulePath
    .split('.')
    .map((name) => `module.${name}.`)
    .join('');
}

/**
 * Path of a child module called from `parentPath`
 */
export function childModulePath(parentPath: string, moduleName: string): string {
  return parentPath === ROOT_MODULE ? moduleName : `${parentPath}.${moduleName}`;
}

/**
 * Path of the module that calls `modulePath`, or null at root
 */
export function parentModulePath(modulePath: string): string | null {
  if (modulePath === ROOT_MODULE) {
    return null;
  }
  const index = modulePath.lastIndexOf('.');
  return index === -1 ? ROOT_MODULE : modulePath.slice(0, index);
}

/**
 * Instance number of a `~N` identifier, or null
 */
export function instanceNumberOf(id: NodeId): number | null {
  const match = INSTANCE_SUFFIX.exec(id);
  return match ? parseInt(match[1], 10) : null;
}

export function isNumberedInstance(id: NodeId): boolean {
  return INSTANCE_SUFFIX.test(id);
}

/**
 * Identifier without its `~N` suffix
 */
export function removeInstanceSuffix(id: NodeId): NodeId {
  return id.replace(INSTANCE_SUFFIX, '');
}

export function withInstanceSuffix(id: NodeId, instance: number): NodeId {
  return `${removeInstanceSuffix(id)}~${instance}`;
}

/**
 * Module-stripped, suffix-stripped identifier: `aws_vpc.main`
 */
export function localIdOf(id: NodeId): string {
  return removeInstanceSuffix(stripModulePrefix(id));
}

/**
 * Resource type of an identifier (first segment after module prefixes)
 */
export function resourceTypeOf(id: NodeId): string {
  return stripModulePrefix(id).split('.')[0];
}

/**
 * Replace the resource type, keeping module prefix, name and suffix
 */
export function replaceResourceType(id: NodeId, newType: string): NodeId {
  const prefix = modulePrefixOf(id);
  const rest = stripModulePrefix(id);
  const dot = rest.indexOf('.');
  const tail = dot === -1 ? '' : rest.slice(dot);
  return `${prefix}${newType}${tail}`;
}
