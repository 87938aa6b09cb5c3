/**
 * Graph Annotations
 * @module services/annotations
 *
 * Two kinds of annotation run after the provider handlers. Provider
 * auto-annotations link matching resources to conceptual nodes such as
 * users or the internet. User annotations are a small document of manual
 * edits: nodes to add, connect, disconnect, remove or update.
 *
 * A start node written as `prefix*` matches every node whose module-stripped
 * identifier starts with `prefix`.
 */

import { z } from 'zod';

import { type PipelineWarning, ParseInputError, TransformationErrorCodes } from '../errors';
import type { ResourceGraph } from '../graph/resource-graph';
import { createModuleLogger } from '../logging';
import { parseStructuredText } from '../parsers/terraform/input-parser';
import { AttributeMapSchema } from '../parsers/terraform/types';
import type { AutoAnnotationRule, ProviderContext } from '../providers/types';
import type { AttributeMap, NodeId } from '../types/graph';
import { stripModulePrefix } from '../utils/node-id';

const logger = createModuleLogger('annotations');

// ============================================================================
// Schema
// ============================================================================

const NodePattern = z.string().min(1);

/** A bare target, or `{ target: label }` for a labelled edge */
const ConnectTargetSchema = z.union([NodePattern, z.record(z.string())]);

export const AnnotationsSchema = z
  .object({
    title: z.string().optional(),
    add: z.record(AttributeMapSchema).default({}),
    connect: z.record(z.array(ConnectTargetSchema)).default({}),
    disconnect: z.record(z.array(NodePattern)).default({}),
    remove: z.array(NodePattern).default([]),
    update: z.record(AttributeMapSchema).default({}),
  })
  .strict();

export type Annotations = z.infer<typeof AnnotationsSchema>;
export type AnnotationsInput = z.input<typeof AnnotationsSchema>;

/**
 * Validate user annotations given as an object or as YAML/JSON text
 */
export function parseAnnotations(raw: unknown): Annotations {
  const value = typeof raw === 'string' ? parseStructuredText(raw, 'annotations') : raw;
  const result = AnnotationsSchema.safeParse(value ?? {});
  if (!result.success) {
    throw ParseInputError.fromValidation('annotations', result.error);
  }
  return result.data;
}

// ============================================================================
// Types
// ============================================================================

export interface AnnotationResult {
  readonly title?: string;
  /** Edges added by auto-annotation rules */
  readonly autoLinks: number;
  readonly warnings: readonly PipelineWarning[];
}

// ============================================================================
// Matching
// ============================================================================

function wildcardPrefix(pattern: string): string | null {
  const index = pattern.indexOf('*');
  return index === -1 ? null : pattern.slice(0, index);
}

function startsWithStripped(id: NodeId, prefix: string): boolean {
  return stripModulePrefix(id).startsWith(prefix);
}

// ============================================================================
// Auto-annotations
// ============================================================================

/**
 * `type.*` names the first node containing `type`, or `type.this` when
 * there is none
 */
function resolveLinkTarget(graph: ResourceGraph, link: string): NodeId {
  if (!link.endsWith('.*')) {
    return link;
  }
  const type = link.slice(0, -2);
  return graph.findNodes(type)[0] ?? `${type}.this`;
}

function applyRule(graph: ResourceGraph, node: NodeId, rule: AutoAnnotationRule): number {
  let linked = 0;
  for (const link of rule.link) {
    const target = resolveLinkTarget(graph, link);
    if (target === node) {
      continue;
    }
    graph.addNode(target);
    if (rule.arrow === 'forward') {
      if (graph.addEdge(node, target)) {
        linked++;
      }
      const kept = graph
        .getConnections(node)
        .filter((id) => !rule.delete.some((prefix) => startsWithStripped(id, prefix)));
      graph.setConnections(node, kept);
    } else if (graph.addEdge(target, node)) {
      linked++;
    }
  }
  return linked;
}

/**
 * Apply every provider's rules to every node. Nodes the rules create are
 * visited too, so a conceptual node can itself match a later rule; each
 * node is visited once.
 */
export function applyAutoAnnotations(graph: ResourceGraph, providers: readonly ProviderContext[]): number {
  const rules = providers.flatMap((provider) => provider.definition.autoAnnotations);
  if (rules.length === 0) {
    return 0;
  }

  const queue = graph.nodeIds();
  const visited = new Set<NodeId>(queue);
  let linked = 0;

  for (let index = 0; index < queue.length; index++) {
    const node = queue[index];
    if (!graph.hasNode(node)) {
      continue;
    }
    for (const rule of rules) {
      if (startsWithStripped(node, rule.prefix)) {
        linked += applyRule(graph, node, rule);
      }
    }
    for (const id of graph.nodeIds()) {
      if (!visited.has(id)) {
        visited.add(id);
        queue.push(id);
      }
    }
  }

  return linked;
}

// ============================================================================
// User Annotations
// ============================================================================

class UserAnnotator {
  readonly warnings: PipelineWarning[] = [];

  constructor(private readonly graph: ResourceGraph) {}

  apply(annotations: Annotations): void {
    for (const [id, attributes] of Object.entries(annotations.add)) {
      this.add(id, attributes);
    }
    for (const [start, targets] of Object.entries(annotations.connect)) {
      this.connect(start, targets);
    }
    for (const [start, targets] of Object.entries(annotations.disconnect)) {
      for (const node of this.startNodes(start, 'disconnect')) {
        for (const target of targets) {
          this.graph.removeEdge(node, target);
        }
      }
    }
    for (const pattern of annotations.remove) {
      for (const node of this.startNodes(pattern, 'remove')) {
        this.graph.removeNode(node);
      }
    }
    for (const [pattern, attributes] of Object.entries(annotations.update)) {
      for (const node of this.startNodes(pattern, 'update')) {
        this.graph.updateMetadata(node, attributes);
      }
    }
  }

  /**
   * A new node, or extra metadata on an existing one; edges are kept
   */
  private add(id: NodeId, attributes: AttributeMap): void {
    if (this.graph.addNode(id, { ...attributes })) {
      logger.debug({ nodeId: id }, 'Annotation node added');
      return;
    }
    this.graph.updateMetadata(id, attributes);
  }

  private connect(start: string, targets: Annotations['connect'][string]): void {
    const labels: Record<string, string>[] = [];
    const ids: NodeId[] = [];
    for (const target of targets) {
      if (typeof target === 'string') {
        ids.push(target);
      } else {
        ids.push(...Object.keys(target));
        labels.push({ ...target });
      }
    }

    for (const node of this.startNodes(start, 'connect')) {
      for (const target of ids) {
        this.graph.addNode(target);
        this.graph.addEdge(node, target);
      }
      if (labels.length > 0) {
        this.graph.updateMetadata(node, { edge_labels: labels });
      }
    }
  }

  /**
   * Nodes an annotation key applies to. A missing exact node is reported.
   */
  private startNodes(pattern: string, operation: string): NodeId[] {
    const prefix = wildcardPrefix(pattern);
    if (prefix !== null) {
      return this.graph.nodeIds().filter((id) => startsWithStripped(id, prefix));
    }
    if (this.graph.hasNode(pattern)) {
      return [pattern];
    }
    this.warnings.push({
      code: TransformationErrorCodes.ANNOTATION_NODE_MISSING,
      message: `Annotation ${operation} names missing node '${pattern}'`,
      stage: 'annotations',
      nodeId: pattern,
      details: { operation },
    });
    return [];
  }
}

/**
 * Apply user annotations in order: add, connect, disconnect, remove, update
 */
export function applyUserAnnotations(graph: ResourceGraph, annotations: Annotations): PipelineWarning[] {
  const annotator = new UserAnnotator(graph);
  annotator.apply(annotations);
  return annotator.warnings;
}

/**
 * Auto-annotations first, then the user's edits when given
 */
export function annotateGraph(
  graph: ResourceGraph,
  providers: readonly ProviderContext[],
  annotations?: Annotations
): AnnotationResult {
  const autoLinks = applyAutoAnnotations(graph, providers);
  const warnings = annotations ? applyUserAnnotations(graph, annotations) : [];
  if (annotations?.title !== undefined) {
    logger.info({ title: annotations.title }, 'Annotations applied');
  }
  return { title: annotations?.title, autoLinks, warnings };
}
