/**
 * Relationship Inferencer
 * @module detectors/relationship-inferencer
 *
 * Adds edges between nodes by scanning resolved metadata for other nodes'
 * identifiers, plus keyword-driven implied connections. Hidden nodes are
 * removed once inference is done.
 */

import type { ResourceGraph } from '../graph/resource-graph';
import { createModuleLogger, timed } from '../logging';
import type { NodeId } from '../types/graph';
import { attributeToSearchText, walkLeaves } from '../utils/attributes';
import {
  instanceNumberOf,
  localIdOf,
  modulePathOf,
  stripModulePrefix,
} from '../utils/node-id';

const logger = createModuleLogger('relationship-inferencer');

// ============================================================================
// Types
// ============================================================================

/**
 * Provider rules consulted during inference, merged across active providers
 */
export interface InferenceRules {
  /** Types whose nodes produce no outgoing inferred edges */
  readonly skipRelationsFrom: readonly string[];
  /** Keyword to target type prefix */
  readonly impliedConnections: Readonly<Record<string, string>>;
  /** Text fragments that flip the inferred direction, earlier entries win */
  readonly reverseArrowPrefixes: readonly string[];
  /** Types removed after inference */
  readonly hiddenPrefixes: readonly string[];
  /** Top-level metadata keys never scanned */
  readonly inferenceSkipKeys: readonly string[];
}

export const EMPTY_INFERENCE_RULES: InferenceRules = {
  skipRelationsFrom: [],
  impliedConnections: {},
  reverseArrowPrefixes: [],
  hiddenPrefixes: [],
  inferenceSkipKeys: [],
};

export interface RelationshipInferenceInput {
  readonly graph: ResourceGraph;
  readonly rules: InferenceRules;
  /** Node identifiers to hide, in addition to `hiddenPrefixes` */
  readonly hidden?: readonly NodeId[];
}

export interface RelationshipInferenceOptions {
  /** Remove hidden nodes once edges are inferred */
  readonly hideNodes: boolean;
}

export const DEFAULT_RELATIONSHIP_INFERENCE_OPTIONS: RelationshipInferenceOptions = {
  hideNodes: true,
};

export interface RelationshipInferenceResult {
  readonly edgesCreated: number;
  readonly impliedEdges: number;
  readonly reversedEdges: number;
  readonly hiddenNodes: readonly NodeId[];
}

interface MatchKey {
  readonly pattern: RegExp;
  /** Candidate targets for this key */
  readonly nodes: readonly NodeId[];
  /** Local keys match any instance; full keys only their own node */
  readonly local: boolean;
}

interface InferredEdge {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly implied: boolean;
  readonly reversed: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tokenPattern(key: string): RegExp {
  // Optional [index] after the key is captured for instance matching
  return new RegExp(`(?<![\\w.-])${escapeRegExp(key)}(?![\\w~-])(?:\\[(\\d+)\\])?`, 'g');
}

function startsWithAny(id: NodeId, prefixes: readonly string[]): boolean {
  const local = stripModulePrefix(id);
  return prefixes.some((prefix) => local.startsWith(prefix));
}

// ============================================================================
// Relationship Inferencer
// ============================================================================

export class RelationshipInferencer {
  private readonly options: RelationshipInferenceOptions;

  constructor(options: Partial<RelationshipInferenceOptions> = {}) {
    this.options = { ...DEFAULT_RELATIONSHIP_INFERENCE_OPTIONS, ...options };
  }

  infer(input: RelationshipInferenceInput): RelationshipInferenceResult {
    const { result, duration } = timed(() => this.run(input));
    logger.inferenceCompleted(result.edgesCreated, duration);
    return result;
  }

  private run(input: RelationshipInferenceInput): RelationshipInferenceResult {
    const { graph, rules } = input;
    const keys = this.buildMatchKeys(graph);

    // Collect first, apply after the scan
    const inferred: InferredEdge[] = [];
    for (const source of graph.nodeIds()) {
      if (startsWithAny(source, rules.skipRelationsFrom)) {
        continue;
      }
      inferred.push(...this.inferForNode(graph, source, keys, rules));
    }

    let edgesCreated = 0;
    let impliedEdges = 0;
    let reversedEdges = 0;

    for (const edge of inferred) {
      if (edge.reversed && graph.hasEdge(edge.to, edge.from)) {
        continue;
      }
      if (!graph.addEdge(edge.from, edge.to)) {
        continue;
      }
      edgesCreated++;
      if (edge.implied) {
        impliedEdges++;
      }
      if (edge.reversed) {
        reversedEdges++;
      }
      this.dropUnnumberedDuplicate(graph, edge);
    }

    const hiddenNodes = this.options.hideNodes ? this.hideNodes(graph, rules, input.hidden ?? []) : [];

    return { edgesCreated, impliedEdges, reversedEdges, hiddenNodes };
  }

  // ==========================================================================
  // Identifier Matching
  // ==========================================================================

  private buildMatchKeys(graph: ResourceGraph): MatchKey[] {
    const full = new Map<string, NodeId[]>();
    const local = new Map<string, NodeId[]>();

    for (const id of graph.nodeIds()) {
      full.set(id, [id]);
      const localId = localIdOf(id);
      if (localId !== id) {
        local.set(localId, [...(local.get(localId) ?? []), id]);
      }
    }

    // A root identifier that is also a module node's local identifier
    // becomes one scoped key
    for (const [key, nodes] of local) {
      const root = full.get(key);
      if (root) {
        local.set(key, [...root, ...nodes]);
        full.delete(key);
      }
    }

    return [
      ...[...full.entries()].map(([key, nodes]) => ({ pattern: tokenPattern(key), nodes, local: false })),
      ...[...local.entries()].map(([key, nodes]) => ({ pattern: tokenPattern(key), nodes, local: true })),
    ];
  }

  private inferForNode(
    graph: ResourceGraph,
    source: NodeId,
    keys: readonly MatchKey[],
    rules: InferenceRules
  ): InferredEdge[] {
    const edges: InferredEdge[] = [];
    const sourceScope = modulePathOf(source);
    const sourceInstance = instanceNumberOf(source);

    for (const [key, value] of Object.entries(graph.getMetadata(source))) {
      if (rules.inferenceSkipKeys.includes(key)) {
        continue;
      }

      for (const leaf of walkLeaves(value, [key])) {
        const text = attributeToSearchText(leaf.value);
        const matched = this.matchIdentifiers(text, keys, source, sourceScope);
        const implied = this.matchImplied(graph, `${leaf.path.join('.')} ${text}`, source, rules);
        const reversed = this.shouldReverse(text, source, rules.reverseArrowPrefixes);

        for (const target of matched) {
          const targetInstance = instanceNumberOf(target);
          if (sourceInstance !== null && targetInstance !== null && sourceInstance !== targetInstance) {
            continue;
          }
          edges.push(
            reversed
              ? { from: target, to: source, implied: false, reversed: true }
              : { from: source, to: target, implied: false, reversed: false }
          );
        }
        for (const target of implied) {
          if (!matched.includes(target)) {
            edges.push({ from: source, to: target, implied: true, reversed: false });
          }
        }
      }
    }

    return edges;
  }

  /**
   * Nodes named in a text as whole tokens. A local key prefers nodes in the
   * source's own module; `key[i]` selects instance `~(i+1)`.
   */
  private matchIdentifiers(
    text: string,
    keys: readonly MatchKey[],
    source: NodeId,
    sourceScope: string
  ): NodeId[] {
    const found: NodeId[] = [];

    for (const key of keys) {
      key.pattern.lastIndex = 0;
      const match = key.pattern.exec(text);
      if (!match) {
        continue;
      }

      let candidates = key.nodes;
      if (key.local) {
        const sameScope = candidates.filter((id) => modulePathOf(id) === sourceScope);
        if (sameScope.length > 0) {
          candidates = sameScope;
        }
        const index = match[1];
        if (index !== undefined) {
          const instance = parseInt(index, 10) + 1;
          candidates = candidates.filter((id) => {
            const number = instanceNumberOf(id);
            return number === null || number === instance;
          });
        }
      }

      for (const candidate of candidates) {
        if (candidate !== source && !found.includes(candidate)) {
          found.push(candidate);
        }
      }
    }

    return found;
  }

  /**
   * Targets of implied connections whose keyword occurs in the text. The
   * nearest node of the target type wins: same module first, then graph order.
   */
  private matchImplied(graph: ResourceGraph, text: string, source: NodeId, rules: InferenceRules): NodeId[] {
    const targets: NodeId[] = [];
    const sourceScope = modulePathOf(source);

    for (const [keyword, targetPrefix] of Object.entries(rules.impliedConnections)) {
      if (!text.includes(keyword)) {
        continue;
      }
      const candidates = graph
        .nodeIds()
        .filter((id) => id !== source && stripModulePrefix(id).startsWith(targetPrefix));
      const target = candidates.find((id) => modulePathOf(id) === sourceScope) ?? candidates[0];
      if (target !== undefined && !targets.includes(target)) {
        targets.push(target);
      }
    }

    return targets;
  }

  private shouldReverse(text: string, source: NodeId, prefixes: readonly string[]): boolean {
    const originIndex = prefixes.findIndex((prefix) => text.includes(prefix));
    if (originIndex === -1) {
      return false;
    }
    // Both ends named: the earlier entry decides
    const sourceIndex = prefixes.findIndex((prefix) => source.includes(prefix));
    return !(sourceIndex !== -1 && sourceIndex < originIndex);
  }

  /**
   * A numbered edge supersedes an edge to the unnumbered base of the same target
   */
  private dropUnnumberedDuplicate(graph: ResourceGraph, edge: InferredEdge): void {
    const fromInstance = instanceNumberOf(edge.from);
    const toInstance = instanceNumberOf(edge.to);
    if (fromInstance === null || toInstance === null) {
      return;
    }
    const base = edge.to.slice(0, edge.to.lastIndexOf('~'));
    graph.removeEdge(edge.from, base);
  }

  // ==========================================================================
  // Hidden Nodes
  // ==========================================================================

  private hideNodes(graph: ResourceGraph, rules: InferenceRules, hidden: readonly NodeId[]): NodeId[] {
    const removed: NodeId[] = [];
    for (const id of graph.nodeIds()) {
      if (hidden.includes(id) || startsWithAny(id, rules.hiddenPrefixes)) {
        graph.removeNode(id);
        removed.push(id);
      }
    }
    return removed;
  }
}

/**
 * Merge inference rules of several providers, keeping first-seen order
 */
export function mergeInferenceRules(rules: readonly InferenceRules[]): InferenceRules {
  const unique = (lists: readonly (readonly string[])[]): string[] => [...new Set(lists.flat())];
  const implied: Record<string, string> = {};
  for (const entry of rules) {
    for (const [keyword, target] of Object.entries(entry.impliedConnections)) {
      if (!(keyword in implied)) {
        implied[keyword] = target;
      }
    }
  }
  return {
    skipRelationsFrom: unique(rules.map((entry) => entry.skipRelationsFrom)),
    impliedConnections: implied,
    reverseArrowPrefixes: unique(rules.map((entry) => entry.reverseArrowPrefixes)),
    hiddenPrefixes: unique(rules.map((entry) => entry.hiddenPrefixes)),
    inferenceSkipKeys: unique(rules.map((entry) => entry.inferenceSkipKeys)),
  };
}

export function createRelationshipInferencer(
  options: Partial<RelationshipInferenceOptions> = {}
): RelationshipInferencer {
  return new RelationshipInferencer(options);
}
