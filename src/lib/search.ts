import type { FeatureFilter, TargetFeatureNode } from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';
import { categoryKey, namePrefixMatches } from './names.js';

export const DEFAULT_SEARCH_DEPTH = 32;

export type FeaturePredicate = (node: TargetFeatureNode) => boolean;

export interface SearchScope {
  filter?: FeatureFilter;
  maxDepth?: number;
  log?: ImportLog;
}

export interface FeatureQuery {
  typeName: string;
  matches?: FeaturePredicate;
}

/** A node passes when every field the filter names starts with the expected value. */
export function passesFilter(node: TargetFeatureNode, filter?: FeatureFilter): boolean {
  if (!filter) return true;
  if (filter.name !== undefined && !namePrefixMatches(node.name, filter.name)) return false;
  if (filter.description !== undefined && !namePrefixMatches(node.description, filter.description)) return false;
  return true;
}

export function hasFilter(filter?: FeatureFilter): boolean {
  return filter !== undefined && (filter.name !== undefined || filter.description !== undefined);
}

function isType(node: TargetFeatureNode, typeName: string): boolean {
  return node.typeName.toLowerCase() === typeName.toLowerCase();
}

/** Requested categories match when any of them is on the node; none requested matches anything. */
export function categoriesMatch(node: TargetFeatureNode, requested: readonly string[]): boolean {
  if (!requested.length) return true;
  return requested.some((category) => node.categories.has(category.trim().toLowerCase()));
}

interface WalkState {
  exceeded: boolean;
}

function reportDepth(scope: SearchScope, state: WalkState, maxDepth: number) {
  if (state.exceeded) return;
  state.exceeded = true;
  scope.log?.issue('depth-exceeded', `Target feature search exceeded ${maxDepth} levels; deeper slots ignored.`);
}

/**
 * Finds the first node of the queried type. Every node at one level is tested
 * before any of their children, and children are searched in declaration
 * order. With a filter set, a node is eligible once it or an ancestor passes.
 */
export function findFeature(
  nodes: readonly TargetFeatureNode[],
  query: FeatureQuery,
  scope: SearchScope = {}
): TargetFeatureNode | undefined {
  const maxDepth = scope.maxDepth ?? DEFAULT_SEARCH_DEPTH;
  const state: WalkState = { exceeded: false };

  const search = (level: readonly TargetFeatureNode[], inherited: boolean, depth: number): TargetFeatureNode | undefined => {
    if (depth > maxDepth) {
      reportDepth(scope, state, maxDepth);
      return undefined;
    }

    const eligible = level.map((node) => inherited || passesFilter(node, scope.filter));
    for (const [index, node] of level.entries()) {
      if (eligible[index] && isType(node, query.typeName) && (query.matches?.(node) ?? true)) {
        return node;
      }
    }
    for (const [index, node] of level.entries()) {
      if (!node.children.length) continue;
      const found = search(node.children, eligible[index], depth + 1);
      if (found) return found;
    }
    return undefined;
  };

  return search(nodes, !hasFilter(scope.filter), 0);
}

/** Every eligible node of the queried type, in depth-first declaration order. */
export function collectFeatures(
  nodes: readonly TargetFeatureNode[],
  query: FeatureQuery,
  scope: SearchScope = {}
): TargetFeatureNode[] {
  const maxDepth = scope.maxDepth ?? DEFAULT_SEARCH_DEPTH;
  const state: WalkState = { exceeded: false };
  const found: TargetFeatureNode[] = [];

  const walk = (level: readonly TargetFeatureNode[], inherited: boolean, depth: number) => {
    if (depth > maxDepth) {
      reportDepth(scope, state, maxDepth);
      return;
    }
    for (const node of level) {
      const eligible = inherited || passesFilter(node, scope.filter);
      if (eligible && isType(node, query.typeName) && (query.matches?.(node) ?? true)) {
        found.push(node);
      }
      walk(node.children, eligible, depth + 1);
    }
  };

  walk(nodes, !hasFilter(scope.filter), 0);
  return found;
}

/** Category key → skill choice guid. The first slot declared for a key keeps it. */
export function indexSkillChoices(nodes: readonly TargetFeatureNode[], scope: SearchScope = {}): Map<string, string> {
  const index = new Map<string, string>();
  for (const node of collectFeatures(nodes, { typeName: 'CharacterSkillChoice' }, scope)) {
    const key = categoryKey(node.categories);
    if (!index.has(key)) index.set(key, node.guid);
  }
  return index;
}
