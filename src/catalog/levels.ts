import type { CatalogRow, LeveledTree, TargetFeatureNode, TargetOption } from '../types/index.js';
import { log } from '../utils/log.js';
import { asArray, asRecordArray, isRecord, optionalNumber, optionalString, type AnyRecord } from '../utils/values.js';

const MAX_TARGET_DEPTH = 32;

/**
 * Accepts `["lore", "Exploration"]` or `{ lore: true, exploration: false }`.
 * Underscored keys in the map form are export metadata, not categories.
 */
export function normalizeCategories(raw: unknown): Set<string> {
  const categories = new Set<string>();
  if (Array.isArray(raw)) {
    for (const entry of raw) {
      if (typeof entry === 'string' && entry.trim()) categories.add(entry.trim().toLowerCase());
    }
  } else if (isRecord(raw)) {
    for (const [tag, enabled] of Object.entries(raw)) {
      if (enabled === true && !tag.startsWith('_')) categories.add(tag.trim().toLowerCase());
    }
  }
  return categories;
}

function parseOptions(raw: unknown): TargetOption[] {
  return asRecordArray(raw).flatMap((entry) => {
    const guid = optionalString(entry.guid ?? entry.id);
    const name = optionalString(entry.name);
    return guid && name ? [{ guid, name }] : [];
  });
}

function parseNode(raw: AnyRecord, depth: number): TargetFeatureNode {
  const nested = raw.features ?? raw.children;
  let children: TargetFeatureNode[] = [];
  if (nested !== undefined) {
    if (depth >= MAX_TARGET_DEPTH) {
      log.warn('Target feature nesting too deep; children dropped', {
        guid: optionalString(raw.guid),
        depth
      });
    } else {
      children = asRecordArray(nested).map((child) => parseNode(child, depth + 1));
    }
  }

  return {
    typeName: optionalString(raw.typeName) ?? '',
    guid: optionalString(raw.guid) ?? '',
    name: optionalString(raw.name) ?? '',
    description: optionalString(raw.description) ?? '',
    categories: normalizeCategories(raw.categories),
    options: parseOptions(raw.options),
    children,
    useSubclass: raw.useSubclass === true
  };
}

export function parseTargetFeatures(raw: unknown): TargetFeatureNode[] {
  return asRecordArray(raw).map((entry) => parseNode(entry, 0));
}

/** Buckets arrive as `[{ level, features }]` or as `{ "1": [...], "2": [...] }`. */
function rawLevelBuckets(raw: unknown): { level: number; features: unknown }[] {
  if (Array.isArray(raw)) {
    return asRecordArray(raw).flatMap((bucket) => {
      const level = optionalNumber(bucket.level);
      return level === undefined ? [] : [{ level, features: bucket.features }];
    });
  }
  if (isRecord(raw)) {
    return Object.entries(raw).flatMap(([key, features]) => {
      const level = optionalNumber(key);
      return level === undefined ? [] : [{ level, features }];
    });
  }
  return [];
}

export function parseTargetLeveled(raw: unknown): LeveledTree<TargetFeatureNode> {
  return rawLevelBuckets(raw).map(({ level, features }) => ({
    level,
    features: parseTargetFeatures(features)
  }));
}

export type FeatureExpander = (entity: CatalogRow, levelCap: number) => LeveledTree<TargetFeatureNode>;

/**
 * Expands a catalog entity into its available choice slots up to `levelCap`.
 * Flat `features` (ancestries, careers, culture aspects) land in a level 1
 * bucket ahead of any leveled ones.
 */
export const expandLeveledFeatures: FeatureExpander = (entity, levelCap) => {
  const tree: LeveledTree<TargetFeatureNode> = [];
  const flat = asArray(entity.features);
  if (flat.length) {
    tree.push({ level: 1, features: parseTargetFeatures(flat) });
  }
  for (const bucket of parseTargetLeveled(entity.levels)) {
    if (bucket.level <= levelCap && bucket.features.length) {
      tree.push(bucket);
    }
  }
  return tree;
};

/** Top-level features of every bucket, in bucket order. */
export function flattenLeveled<T>(tree: LeveledTree<T>): T[] {
  return tree.flatMap((bucket) => bucket.features);
}
