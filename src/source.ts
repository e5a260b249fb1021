import type {
  LeveledTree,
  SelectedOption,
  SourceAbility,
  SourceAncestry,
  SourceCareer,
  SourceCharacter,
  SourceClass,
  SourceCulture,
  SourceCultureAspect,
  SourceFeatureKind,
  SourceFeatureNode,
  SourceSubclass
} from './types/index.js';
import { ImportLog } from './utils/importLog.js';
import { asArray, asRecordArray, isRecord, optionalNumber, optionalString, type AnyRecord } from './utils/values.js';

export const DEFAULT_MAX_DEPTH = 32;

const KIND_BY_TYPE: Record<string, SourceFeatureKind> = {
  choice: 'choice',
  ability: 'ability',
  'language choice': 'language-choice',
  'skill choice': 'skill-choice',
  perk: 'perk',
  'class ability': 'class-ability',
  domain: 'domain',
  'domain feature': 'domain-feature',
  'multiple features': 'multiple-features',
  subclass: 'subclass',
  deity: 'deity',
  kit: 'kit'
};

export function classifyFeatureType(type: string | undefined): SourceFeatureKind {
  return KIND_BY_TYPE[(type ?? '').trim().toLowerCase()] ?? 'unknown';
}

export interface SourceParseOptions {
  maxDepth?: number;
  log?: ImportLog;
}

interface ParseContext {
  maxDepth: number;
  log: ImportLog;
}

function toContext(options: SourceParseOptions): ParseContext {
  return {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    log: options.log ?? new ImportLog()
  };
}

function namedEntries(value: unknown): string[] {
  const names: string[] = [];
  for (const entry of asArray(value)) {
    if (typeof entry === 'string') {
      names.push(entry);
    } else if (isRecord(entry)) {
      const name = optionalString(entry.name);
      if (name) names.push(name);
    }
  }
  return names;
}

function parseSelectedOptions(value: unknown, ctx: ParseContext, depth: number): SelectedOption[] {
  const options: SelectedOption[] = [];
  for (const entry of asArray(value)) {
    if (typeof entry === 'string') {
      options.push({ name: entry });
      continue;
    }
    if (!isRecord(entry)) continue;
    const option: SelectedOption = { name: optionalString(entry.name) ?? '' };
    const id = optionalString(entry.id);
    if (id) option.id = id;
    const description = optionalString(entry.description);
    if (description) option.description = description;
    if (entry.featuresByLevel !== undefined) {
      option.featuresByLevel = parseLeveledTree(entry.featuresByLevel, ctx, depth + 1);
    }
    options.push(option);
  }
  return options;
}

function parseNode(raw: AnyRecord, ctx: ParseContext, depth: number): SourceFeatureNode | undefined {
  if (depth > ctx.maxDepth) {
    ctx.log.issue('depth-exceeded', `Source feature nesting exceeds ${ctx.maxDepth} levels; subtree dropped.`, {
      name: optionalString(raw.name)
    });
    return undefined;
  }

  const type = optionalString(raw.type) ?? '';
  const kind = classifyFeatureType(type);
  const data = isRecord(raw.data) ? raw.data : {};
  const base = { type, id: optionalString(raw.id), name: optionalString(raw.name) };

  switch (kind) {
    case 'choice':
    case 'ability':
    case 'domain':
    case 'kit':
      return { ...base, kind, selected: parseSelectedOptions(data.selected, ctx, depth) };
    case 'language-choice':
    case 'skill-choice':
    case 'perk':
      return {
        ...base,
        kind,
        selected: namedEntries(data.selected),
        listOptions: namedEntries(data.listOptions)
      };
    case 'class-ability':
      return {
        ...base,
        kind,
        selectedIds: asArray(data.selectedIDs ?? data.selectedIds).filter(
          (id): id is string => typeof id === 'string'
        )
      };
    case 'domain-feature':
      return { ...base, kind, selected: parseFeatureList(data.selected, ctx, depth + 1) };
    case 'multiple-features':
      return { ...base, kind, children: parseFeatureList(data.features, ctx, depth + 1) };
    case 'subclass':
    case 'deity':
      return { ...base, kind, name: base.name ?? '' };
    default:
      return { ...base, kind: 'unknown' };
  }
}

function parseFeatureList(value: unknown, ctx: ParseContext, depth: number): SourceFeatureNode[] {
  const nodes: SourceFeatureNode[] = [];
  for (const entry of asRecordArray(value)) {
    const node = parseNode(entry, ctx, depth);
    if (node) nodes.push(node);
  }
  return nodes;
}

function parseLeveledTree(value: unknown, ctx: ParseContext, depth: number): LeveledTree<SourceFeatureNode> {
  return asRecordArray(value).map((bucket) => ({
    level: optionalNumber(bucket.level) ?? 0,
    features: parseFeatureList(bucket.features, ctx, depth)
  }));
}

export function parseSourceFeature(
  raw: unknown,
  options: SourceParseOptions = {}
): SourceFeatureNode | undefined {
  if (!isRecord(raw)) return undefined;
  return parseNode(raw, toContext(options), 0);
}

export function parseSourceFeatures(raw: unknown, options: SourceParseOptions = {}): SourceFeatureNode[] {
  return parseFeatureList(raw, toContext(options), 0);
}

export function parseSourceLeveled(
  raw: unknown,
  options: SourceParseOptions = {}
): LeveledTree<SourceFeatureNode> {
  return parseLeveledTree(raw, toContext(options), 0);
}

function parseAncestry(raw: AnyRecord, ctx: ParseContext): SourceAncestry | undefined {
  const name = optionalString(raw.name);
  if (!name) return undefined;
  return { name, features: parseFeatureList(raw.features, ctx, 0) };
}

function parseCultureAspect(raw: unknown, ctx: ParseContext): SourceCultureAspect | undefined {
  if (!isRecord(raw)) return undefined;
  const name = optionalString(raw.name);
  const feature = parseNode(raw, ctx, 0);
  if (!name || !feature) return undefined;
  return { name, feature };
}

function parseCulture(raw: AnyRecord, ctx: ParseContext): SourceCulture {
  return {
    languages: namedEntries(raw.languages),
    environment: parseCultureAspect(raw.environment, ctx),
    organization: parseCultureAspect(raw.organization, ctx),
    upbringing: parseCultureAspect(raw.upbringing, ctx)
  };
}

function parseCareer(raw: AnyRecord, ctx: ParseContext): SourceCareer | undefined {
  const name = optionalString(raw.name);
  if (!name) return undefined;
  const career: SourceCareer = { name, features: parseFeatureList(raw.features, ctx, 0) };
  if (isRecord(raw.incitingIncidents)) {
    const incidents = raw.incitingIncidents;
    career.incitingIncidents = {
      selectedId: optionalString(incidents.selectedID ?? incidents.selectedId),
      options: asRecordArray(incidents.options).flatMap((option) => {
        const id = optionalString(option.id);
        const optionName = optionalString(option.name);
        return id && optionName ? [{ id, name: optionName }] : [];
      })
    };
  }
  return career;
}

function parseAbilities(value: unknown): SourceAbility[] {
  return asRecordArray(value).flatMap((entry) => {
    const id = optionalString(entry.id);
    const name = optionalString(entry.name);
    if (!id || !name) return [];
    const description = optionalString(entry.description);
    return [description ? { id, name, description } : { id, name }];
  });
}

function parseSubclasses(value: unknown, ctx: ParseContext): SourceSubclass[] {
  return asRecordArray(value).flatMap((entry) => {
    const name = optionalString(entry.name);
    if (!name) return [];
    return [
      {
        name,
        selected: entry.selected === true,
        featuresByLevel: parseLeveledTree(entry.featuresByLevel, ctx, 0)
      }
    ];
  });
}

function parseClass(raw: AnyRecord, ctx: ParseContext): SourceClass | undefined {
  const name = optionalString(raw.name);
  const level = optionalNumber(raw.level);
  if (!name || level === undefined) return undefined;
  return {
    name,
    level,
    characteristics: asRecordArray(raw.characteristics).flatMap((entry) => {
      const characteristic = optionalString(entry.characteristic);
      const value = optionalNumber(entry.value);
      return characteristic && value !== undefined ? [{ characteristic, value }] : [];
    }),
    featuresByLevel: parseLeveledTree(raw.featuresByLevel, ctx, 0),
    abilities: parseAbilities(raw.abilities),
    subclasses: parseSubclasses(raw.subclasses, ctx)
  };
}

/**
 * Parses an exported character into typed sections. Sections that are absent
 * or lack their identifying name come back undefined.
 */
export function parseSourceCharacter(raw: unknown, options: SourceParseOptions = {}): SourceCharacter {
  const ctx = toContext(options);
  const root = isRecord(raw) ? raw : {};
  return {
    name: optionalString(root.name) ?? 'Unnamed Character',
    ancestry: isRecord(root.ancestry) ? parseAncestry(root.ancestry, ctx) : undefined,
    culture: isRecord(root.culture) ? parseCulture(root.culture, ctx) : undefined,
    career: isRecord(root.career) ? parseCareer(root.career, ctx) : undefined,
    class: isRecord(root.class) ? parseClass(root.class, ctx) : undefined
  };
}
