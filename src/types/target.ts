export const CHOICE_TYPE_NAMES = [
  'CharacterFeatureChoice',
  'CharacterLanguageChoice',
  'CharacterFeatChoice',
  'CharacterSkillChoice',
  'CharacterDeityChoice',
  'CharacterSubclassChoice',
  'CharacterDeityDomainChoice'
] as const;

export type ChoiceTypeName = (typeof CHOICE_TYPE_NAMES)[number];

export interface TargetOption {
  guid: string;
  name: string;
}

export interface TargetFeatureNode {
  /** One of the choice tags, or any other tag for wrapper nodes. */
  typeName: string;
  guid: string;
  name: string;
  description: string;
  categories: ReadonlySet<string>;
  options: readonly TargetOption[];
  children: readonly TargetFeatureNode[];
  useSubclass: boolean;
}

export interface LevelBucket<T> {
  level: number;
  features: T[];
}

export type LeveledTree<T> = LevelBucket<T>[];

export const CATALOG_TABLES = [
  'ancestries',
  'careers',
  'cultureAspects',
  'classes',
  'subclasses',
  'domains',
  'deities',
  'kits',
  'skills',
  'languages',
  'feats',
  'incitingIncidents'
] as const;

export type CatalogTableName = (typeof CATALOG_TABLES)[number];

export interface CatalogRow {
  id: string;
  name: string;
  hidden?: boolean;
  category?: string;
  /** Leveled feature definitions, for classes and subclasses. */
  levels?: unknown;
  /** Flat feature definitions, for ancestries, careers and culture aspects. */
  features?: unknown;
}

export interface CatalogMatch {
  id: string;
  row: CatalogRow;
}

export interface FeatureFilter {
  name?: string;
  description?: string;
}
