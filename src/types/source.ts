import type { LeveledTree } from './target.js';

export type SourceFeatureKind =
  | 'choice'
  | 'ability'
  | 'language-choice'
  | 'skill-choice'
  | 'perk'
  | 'class-ability'
  | 'domain'
  | 'domain-feature'
  | 'multiple-features'
  | 'subclass'
  | 'deity'
  | 'kit'
  | 'unknown';

export interface SelectedOption {
  id?: string;
  name: string;
  description?: string;
  featuresByLevel?: LeveledTree<SourceFeatureNode>;
}

interface SourceFeatureBase {
  id?: string;
  name?: string;
  /** The type string as the builder wrote it. */
  type: string;
}

export interface OptionFeature extends SourceFeatureBase {
  kind: 'choice' | 'ability' | 'domain' | 'kit';
  selected: SelectedOption[];
}

export interface NamedListFeature extends SourceFeatureBase {
  kind: 'language-choice' | 'skill-choice' | 'perk';
  selected: string[];
  listOptions: string[];
}

export interface ClassAbilityFeature extends SourceFeatureBase {
  kind: 'class-ability';
  selectedIds: string[];
}

export interface DomainFeatureSelection extends SourceFeatureBase {
  kind: 'domain-feature';
  selected: SourceFeatureNode[];
}

export interface MultipleFeatures extends SourceFeatureBase {
  kind: 'multiple-features';
  children: SourceFeatureNode[];
}

export interface SingleNameFeature extends SourceFeatureBase {
  kind: 'subclass' | 'deity';
  name: string;
}

export interface UnknownFeature extends SourceFeatureBase {
  kind: 'unknown';
}

export type SourceFeatureNode =
  | OptionFeature
  | NamedListFeature
  | ClassAbilityFeature
  | DomainFeatureSelection
  | MultipleFeatures
  | SingleNameFeature
  | UnknownFeature;

export interface SourceAbility {
  id: string;
  name: string;
  description?: string;
}

export interface SourceSubclass {
  name: string;
  selected: boolean;
  featuresByLevel: LeveledTree<SourceFeatureNode>;
}

export interface SourceCharacteristic {
  characteristic: string;
  value: number;
}

export interface SourceClass {
  name: string;
  level: number;
  characteristics: SourceCharacteristic[];
  featuresByLevel: LeveledTree<SourceFeatureNode>;
  abilities: SourceAbility[];
  subclasses: SourceSubclass[];
}

export interface SourceAncestry {
  name: string;
  features: SourceFeatureNode[];
}

export interface SourceCultureAspect {
  name: string;
  feature: SourceFeatureNode;
}

export interface SourceCulture {
  languages: string[];
  environment?: SourceCultureAspect;
  organization?: SourceCultureAspect;
  upbringing?: SourceCultureAspect;
}

export interface SourceIncitingIncidents {
  selectedId?: string;
  options: { id: string; name: string }[];
}

export interface SourceCareer {
  name: string;
  features: SourceFeatureNode[];
  incitingIncidents?: SourceIncitingIncidents;
}

/** An exported character after parsing; missing sections stay undefined. */
export interface SourceCharacter {
  name: string;
  ancestry?: SourceAncestry;
  culture?: SourceCulture;
  career?: SourceCareer;
  class?: SourceClass;
}
