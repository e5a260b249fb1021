import type { ImportIssue } from '../utils/importLog.js';
import type { TargetFeatureNode } from './target.js';

export type ChoiceValue = string | string[];

export type ChoiceMap = Map<string, ChoiceValue>;

export type FeatureDataMap = Map<string, TargetFeatureNode>;

export interface ResolutionResult {
  choices: ChoiceMap;
  featureData: FeatureDataMap;
}

export interface CharacterAttributes {
  mgt?: number;
  agl?: number;
  rea?: number;
  inu?: number;
  prs?: number;
}

export interface CultureImport {
  languageId?: string;
  environmentId?: string;
  organizationId?: string;
  upbringingId?: string;
}

export interface ClassImport {
  classId: string;
  level: number;
}

export interface IncitingIncidentImport {
  name: string;
  id?: string;
}

export interface CharacterImport {
  name: string;
  attributes: CharacterAttributes;
  ancestryId?: string;
  culture: CultureImport;
  careerId?: string;
  incitingIncident?: IncitingIncidentImport;
  classes: ClassImport[];
  kitIds: string[];
  levelChoices: Record<string, ChoiceValue>;
  issues: ImportIssue[];
}
