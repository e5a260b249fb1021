import type { Catalog } from '../catalog/catalog.js';
import type { FeatureExpander } from '../catalog/levels.js';
import { mergeResults } from '../lib/choices.js';
import type { LeveledResolverOptions } from '../lib/leveled.js';
import type { CharacterImport, ResolutionResult } from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';

/** State shared by the section importers of one character. */
export interface ImportContext {
  catalog: Catalog;
  log: ImportLog;
  expand: FeatureExpander;
  maxDepth: number;
  /** Level used to expand class, subclass and background slots. */
  levelCap: number;
  domainLevelCap: number;
  /** Running choices table every pass is merged into. */
  result: ResolutionResult;
  output: CharacterImport;
  now?: () => number;
}

export function resolverOptions(ctx: ImportContext, log: ImportLog): LeveledResolverOptions {
  return { catalog: ctx.catalog, log, maxDepth: ctx.maxDepth, now: ctx.now };
}

export function mergePass(ctx: ImportContext, pass: ResolutionResult) {
  mergeResults(ctx.result, pass);
}
