import type { Catalog } from './catalog/catalog.js';
import { expandLeveledFeatures, type FeatureExpander } from './catalog/levels.js';
import { choicesToObject, createResult } from './lib/choices.js';
import { DEFAULT_SEARCH_DEPTH } from './lib/search.js';
import { importAncestry } from './sections/ancestry.js';
import { importAttributes } from './sections/attributes.js';
import { importCareer } from './sections/career.js';
import { importClass } from './sections/class.js';
import type { ImportContext } from './sections/context.js';
import { importCulture } from './sections/culture.js';
import { parseSourceCharacter } from './source.js';
import type { CharacterImport, ResolutionResult, SourceCharacter } from './types/index.js';
import { ImportLog } from './utils/importLog.js';

export interface ImportOptions {
  catalog: Catalog;
  log?: ImportLog;
  expand?: FeatureExpander;
  maxDepth?: number;
  /** Overrides the class level as the expansion cap. */
  levelCap?: number;
  domainLevelCap?: number;
  now?: () => number;
}

export interface ImportOutcome {
  character: CharacterImport;
  result: ResolutionResult;
}

/**
 * Runs every section import over an already parsed character. Each section is
 * independent: one that is missing or fails to resolve is reported in
 * `issues` and the others still run.
 */
export function importSourceCharacter(source: SourceCharacter, options: ImportOptions): ImportOutcome {
  const log = options.log ?? new ImportLog();
  const output: CharacterImport = {
    name: source.name,
    attributes: {},
    culture: {},
    classes: [],
    kitIds: [],
    levelChoices: {},
    issues: log.issues
  };

  const ctx: ImportContext = {
    catalog: options.catalog,
    log,
    expand: options.expand ?? expandLeveledFeatures,
    maxDepth: options.maxDepth ?? DEFAULT_SEARCH_DEPTH,
    levelCap: options.levelCap ?? source.class?.level ?? 1,
    domainLevelCap: options.domainLevelCap ?? 10,
    result: createResult(),
    output,
    now: options.now
  };

  log.info(`Import of [${source.name}] starting.`);
  importAttributes(source.class, ctx);
  importAncestry(source.ancestry, ctx);
  importCulture(source.culture, ctx);
  importCareer(source.career, ctx);
  importClass(source.class, ctx);

  output.levelChoices = choicesToObject(ctx.result.choices);
  log.info(`Import of [${source.name}] complete.`, {
    choices: ctx.result.choices.size,
    issues: log.issues.length
  });
  return { character: output, result: ctx.result };
}

export function importCharacter(raw: unknown, options: ImportOptions): CharacterImport {
  const log = options.log ?? new ImportLog();
  const source = parseSourceCharacter(raw, { maxDepth: options.maxDepth, log });
  return importSourceCharacter(source, { ...options, log }).character;
}
