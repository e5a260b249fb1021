import { resolveName } from '../catalog/catalog.js';
import { flattenLeveled } from '../catalog/levels.js';
import { extractDomains, extractKits, findSelectedSubclass, translateClassAbilities } from '../extract.js';
import { addChoice } from '../lib/choices.js';
import { LeveledChoiceResolver, resolveLeveled } from '../lib/leveled.js';
import { namesMatch } from '../lib/names.js';
import { DEFAULT_DEITY_NAME, domainFilterName } from '../lib/resolver.js';
import { findFeature } from '../lib/search.js';
import type {
  LeveledTree,
  OptionFeature,
  SelectedOption,
  SourceClass,
  SourceFeatureNode,
  TargetFeatureNode
} from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';
import { mergePass, resolverOptions, type ImportContext } from './context.js';

export const MAX_KITS = 2;
export const MAX_DOMAIN_SUBCLASSES = 2;

function importKits(kits: readonly SelectedOption[], ctx: ImportContext, log: ImportLog) {
  for (const kit of kits) {
    log.info(`Kit [${kit.name}] found in import.`);
    if (ctx.output.kitIds.length >= MAX_KITS) {
      log.nested().warn(`A character carries at most ${MAX_KITS} kits; [${kit.name}] ignored.`);
      continue;
    }
    const match = resolveName(ctx.catalog, 'kits', kit.name, log.nested());
    if (!match) {
      log.issue('unresolved-name', `Kit [${kit.name}] not found in catalog.`, { name: kit.name, table: 'kits' });
      continue;
    }
    log.nested().info(`Adding Kit ${ctx.output.kitIds.length + 1} [${kit.name}].`);
    ctx.output.kitIds.push(match.id);
  }
}

function findDomainNode(featuresByLevel: LeveledTree<SourceFeatureNode>): OptionFeature | undefined {
  for (const bucket of featuresByLevel) {
    for (const feature of bucket.features) {
      if (feature.kind === 'domain' && feature.selected.length) return feature;
    }
  }
  return undefined;
}

/** Attaches each selected domain's own feature picks, pulled from the domain-feature nodes. */
function withDomainFeatures(node: OptionFeature, featuresByLevel: LeveledTree<SourceFeatureNode>): OptionFeature {
  const extracted = extractDomains(featuresByLevel);
  return {
    ...node,
    selected: node.selected.map((domain) => {
      const features = extracted.get(domain.name);
      return features ? { ...domain, featuresByLevel: features } : domain;
    })
  };
}

/**
 * Classes whose deity slot is flagged `useSubclass` model each domain as a
 * subclass pick in the "1st Domain" / "2nd Domain" slots.
 */
function importDomainsAsSubclasses(
  cls: SourceClass,
  domainNode: OptionFeature,
  classTree: LeveledTree<TargetFeatureNode>,
  ctx: ImportContext,
  log: ImportLog
) {
  const extracted = extractDomains(cls.featuresByLevel);
  const scope = flattenLeveled(classTree);
  let count = 0;

  for (const domain of domainNode.selected) {
    log.info(`Domain [${domain.name}] found.`);
    const subclassName = domainFilterName(domain.name);
    const match = resolveName(ctx.catalog, 'subclasses', subclassName, log.nested());
    if (!match) {
      log.issue('unresolved-name', `Domain [${subclassName}] not found in catalog.`, {
        name: subclassName,
        table: 'subclasses'
      });
      continue;
    }

    count++;
    if (count > MAX_DOMAIN_SUBCLASSES) {
      log.nested().warn(`Too many domains; [${domain.name}] ignored.`);
      return;
    }

    const slotName = count === 2 ? '2nd Domain' : '1st Domain';
    const slot = findFeature(
      scope,
      { typeName: 'CharacterSubclassChoice', matches: (node) => namesMatch(node.name, slotName) },
      { maxDepth: ctx.maxDepth, log }
    );
    if (!slot) {
      log.issue('unmatched-slot', `No [${slotName}] subclass slot for domain [${domain.name}].`, {
        name: domain.name
      });
      continue;
    }

    log.nested().info(`Adding Domain [${subclassName}] as [${slotName}].`);
    addChoice(ctx.result.choices, slot.guid, match.id);
    ctx.result.featureData.set(slot.guid, slot);

    const features = extracted.get(domain.name) ?? domain.featuresByLevel ?? [];
    const domainTree = ctx.expand(match.row, Math.min(ctx.levelCap, ctx.domainLevelCap));
    mergePass(ctx, resolveLeveled(features, domainTree, resolverOptions(ctx, log.nested())));
  }
}

function importSubclass(cls: SourceClass, classResolver: LeveledChoiceResolver, ctx: ImportContext, log: ImportLog) {
  const subclass = findSelectedSubclass(cls.subclasses);
  if (!subclass) {
    log.info('No subclass selected in import.');
    return;
  }

  log.info(`Found selected Subclass [${subclass.name}] in import.`);
  mergePass(ctx, classResolver.processFeature({ kind: 'subclass', type: 'Subclass', name: subclass.name }));

  const match = resolveName(ctx.catalog, 'subclasses', subclass.name, log.nested());
  if (!match) return;

  const subclassTree = ctx.expand(match.row, ctx.levelCap);
  mergePass(ctx, resolveLeveled(subclass.featuresByLevel, subclassTree, resolverOptions(ctx, log.nested())));
  importKits(extractKits(subclass.featuresByLevel), ctx, log.nested());
}

/**
 * Class import: class and level, kits, the deity and domains (as subclasses
 * or through the resolver), the selected subclass, then the class features.
 */
export function importClass(cls: SourceClass | undefined, ctx: ImportContext) {
  const log = ctx.log.forSection('class');
  if (!cls) {
    log.issue('malformed-section', 'Class information not found in import.');
    return;
  }

  log.info(`Found Class [${cls.name}] Level [${cls.level}] in import.`);
  const match = resolveName(ctx.catalog, 'classes', cls.name, log.nested());
  if (!match) {
    log.issue('unresolved-name', `Class [${cls.name}] not found in catalog.`, { name: cls.name, table: 'classes' });
    return;
  }
  ctx.output.classes.push({ classId: match.id, level: cls.level });

  importKits(extractKits(cls.featuresByLevel), ctx, log.nested());

  const classTree = ctx.expand(match.row, ctx.levelCap);
  const classResolver = new LeveledChoiceResolver(classTree, resolverOptions(ctx, log.nested()));
  if (classResolver.isEmpty) {
    log.nested().info('No class features to process.');
    return;
  }

  const deitySlot = findFeature(
    flattenLeveled(classTree),
    { typeName: 'CharacterDeityChoice' },
    { maxDepth: ctx.maxDepth, log }
  );
  const domainNode = findDomainNode(cls.featuresByLevel);

  if (deitySlot?.useSubclass) {
    mergePass(ctx, classResolver.processFeature({ kind: 'deity', type: 'Deity', name: DEFAULT_DEITY_NAME }));
    if (domainNode) {
      importDomainsAsSubclasses(cls, domainNode, classTree, ctx, log.nested());
    }
  } else {
    if (domainNode) {
      mergePass(ctx, classResolver.processFeature(withDomainFeatures(domainNode, cls.featuresByLevel)));
    }
    importSubclass(cls, classResolver, ctx, log.nested());
  }

  log.info('Class features start.');
  const classFeatures = translateClassAbilities(cls.featuresByLevel, cls.abilities).filter(
    (feature) => feature.kind !== 'domain' && feature.kind !== 'domain-feature'
  );
  mergePass(ctx, classResolver.process(classFeatures));
  log.info('Class features complete.');
}
