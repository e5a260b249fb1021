import { resolveName } from '../catalog/catalog.js';
import { LeveledChoiceResolver } from '../lib/leveled.js';
import type { CultureImport, SourceCulture, SourceCultureAspect } from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';
import { mergePass, resolverOptions, type ImportContext } from './context.js';

const ASPECTS = [
  ['environment', 'environmentId'],
  ['organization', 'organizationId'],
  ['upbringing', 'upbringingId']
] as const satisfies readonly (readonly [keyof SourceCulture, keyof CultureImport])[];

function importAspect(label: string, aspect: SourceCultureAspect, ctx: ImportContext, log: ImportLog): string | undefined {
  log.info(`Processing Culture Aspect [${label}] [${aspect.name}]`);
  const match = resolveName(ctx.catalog, 'cultureAspects', aspect.name, log.nested());
  if (!match) {
    log.issue('unresolved-name', `Culture aspect [${aspect.name}] not found in catalog.`, {
      name: aspect.name,
      table: 'cultureAspects'
    });
    return undefined;
  }

  const resolver = new LeveledChoiceResolver(ctx.expand(match.row, ctx.levelCap), resolverOptions(ctx, log.nested()));
  if (!resolver.isEmpty) {
    mergePass(ctx, resolver.processFeature(aspect.feature));
  }
  return match.id;
}

export function importCulture(culture: SourceCulture | undefined, ctx: ImportContext) {
  const log = ctx.log.forSection('culture');
  if (!culture) {
    log.issue('malformed-section', 'Culture not found in import.');
    return;
  }

  log.info('Parsing Culture.');
  const [primaryLanguage] = culture.languages;
  if (primaryLanguage) {
    log.nested().info(`Setting primary culture language [${primaryLanguage}].`);
    const match = resolveName(ctx.catalog, 'languages', primaryLanguage, log.nested());
    if (match) {
      ctx.output.culture.languageId = match.id;
    } else {
      log.issue('unresolved-name', `Language [${primaryLanguage}] not found in catalog.`, {
        name: primaryLanguage,
        table: 'languages'
      });
    }
  }

  for (const [label, key] of ASPECTS) {
    const aspect = culture[label];
    if (!aspect) {
      log.nested().warn(`Culture Aspect [${label}] not found in import.`);
      continue;
    }
    const id = importAspect(label, aspect, ctx, log.nested());
    if (id) ctx.output.culture[key] = id;
  }
}
