import { resolveName } from '../catalog/catalog.js';
import { LeveledChoiceResolver } from '../lib/leveled.js';
import type { SourceAncestry } from '../types/index.js';
import { mergePass, resolverOptions, type ImportContext } from './context.js';

export function importAncestry(ancestry: SourceAncestry | undefined, ctx: ImportContext) {
  const log = ctx.log.forSection('ancestry');
  if (!ancestry) {
    log.issue('malformed-section', 'Ancestry not found in import.');
    return;
  }

  log.info(`Ancestry [${ancestry.name}] found in import.`);
  const match = resolveName(ctx.catalog, 'ancestries', ancestry.name, log.nested());
  if (!match) {
    log.issue('unresolved-name', `Ancestry [${ancestry.name}] not found in catalog.`, {
      name: ancestry.name,
      table: 'ancestries'
    });
    return;
  }
  ctx.output.ancestryId = match.id;

  const resolver = new LeveledChoiceResolver(ctx.expand(match.row, ctx.levelCap), resolverOptions(ctx, log.nested()));
  if (resolver.isEmpty) {
    log.nested().info('No ancestry features to process.');
    return;
  }
  mergePass(ctx, resolver.process(ancestry.features));
  log.info('Ancestry complete.');
}
