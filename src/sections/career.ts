import { resolveName } from '../catalog/catalog.js';
import { LeveledChoiceResolver } from '../lib/leveled.js';
import { translate } from '../lib/names.js';
import type { SourceCareer, SourceIncitingIncidents } from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';
import { mergePass, resolverOptions, type ImportContext } from './context.js';

function importIncitingIncident(incidents: SourceIncitingIncidents, ctx: ImportContext, log: ImportLog) {
  const selectedId = incidents.selectedId?.toLowerCase();
  if (!selectedId) {
    log.info('No inciting incident selected.');
    return;
  }

  const option = incidents.options.find((entry) => entry.id.toLowerCase() === selectedId);
  if (!option) {
    log.warn(`Selected inciting incident [${incidents.selectedId}] is not among the options.`);
    return;
  }

  log.info(`Found Inciting Incident [${option.name}] in import.`);
  const name = translate(option.name);
  const match = resolveName(ctx.catalog, 'incitingIncidents', option.name, log.nested());
  if (!match) {
    log.issue('unresolved-name', `Inciting incident [${option.name}] not found in catalog; name kept.`, {
      name: option.name,
      table: 'incitingIncidents'
    });
    ctx.output.incitingIncident = { name };
    return;
  }
  ctx.output.incitingIncident = { name: match.row.name, id: match.id };
}

export function importCareer(career: SourceCareer | undefined, ctx: ImportContext) {
  const log = ctx.log.forSection('career');
  if (!career) {
    log.issue('malformed-section', 'Career not found in import.');
    return;
  }

  log.info(`Found Career [${career.name}] in import.`);
  const match = resolveName(ctx.catalog, 'careers', career.name, log.nested());
  if (match) {
    ctx.output.careerId = match.id;
    const resolver = new LeveledChoiceResolver(ctx.expand(match.row, ctx.levelCap), resolverOptions(ctx, log.nested()));
    if (!resolver.isEmpty) {
      mergePass(ctx, resolver.process(career.features));
    }
  } else {
    log.issue('unresolved-name', `Career [${career.name}] not found in catalog.`, {
      name: career.name,
      table: 'careers'
    });
  }

  if (career.incitingIncidents) {
    importIncitingIncident(career.incitingIncidents, ctx, log.nested());
  }
  log.info('Career complete.');
}
