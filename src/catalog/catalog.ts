import { namesMatch, translate } from '../lib/names.js';
import type { CatalogMatch, CatalogRow, CatalogTableName } from '../types/index.js';
import type { ImportLog } from '../utils/importLog.js';
import { isRecord, optionalString } from '../utils/values.js';

/** Read-only access to the target system's tables. */
export interface Catalog {
  rows(table: CatalogTableName): readonly CatalogRow[];
  /** Curated fast path; may miss names that only match after normalization. */
  exactLookup(table: CatalogTableName, name: string): CatalogRow | undefined;
}

export function normalizeCatalogRow(raw: unknown): CatalogRow | undefined {
  if (!isRecord(raw)) return undefined;
  const id = raw.id;
  const name = optionalString(raw.name);
  if ((typeof id !== 'string' && typeof id !== 'number') || !name) return undefined;

  const row: CatalogRow = { id: String(id), name };
  if (raw.hidden === true) row.hidden = true;
  const category = optionalString(raw.category);
  if (category) row.category = category;
  if (raw.levels !== undefined) row.levels = raw.levels;
  if (raw.features !== undefined) row.features = raw.features;
  return row;
}

/**
 * Resolves a builder-side name to a catalog row: translated first, then the
 * exact index, then a normalized scan of every visible row. First match wins.
 */
export function resolveName(
  catalog: Catalog,
  table: CatalogTableName,
  name: string | undefined,
  log: ImportLog
): CatalogMatch | undefined {
  if (!name) return undefined;
  const translated = translate(name);
  if (translated !== name) {
    log.debug(`Translated [${name}] to [${translated}]`, { table });
  }

  const exact = catalog.exactLookup(table, translated);
  if (exact && !exact.hidden) {
    return { id: exact.id, row: exact };
  }

  log.debug(`Lookup fallthrough table [${table}] -> [${translated}]`);
  for (const row of catalog.rows(table)) {
    if (!row.hidden && namesMatch(row.name, translated)) {
      return { id: row.id, row };
    }
  }
  return undefined;
}
