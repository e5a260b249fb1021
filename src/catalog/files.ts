import { basename, join } from 'node:path';
import { CATALOG_TABLES, type CatalogRow, type CatalogTableName } from '../types/index.js';
import { listJsonFiles, pathExists, readJson } from '../utils/fs.js';
import { log } from '../utils/log.js';
import { asArray, isRecord } from '../utils/values.js';
import { normalizeCatalogRow } from './catalog.js';
import { MemoryCatalog } from './memory.js';

function isCatalogTable(value: string): value is CatalogTableName {
  return CATALOG_TABLES.some((table) => table === value);
}

/** A dump is either an array of rows or `{ "data": [...] }` as exported from the CMS. */
function rowsFromDump(payload: unknown): unknown[] {
  if (isRecord(payload) && 'data' in payload) return asArray(payload.data);
  return asArray(payload);
}

/**
 * Loads `<table>.json` dumps from a directory. Subdirectories are searched as
 * well so packs can be split (`core/skills.json`, `homebrew/skills.json`).
 */
export async function loadFileCatalog(dir: string): Promise<MemoryCatalog> {
  if (!(await pathExists(dir))) {
    throw new Error(`Catalog directory ${dir} does not exist.`);
  }

  const files = await listJsonFiles(dir);
  const tables: Partial<Record<CatalogTableName, CatalogRow[]>> = {};

  for (const file of files) {
    const table = basename(file, '.json');
    if (!isCatalogTable(table)) {
      log.debug('Skipping non-table catalog file', { file });
      continue;
    }

    let payload: unknown;
    try {
      payload = await readJson(join(dir, file));
    } catch (error) {
      log.warn('Failed to read catalog file', { file, error: error instanceof Error ? error.message : String(error) });
      continue;
    }

    const rows: CatalogRow[] = [];
    let skipped = 0;
    for (const raw of rowsFromDump(payload)) {
      const row = normalizeCatalogRow(raw);
      if (row) rows.push(row);
      else skipped++;
    }
    if (skipped) {
      log.warn('Skipped catalog rows without id or name', { file, skipped });
    }
    tables[table] = [...(tables[table] ?? []), ...rows];
  }

  const catalog = new MemoryCatalog(tables);
  log.info('Loaded catalog from files', { dir, tables: catalog.tableSizes() });
  return catalog;
}
