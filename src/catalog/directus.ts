import { collectionFor, type ImportConfig } from '../config/import.js';
import { CATALOG_TABLES, type CatalogRow } from '../types/index.js';
import { readByQuery } from '../utils/directus.js';
import { log } from '../utils/log.js';
import type { AnyRecord } from '../utils/values.js';
import { normalizeCatalogRow } from './catalog.js';
import { MemoryCatalog } from './memory.js';

export type PageReader = (collection: string, query: Record<string, unknown>) => Promise<AnyRecord[]>;

const PAGE_SIZE = 200;
const FIELDS = ['id', 'name', 'hidden', 'category', 'levels', 'features'];

async function fetchRows(read: PageReader, collection: string): Promise<CatalogRow[]> {
  let offset = 0;
  const rows: CatalogRow[] = [];

  while (true) {
    const batch = await read(collection, { fields: FIELDS, limit: PAGE_SIZE, offset });
    if (!batch.length) break;
    for (const raw of batch) {
      const row = normalizeCatalogRow(raw);
      if (row) {
        rows.push(row);
      } else {
        log.warn('Skipping catalog row without id or name', { collection, id: raw.id });
      }
    }
    if (batch.length < PAGE_SIZE) break;
    offset += PAGE_SIZE;
  }

  return rows;
}

/**
 * Catalog read from a Directus instance. Matching is synchronous, so every
 * table is pulled into memory by `warmup()` before the import starts; until
 * then every table reads as empty.
 */
export class DirectusCatalog extends MemoryCatalog {
  private warmed = false;
  private readonly config: Pick<ImportConfig, 'collections' | 'directusUrl' | 'directusToken'>;
  private readonly read: PageReader;

  constructor(
    config: Pick<ImportConfig, 'collections' | 'directusUrl' | 'directusToken'>,
    read?: PageReader
  ) {
    super();
    this.config = config;
    this.read =
      read ??
      ((collection, query) =>
        readByQuery(collection, query, { url: config.directusUrl, token: config.directusToken }));
  }

  get isWarm(): boolean {
    return this.warmed;
  }

  async warmup(): Promise<void> {
    if (this.warmed) return;
    for (const table of CATALOG_TABLES) {
      const collection = collectionFor(this.config, table);
      const rows = await fetchRows(this.read, collection);
      this.load(table, rows);
      log.debug('Warmed catalog table', { table, collection, rows: rows.length });
    }
    this.warmed = true;
    log.info('Loaded catalog from Directus', { tables: this.tableSizes() });
  }
}
