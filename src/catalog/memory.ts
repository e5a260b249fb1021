import { CATALOG_TABLES, type CatalogRow, type CatalogTableName } from '../types/index.js';
import type { Catalog } from './catalog.js';

export type CatalogTables = Partial<Record<CatalogTableName, CatalogRow[]>>;

function exactKey(name: string): string {
  return name.trim().toLowerCase();
}

export class MemoryCatalog implements Catalog {
  private tables = new Map<CatalogTableName, CatalogRow[]>();
  private exact = new Map<CatalogTableName, Map<string, CatalogRow>>();

  constructor(tables: CatalogTables = {}) {
    for (const table of CATALOG_TABLES) {
      const rows = tables[table];
      if (rows) this.load(table, rows);
    }
  }

  protected load(table: CatalogTableName, rows: readonly CatalogRow[]) {
    const existing = this.tables.get(table) ?? [];
    const merged = [...existing, ...rows];
    this.tables.set(table, merged);

    const index = this.exact.get(table) ?? new Map<string, CatalogRow>();
    for (const row of rows) {
      const key = exactKey(row.name);
      if (!row.hidden && !index.has(key)) {
        index.set(key, row);
      }
    }
    this.exact.set(table, index);
  }

  rows(table: CatalogTableName): readonly CatalogRow[] {
    return this.tables.get(table) ?? [];
  }

  exactLookup(table: CatalogTableName, name: string): CatalogRow | undefined {
    return this.exact.get(table)?.get(exactKey(name));
  }

  tableSizes(): Record<string, number> {
    return Object.fromEntries([...this.tables.entries()].map(([table, rows]) => [table, rows.length]));
  }
}
