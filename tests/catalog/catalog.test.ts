import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { normalizeCatalogRow, resolveName } from '../../src/catalog/catalog.js';
import { loadFileCatalog } from '../../src/catalog/files.js';
import { MemoryCatalog } from '../../src/catalog/memory.js';
import { ImportLog } from '../../src/utils/importLog.js';
import { CATALOG_DIR, row } from '../helpers.js';

describe('normalizeCatalogRow', () => {
  it('keeps the known fields and stringifies numeric ids', () => {
    expect(normalizeCatalogRow({ id: 7, name: 'Khelt', hidden: false, category: 'language', sort: 3 })).toEqual({
      id: '7',
      name: 'Khelt',
      category: 'language'
    });
  });

  it('rejects rows without an id or a name', () => {
    expect(normalizeCatalogRow({ name: 'Khelt' })).toBeUndefined();
    expect(normalizeCatalogRow({ id: 'l-1', name: '  ' })).toBeUndefined();
    expect(normalizeCatalogRow('Khelt')).toBeUndefined();
  });
});

describe('resolveName', () => {
  const log = new ImportLog();
  const catalog = new MemoryCatalog({
    skills: [row('sk-perf', 'Performance')],
    feats: [
      row('f-hidden', 'Lucky', { hidden: true }),
      row('f-lucky', 'Lucky'),
      row('f-old', 'Old Secret', { hidden: true }),
      row('f-tongue', "Devil's Tongue")
    ]
  });

  it('uses the exact index, case-insensitively', () => {
    expect(resolveName(catalog, 'skills', ' PERFORMANCE ', log)?.id).toBe('sk-perf');
  });

  it('translates before looking up', () => {
    expect(resolveName(catalog, 'skills', 'Perform', log)?.id).toBe('sk-perf');
  });

  it('falls through to a normalized scan', () => {
    expect(catalog.exactLookup('feats', 'Devils Tongue')).toBeUndefined();
    expect(resolveName(catalog, 'feats', 'Devils Tongue', log)?.id).toBe('f-tongue');
  });

  it('never returns hidden rows', () => {
    expect(resolveName(catalog, 'feats', 'Lucky', log)?.id).toBe('f-lucky');
    expect(resolveName(catalog, 'feats', 'Old Secret', log)).toBeUndefined();
  });

  it('returns undefined for empty names and empty tables', () => {
    expect(resolveName(catalog, 'feats', undefined, log)).toBeUndefined();
    expect(resolveName(catalog, 'kits', 'Mountain', log)).toBeUndefined();
  });
});

describe('MemoryCatalog', () => {
  it('appends rows loaded for the same table', () => {
    const catalog = new MemoryCatalog({ kits: [row('k1', 'Mountain')] });
    expect(catalog.rows('kits').map((entry) => entry.id)).toEqual(['k1']);
    expect(catalog.tableSizes()).toEqual({ kits: 1 });
  });
});

describe('loadFileCatalog', () => {
  it('loads table dumps and skips other files and bad rows', async () => {
    const catalog = await loadFileCatalog(CATALOG_DIR);

    expect(catalog.tableSizes()).toEqual({
      ancestries: 2,
      careers: 1,
      cultureAspects: 3,
      classes: 1,
      domains: 2,
      deities: 1,
      kits: 2,
      skills: 6,
      languages: 3,
      feats: 2,
      incitingIncidents: 1
    });
    expect(catalog.exactLookup('classes', 'conduit')?.id).toBe('class-conduit');
    expect(catalog.rows('careers')[0].name).toBe('Artisan');
  });

  it('fails for a missing directory', async () => {
    await expect(loadFileCatalog(join(CATALOG_DIR, 'missing'))).rejects.toThrow('does not exist');
  });
});
