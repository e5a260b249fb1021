import { CATALOG_TABLES, type CatalogTableName } from '../types/index.js';
import { log } from '../utils/log.js';

export type CatalogSource = 'files' | 'directus';

export interface ImportConfig {
  catalogSource: CatalogSource;
  catalogDir: string;
  maxDepth: number;
  /** Overrides the class level when expanding class and subclass slots. */
  levelCap?: number;
  /** Level up to which domain subclasses are expanded. */
  domainLevelCap: number;
  collections: Partial<Record<CatalogTableName, string>>;
  directusUrl?: string;
  directusToken?: string;
}

type Env = Record<string, string | undefined>;

function normalizeToken(value: string): string | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  return trimmed.toLowerCase();
}

function parseCatalogSource(raw: string | undefined, defaultValue: CatalogSource): CatalogSource {
  if (!raw) return defaultValue;
  const normalized = normalizeToken(raw);
  if (normalized === 'files' || normalized === 'directus') return normalized;
  log.warn('Unknown CATALOG_SOURCE, falling back to default', { value: raw, defaultValue });
  return defaultValue;
}

function parsePositiveInteger(name: string, raw: string | undefined, defaultValue: number): number {
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw.trim());
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  log.warn(`Unable to parse ${name} as a positive integer, falling back to default`, {
    value: raw,
    defaultValue
  });
  return defaultValue;
}

/** `cultureAspects` → `culture_aspects` */
function snakeCase(table: string): string {
  return table.replace(/([a-z])([A-Z])/g, '$1_$2').toLowerCase();
}

/** Collection overrides from `CATALOG_COLLECTION_<TABLE>`, e.g. `CATALOG_COLLECTION_CULTURE_ASPECTS`. */
export function collectionOverrides(env: Env = process.env): Partial<Record<CatalogTableName, string>> {
  const overrides: Partial<Record<CatalogTableName, string>> = {};
  for (const table of CATALOG_TABLES) {
    const value = env[`CATALOG_COLLECTION_${snakeCase(table).toUpperCase()}`]?.trim();
    if (value) overrides[table] = value;
  }
  return overrides;
}

export function collectionFor(config: Pick<ImportConfig, 'collections'>, table: CatalogTableName): string {
  return config.collections[table] ?? snakeCase(table);
}

export function loadImportConfig(overrides?: Partial<ImportConfig>, env: Env = process.env): ImportConfig {
  const catalogSource = overrides?.catalogSource ?? parseCatalogSource(env.CATALOG_SOURCE, 'files');
  const catalogDir = overrides?.catalogDir ?? (env.CATALOG_DIR?.trim() || './catalog');
  const maxDepth = overrides?.maxDepth ?? parsePositiveInteger('IMPORT_MAX_DEPTH', env.IMPORT_MAX_DEPTH, 32);
  const domainLevelCap =
    overrides?.domainLevelCap ?? parsePositiveInteger('DOMAIN_LEVEL_CAP', env.DOMAIN_LEVEL_CAP, 10);

  return {
    catalogSource,
    catalogDir,
    maxDepth,
    levelCap: overrides?.levelCap,
    domainLevelCap,
    collections: { ...collectionOverrides(env), ...overrides?.collections },
    directusUrl: overrides?.directusUrl ?? env.DIRECTUS_URL,
    directusToken: overrides?.directusToken ?? env.DIRECTUS_TOKEN
  };
}
