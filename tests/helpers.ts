import { fileURLToPath } from 'node:url';
import { MemoryCatalog } from '../src/catalog/memory.js';
import type { CatalogRow, TargetFeatureNode, TargetOption } from '../src/types/index.js';

export const FIXTURE_DIR = fileURLToPath(new URL('./fixtures/', import.meta.url));
export const CATALOG_DIR = fileURLToPath(new URL('./fixtures/catalog/', import.meta.url));
export const SCHEMA_DIR = fileURLToPath(new URL('../schemas/', import.meta.url));

interface SlotExtras {
  name?: string;
  description?: string;
  categories?: string[];
  options?: TargetOption[];
  children?: TargetFeatureNode[];
  useSubclass?: boolean;
}

export function slot(typeName: string, guid: string, extras: SlotExtras = {}): TargetFeatureNode {
  return {
    typeName,
    guid,
    name: extras.name ?? '',
    description: extras.description ?? '',
    categories: new Set(extras.categories ?? []),
    options: extras.options ?? [],
    children: extras.children ?? [],
    useSubclass: extras.useSubclass ?? false
  };
}

export function wrapper(name: string, children: TargetFeatureNode[]): TargetFeatureNode {
  return slot('Wrapper', '', { name, children });
}

export function opt(guid: string, name: string): TargetOption {
  return { guid, name };
}

export function row(id: string, name: string, extras: Partial<CatalogRow> = {}): CatalogRow {
  return { id, name, ...extras };
}

/** Small catalog shared by the resolver tests. */
export function testCatalog(): MemoryCatalog {
  return new MemoryCatalog({
    skills: [
      row('sk-perf', 'Performance', { category: 'interpersonal' }),
      row('sk-alert', 'Alertness', { category: 'exploration' }),
      row('sk-hist', 'History', { category: 'lore' })
    ],
    languages: [row('l-cae', 'Caelian'), row('l-khe', 'Khelt'), row('l-anj', 'Anjal')],
    feats: [row('f-tb', 'Team Backbone')],
    deities: [row('d-all', 'All Domains')],
    domains: [row('dom-war', 'War'), row('dom-life', 'Life')],
    subclasses: [row('sub-oracle', 'Oracle')]
  });
}
