import { resolveName, type Catalog } from '../catalog/catalog.js';
import type {
  CatalogTableName,
  ChoiceTypeName,
  FeatureFilter,
  NamedListFeature,
  OptionFeature,
  ResolutionResult,
  SelectedOption,
  SingleNameFeature,
  SourceFeatureNode,
  TargetFeatureNode
} from '../types/index.js';
import { ImportLog } from '../utils/importLog.js';
import { addChoice, createResult } from './choices.js';
import { categoryKey, namesMatch, titleCase, translateFeatureChoice } from './names.js';
import {
  categoriesMatch,
  DEFAULT_SEARCH_DEPTH,
  findFeature,
  type FeatureQuery,
  type SearchScope
} from './search.js';

export const DEFAULT_DEITY_NAME = 'All Domains';

export interface ChoiceResolverOptions {
  catalog: Catalog;
  log?: ImportLog;
  filter?: FeatureFilter;
  maxDepth?: number;
  /** Accumulator to write into; a fresh one is created when omitted. */
  result?: ResolutionResult;
  /** Clock for the synthetic domain key. */
  now?: () => number;
}

interface NamedListRoute {
  table: CatalogTableName;
  typeName: ChoiceTypeName;
  label: string;
}

const NAMED_LIST_ROUTES: Record<NamedListFeature['kind'], NamedListRoute> = {
  'language-choice': { table: 'languages', typeName: 'CharacterLanguageChoice', label: 'Language' },
  'skill-choice': { table: 'skills', typeName: 'CharacterSkillChoice', label: 'Skill' },
  perk: { table: 'feats', typeName: 'CharacterFeatChoice', label: 'Perk' }
};

const SINGLE_NAME_ROUTES: Record<SingleNameFeature['kind'], NamedListRoute> = {
  deity: { table: 'deities', typeName: 'CharacterDeityChoice', label: 'Deity' },
  subclass: { table: 'subclasses', typeName: 'CharacterSubclassChoice', label: 'Subclass' }
};

const DOMAIN_ID_REGEX = /^domain-([^-]+)/i;

/** "War" → "War Domain"; names that already carry the suffix are kept. */
export function domainFilterName(domain: string): string {
  const trimmed = domain.trim();
  return /\bdomain$/i.test(trimmed) ? trimmed : `${trimmed} Domain`;
}

/** `domain-war-3` → "War Domain". */
export function domainFromFeatureId(id: string | undefined): string | undefined {
  const match = DOMAIN_ID_REGEX.exec(id ?? '');
  return match ? domainFilterName(titleCase(match[1])) : undefined;
}

/**
 * Matches source selections against one flattened scope of target slots and
 * records `slot guid → option id` into a shared result. Failures are logged as
 * issues and the selection is dropped; nothing here throws.
 */
export class ChoiceResolver {
  readonly result: ResolutionResult;
  private readonly scope: readonly TargetFeatureNode[];
  private readonly catalog: Catalog;
  private readonly log: ImportLog;
  private readonly filter?: FeatureFilter;
  private readonly maxDepth: number;
  private readonly now: () => number;

  constructor(scope: readonly TargetFeatureNode[], options: ChoiceResolverOptions) {
    this.scope = scope;
    this.catalog = options.catalog;
    this.log = options.log ?? new ImportLog();
    this.filter = options.filter;
    this.maxDepth = options.maxDepth ?? DEFAULT_SEARCH_DEPTH;
    this.result = options.result ?? createResult();
    this.now = options.now ?? Date.now;
  }

  /** Same scope and accumulator, different filter. */
  withFilter(filter?: FeatureFilter): ChoiceResolver {
    return new ChoiceResolver(this.scope, {
      catalog: this.catalog,
      log: this.log,
      filter,
      maxDepth: this.maxDepth,
      result: this.result,
      now: this.now
    });
  }

  resolveAll(nodes: readonly SourceFeatureNode[]): ResolutionResult {
    for (const node of nodes) {
      this.resolve(node);
    }
    return this.result;
  }

  resolve(node: SourceFeatureNode, depth = 0): ResolutionResult {
    if (depth > this.maxDepth) {
      this.log.issue('depth-exceeded', `Source feature [${node.name ?? node.type}] nested deeper than ${this.maxDepth} levels.`, {
        name: node.name
      });
      return this.result;
    }

    switch (node.kind) {
      case 'choice':
      case 'ability':
        this.resolveFeatureChoice(node);
        break;
      case 'language-choice':
      case 'skill-choice':
      case 'perk':
        this.resolveNamedList(node);
        break;
      case 'deity':
      case 'subclass':
        this.resolveSingleName(node);
        break;
      case 'domain':
        this.resolveDomains(node, depth);
        break;
      case 'domain-feature':
        for (const selected of node.selected) {
          const domain = domainFromFeatureId(selected.id);
          if (!domain) {
            this.log.issue('unmatched-slot', `Domain feature [${selected.name ?? selected.id ?? '?'}] has no domain in its id; discarded.`, {
              name: selected.name
            });
            continue;
          }
          this.log.debug(`Domain feature [${selected.name ?? selected.id}] scoped to [${domain}]`);
          this.withFilter({ name: domain }).resolve(selected, depth + 1);
        }
        break;
      case 'multiple-features':
        for (const child of node.children) {
          this.resolve(child, depth + 1);
        }
        break;
      case 'class-ability':
        this.log.debug(`Class ability [${node.name ?? node.id ?? '?'}] must be translated before resolution; skipped.`);
        break;
      case 'kit':
        this.log.debug(`Kit feature [${node.name ?? '?'}] is imported with the class; skipped.`);
        break;
      default:
        this.log.debug(`Unsupported feature type [${node.type}]; skipped.`);
    }
    return this.result;
  }

  private searchScope(): SearchScope {
    return { filter: this.filter, maxDepth: this.maxDepth, log: this.log };
  }

  private find(query: FeatureQuery): TargetFeatureNode | undefined {
    return findFeature(this.scope, query, this.searchScope());
  }

  private record(slot: TargetFeatureNode, value: string) {
    addChoice(this.result.choices, slot.guid, value);
    this.result.featureData.set(slot.guid, slot);
  }

  private resolveFeatureChoice(node: OptionFeature) {
    for (const option of node.selected) {
      const choiceName = translateFeatureChoice(option.name, option.description);
      this.log.info(`Found Feature [${choiceName}] in import.`);

      const offers = (candidate: TargetFeatureNode) =>
        candidate.options.find((entry) => namesMatch(entry.name, choiceName));
      const slot = this.find({ typeName: 'CharacterFeatureChoice', matches: (candidate) => offers(candidate) !== undefined });
      const matchedOption = slot ? offers(slot) : undefined;

      if (!slot || !matchedOption) {
        this.log.issue('unmatched-slot', `No feature choice offers [${choiceName}].`, { name: choiceName });
        continue;
      }
      this.log.nested().info(`Adding Feature [${choiceName}].`);
      this.record(slot, matchedOption.guid);
    }
  }

  /** The slot whose category set equals `listOptions`, else the first sharing any category. */
  private findSkillSlot(listOptions: readonly string[]): TargetFeatureNode | undefined {
    if (listOptions.length) {
      const key = categoryKey(listOptions);
      const exact = this.find({ typeName: 'CharacterSkillChoice', matches: (node) => categoryKey(node.categories) === key });
      if (exact) return exact;
    }
    return this.find({ typeName: 'CharacterSkillChoice', matches: (node) => categoriesMatch(node, listOptions) });
  }

  private resolveNamedList(node: NamedListFeature) {
    const route = NAMED_LIST_ROUTES[node.kind];
    for (const name of node.selected) {
      this.log.info(`Found ${route.label} [${name}] in import.`);
      const match = resolveName(this.catalog, route.table, name, this.log.nested());
      if (!match) {
        this.log.issue('unresolved-name', `${route.label} [${name}] not found in catalog.`, {
          name,
          table: route.table
        });
        continue;
      }

      const slot =
        node.kind === 'skill-choice' ? this.findSkillSlot(node.listOptions) : this.find({ typeName: route.typeName });
      if (!slot) {
        this.log.issue('unmatched-slot', `No ${route.typeName} slot for ${route.label} [${name}].`, {
          name,
          table: route.table
        });
        continue;
      }
      this.log.nested().info(`Adding ${route.label} [${name}].`);
      this.record(slot, match.id);
    }
  }

  private resolveSingleName(node: SingleNameFeature) {
    const route = SINGLE_NAME_ROUTES[node.kind];
    this.log.info(`Found ${route.label} [${node.name}] in import.`);
    const match = resolveName(this.catalog, route.table, node.name, this.log.nested());
    if (!match) {
      this.log.issue('unresolved-name', `${route.label} [${node.name}] not found in catalog.`, {
        name: node.name,
        table: route.table
      });
      return;
    }
    const slot = this.find({ typeName: route.typeName });
    if (!slot) {
      this.log.issue('unmatched-slot', `No ${route.typeName} slot for ${route.label} [${node.name}].`, {
        name: node.name,
        table: route.table
      });
      return;
    }
    this.log.nested().info(`Adding ${route.label} [${node.name}].`);
    this.record(slot, match.id);
  }

  /**
   * Records the default deity, every selected domain under
   * `<deity slot guid>-domains`, then each domain's own features scoped to
   * "<Domain> Domain".
   */
  private resolveDomains(node: OptionFeature, depth: number) {
    if (!node.selected.length) return;

    const deitySlot = this.find({ typeName: 'CharacterDeityChoice' });
    this.resolveSingleName({ kind: 'deity', type: 'Deity', name: DEFAULT_DEITY_NAME });

    let domainsKey: string;
    if (deitySlot) {
      domainsKey = `${deitySlot.guid}-domains`;
      this.result.featureData.set(deitySlot.guid, deitySlot);
    } else {
      // Downstream consumers cannot resolve this key; it is kept so the picks are not lost.
      domainsKey = `synthetic-deity-${this.now()}-domains`;
      this.log.issue('ambiguous-fallback', `No deity choice slot found; domains recorded under [${domainsKey}].`);
    }

    for (const domain of node.selected) {
      this.resolveDomain(domain, domainsKey, depth);
    }
  }

  private resolveDomain(domain: SelectedOption, domainsKey: string, depth: number) {
    this.log.info(`Found Domain [${domain.name}] in import.`);
    const match = resolveName(this.catalog, 'domains', domain.name, this.log.nested());
    if (!match) {
      this.log.issue('unresolved-name', `Domain [${domain.name}] not found in catalog.`, {
        name: domain.name,
        table: 'domains'
      });
      return;
    }
    this.log.nested().info(`Adding Domain [${domain.name}].`);
    addChoice(this.result.choices, domainsKey, match.id);

    if (!domain.featuresByLevel?.length) return;
    const scoped = this.withFilter({ name: domainFilterName(domain.name) });
    for (const bucket of domain.featuresByLevel) {
      for (const feature of bucket.features) {
        scoped.resolve(feature, depth + 1);
      }
    }
  }
}
