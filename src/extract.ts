import type {
  LeveledTree,
  OptionFeature,
  SelectedOption,
  SourceAbility,
  SourceFeatureNode,
  SourceSubclass
} from './types/index.js';

function featuresOf(featuresByLevel: LeveledTree<SourceFeatureNode>): SourceFeatureNode[] {
  return featuresByLevel.flatMap((bucket) => bucket.features);
}

export function extractKits(featuresByLevel: LeveledTree<SourceFeatureNode>): SelectedOption[] {
  return featuresOf(featuresByLevel).flatMap((feature) => (feature.kind === 'kit' ? feature.selected : []));
}

function domainKey(domainName: string): string {
  return `domain-${domainName.toLowerCase()}`;
}

function extractDomainFeatures(
  domainName: string,
  featuresByLevel: LeveledTree<SourceFeatureNode>
): LeveledTree<SourceFeatureNode> {
  const prefix = domainKey(domainName);
  const leveled: LeveledTree<SourceFeatureNode> = [];

  for (const bucket of featuresByLevel) {
    const features: SourceFeatureNode[] = [];
    for (const feature of bucket.features) {
      if (feature.kind !== 'domain-feature') continue;
      for (const selected of feature.selected) {
        if (selected.id?.toLowerCase().startsWith(prefix)) {
          features.push(selected);
        }
      }
    }
    if (features.length) {
      leveled.push({ level: bucket.level, features });
    }
  }

  return leveled;
}

/**
 * Domain name → the domain-feature selections that belong to it, grouped by
 * source level. Domains with no features of their own are left out.
 */
export function extractDomains(
  featuresByLevel: LeveledTree<SourceFeatureNode>
): Map<string, LeveledTree<SourceFeatureNode>> {
  const domains = new Map<string, LeveledTree<SourceFeatureNode>>();

  for (const feature of featuresOf(featuresByLevel)) {
    if (feature.kind !== 'domain') continue;
    for (const selection of feature.selected) {
      if (!selection.name || domains.has(selection.name)) continue;
      const features = extractDomainFeatures(selection.name, featuresByLevel);
      if (features.length) {
        domains.set(selection.name, features);
      }
    }
  }

  return domains;
}

/**
 * Flattens the class features, replacing each class-ability pick (ability ids)
 * with an `ability` choice carrying the referenced names and descriptions.
 */
export function translateClassAbilities(
  featuresByLevel: LeveledTree<SourceFeatureNode>,
  abilities: readonly SourceAbility[]
): SourceFeatureNode[] {
  const byId = new Map(abilities.map((ability) => [ability.id, ability]));
  const translated: SourceFeatureNode[] = [];

  for (const feature of featuresOf(featuresByLevel)) {
    if (feature.kind !== 'class-ability') {
      translated.push(feature);
      continue;
    }

    const selected: SelectedOption[] = [];
    for (const id of feature.selectedIds) {
      const ability = byId.get(id);
      if (ability) {
        selected.push({ name: ability.name, description: ability.description });
      }
    }
    if (selected.length) {
      const ability: OptionFeature = { kind: 'ability', type: 'Ability', name: feature.name, selected };
      translated.push(ability);
    }
  }

  return translated;
}

export function findSelectedSubclass(subclasses: readonly SourceSubclass[]): SourceSubclass | undefined {
  return subclasses.find((subclass) => subclass.selected);
}
