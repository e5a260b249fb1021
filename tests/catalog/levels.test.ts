import { describe, expect, it } from 'vitest';
import {
  expandLeveledFeatures,
  flattenLeveled,
  normalizeCategories,
  parseTargetFeatures,
  parseTargetLeveled
} from '../../src/catalog/levels.js';
import type { TargetFeatureNode } from '../../src/types/index.js';
import type { AnyRecord } from '../../src/utils/values.js';
import { row } from '../helpers.js';

describe('normalizeCategories', () => {
  it('accepts lists', () => {
    expect([...normalizeCategories(['Lore', ' exploration ', 3, ''])]).toEqual(['lore', 'exploration']);
  });

  it('accepts tag maps and ignores disabled or marker keys', () => {
    expect([...normalizeCategories({ lore: true, crafting: false, _meta: true, Exploration: true })]).toEqual([
      'lore',
      'exploration'
    ]);
    expect(normalizeCategories(undefined).size).toBe(0);
  });
});

describe('parseTargetFeatures', () => {
  it('reads options and nested children', () => {
    const [node] = parseTargetFeatures([
      {
        typeName: 'CharacterFeatureChoice',
        guid: 'g1',
        name: 'Signature Ability',
        options: [{ id: 'o1', name: 'Holy Lash' }, { guid: 'o2' }],
        children: [{ typeName: 'CharacterSkillChoice', guid: 'c1', categories: { lore: true } }]
      }
    ]);

    expect(node.options).toEqual([{ guid: 'o1', name: 'Holy Lash' }]);
    expect(node.children.map((child) => [child.guid, [...child.categories]])).toEqual([['c1', ['lore']]]);
    expect(node.useSubclass).toBe(false);
  });

  it('stops nesting at the depth cap', () => {
    let raw: AnyRecord = { typeName: 'CharacterSkillChoice', guid: 'leaf' };
    for (let i = 0; i < 40; i++) {
      raw = { typeName: 'Wrapper', guid: `w${i}`, features: [raw] };
    }

    let node: TargetFeatureNode | undefined = parseTargetFeatures([raw])[0];
    let count = 0;
    while (node) {
      count++;
      node = node.children[0];
    }
    expect(count).toBe(33);
  });
});

describe('parseTargetLeveled', () => {
  it('reads keyed buckets in level order', () => {
    const tree = parseTargetLeveled({
      '3': [{ typeName: 'CharacterFeatChoice', guid: 'perk-3' }],
      '1': [{ typeName: 'CharacterSkillChoice', guid: 'skill-1' }],
      notes: []
    });
    expect(tree.map((bucket) => [bucket.level, bucket.features.map((feature) => feature.guid)])).toEqual([
      [1, ['skill-1']],
      [3, ['perk-3']]
    ]);
  });
});

describe('expandLeveledFeatures', () => {
  const entity = row('class-x', 'Example', {
    features: [{ typeName: 'CharacterLanguageChoice', guid: 'flat' }],
    levels: [
      { level: 1, features: [{ typeName: 'CharacterSkillChoice', guid: 'l1' }] },
      { level: 2, features: [] },
      { level: 4, features: [{ typeName: 'CharacterFeatChoice', guid: 'l4' }] }
    ]
  });

  it('puts flat features first and stops at the level cap', () => {
    const tree = expandLeveledFeatures(entity, 3);
    expect(tree.map((bucket) => bucket.level)).toEqual([1, 1]);
    expect(flattenLeveled(tree).map((node) => node.guid)).toEqual(['flat', 'l1']);
  });

  it('includes higher levels when the cap allows', () => {
    expect(flattenLeveled(expandLeveledFeatures(entity, 10)).map((node) => node.guid)).toEqual(['flat', 'l1', 'l4']);
  });

  it('returns nothing for an entity without features', () => {
    expect(expandLeveledFeatures(row('k', 'Kit'), 5)).toEqual([]);
  });
});
