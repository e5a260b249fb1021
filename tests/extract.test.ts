import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { extractDomains, extractKits, findSelectedSubclass, translateClassAbilities } from '../src/extract.js';
import { parseSourceCharacter } from '../src/source.js';
import type { SourceClass } from '../src/types/index.js';
import { readJson } from '../src/utils/fs.js';
import { FIXTURE_DIR } from './helpers.js';

async function fixtureClass(): Promise<SourceClass> {
  const character = parseSourceCharacter(await readJson(join(FIXTURE_DIR, 'character.json')));
  if (!character.class) throw new Error('fixture has no class');
  return character.class;
}

describe('extractKits', () => {
  it('collects kit selections across levels', async () => {
    expect(extractKits((await fixtureClass()).featuresByLevel)).toEqual([{ name: 'Rapid Fire' }]);
  });
});

describe('extractDomains', () => {
  it('groups domain feature picks under their domain', async () => {
    const domains = extractDomains((await fixtureClass()).featuresByLevel);

    expect([...domains.keys()]).toEqual(['War', 'Life']);
    expect(domains.get('War')?.map((bucket) => [bucket.level, bucket.features.map((feature) => feature.id)])).toEqual([
      [1, ['domain-war-1']]
    ]);
    expect(domains.get('Life')?.[0].features[0]).toEqual({
      kind: 'skill-choice',
      type: 'Skill Choice',
      id: 'domain-life-1',
      name: 'Life Skill',
      selected: ['History'],
      listOptions: ['lore']
    });
  });

  it('leaves out domains without features', () => {
    const domains = extractDomains([
      {
        level: 1,
        features: [{ kind: 'domain', type: 'Domain', selected: [{ name: 'Sun' }] }]
      }
    ]);
    expect(domains.size).toBe(0);
  });
});

describe('translateClassAbilities', () => {
  it('turns ability ids into ability choices and keeps everything else', async () => {
    const cls = await fixtureClass();
    const features = translateClassAbilities(cls.featuresByLevel, cls.abilities);

    expect(features.map((feature) => feature.kind)).toEqual([
      'domain',
      'domain-feature',
      'skill-choice',
      'ability',
      'kit',
      'perk'
    ]);
    expect(features[3]).toEqual({
      kind: 'ability',
      type: 'Ability',
      name: 'Signature Ability',
      selected: [{ name: 'Holy Lash', description: 'Radiant strike.' }]
    });
  });

  it('drops picks whose ids are unknown', () => {
    const features = translateClassAbilities(
      [{ level: 1, features: [{ kind: 'class-ability', type: 'Class Ability', selectedIds: ['missing'] }] }],
      [{ id: 'ab-1', name: 'Holy Lash' }]
    );
    expect(features).toEqual([]);
  });
});

describe('findSelectedSubclass', () => {
  it('returns the selected subclass', () => {
    const subclasses = [
      { name: 'Oracle', selected: false, featuresByLevel: [] },
      { name: 'Seer', selected: true, featuresByLevel: [] }
    ];
    expect(findSelectedSubclass(subclasses)?.name).toBe('Seer');
    expect(findSelectedSubclass([])).toBeUndefined();
  });
});
