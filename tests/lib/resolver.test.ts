import { describe, expect, it } from 'vitest';
import { choicesToObject } from '../../src/lib/choices.js';
import { ChoiceResolver, domainFilterName, domainFromFeatureId } from '../../src/lib/resolver.js';
import type { NamedListFeature, SourceFeatureNode, TargetFeatureNode } from '../../src/types/index.js';
import { ImportLog } from '../../src/utils/importLog.js';
import { opt, slot, testCatalog, wrapper } from '../helpers.js';

function skills(selected: string[], listOptions: string[] = []): NamedListFeature {
  return { kind: 'skill-choice', type: 'Skill Choice', selected, listOptions };
}

function languages(selected: string[], name?: string): NamedListFeature {
  return { kind: 'language-choice', type: 'Language Choice', name, selected, listOptions: [] };
}

function run(scope: TargetFeatureNode[], node: SourceFeatureNode, now?: () => number) {
  const log = new ImportLog();
  const resolver = new ChoiceResolver(scope, { catalog: testCatalog(), log, now });
  resolver.resolve(node);
  return { choices: choicesToObject(resolver.result.choices), result: resolver.result, issues: log.issues };
}

describe('skill choices', () => {
  const scope = [
    slot('CharacterSkillChoice', 'lore-slot', { categories: ['lore'] }),
    slot('CharacterSkillChoice', 'exploration-slot', { categories: ['exploration'] })
  ];

  it('picks the slot whose categories equal the requested list', () => {
    expect(run(scope, skills(['Alertness'], ['Exploration'])).choices).toEqual({ 'exploration-slot': 'sk-alert' });
  });

  it('falls back to any category overlap', () => {
    expect(run(scope, skills(['Alertness'], ['exploration', 'intrigue'])).choices).toEqual({
      'exploration-slot': 'sk-alert'
    });
  });

  it('takes the first skill slot when no categories are listed', () => {
    expect(run(scope, skills(['History'])).choices).toEqual({ 'lore-slot': 'sk-hist' });
  });

  it('prefers a top-level slot over a nested one with the same categories', () => {
    const nested = [
      wrapper('Life Domain Features', [slot('CharacterSkillChoice', 'life-skill', { categories: ['lore'] })]),
      slot('CharacterSkillChoice', 'class-skill', { categories: ['lore'] })
    ];
    expect(run(nested, skills(['History'], ['lore'])).choices).toEqual({ 'class-skill': 'sk-hist' });
    expect(run(nested, skills(['History'], ['lore', 'crafting'])).choices).toEqual({ 'class-skill': 'sk-hist' });
  });

  it('translates the name before looking it up', () => {
    const outcome = run([slot('CharacterSkillChoice', 'G1', { categories: ['interpersonal'] })], skills(['Perform'], ['interpersonal']));
    expect(outcome.choices).toEqual({ G1: 'sk-perf' });
    expect(outcome.issues).toEqual([]);
  });

  it('records an issue when no slot accepts the skill', () => {
    const outcome = run([slot('CharacterLanguageChoice', 'L1')], skills(['History']));
    expect(outcome.choices).toEqual({});
    expect(outcome.issues).toEqual([
      {
        kind: 'unmatched-slot',
        message: 'No CharacterSkillChoice slot for Skill [History].',
        name: 'History',
        table: 'skills'
      }
    ]);
  });
});

describe('language choices', () => {
  const scope = [slot('CharacterLanguageChoice', 'lang-slot')];

  it('stores a single language as a scalar', () => {
    expect(run(scope, languages(['Caelian'])).choices).toEqual({ 'lang-slot': 'l-cae' });
  });

  it('collects several languages in order', () => {
    expect(run(scope, languages(['Caelian', 'Khelt', 'Anjali'])).choices).toEqual({
      'lang-slot': ['l-cae', 'l-khe', 'l-anj']
    });
  });

  it('drops names the catalog does not know', () => {
    const outcome = run(scope, languages(['Gibberish']));
    expect(outcome.result.choices.size).toBe(0);
    expect(outcome.issues).toEqual([
      {
        kind: 'unresolved-name',
        message: 'Language [Gibberish] not found in catalog.',
        name: 'Gibberish',
        table: 'languages'
      }
    ]);
  });
});

describe('feature choices', () => {
  const scope = [
    slot('CharacterFeatureChoice', 'fc1', { options: [opt('opt-glamor', 'Glamor of Terror')] }),
    slot('CharacterFeatureChoice', 'fc2', { options: [opt('opt-fire', 'Fire Immunity')] })
  ];

  it('finds the slot that offers the option', () => {
    const outcome = run(scope, {
      kind: 'choice',
      type: 'Choice',
      selected: [{ name: 'Damage Modifier', description: 'Fire Immunity 5' }]
    });
    expect(outcome.choices).toEqual({ fc2: 'opt-fire' });
    expect(outcome.result.featureData.get('fc2')?.guid).toBe('fc2');
  });

  it('reports options no slot offers', () => {
    const outcome = run(scope, { kind: 'ability', type: 'Ability', selected: [{ name: 'Nope' }] });
    expect(outcome.choices).toEqual({});
    expect(outcome.issues).toEqual([{ kind: 'unmatched-slot', message: 'No feature choice offers [Nope].', name: 'Nope' }]);
  });
});

describe('deity and domains', () => {
  const domainScope = () => [
    wrapper('War Domain Features', [slot('CharacterSkillChoice', 'war-skill', { categories: ['exploration'] })]),
    wrapper('Life Domain Features', [slot('CharacterSkillChoice', 'life-skill', { categories: ['exploration'] })])
  ];

  it('records the default deity, the domains and each domain feature', () => {
    const scope = [slot('CharacterDeityChoice', 'deity-1'), ...domainScope()];
    const outcome = run(scope, {
      kind: 'domain',
      type: 'Domain',
      selected: [
        { name: 'War', featuresByLevel: [{ level: 1, features: [skills(['Alertness'], ['exploration'])] }] },
        { name: 'Life', featuresByLevel: [{ level: 1, features: [skills(['Alertness'], ['exploration'])] }] }
      ]
    });

    expect(outcome.choices).toEqual({
      'deity-1': 'd-all',
      'deity-1-domains': ['dom-war', 'dom-life'],
      'war-skill': 'sk-alert',
      'life-skill': 'sk-alert'
    });
    expect(outcome.issues).toEqual([]);
  });

  it('falls back to a synthetic key without a deity slot', () => {
    const outcome = run(domainScope(), { kind: 'domain', type: 'Domain', selected: [{ name: 'War' }] }, () => 1700000000000);

    expect(outcome.choices).toEqual({ 'synthetic-deity-1700000000000-domains': 'dom-war' });
    expect(outcome.issues.map((issue) => issue.kind)).toEqual(['unmatched-slot', 'ambiguous-fallback']);
    expect(outcome.issues[1].message).toBe(
      'No deity choice slot found; domains recorded under [synthetic-deity-1700000000000-domains].'
    );
  });

  it('scopes domain features by the domain in their id', () => {
    const outcome = run(domainScope(), {
      kind: 'domain-feature',
      type: 'Domain Feature',
      selected: [
        { ...skills(['Alertness'], ['exploration']), id: 'domain-life-1' },
        { ...skills(['History'], ['exploration']), id: 'mystery-1', name: 'Odd Pick' }
      ]
    });

    expect(outcome.choices).toEqual({ 'life-skill': 'sk-alert' });
    expect(outcome.issues).toEqual([
      {
        kind: 'unmatched-slot',
        message: 'Domain feature [Odd Pick] has no domain in its id; discarded.',
        name: 'Odd Pick'
      }
    ]);
  });

  it('derives domain names', () => {
    expect(domainFilterName('War')).toBe('War Domain');
    expect(domainFilterName('War Domain')).toBe('War Domain');
    expect(domainFromFeatureId('domain-war-3')).toBe('War Domain');
    expect(domainFromFeatureId('conduit-1')).toBeUndefined();
  });
});

describe('other feature kinds', () => {
  it('resolves every child of a multiple-features node', () => {
    const scope = [slot('CharacterLanguageChoice', 'lang-slot'), slot('CharacterFeatChoice', 'perk-slot')];
    const outcome = run(scope, {
      kind: 'multiple-features',
      type: 'Multiple Features',
      children: [languages(['Khelt']), { kind: 'perk', type: 'Perk', selected: ['Teamwork'], listOptions: [] }]
    });
    expect(outcome.choices).toEqual({ 'lang-slot': 'l-khe', 'perk-slot': 'f-tb' });
  });

  it('resolves a subclass by name', () => {
    const outcome = run([slot('CharacterSubclassChoice', 'sub-slot')], { kind: 'subclass', type: 'Subclass', name: 'Oracle' });
    expect(outcome.choices).toEqual({ 'sub-slot': 'sub-oracle' });
  });

  it('skips kits, untranslated class abilities and unknown types', () => {
    const scope = [slot('CharacterFeatureChoice', 'fc', { options: [opt('o', 'Mountain')] })];
    const skipped: SourceFeatureNode[] = [
      { kind: 'kit', type: 'Kit', selected: [{ name: 'Mountain' }] },
      { kind: 'class-ability', type: 'Class Ability', selectedIds: ['ab-1'] },
      { kind: 'unknown', type: 'Title' }
    ];
    for (const node of skipped) {
      const outcome = run(scope, node);
      expect(outcome.choices).toEqual({});
      expect(outcome.issues).toEqual([]);
    }
  });

  it('stops at the depth cap', () => {
    const log = new ImportLog();
    const resolver = new ChoiceResolver([slot('CharacterLanguageChoice', 'lang-slot')], { catalog: testCatalog(), log });
    resolver.resolve(languages(['Khelt'], 'Languages'), 33);

    expect(resolver.result.choices.size).toBe(0);
    expect(log.issues).toEqual([
      { kind: 'depth-exceeded', message: 'Source feature [Languages] nested deeper than 32 levels.', name: 'Languages' }
    ]);
  });

  it('shares the accumulator with filtered copies', () => {
    const scope = [wrapper('War Domain Features', [slot('CharacterLanguageChoice', 'war-lang')])];
    const resolver = new ChoiceResolver(scope, { catalog: testCatalog() });
    resolver.withFilter({ name: 'War Domain' }).resolve(languages(['Caelian']));
    expect(choicesToObject(resolver.result.choices)).toEqual({ 'war-lang': 'l-cae' });
  });
});
