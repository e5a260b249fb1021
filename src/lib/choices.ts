import type { ChoiceMap, ChoiceValue, FeatureDataMap, ResolutionResult } from '../types/index.js';

export function createResult(): ResolutionResult {
  return { choices: new Map(), featureData: new Map() };
}

export function choiceValues(value: ChoiceValue | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Records one selection. The first write stores a scalar; the second promotes
 * the slot to `[first, second]`; later writes append.
 */
export function addChoice(choices: ChoiceMap, guid: string, value: string) {
  const existing = choices.get(guid);
  if (existing === undefined) {
    choices.set(guid, value);
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    choices.set(guid, [existing, value]);
  }
}

/** Folds one pass's choices into a longer-lived table, value by value, with `addChoice`. */
export function mergeChoices(into: ChoiceMap, from: ChoiceMap): ChoiceMap {
  for (const [guid, incoming] of from) {
    for (const value of choiceValues(incoming)) {
      addChoice(into, guid, value);
    }
  }
  return into;
}

export function mergeFeatureData(into: FeatureDataMap, from: FeatureDataMap): FeatureDataMap {
  for (const [guid, node] of from) {
    into.set(guid, node);
  }
  return into;
}

export function mergeResults(into: ResolutionResult, from: ResolutionResult): ResolutionResult {
  mergeChoices(into.choices, from.choices);
  mergeFeatureData(into.featureData, from.featureData);
  return into;
}

export function choicesToObject(choices: ChoiceMap): Record<string, ChoiceValue> {
  const output: Record<string, ChoiceValue> = {};
  for (const [guid, value] of choices) {
    output[guid] = Array.isArray(value) ? [...value] : value;
  }
  return output;
}
