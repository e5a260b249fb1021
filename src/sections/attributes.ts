import type { CharacterAttributes, SourceClass } from '../types/index.js';
import type { ImportContext } from './context.js';

const CHARACTERISTICS: Record<string, keyof CharacterAttributes> = {
  might: 'mgt',
  agility: 'agl',
  reason: 'rea',
  intuition: 'inu',
  presence: 'prs'
};

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

export function importAttributes(cls: SourceClass | undefined, ctx: ImportContext) {
  const log = ctx.log.forSection('attributes');
  if (!cls || !cls.characteristics.length) {
    log.issue('malformed-section', 'class.characteristics not found in import.');
    return;
  }

  log.info('Parsing Attributes.');
  const attributes = ctx.output.attributes;
  for (const entry of cls.characteristics) {
    const key = CHARACTERISTICS[entry.characteristic.trim().toLowerCase()];
    if (!key) {
      log.nested().warn(`Unknown characteristic [${entry.characteristic}] in import.`);
      continue;
    }
    log.nested().info(`Setting Attribute ${key} to ${signed(entry.value)}.`);
    attributes[key] = entry.value;
  }
}
