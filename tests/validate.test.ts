import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { readJson } from '../src/utils/fs.js';
import { validateCharacterExport } from '../src/validate.js';
import { FIXTURE_DIR, SCHEMA_DIR } from './helpers.js';

describe('validateCharacterExport', () => {
  it('accepts a builder export', async () => {
    const document = await readJson(join(FIXTURE_DIR, 'character.json'));
    await expect(validateCharacterExport(document, SCHEMA_DIR)).resolves.toBeUndefined();
  });

  it('requires a class', async () => {
    await expect(validateCharacterExport({ name: 'Nobody' }, SCHEMA_DIR)).rejects.toThrow(
      "character must have required property 'class'"
    );
  });

  it('rejects a class level below one', async () => {
    await expect(
      validateCharacterExport({ name: 'Nobody', class: { name: 'Conduit', level: 0 } }, SCHEMA_DIR)
    ).rejects.toThrow('character/class/level must be >= 1');
  });
});
