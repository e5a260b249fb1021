import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import { readJson } from './utils/fs.js';
import { isRecord } from './utils/values.js';

const ajv = new Ajv({ allErrors: true, strict: false });

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator(schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = await readJson(schemaPath);
  if (!isRecord(schema)) {
    throw new Error(`Schema ${schemaPath} is not a JSON object.`);
  }
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

export async function validateDocument(schemaPath: string, data: unknown, label: string) {
  const validator = await loadValidator(schemaPath);
  if (!validator(data)) {
    throw new Error(ajv.errorsText(validator.errors, { dataVar: label }));
  }
}

const defaultSchemaDir = join(process.cwd(), 'schemas');

/** Rejects documents that are not character exports at all; section-level gaps are left to the importer. */
export async function validateCharacterExport(data: unknown, schemaDir: string = defaultSchemaDir) {
  await validateDocument(join(schemaDir, 'character.json'), data, 'character');
}
