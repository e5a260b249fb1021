import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';
import fg from 'fast-glob';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/** Parsed but unchecked; callers narrow the value themselves. */
export async function readJson(file: string): Promise<unknown> {
  const text = await readFile(file, 'utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** JSON files below `dir`, relative to it and sorted so load order is stable. */
export async function listJsonFiles(dir: string): Promise<string[]> {
  const files = await fg('**/*.json', { cwd: dir, onlyFiles: true });
  return files.sort();
}

export async function writeJson(file: string, data: unknown) {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}
