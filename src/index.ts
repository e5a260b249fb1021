#!/usr/bin/env node
import 'dotenv/config';
import { basename, dirname, extname, join } from 'node:path';
import type { Catalog } from './catalog/catalog.js';
import { DirectusCatalog } from './catalog/directus.js';
import { loadFileCatalog } from './catalog/files.js';
import { loadImportConfig, type CatalogSource, type ImportConfig } from './config/import.js';
import { importCharacter } from './transform.js';
import { getStringArg, isFlagSet, parseCliArgs } from './utils/args.js';
import { pathExists, readJson, writeJson } from './utils/fs.js';
import { ImportLog } from './utils/importLog.js';
import { log } from './utils/log.js';
import { validateCharacterExport } from './validate.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

function resolveCatalogSource(value: string | undefined): CatalogSource | undefined {
  if (value === 'files' || value === 'directus') return value;
  if (value !== undefined) {
    log.warn('Unknown --catalog-source, using configured source', { value });
  }
  return undefined;
}

function resolveLevelCap(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  log.warn('Ignoring --level-cap that is not a positive integer', { value });
  return undefined;
}

function defaultOutputPath(input: string): string {
  return join(dirname(input), `${basename(input, extname(input))}.import.json`);
}

async function loadCatalog(config: ImportConfig): Promise<Catalog> {
  if (config.catalogSource === 'directus') {
    const catalog = new DirectusCatalog(config);
    await catalog.warmup();
    return catalog;
  }
  return loadFileCatalog(config.catalogDir);
}

function usage(): string {
  return [
    'Usage: character-import --input <file> [--output <file>] [--catalog-dir <dir>]',
    '                        [--catalog-source files|directus] [--level-cap <n>] [--verbose]'
  ].join('\n');
}

async function main() {
  const rawArgs = parseCliArgs(process.argv.slice(2));

  if (isFlagSet(rawArgs, 'help')) {
    console.log(usage());
    return;
  }
  if (isFlagSet(rawArgs, 'verbose')) {
    log.setLevel('debug');
  }

  const input = getStringArg(rawArgs, 'input');
  if (!input) {
    throw new Error(`--input is required.\n${usage()}`);
  }
  if (!(await pathExists(input))) {
    throw new Error(`Input file ${input} does not exist.`);
  }
  const output = getStringArg(rawArgs, 'output') ?? defaultOutputPath(input);

  const config = loadImportConfig({
    catalogSource: resolveCatalogSource(getStringArg(rawArgs, 'catalog-source')),
    catalogDir: getStringArg(rawArgs, 'catalog-dir'),
    levelCap: resolveLevelCap(getStringArg(rawArgs, 'level-cap'))
  });

  const document = await readJson(input);
  await validateCharacterExport(document);
  log.info('Character export validated', { input });

  const catalog = await loadCatalog(config);
  const importLog = new ImportLog();
  const character = importCharacter(document, {
    catalog,
    log: importLog,
    maxDepth: config.maxDepth,
    levelCap: config.levelCap,
    domainLevelCap: config.domainLevelCap
  });

  await writeJson(output, character);
  log.info('Import finished', {
    output,
    choices: Object.keys(character.levelChoices).length,
    issues: character.issues.length
  });
}

main().catch((error) => {
  log.error('Import failed', error);
  process.exitCode = 1;
});
