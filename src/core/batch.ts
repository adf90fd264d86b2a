import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { createGenerator } from '../generators/index.js';
import { ConfigurationError, isArrowError } from './errors.js';
import { fromArrowError, fromValueRange, type Diagnostic } from './format.js';
import type { UniqueIdOption } from './types.js';

export const CONFIG_SUFFIX = '.arrow.json';

const DEFAULT_INCLUDE_GLOBS = [`**/*${CONFIG_SUFFIX}`];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/coverage/**',
];

export interface BatchOptions {
  includes?: string[];
  excludes?: string[];
  useGitignore?: boolean;
  /** Write next to each config file when unset */
  outDir?: string;
  uniqueId?: UniqueIdOption;
  dryRun?: boolean;
}

export interface BatchItem {
  source: string;
  /** Position of the config inside its file */
  index: number;
  output: string;
  diagnostics: Diagnostic[];
  written: boolean;
}

export async function listConfigFiles(root: string, includes: string[] = [], excludes: string[] = [], useGitignore = true): Promise<string[]> {
  const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
  const files = await globby(patterns, {
    cwd: path.resolve(root),
    absolute: true,
    dot: true,
    gitignore: useGitignore,
    ignore: [...excludes, ...DEFAULT_IGNORE_DIRS],
    followSymbolicLinks: false,
  });
  return files.sort();
}

/** One config object or an array of them */
export function readConfigFile(file: string): unknown[] {
  const text = fs.readFileSync(file, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError('CFG-INVALID-OPTION', `Invalid JSON in ${file}: ${reason}`);
  }
  return Array.isArray(data) ? data : [data];
}

export function outputPathFor(file: string, index: number, count: number, outDir?: string): string {
  const name = path.basename(file);
  const stem = name.endsWith(CONFIG_SUFFIX) ? name.slice(0, -CONFIG_SUFFIX.length) : path.basename(name, path.extname(name));
  const base = count > 1 ? `${stem}-${index + 1}` : stem;
  return path.join(outDir ?? path.dirname(file), `${base}.svg`);
}

/**
 * Render every config file under `root`. Configuration problems are
 * collected per item; anything else propagates.
 */
export async function renderBatch(root: string, options: BatchOptions = {}): Promise<BatchItem[]> {
  const files = await listConfigFiles(root, options.includes, options.excludes, options.useGitignore ?? true);
  const items: BatchItem[] = [];
  if (options.outDir && !options.dryRun) fs.mkdirSync(options.outDir, { recursive: true });

  for (const file of files) {
    let configs: unknown[];
    try {
      configs = readConfigFile(file);
    } catch (err) {
      if (!isArrowError(err)) throw err;
      items.push({ source: file, index: 0, output: '', diagnostics: [fromArrowError(err)], written: false });
      continue;
    }

    configs.forEach((config, index) => {
      const output = outputPathFor(file, index, configs.length, options.outDir);
      try {
        const generator = createGenerator(config);
        const svg = generator.generate(options.uniqueId);
        if (!options.dryRun) fs.writeFileSync(output, svg, 'utf8');
        items.push({
          source: file,
          index,
          output,
          diagnostics: generator.warnings.map(fromValueRange),
          written: !options.dryRun,
        });
      } catch (err) {
        if (!isArrowError(err)) throw err;
        items.push({ source: file, index, output, diagnostics: [fromArrowError(err)], written: false });
      }
    });
  }
  return items;
}
