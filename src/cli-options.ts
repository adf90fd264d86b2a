// Flag parsing for the arrow-anim CLI, kept apart from the entry point so it can be exercised directly

import type { BatchOptions } from './core/batch.js';
import { ConfigurationError } from './core/errors.js';
import type { OutputFormat } from './core/format.js';
import type { UniqueIdOption } from './core/types.js';

const NUMBER_FLAGS: Record<string, string> = {
  '--stroke-width': 'strokeWidth',
  '--width': 'width',
  '--height': 'height',
  '--num-arrows': 'numArrows',
  '--speed': 'speedInPxPerSecond',
  '--duration': 'speedInDurationSeconds',
  '--spotlight-size': 'spotlightSize',
  '--dim-opacity': 'dimOpacity',
  '--center-gap': 'centerGapRatio',
  '--path-extension': 'pathExtensionFactor',
};

const STRING_FLAGS: Record<string, string> = {
  '--color': 'color',
  '-c': 'color',
  '--direction': 'direction',
  '-d': 'direction',
  '--animation': 'animation',
};

export interface GenerateCommand {
  config: Record<string, unknown>;
  output?: string;
  format: OutputFormat;
  uniqueId?: UniqueIdOption;
}

export interface BatchCommand {
  root: string;
  options: BatchOptions;
  format: OutputFormat;
}

function takeValue(args: string[], i: number, flag: string): string {
  const v = args[i + 1];
  if (v === undefined || (v.startsWith('-') && Number.isNaN(Number(v)))) {
    throw new ConfigurationError('CFG-INVALID-OPTION', `${flag} expects a value`);
  }
  return v;
}

function toNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new ConfigurationError('CFG-INVALID-OPTION', `${flag} expects a number, got "${value}"`);
  }
  return n;
}

function readFormat(args: string[], i: number, flag: string): OutputFormat {
  const v = takeValue(args, i, flag).toLowerCase();
  if (v !== 'json' && v !== 'text') {
    throw new ConfigurationError('CFG-INVALID-OPTION', `${flag} expects text or json, got "${v}"`);
  }
  return v;
}

// --unique-id, --unique-id=<suffix>, --no-unique-id
function readUniqueId(arg: string): UniqueIdOption | undefined {
  if (arg === '--unique-id') return true;
  if (arg === '--no-unique-id') return false;
  if (arg.startsWith('--unique-id=')) return arg.slice('--unique-id='.length);
  return undefined;
}

export function parseGenerateArgs(args: string[]): GenerateCommand {
  const config: Record<string, unknown> = {};
  const positionals: string[] = [];
  let output: string | undefined;
  let format: OutputFormat = 'text';
  let uniqueId: UniqueIdOption | undefined;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    const numberKey = NUMBER_FLAGS[a];
    if (numberKey) { config[numberKey] = toNumber(a, takeValue(args, i, a)); i++; continue; }
    const stringKey = STRING_FLAGS[a];
    if (stringKey) { config[stringKey] = takeValue(args, i, a); i++; continue; }
    if (a === '--output' || a === '-o') { output = takeValue(args, i, a); i++; continue; }
    if (a === '--format' || a === '-f') { format = readFormat(args, i, a); i++; continue; }
    const unique = readUniqueId(a);
    if (unique !== undefined) { uniqueId = unique; continue; }
    if (a.startsWith('-')) throw new ConfigurationError('CFG-INVALID-OPTION', `Unknown option: ${a}`);
    positionals.push(a);
  }

  if (positionals.length === 0) {
    throw new ConfigurationError('CFG-INVALID-OPTION', 'Missing pattern name');
  }
  if (!output && positionals[1]) output = positionals[1];
  return { config: { pattern: positionals[0], ...config }, output, format, uniqueId };
}

export function parseBatchArgs(args: string[]): BatchCommand {
  const options: BatchOptions = {};
  const includes: string[] = [];
  const excludes: string[] = [];
  let format: OutputFormat = 'text';
  let root: string | undefined;

  const splitGlobs = (v: string) => v.split(',').map(s => s.trim()).filter(Boolean);

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === '--out-dir' || a === '-O') { options.outDir = takeValue(args, i, a); i++; continue; }
    if (a === '--include' || a === '-I') { includes.push(...splitGlobs(takeValue(args, i, a))); i++; continue; }
    if (a === '--exclude' || a === '-E') { excludes.push(...splitGlobs(takeValue(args, i, a))); i++; continue; }
    if (a === '--no-gitignore') { options.useGitignore = false; continue; }
    if (a === '--gitignore') { options.useGitignore = true; continue; }
    if (a === '--dry-run' || a === '-n') { options.dryRun = true; continue; }
    if (a === '--format' || a === '-f') { format = readFormat(args, i, a); i++; continue; }
    const unique = readUniqueId(a);
    if (unique !== undefined) { options.uniqueId = unique; continue; }
    if (a.startsWith('-')) throw new ConfigurationError('CFG-INVALID-OPTION', `Unknown option: ${a}`);
    if (root === undefined) root = a;
  }

  if (includes.length) options.includes = includes;
  if (excludes.length) options.excludes = excludes;
  return { root: root ?? '.', options, format };
}
