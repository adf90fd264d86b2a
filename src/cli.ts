#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseBatchArgs, parseGenerateArgs } from './cli-options.js';
import { renderBatch } from './core/batch.js';
import { PATTERNS } from './core/config.js';
import { isArrowError } from './core/errors.js';
import { fromArrowError, fromValueRange, textReport, toJsonResult } from './core/format.js';
import { createGenerator } from './generators/index.js';

function printUsage() {
    console.log('Usage: arrow-anim <pattern> [options] [output.svg]');
    console.log('       arrow-anim batch <directory> [options]');
    console.log('       arrow-anim patterns');
    console.log(`  - Patterns: ${PATTERNS.join(', ')}`);
    console.log('  - Without an output path the SVG is written to stdout');
    console.log('Options:');
    console.log('  --color, -c          Stroke color (default: #2563eb)');
    console.log('  --direction, -d      up|down|left|right for flows, horizontal|vertical for spreads');
    console.log('  --width, --height    Canvas size in pixels');
    console.log('  --stroke-width       Stroke width (at least 2)');
    console.log('  --num-arrows         Number of arrows');
    console.log('  --speed              Speed in pixels per second');
    console.log('  --duration           Loop duration in seconds (instead of --speed)');
    console.log('  --animation          CSS easing for moving-flow and bouncing-spread');
    console.log('  --spotlight-size     Highlight band size, 0.1 to 1.0');
    console.log('  --dim-opacity        Opacity of the dimmed arrows, 0 to 1');
    console.log('  --center-gap         Gap between spread groups, 0.1 to 0.4');
    console.log('  --path-extension     How far the spotlight overshoots the canvas');
    console.log('  --unique-id[=sfx]    Suffix internal ids (random unless a suffix is given)');
    console.log('  --no-unique-id       Keep the default ids');
    console.log('  --output, -o         Output file path');
    console.log('  --format, -f         Report format: text|json (default: text)');
    console.log('Batch options:');
    console.log('  --out-dir, -O        Write SVGs here instead of next to each *.arrow.json');
    console.log('  --include, -I        Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E        Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore       Do not respect .gitignore when scanning');
    console.log('  --dry-run, -n        Do not write files');
}

function handleGenerate(args: string[]) {
    const cmd = parseGenerateArgs(args);
    const generator = createGenerator(cmd.config);
    const svg = generator.generate(cmd.uniqueId);
    const source = String(cmd.config.pattern);
    const diagnostics = generator.warnings.map(fromValueRange);

    if (cmd.output) {
        fs.writeFileSync(cmd.output, svg, 'utf8');
    }

    if (cmd.format === 'json') {
        const payload = { ...toJsonResult(source, diagnostics), output: cmd.output ?? null, svg: cmd.output ? undefined : svg };
        console.log(JSON.stringify(payload, null, 2));
        return;
    }

    if (cmd.output) console.log(`Rendered ${source} -> ${cmd.output}`);
    else process.stdout.write(svg);
    if (diagnostics.length > 0) console.error(textReport(source, diagnostics).trimEnd());
}

async function handleBatch(args: string[]) {
    const cmd = parseBatchArgs(args);
    if (!fs.existsSync(cmd.root) || !fs.statSync(cmd.root).isDirectory()) {
        console.error(`Directory not found: ${cmd.root}`);
        process.exit(1);
    }
    const items = await renderBatch(cmd.root, cmd.options);
    const failed = items.filter(it => it.diagnostics.some(d => d.severity === 'error'));

    if (cmd.format === 'json') {
        const files = items.map(it => ({ ...toJsonResult(it.source, it.diagnostics), index: it.index, output: it.output, written: it.written }));
        console.log(JSON.stringify({ valid: failed.length === 0, renderCount: items.length - failed.length, files }, null, 2));
        process.exit(failed.length === 0 ? 0 : 1);
    }

    if (items.length === 0) {
        console.log('No arrow configs found.');
        process.exit(0);
    }
    for (const it of items) {
        const where = path.relative(process.cwd(), it.source);
        if (it.written) console.log(`Rendered ${where}#${it.index} -> ${path.relative(process.cwd(), it.output)}`);
        if (it.diagnostics.length > 0) console.error(textReport(`${where}#${it.index}`, it.diagnostics).trimEnd());
    }
    if (cmd.options.dryRun) console.log(`Dry run: ${items.length - failed.length} SVG(s) would be written.`);
    process.exit(failed.length === 0 ? 0 : 1);
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    if (args[0] === 'patterns') {
        for (const p of PATTERNS) console.log(p);
        return;
    }

    if (args[0] === 'batch') {
        await handleBatch(args.slice(1));
        return;
    }

    handleGenerate(args);
}

main().catch((err) => {
    if (isArrowError(err)) {
        console.error(textReport('arrow-anim', [fromArrowError(err)]).trimEnd());
    } else {
        console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    }
    process.exit(1);
});
