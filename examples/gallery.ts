/**
 * Example: several arrows embedded inline in one HTML page
 *
 * Inline SVGs share the page's id namespace, so every arrow is generated
 * with unique ids. Without them the second spotlight would reuse the first
 * one's mask and gradients.
 *
 * Usage: tsx examples/gallery.ts [output.html]
 */

import * as fs from 'node:fs';
import {
  BouncingSpreadGenerator,
  MovingFlowGenerator,
  SpotlightFlowGenerator,
  SpotlightSpreadGenerator,
  type AnyArrowGenerator,
} from '../src/index.js';
import { escapeXml } from '../src/renderer/utils.js';

const outputPath = process.argv[2] ?? 'arrow-gallery.html';

const entries: Array<{ title: string; generator: AnyArrowGenerator }> = [
  { title: 'Moving flow, right', generator: new MovingFlowGenerator({ color: '#2563eb', direction: 'right', numArrows: 4 }) },
  { title: 'Moving flow, up', generator: new MovingFlowGenerator({ color: '#16a34a', direction: 'up', speedInDurationSeconds: 2 }) },
  { title: 'Spotlight flow, down', generator: new SpotlightFlowGenerator({ color: '#dc2626', direction: 'down', numArrows: 3 }) },
  { title: 'Spotlight flow, left', generator: new SpotlightFlowGenerator({ color: '#9333ea', direction: 'left', spotlightSize: 0.5 }) },
  { title: 'Bouncing spread, horizontal', generator: new BouncingSpreadGenerator({ direction: 'horizontal', numArrows: 6 }) },
  { title: 'Spotlight spread, vertical', generator: new SpotlightSpreadGenerator({ color: '#ea580c', direction: 'vertical', width: 150, height: 200 }) },
];

console.log('Arrow gallery');
console.log('='.repeat(50));

const figures = entries.map(({ title, generator }) => {
  console.log(`${title}: ${generator.width}x${generator.height}, ${generator.duration().toFixed(2)}s loop`);
  for (const w of generator.warnings) console.log(`  warning: ${w.message}`);
  return [
    '  <figure>',
    generator.generate(true).trimEnd(),
    `    <figcaption>${escapeXml(title)}</figcaption>`,
    '  </figure>',
  ].join('\n');
});

const html = [
  '<!doctype html>',
  '<html>',
  '<head>',
  '<meta charset="utf-8">',
  '<title>Arrow gallery</title>',
  '<style>body { display: flex; flex-wrap: wrap; gap: 24px; font-family: sans-serif; } figure { margin: 0; }</style>',
  '</head>',
  '<body>',
  ...figures,
  '</body>',
  '</html>',
  '',
].join('\n');

fs.writeFileSync(outputPath, html, 'utf8');
console.log('='.repeat(50));
console.log(`Wrote ${entries.length} arrows to ${outputPath}`);
