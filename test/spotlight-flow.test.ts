import { describe, expect, it } from 'vitest';
import { SpotlightFlowGenerator } from '../src/generators/flow/spotlight-flow.js';

const ids = (svg: string) => [...svg.matchAll(/id="([^"]+)"/g)].map(m => m[1]);
const refs = (svg: string) => [...svg.matchAll(/url\(#([^)]+)\)/g)].map(m => m[1]);

describe('SpotlightFlowGenerator', () => {
  it('draws a dimmed copy and a masked copy of evenly spaced arrows', () => {
    const svg = new SpotlightFlowGenerator().generate(false);
    const copy = [
      '      <polyline points="23,25 47,50 23,75"/>',
      '      <polyline points="38,25 62,50 38,75"/>',
      '      <polyline points="53,25 77,50 53,75"/>',
    ];
    expect(svg).toContain(['    <g class="arrow-dim">', ...copy, '    </g>'].join('\n'));
    expect(svg).toContain(['    <g class="arrow-hi">', ...copy, '    </g>'].join('\n'));
  });

  it('sweeps a soft mask across an extended path', () => {
    const generator = new SpotlightFlowGenerator();
    expect(generator.travelDistance()).toBe(150);
    expect(generator.duration()).toBe(7.5);

    const svg = generator.generate(false);
    expect(svg).toContain(
      [
        '    <linearGradient id="maskGrad" x1="0" y1="0" x2="1" y2="0">',
        '      <stop offset="0%" stop-color="black" stop-opacity="0"/>',
        '      <stop offset="35.0%" stop-color="white" stop-opacity="1"/>',
        '      <stop offset="65.0%" stop-color="white" stop-opacity="1"/>',
        '      <stop offset="100%" stop-color="black" stop-opacity="0"/>',
        '    </linearGradient>',
        '    <mask id="sweepMask" maskUnits="userSpaceOnUse" x="0" y="0" width="100" height="100">',
        '      <rect class="sweep-rect" x="10.00" y="-50.00" width="80.00" height="200.00" fill="url(#maskGrad)"/>',
        '    </mask>',
      ].join('\n')
    );
    expect(svg).toContain(
      '    .arrow-dim polyline { stroke: #2563eb; stroke-opacity: 0.2; stroke-width: 10; stroke-linecap: round; stroke-linejoin: round; fill: none; }'
    );
    expect(svg).toContain(
      '    .arrow-hi polyline { stroke: #2563eb; stroke-width: 10; stroke-linecap: round; stroke-linejoin: round; fill: none; mask: url(#sweepMask); }'
    );
    expect(svg).toContain(
      '    .sweep-rect { animation: sweep 7.50s linear infinite; transform-box: fill-box; transform-origin: center; }'
    );
    expect(svg).toContain('      0% { transform: translateX(-90.00px); }');
    expect(svg).toContain('      100% { transform: translateX(90.00px); }');
  });

  it('suffixes ids by default and keeps every reference resolvable', () => {
    const generator = new SpotlightFlowGenerator({ direction: 'down' });
    const first = generator.generate();
    const second = generator.generate();

    const suffix = /id="arrowClip-([0-9a-f]{6})"/.exec(first)?.[1];
    expect(suffix).toBeDefined();
    expect(ids(first)).toEqual([`arrowClip-${suffix}`, `maskGrad-${suffix}`, `sweepMask-${suffix}`]);
    for (const ref of refs(first)) expect(ids(first)).toContain(ref);
    expect(ids(second)).not.toEqual(ids(first));
  });

  it('applies an explicit suffix everywhere', () => {
    const svg = new SpotlightFlowGenerator().generate('card');
    expect(refs(svg).sort()).toEqual(['arrowClip-card', 'maskGrad-card', 'sweepMask-card']);
    expect(ids(svg)).toEqual(['arrowClip-card', 'maskGrad-card', 'sweepMask-card']);
  });

  it('clamps spotlight fields and reports each one', () => {
    const generator = new SpotlightFlowGenerator({ spotlightSize: 5, dimOpacity: -1, pathExtensionFactor: -2, strokeWidth: 1 });
    expect(generator.config).toMatchObject({ spotlightSize: 1, dimOpacity: 0, pathExtensionFactor: 0, strokeWidth: 2 });
    expect(generator.warnings.map(w => w.message)).toEqual([
      'strokeWidth 1 is below 2; using 2',
      'spotlightSize 5 is outside [0.1, 1]; using 1',
      'pathExtensionFactor -2 is below 0; using 0',
      'dimOpacity -1 is outside [0, 1]; using 0',
    ]);
  });
});
