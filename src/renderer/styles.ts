import type { Declaration, StyleRule } from './scene-types.js';

export type StrokeStyleOptions = {
  /** Paint: a color token or a `url(#id)` reference */
  stroke: string;
  strokeWidth: number;
  strokeOpacity?: number;
  mask?: string;
};

export function strokeDeclarations(opts: StrokeStyleOptions): Declaration[] {
  const decls: Declaration[] = [['stroke', opts.stroke]];
  if (opts.strokeOpacity != null) decls.push(['stroke-opacity', String(opts.strokeOpacity)]);
  decls.push(
    ['stroke-width', String(opts.strokeWidth)],
    ['stroke-linecap', 'round'],
    ['stroke-linejoin', 'round'],
    ['fill', 'none'],
  );
  if (opts.mask) decls.push(['mask', opts.mask]);
  return decls;
}

export function strokeRule(selector: string, opts: StrokeStyleOptions): StyleRule {
  return { selector, declarations: strokeDeclarations(opts) };
}

export function animationRule(selector: string, animation: string, extra: Declaration[] = []): StyleRule {
  return { selector, declarations: [['animation', animation], ...extra] };
}
