// Chevron point sets for the four cardinal directions.
// Every coordinate is an integer so output is stable across runs.

import { InvalidDirectionError } from '../core/errors.js';
import { FLOW_DIRECTIONS, type FlowDirection } from '../core/types.js';
import { formatNumber } from './utils.js';

export type Point = { x: number; y: number };

export type ArrowGlyph = readonly [Point, Point, Point];

const half = (n: number) => Math.floor(n / 2);

/**
 * Chevron centred on the canvas, apex pointing in `direction`.
 * The spread along the travel axis is a quarter of the canvas and the
 * depth of the chevron an eighth.
 */
export function glyphPoints(direction: FlowDirection, width: number, height: number): ArrowGlyph {
  const cx = half(width);
  const cy = half(height);
  const ox = Math.floor(width / 4);
  const oy = Math.floor(height / 4);

  switch (direction) {
    case 'down':
      return [
        { x: cx - ox, y: cy - half(oy) },
        { x: cx, y: cy + half(oy) },
        { x: cx + ox, y: cy - half(oy) },
      ];
    case 'up':
      return [
        { x: cx - ox, y: cy + half(oy) },
        { x: cx, y: cy - half(oy) },
        { x: cx + ox, y: cy + half(oy) },
      ];
    case 'right':
      return [
        { x: cx - half(ox), y: cy - oy },
        { x: cx + half(ox), y: cy },
        { x: cx - half(ox), y: cy + oy },
      ];
    case 'left':
      return [
        { x: cx + half(ox), y: cy - oy },
        { x: cx - half(ox), y: cy },
        { x: cx + half(ox), y: cy + oy },
      ];
    default:
      throw new InvalidDirectionError(String(direction), FLOW_DIRECTIONS);
  }
}

/**
 * Small chevron around the local origin, placed by translation.
 * Sized at a twentieth of the canvas on each axis.
 */
export function localGlyphPoints(direction: FlowDirection, width: number, height: number): ArrowGlyph {
  const ox = Math.floor(width / 20);
  const oy = Math.floor(height / 20);

  switch (direction) {
    case 'left':
      return [{ x: ox, y: -oy }, { x: -ox, y: 0 }, { x: ox, y: oy }];
    case 'right':
      return [{ x: -ox, y: -oy }, { x: ox, y: 0 }, { x: -ox, y: oy }];
    case 'up':
      return [{ x: -ox, y: oy }, { x: 0, y: -oy }, { x: ox, y: oy }];
    case 'down':
      return [{ x: -ox, y: -oy }, { x: 0, y: oy }, { x: ox, y: -oy }];
    default:
      throw new InvalidDirectionError(String(direction), FLOW_DIRECTIONS);
  }
}

export function offsetGlyph(glyph: ArrowGlyph, dx: number, dy: number): ArrowGlyph {
  const [a, b, c] = glyph;
  return [
    { x: a.x + dx, y: a.y + dy },
    { x: b.x + dx, y: b.y + dy },
    { x: c.x + dx, y: c.y + dy },
  ];
}

export function formatPoints(glyph: ArrowGlyph): string {
  return glyph.map(p => `${formatNumber(p.x)},${formatNumber(p.y)}`).join(' ');
}

export function isVertical(direction: FlowDirection): boolean {
  return direction === 'up' || direction === 'down';
}
