import { InvalidDirectionError } from '../core/errors.js';
import { SPREAD_DIRECTIONS, type SpreadDirection } from '../core/types.js';

export interface ClipRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface EvenSpacing {
  margin: number;
  spacing: number;
  positions: number[];
}

/**
 * Place `count` arrows across `span`, one interval in from a margin of a
 * fifth of the span on both sides so neither end sits on the clip edge.
 * Spacing never drops below 1px, so when `count + 1` exceeds the space
 * between the margins the last positions run past `span - margin`
 * (span 10, count 8 gives 3..10 against a margin of 2).
 */
export function evenSpacing(count: number, span: number): EvenSpacing {
  const margin = Math.floor(span / 5);
  const available = span - 2 * margin;
  const spacing = Math.max(1, Math.floor(available / (count + 1)));
  const positions: number[] = [];
  for (let i = 0; i < count; i++) {
    positions.push(margin + (i + 1) * spacing);
  }
  return { margin, spacing, positions };
}

export interface SplitGroups {
  perSide: number;
  margin: number;
  /** Width of the empty band between the two groups */
  gap: number;
  spacing: number;
  /** Left or top group, from the margin edge toward the gap */
  near: number[];
  /** Right or bottom group, from the gap edge toward the far margin */
  far: number[];
}

/**
 * Two symmetric groups separated by a centre gap.
 *
 * Each side gets `floor(count / 2)` arrows, so an odd count loses one arrow
 * (5 becomes 2 + 2). The margin is an eighth of the span and the gap is
 * `centerGapRatio` of what remains inside the margins.
 */
export function splitGroups(count: number, span: number, centerGapRatio: number): SplitGroups {
  const perSide = Math.floor(count / 2);
  const margin = Math.floor(span / 8);
  const available = span - 2 * margin;
  const gap = available * centerGapRatio;
  const sideSpan = Math.floor((available - gap) / 2);
  const spacing = perSide > 1 ? Math.floor(sideSpan / (perSide + 1)) : Math.floor(sideSpan / 2);

  const nearStart = margin;
  const farStart = Math.floor(span / 2) + Math.floor(gap / 2);

  const near: number[] = [];
  const far: number[] = [];
  for (let i = 0; i < perSide; i++) {
    near.push(nearStart + (i + 1) * spacing);
    far.push(farStart + (i + 1) * spacing);
  }
  return { perSide, margin, gap, spacing, near, far };
}

export type SpreadGroup = 'left' | 'right' | 'top' | 'bottom';

/** Near (left/top) and far (right/bottom) group for a spread direction */
export function spreadGroups(direction: SpreadDirection): readonly [near: SpreadGroup, far: SpreadGroup] {
  switch (direction) {
    case 'horizontal':
      return ['left', 'right'];
    case 'vertical':
      return ['top', 'bottom'];
    default:
      throw new InvalidDirectionError(String(direction), SPREAD_DIRECTIONS);
  }
}

export function fullCanvasClip(width: number, height: number): ClipRect {
  return { x: 0, y: 0, width, height };
}

// Inset along the spreading axis so the outer arrows fade at the edge
export function spreadClipBounds(direction: SpreadDirection, width: number, height: number): ClipRect {
  switch (direction) {
    case 'vertical': {
      const marginY = Math.floor(height / 10);
      return { x: 0, y: marginY, width, height: height - 2 * marginY };
    }
    case 'horizontal': {
      const marginX = Math.floor(width / 10);
      return { x: marginX, y: 0, width: width - 2 * marginX, height };
    }
    default:
      throw new InvalidDirectionError(String(direction), SPREAD_DIRECTIONS);
  }
}
