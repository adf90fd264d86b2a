// Declarative animation descriptors: keyframes, gradients and masks.
// Nothing here schedules anything; the renderer loops them forever.

import { InvalidDirectionError } from '../core/errors.js';
import { FLOW_DIRECTIONS, type Easing, type FlowDirection } from '../core/types.js';
import type { IdScope } from './id-scope.js';
import type { SpreadGroup } from './layout.js';
import type { KeyframesRule, SvgElement } from './scene-types.js';
import { el } from './svg-writer.js';
import { clamp, formatFixed, formatNumber, formatPercent, formatPx } from './utils.js';
import { formatSeconds } from './timing.js';

export type Axis = 'x' | 'y';

export function translate(axis: Axis, value: string): string {
  return axis === 'x' ? `translateX(${value})` : `translateY(${value})`;
}

export function flowAxis(direction: FlowDirection): Axis {
  return direction === 'up' || direction === 'down' ? 'y' : 'x';
}

// +1 when the arrow travels toward larger coordinates
function flowSign(direction: FlowDirection): 1 | -1 {
  switch (direction) {
    case 'down':
    case 'right':
      return 1;
    case 'up':
    case 'left':
      return -1;
    default:
      throw new InvalidDirectionError(String(direction), FLOW_DIRECTIONS);
  }
}

export function animationShorthand(name: string, duration: number, easing: Easing, alternate = false): string {
  return `${name} ${formatSeconds(duration)} ${easing} infinite${alternate ? ' alternate' : ''}`;
}

/**
 * Shared fade-translate loop for moving flow arrows: fade in over the
 * first fifth, hold, fade out over the last fifth, while moving from
 * `-halfTravel` to `+halfTravel` along the flow.
 */
export function flowKeyframes(direction: FlowDirection, halfTravel: number, name = 'flow'): KeyframesRule {
  const axis = flowAxis(direction);
  const sign = flowSign(direction);
  return {
    name,
    frames: [
      { offset: 0, declarations: [['transform', translate(axis, formatPx(-sign * halfTravel))], ['opacity', '0']] },
      { offset: 20, declarations: [['opacity', '1']] },
      { offset: 80, declarations: [['opacity', '1']] },
      { offset: 100, declarations: [['transform', translate(axis, formatPx(sign * halfTravel))], ['opacity', '0']] },
    ],
  };
}

const GROUP_KEYFRAMES: Record<SpreadGroup, string> = {
  left: 'moveLeft',
  right: 'moveRight',
  top: 'moveTop',
  bottom: 'moveBottom',
};

export function bounceKeyframesName(group: SpreadGroup): string {
  return GROUP_KEYFRAMES[group];
}

/**
 * Outward pulse for one spread group. Left and top move toward larger
 * coordinates, right and bottom toward smaller ones, so under an
 * alternating timing both halves read as moving away from the centre.
 */
export function bounceKeyframes(group: SpreadGroup, distance: number, name = GROUP_KEYFRAMES[group]): KeyframesRule {
  const axis: Axis = group === 'left' || group === 'right' ? 'x' : 'y';
  const sign = group === 'left' || group === 'top' ? 1 : -1;
  return {
    name,
    frames: [
      { offset: 0, declarations: [['transform', translate(axis, '0px')]] },
      { offset: 100, declarations: [['transform', translate(axis, formatPx(sign * distance))]] },
    ],
  };
}

export interface SweepGeometry {
  axis: Axis;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Distance from the centred rect to either end of its sweep */
  travel: number;
}

/**
 * Rect carrying the spotlight gradient. It is twice the canvas across the
 * sweep so the highlight never shows a side edge, and along the sweep it
 * grows with the path extension factor.
 */
export function sweepGeometry(direction: FlowDirection, width: number, height: number, pathExtensionFactor: number): SweepGeometry {
  const axis = flowAxis(direction);
  const along = 0.6 + 0.4 * Math.max(0, pathExtensionFactor);
  const rectW = axis === 'x' ? width * along : width * 2;
  const rectH = axis === 'x' ? height * 2 : height * along;
  const travel = axis === 'x' ? (width + rectW) / 2 : (height + rectH) / 2;
  return {
    axis,
    x: (width - rectW) / 2,
    y: (height - rectH) / 2,
    width: rectW,
    height: rectH,
    travel,
  };
}

/** Soft-edged band: transparent, opaque core of `spotlightSize`, transparent */
export function maskGradientStops(spotlightSize: number): SvgElement[] {
  const core = spotlightSize * 100;
  const a = clamp((100 - core) / 2, 0, 50);
  const b = 100 - a;
  return [
    el('stop', { offset: '0%', 'stop-color': 'black', 'stop-opacity': 0 }),
    el('stop', { offset: formatPercent(a), 'stop-color': 'white', 'stop-opacity': 1 }),
    el('stop', { offset: formatPercent(b), 'stop-color': 'white', 'stop-opacity': 1 }),
    el('stop', { offset: '100%', 'stop-color': 'black', 'stop-opacity': 0 }),
  ];
}

export const MASK_GRADIENT_ID = 'maskGrad';
export const SWEEP_MASK_ID = 'sweepMask';

export function sweepMaskDefs(scope: IdScope, sweep: SweepGeometry, spotlightSize: number, width: number, height: number): SvgElement[] {
  const gradientAxis = sweep.axis === 'x' ? { x1: 0, y1: 0, x2: 1, y2: 0 } : { x1: 0, y1: 0, x2: 0, y2: 1 };
  const gradient = el('linearGradient', { id: scope.define(MASK_GRADIENT_ID), ...gradientAxis }, maskGradientStops(spotlightSize));
  const mask = el('mask', { id: scope.define(SWEEP_MASK_ID), maskUnits: 'userSpaceOnUse', x: 0, y: 0, width, height }, [
    el('rect', {
      class: scope.name('sweep-rect'),
      x: formatFixed(sweep.x, 2),
      y: formatFixed(sweep.y, 2),
      width: formatFixed(sweep.width, 2),
      height: formatFixed(sweep.height, 2),
      fill: scope.url(MASK_GRADIENT_ID),
    }),
  ]);
  return [gradient, mask];
}

export function sweepKeyframes(direction: FlowDirection, travel: number, name = 'sweep'): KeyframesRule {
  const axis = flowAxis(direction);
  const sign = flowSign(direction);
  return {
    name,
    frames: [
      { offset: 0, declarations: [['transform', translate(axis, `${formatFixed(-sign * travel, 2)}px`)]] },
      { offset: 100, declarations: [['transform', translate(axis, `${formatFixed(sign * travel, 2)}px`)]] },
    ],
  };
}

const GROUP_GRADIENT_IDS: Record<SpreadGroup, string> = {
  left: 'spotlightGradientLeft',
  right: 'spotlightGradientRight',
  top: 'spotlightGradientTop',
  bottom: 'spotlightGradientBottom',
};

export function spreadGradientId(group: SpreadGroup): string {
  return GROUP_GRADIENT_IDS[group];
}

export interface SpreadSpotlightOptions {
  width: number;
  height: number;
  duration: number;
  color: string;
  dimOpacity: number;
  spotlightSize: number;
}

/**
 * User-space stroke gradient for one spread group. The bright band starts
 * at the centre and slides outward, each group on its own axis and sign,
 * so both highlights leave the gap in step.
 */
export function spreadSpotlightGradient(scope: IdScope, group: SpreadGroup, opts: SpreadSpotlightOptions): SvgElement {
  const { width: w, height: h } = opts;
  const cx = Math.floor(w / 2);
  const cy = Math.floor(h / 2);
  const n = formatNumber;

  const geometry: Record<SpreadGroup, { x1: number; y1: number; x2: number; y2: number; values: string }> = {
    left: { x1: 0, y1: 0, x2: w, y2: 0, values: `${n(cx)} 0; ${n(-w)} 0` },
    right: { x1: -w, y1: 0, x2: 0, y2: 0, values: `${n(-cx)} 0; ${n(w)} 0` },
    top: { x1: 0, y1: 0, x2: 0, y2: h, values: `0 ${n(cy)}; 0 ${n(-h)}` },
    bottom: { x1: 0, y1: -h, x2: 0, y2: 0, values: `0 ${n(-cy)}; 0 ${n(h)}` },
  };
  const g = geometry[group];

  const core = opts.spotlightSize * 100;
  const before = (100 - core) / 2;
  const after = before + core;
  const stop = (offset: string, opacity: number) =>
    el('stop', { offset, 'stop-color': opts.color, 'stop-opacity': opacity });

  return el(
    'linearGradient',
    { id: scope.define(GROUP_GRADIENT_IDS[group]), x1: g.x1, y1: g.y1, x2: g.x2, y2: g.y2, gradientUnits: 'userSpaceOnUse' },
    [
      el('animateTransform', {
        attributeName: 'gradientTransform',
        type: 'translate',
        values: g.values,
        dur: formatSeconds(opts.duration),
        repeatCount: 'indefinite',
      }),
      stop('0%', opts.dimOpacity),
      stop(formatPercent(before), opts.dimOpacity),
      stop('50%', 1),
      stop(formatPercent(after), opts.dimOpacity),
      stop('100%', opts.dimOpacity),
    ]
  );
}
