import {
  MovingFlowOptionsSchema,
  RangeClamp,
  parseFlowDirection,
  parseOptions,
  type MovingFlowOptions,
} from '../../core/config.js';
import type { MovingFlowConfig } from '../../core/types.js';
import { animationShorthand, flowKeyframes } from '../../renderer/animation.js';
import { formatPoints, glyphPoints, isVertical } from '../../renderer/geometry.js';
import type { IdScope } from '../../renderer/id-scope.js';
import type { StyleSheet, SvgElement } from '../../renderer/scene-types.js';
import { animationRule, strokeRule } from '../../renderer/styles.js';
import { el } from '../../renderer/svg-writer.js';
import { flowTravelDistance, formatSeconds, staggerDelay } from '../../renderer/timing.js';
import { ArrowGenerator, resolveBaseConfig, type Resolved } from '../base.js';

const DEFAULTS = { strokeWidth: 15, width: 100, height: 100, numArrows: 4, minArrows: 1, pxPerSecond: 20 };

function resolve(options: MovingFlowOptions): Resolved<MovingFlowConfig> {
  const parsed = parseOptions(MovingFlowOptionsSchema, options);
  const clamp = new RangeClamp();
  const base = resolveBaseConfig(parsed, DEFAULTS, clamp);
  return {
    config: {
      ...base,
      direction: parseFlowDirection(parsed.direction ?? 'right'),
      animation: parsed.animation ?? 'ease-in-out',
    },
    warnings: clamp.warnings,
  };
}

/**
 * Arrows stacked on one centred chevron, each travelling the full axis and
 * fading at both ends. They share one keyframes loop and differ only by a
 * negative start offset, which reads as a continuous stream.
 */
export class MovingFlowGenerator extends ArrowGenerator<MovingFlowConfig> {
  constructor(options: MovingFlowOptions = {}) {
    super(resolve(options));
  }

  travelDistance(): number {
    const { direction, width, height } = this.config;
    return flowTravelDistance(isVertical(direction) ? height : width);
  }

  buildStyles(scope: IdScope): StyleSheet {
    const { color, strokeWidth, direction, animation } = this.config;
    const keyframes = scope.name('flow');
    return {
      rules: [
        strokeRule(`.${scope.name('arrow')}`, { stroke: color, strokeWidth }),
        animationRule(`.${scope.name('arrow-flow')}`, animationShorthand(keyframes, this.duration(), animation)),
      ],
      keyframes: [flowKeyframes(direction, Math.floor(this.travelDistance() / 2), keyframes)],
    };
  }

  buildArrows(scope: IdScope): SvgElement[] {
    const { direction, width, height, numArrows } = this.config;
    const points = formatPoints(glyphPoints(direction, width, height));
    const duration = this.duration();
    const className = `${scope.name('arrow')} ${scope.name('arrow-flow')}`;
    const arrows: SvgElement[] = [];
    for (let i = 1; i <= numArrows; i++) {
      const delay = staggerDelay(i, duration, numArrows);
      arrows.push(
        el('g', { class: className, style: `animation-delay: ${formatSeconds(delay)}` }, [el('polyline', { points })])
      );
    }
    return arrows;
  }
}
