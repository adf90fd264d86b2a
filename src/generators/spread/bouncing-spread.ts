import {
  BouncingSpreadOptionsSchema,
  RangeClamp,
  parseOptions,
  parseSpreadDirection,
  type BouncingSpreadOptions,
} from '../../core/config.js';
import type { BouncingSpreadConfig } from '../../core/types.js';
import { animationShorthand, bounceKeyframes, bounceKeyframesName } from '../../renderer/animation.js';
import type { IdScope } from '../../renderer/id-scope.js';
import { spreadClipBounds, spreadGroups, type ClipRect } from '../../renderer/layout.js';
import type { StyleSheet, SvgElement } from '../../renderer/scene-types.js';
import { animationRule, strokeRule } from '../../renderer/styles.js';
import { el } from '../../renderer/svg-writer.js';
import { bounceTravelDistance } from '../../renderer/timing.js';
import { ArrowGenerator, resolveBaseConfig, type Resolved } from '../base.js';
import { placeSpreadArrows, translateStyle } from './placement.js';

const DEFAULTS = { strokeWidth: 2, width: 300, height: 150, numArrows: 6, minArrows: 2, pxPerSecond: 10 };

function resolve(options: BouncingSpreadOptions): Resolved<BouncingSpreadConfig> {
  const parsed = parseOptions(BouncingSpreadOptionsSchema, options);
  const clamp = new RangeClamp();
  const base = resolveBaseConfig(parsed, DEFAULTS, clamp);
  return {
    config: {
      ...base,
      direction: parseSpreadDirection(parsed.direction ?? 'vertical'),
      animation: parsed.animation ?? 'ease-in-out',
      centerGapRatio: clamp.clamp('centerGapRatio', parsed.centerGapRatio ?? 0.2, 0.1, 0.4),
    },
    warnings: clamp.warnings,
  };
}

/**
 * Two groups on either side of a centre gap that push outward and
 * retract on an alternating loop.
 */
export class BouncingSpreadGenerator extends ArrowGenerator<BouncingSpreadConfig> {
  constructor(options: BouncingSpreadOptions = {}) {
    super(resolve(options));
  }

  travelDistance(): number {
    const { direction, width, height } = this.config;
    return bounceTravelDistance(direction === 'horizontal' ? width : height);
  }

  clipBounds(): ClipRect {
    return spreadClipBounds(this.config.direction, this.width, this.height);
  }

  buildStyles(scope: IdScope): StyleSheet {
    const { color, strokeWidth, animation, direction } = this.config;
    const duration = this.duration();
    const distance = this.travelDistance();
    const present = placeSpreadArrows(this.config).map(g => g.group);
    const groups = spreadGroups(direction).filter(g => present.includes(g));
    return {
      rules: [
        strokeRule(`.${scope.name('arrow')}`, { stroke: color, strokeWidth }),
        ...groups.map(g =>
          animationRule(`.${scope.name(`group-${g}`)}`, animationShorthand(scope.name(bounceKeyframesName(g)), duration, animation, true))
        ),
      ],
      keyframes: groups.map(g => bounceKeyframes(g, distance, scope.name(bounceKeyframesName(g)))),
    };
  }

  buildArrows(scope: IdScope): SvgElement[] {
    return placeSpreadArrows(this.config).map(({ group, arrows }) =>
      el(
        'g',
        { class: `${scope.name('arrow')} ${scope.name(`group-${group}`)}` },
        arrows.map(a => el('g', { style: translateStyle(a) }, [el('polyline', { points: a.points })]))
      )
    );
  }
}
