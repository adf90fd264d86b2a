import {
  RangeClamp,
  SpotlightFlowOptionsSchema,
  parseFlowDirection,
  parseOptions,
  type SpotlightFlowOptions,
} from '../../core/config.js';
import type { SpotlightFlowConfig, UniqueIdOption } from '../../core/types.js';
import {
  SWEEP_MASK_ID,
  animationShorthand,
  sweepGeometry,
  sweepKeyframes,
  sweepMaskDefs,
  type SweepGeometry,
} from '../../renderer/animation.js';
import { formatPoints, glyphPoints, isVertical, offsetGlyph } from '../../renderer/geometry.js';
import type { IdScope } from '../../renderer/id-scope.js';
import { evenSpacing } from '../../renderer/layout.js';
import type { StyleSheet, SvgElement } from '../../renderer/scene-types.js';
import { animationRule, strokeRule } from '../../renderer/styles.js';
import { el } from '../../renderer/svg-writer.js';
import { spotlightTravelDistance } from '../../renderer/timing.js';
import { ArrowGenerator, resolveBaseConfig, type Resolved } from '../base.js';

const DEFAULTS = { strokeWidth: 10, width: 100, height: 100, numArrows: 3, minArrows: 1, pxPerSecond: 20 };

function resolve(options: SpotlightFlowOptions): Resolved<SpotlightFlowConfig> {
  const parsed = parseOptions(SpotlightFlowOptionsSchema, options);
  const clamp = new RangeClamp();
  const base = resolveBaseConfig(parsed, DEFAULTS, clamp);
  return {
    config: {
      ...base,
      direction: parseFlowDirection(parsed.direction ?? 'right'),
      spotlightSize: clamp.clamp('spotlightSize', parsed.spotlightSize ?? 0.3, 0.1, 1.0),
      pathExtensionFactor: clamp.clamp('pathExtensionFactor', parsed.pathExtensionFactor ?? 0.5, 0),
      dimOpacity: clamp.clamp('dimOpacity', parsed.dimOpacity ?? 0.2, 0, 1),
    },
    warnings: clamp.warnings,
  };
}

/**
 * Evenly spaced arrows drawn twice: a dimmed copy underneath and a full
 * strength copy masked by a soft band that sweeps along the flow.
 */
export class SpotlightFlowGenerator extends ArrowGenerator<SpotlightFlowConfig> {
  protected readonly defaultUniqueId: UniqueIdOption = true;

  constructor(options: SpotlightFlowOptions = {}) {
    super(resolve(options));
  }

  private get span(): number {
    return isVertical(this.config.direction) ? this.height : this.width;
  }

  travelDistance(): number {
    return spotlightTravelDistance(this.span, this.config.pathExtensionFactor);
  }

  sweep(): SweepGeometry {
    const { direction, width, height, pathExtensionFactor } = this.config;
    return sweepGeometry(direction, width, height, pathExtensionFactor);
  }

  buildDefs(scope: IdScope): SvgElement[] {
    return sweepMaskDefs(scope, this.sweep(), this.config.spotlightSize, this.width, this.height);
  }

  buildStyles(scope: IdScope): StyleSheet {
    const { color, strokeWidth, dimOpacity, direction } = this.config;
    return {
      rules: [
        strokeRule(`.${scope.name('arrow-dim')} polyline`, { stroke: color, strokeOpacity: dimOpacity, strokeWidth }),
        strokeRule(`.${scope.name('arrow-hi')} polyline`, { stroke: color, strokeWidth, mask: scope.url(SWEEP_MASK_ID) }),
        animationRule(`.${scope.name('sweep-rect')}`, animationShorthand(scope.name('sweep'), this.duration(), 'linear'), [
          ['transform-box', 'fill-box'],
          ['transform-origin', 'center'],
        ]),
      ],
      keyframes: [sweepKeyframes(direction, this.sweep().travel, scope.name('sweep'))],
    };
  }

  buildArrows(scope: IdScope): SvgElement[] {
    const { direction, width, height, numArrows } = this.config;
    const base = glyphPoints(direction, width, height);
    const center = Math.floor(this.span / 2);
    const vertical = isVertical(direction);

    const points = evenSpacing(numArrows, this.span).positions.map(pos => {
      const offset = pos - center;
      return formatPoints(vertical ? offsetGlyph(base, 0, offset) : offsetGlyph(base, offset, 0));
    });
    const copy = () => points.map(p => el('polyline', { points: p }));
    return [el('g', { class: scope.name('arrow-dim') }, copy()), el('g', { class: scope.name('arrow-hi') }, copy())];
  }
}
