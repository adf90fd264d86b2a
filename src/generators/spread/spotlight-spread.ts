import {
  RangeClamp,
  SpotlightSpreadOptionsSchema,
  parseOptions,
  parseSpreadDirection,
  type SpotlightSpreadOptions,
} from '../../core/config.js';
import type { SpotlightSpreadConfig, UniqueIdOption } from '../../core/types.js';
import { spreadGradientId, spreadSpotlightGradient } from '../../renderer/animation.js';
import type { IdScope } from '../../renderer/id-scope.js';
import { spreadClipBounds, type ClipRect } from '../../renderer/layout.js';
import type { StyleSheet, SvgElement } from '../../renderer/scene-types.js';
import { strokeRule } from '../../renderer/styles.js';
import { el } from '../../renderer/svg-writer.js';
import { ArrowGenerator, resolveBaseConfig, type Resolved } from '../base.js';
import { placeSpreadArrows, translateStyle } from './placement.js';

const DEFAULTS = { strokeWidth: 10, width: 100, height: 100, numArrows: 4, minArrows: 2, pxPerSecond: 20 };

function resolve(options: SpotlightSpreadOptions): Resolved<SpotlightSpreadConfig> {
  const parsed = parseOptions(SpotlightSpreadOptionsSchema, options);
  const clamp = new RangeClamp();
  const base = resolveBaseConfig(parsed, DEFAULTS, clamp);
  return {
    config: {
      ...base,
      direction: parseSpreadDirection(parsed.direction ?? 'horizontal'),
      spotlightSize: clamp.clamp('spotlightSize', parsed.spotlightSize ?? 0.3, 0.1, 1.0),
      dimOpacity: clamp.clamp('dimOpacity', parsed.dimOpacity ?? 0.2, 0, 1),
      centerGapRatio: clamp.clamp('centerGapRatio', parsed.centerGapRatio ?? 0.2, 0.1, 0.4),
    },
    warnings: clamp.warnings,
  };
}

/**
 * Spread groups stroked with their own moving gradient, so a highlight
 * leaves the centre gap on both sides at once.
 */
export class SpotlightSpreadGenerator extends ArrowGenerator<SpotlightSpreadConfig> {
  protected readonly defaultUniqueId: UniqueIdOption = true;

  constructor(options: SpotlightSpreadOptions = {}) {
    super(resolve(options));
  }

  travelDistance(): number {
    return this.config.direction === 'horizontal' ? this.width : this.height;
  }

  clipBounds(): ClipRect {
    return spreadClipBounds(this.config.direction, this.width, this.height);
  }

  buildDefs(scope: IdScope): SvgElement[] {
    const { color, dimOpacity, spotlightSize } = this.config;
    const duration = this.duration();
    return placeSpreadArrows(this.config).map(({ group }) =>
      spreadSpotlightGradient(scope, group, {
        width: this.width,
        height: this.height,
        duration,
        color,
        dimOpacity,
        spotlightSize,
      })
    );
  }

  buildStyles(scope: IdScope): StyleSheet {
    const { strokeWidth } = this.config;
    return {
      rules: placeSpreadArrows(this.config).map(({ group }) =>
        strokeRule(`.${scope.name(`arrow-${group}`)}`, { stroke: scope.url(spreadGradientId(group)), strokeWidth })
      ),
      keyframes: [],
    };
  }

  buildArrows(scope: IdScope): SvgElement[] {
    return placeSpreadArrows(this.config).flatMap(({ group, arrows }) =>
      arrows.map(a => el('g', { class: scope.name(`arrow-${group}`), style: translateStyle(a) }, [el('polyline', { points: a.points })]))
    );
  }
}
