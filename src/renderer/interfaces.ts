import type { IdScope } from './id-scope.js';
import type { ClipRect } from './layout.js';
import type { StyleSheet, SvgElement } from './scene-types.js';

/**
 * Capability interface every arrow variant provides to the scene composer
 */
export interface ArrowPattern {
  readonly width: number;
  readonly height: number;

  /** Region outside which arrows are clipped */
  clipBounds(): ClipRect;

  /**
   * Gradient and mask definitions, defining their ids through `scope`
   */
  buildDefs(scope: IdScope): SvgElement[];

  /**
   * Stroke rules, animation rules and keyframes
   */
  buildStyles(scope: IdScope): StyleSheet;

  /** Positioned glyph groups, in render order, classed through `scope` */
  buildArrows(scope: IdScope): SvgElement[];
}
