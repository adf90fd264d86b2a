// Scene building blocks shared by the generators
export type { ArrowPattern } from './interfaces.js';
export type { AttrValue, SvgElement, Declaration, StyleRule, Keyframe, KeyframesRule, StyleSheet, SceneDocument } from './scene-types.js';
export type { Point, ArrowGlyph } from './geometry.js';
export type { ClipRect, EvenSpacing, SplitGroups, SpreadGroup } from './layout.js';

export { CLIP_ID, composeScene, renderScene } from './scene.js';
export { IdScope, randomSuffix, suffixFor } from './id-scope.js';
export { el, renderElement, renderStyleSheet, serializeScene } from './svg-writer.js';
export { glyphPoints, localGlyphPoints, offsetGlyph, formatPoints, isVertical } from './geometry.js';
export { evenSpacing, splitGroups, spreadGroups, fullCanvasClip, spreadClipBounds } from './layout.js';
export {
  MIN_SPEED,
  BOUNCE_FRACTION,
  resolveDuration,
  staggerDelay,
  flowTravelDistance,
  spotlightTravelDistance,
  bounceTravelDistance,
} from './timing.js';
