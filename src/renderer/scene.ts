import { SceneReferenceError } from '../core/errors.js';
import type { UniqueIdOption } from '../core/types.js';
import { IdScope, suffixFor } from './id-scope.js';
import type { ArrowPattern } from './interfaces.js';
import type { SceneDocument } from './scene-types.js';
import { el, serializeScene } from './svg-writer.js';

export const CLIP_ID = 'arrowClip';

/**
 * Assemble clip region, defs, style block and glyphs of a pattern into one
 * scene. Fails without producing anything when a reference would dangle.
 */
export function composeScene(pattern: ArrowPattern, uniqueId: UniqueIdOption = false): SceneDocument {
  const scope = new IdScope(suffixFor(uniqueId));
  const clip = pattern.clipBounds();

  const clipPath = el('clipPath', { id: scope.define(CLIP_ID) }, [
    el('rect', { x: clip.x, y: clip.y, width: clip.width, height: clip.height }),
  ]);
  const defs = [clipPath, ...pattern.buildDefs(scope)];
  const style = pattern.buildStyles(scope);
  const body = [el('g', { 'clip-path': scope.url(CLIP_ID) }, pattern.buildArrows(scope))];

  const dangling = scope.undefinedReferences();
  if (dangling.length > 0) throw new SceneReferenceError(dangling);

  return { width: pattern.width, height: pattern.height, ids: scope.definedIds(), defs, style, body };
}

export function renderScene(pattern: ArrowPattern, uniqueId: UniqueIdOption = false): string {
  return serializeScene(composeScene(pattern, uniqueId));
}
