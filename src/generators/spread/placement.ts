import type { FlowDirection, SpreadDirection } from '../../core/types.js';
import { formatPoints, localGlyphPoints } from '../../renderer/geometry.js';
import { splitGroups, spreadGroups, type SpreadGroup } from '../../renderer/layout.js';
import { formatPx } from '../../renderer/utils.js';

// Each group's chevron points away from the centre
const GROUP_GLYPH: Record<SpreadGroup, FlowDirection> = {
  left: 'left',
  right: 'right',
  top: 'up',
  bottom: 'down',
};

export interface PlacedArrow {
  x: number;
  y: number;
  points: string;
}

export interface PlacedGroup {
  group: SpreadGroup;
  arrows: PlacedArrow[];
}

export interface SpreadPlacementInput {
  direction: SpreadDirection;
  numArrows: number;
  width: number;
  height: number;
  centerGapRatio: number;
}

/**
 * Near and far groups with their positions on the spreading axis; the other
 * coordinate is the canvas midline.
 */
export function placeSpreadArrows(input: SpreadPlacementInput): PlacedGroup[] {
  const { direction, numArrows, width, height, centerGapRatio } = input;
  const horizontal = direction === 'horizontal';
  const span = horizontal ? width : height;
  const [nearGroup, farGroup] = spreadGroups(direction);
  const { near, far } = splitGroups(numArrows, span, centerGapRatio);

  const place = (group: SpreadGroup, positions: number[]): PlacedGroup => {
    const points = formatPoints(localGlyphPoints(GROUP_GLYPH[group], width, height));
    return {
      group,
      arrows: positions.map(pos => ({
        x: horizontal ? pos : Math.floor(width / 2),
        y: horizontal ? Math.floor(height / 2) : pos,
        points,
      })),
    };
  };

  return [place(nearGroup, near), place(farGroup, far)].filter(g => g.arrows.length > 0);
}

export function translateStyle(arrow: PlacedArrow): string {
  return `transform: translate(${formatPx(arrow.x)}, ${formatPx(arrow.y)})`;
}
