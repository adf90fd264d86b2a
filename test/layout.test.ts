import { describe, expect, it } from 'vitest';
import { evenSpacing, splitGroups, spreadClipBounds, spreadGroups } from '../src/renderer/layout.js';

describe('evenSpacing', () => {
  it('starts one interval in from the margin', () => {
    expect(evenSpacing(3, 100)).toEqual({ margin: 20, spacing: 15, positions: [35, 50, 65] });
    expect(evenSpacing(4, 100).positions).toEqual([32, 44, 56, 68]);
  });

  it('keeps every position inside the margins and strictly increasing', () => {
    for (const span of [60, 100, 257, 400]) {
      for (let n = 1; n <= 8; n++) {
        const { margin, positions } = evenSpacing(n, span);
        expect(positions[0]).toBeGreaterThanOrEqual(margin);
        expect(positions[positions.length - 1]).toBeLessThanOrEqual(span - margin);
        for (let i = 1; i < positions.length; i++) {
          expect(positions[i]).toBeGreaterThan(positions[i - 1]);
        }
      }
    }
  });

  it('keeps a 1px step on spans too small for the count', () => {
    expect(evenSpacing(8, 10)).toEqual({ margin: 2, spacing: 1, positions: [3, 4, 5, 6, 7, 8, 9, 10] });
  });
});

describe('splitGroups', () => {
  it('places two symmetric groups around the gap', () => {
    expect(splitGroups(6, 300, 0.2)).toEqual({
      perSide: 3,
      margin: 37,
      gap: 226 * 0.2,
      spacing: 22,
      near: [59, 81, 103],
      far: [194, 216, 238],
    });
  });

  it('truncates an odd count to the same number per side', () => {
    const groups = splitGroups(5, 100, 0.2);
    expect(groups.perSide).toBe(2);
    expect(groups.near).toEqual([22, 32]);
    expect(groups.far).toEqual([67, 77]);
  });

  it('halves the side span when a side holds one arrow', () => {
    const groups = splitGroups(2, 100, 0.2);
    expect(groups.spacing).toBe(15);
    expect(groups.near).toEqual([27]);
    expect(groups.far).toEqual([72]);
  });

  it('never puts an arrow inside the centre gap or past the far margin', () => {
    for (const span of [100, 257, 300]) {
      for (const ratio of [0.1, 0.2, 0.3, 0.4]) {
        for (const count of [2, 4, 5, 6, 8]) {
          const { margin, gap, near, far } = splitGroups(count, span, ratio);
          const gapStart = span / 2 - gap / 2;
          const gapEnd = span / 2 + gap / 2;
          for (const p of near) {
            expect(p).toBeGreaterThan(margin);
            expect(p).toBeLessThan(gapStart);
          }
          for (const p of far) {
            expect(p).toBeGreaterThan(gapEnd);
            expect(p).toBeLessThanOrEqual(span - margin);
          }
        }
      }
    }
  });
});

describe('spread clip and groups', () => {
  it('insets along the spreading axis only', () => {
    expect(spreadClipBounds('horizontal', 100, 100)).toEqual({ x: 10, y: 0, width: 80, height: 100 });
    expect(spreadClipBounds('vertical', 300, 150)).toEqual({ x: 0, y: 15, width: 300, height: 120 });
  });

  it('maps directions to near and far groups', () => {
    expect(spreadGroups('horizontal')).toEqual(['left', 'right']);
    expect(spreadGroups('vertical')).toEqual(['top', 'bottom']);
  });
});
