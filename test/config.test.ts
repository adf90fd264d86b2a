import { describe, expect, it } from 'vitest';
import {
  RangeClamp,
  parsePatternConfig,
  parseSpreadDirection,
  resolveSpeedSpec,
} from '../src/core/config.js';
import { ConfigurationError, InvalidDirectionError } from '../src/core/errors.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('resolveSpeedSpec', () => {
  it('falls back to the default when no speed field is given', () => {
    expect(resolveSpeedSpec({}, 20)).toEqual({ kind: 'pixelsPerSecond', value: 20 });
  });

  it('takes whichever flat field is set', () => {
    expect(resolveSpeedSpec({ speedInPxPerSecond: 35 }, 20)).toEqual({ kind: 'pixelsPerSecond', value: 35 });
    expect(resolveSpeedSpec({ speedInPxPerSecond: null, speedInDurationSeconds: 3 }, 20)).toEqual({
      kind: 'durationSeconds',
      value: 3,
    });
  });

  it('passes a tagged speed through', () => {
    expect(resolveSpeedSpec({ speed: { kind: 'durationSeconds', value: 2 } }, 20)).toEqual({
      kind: 'durationSeconds',
      value: 2,
    });
  });

  it('rejects both flat fields at once', () => {
    const err = thrown(() => resolveSpeedSpec({ speedInPxPerSecond: 30, speedInDurationSeconds: 2 }, 20));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ code: 'CFG-SPEED-CONFLICT' });
  });

  it('rejects a tagged speed next to a flat field', () => {
    const err = thrown(() => resolveSpeedSpec({ speed: { kind: 'pixelsPerSecond', value: 5 }, speedInDurationSeconds: 2 }, 20));
    expect(err).toMatchObject({ code: 'CFG-SPEED-CONFLICT' });
  });

  it('rejects both flat fields explicitly unset', () => {
    const err = thrown(() => resolveSpeedSpec({ speedInPxPerSecond: null, speedInDurationSeconds: null }, 20));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ code: 'CFG-SPEED-MISSING' });
  });
});

describe('RangeClamp', () => {
  it('pulls values into range and records a warning', () => {
    const clamp = new RangeClamp();
    expect(clamp.clamp('spotlightSize', 2, 0.1, 1)).toBe(1);
    expect(clamp.clamp('strokeWidth', 1, 2)).toBe(2);
    expect(clamp.clamp('dimOpacity', 0.5, 0, 1)).toBe(0.5);
    expect(clamp.warnings.map(w => w.message)).toEqual([
      'spotlightSize 2 is outside [0.1, 1]; using 1',
      'strokeWidth 1 is below 2; using 2',
    ]);
    expect(clamp.warnings[0]).toMatchObject({ field: 'spotlightSize', given: 2, applied: 1, code: 'CFG-VALUE-CLAMPED' });
  });
});

describe('parsePatternConfig', () => {
  it('accepts a known pattern with its own fields', () => {
    expect(parsePatternConfig({ pattern: 'bouncing-spread', centerGapRatio: 0.3 })).toEqual({
      pattern: 'bouncing-spread',
      centerGapRatio: 0.3,
    });
  });

  it('rejects fields that belong to another pattern', () => {
    const err = thrown(() => parsePatternConfig({ pattern: 'moving-flow', dimOpacity: 0.5 }));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ code: 'CFG-INVALID-OPTION' });
    expect(String(err)).toMatch(/Unrecognized key\(s\) in object: 'dimOpacity'/);
  });

  it('rejects markup in the color', () => {
    const err = thrown(() => parsePatternConfig({ pattern: 'moving-flow', color: 'red"><script>' }));
    expect(err).toMatchObject({ code: 'CFG-INVALID-OPTION' });
  });

  it('rejects a non-positive canvas', () => {
    const err = thrown(() => parsePatternConfig({ pattern: 'spotlight-flow', width: 0 }));
    expect(err).toMatchObject({ code: 'CFG-INVALID-OPTION' });
  });
});

describe('parseSpreadDirection', () => {
  it('names the accepted values in the hint', () => {
    const err = thrown(() => parseSpreadDirection('up'));
    expect(err).toBeInstanceOf(InvalidDirectionError);
    expect(err).toMatchObject({
      code: 'GEO-DIRECTION-INVALID',
      message: 'Invalid direction: up',
      hint: "Use 'horizontal', 'vertical'.",
    });
  });
});
