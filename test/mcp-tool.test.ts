import { ZodError } from 'zod';
import { describe, expect, it } from 'vitest';
import { InvalidPatternError } from '../src/core/errors.js';
import { generateArrow } from '../src/mcp-tool.js';

describe('generateArrow', () => {
  it('returns the markup with clamp warnings', () => {
    const result = generateArrow({ pattern: 'spotlight-flow', uniqueId: 't1', dimOpacity: 2 });
    expect(result.svg).toContain('<mask id="sweepMask-t1"');
    expect(result.warnings).toEqual([
      { severity: 'warning', code: 'CFG-VALUE-CLAMPED', message: 'dimOpacity 2 is outside [0, 1]; using 1', field: 'dimOpacity' },
    ]);
  });

  it('keeps default ids when asked', () => {
    expect(generateArrow({ pattern: 'moving-flow', uniqueId: false }).svg).toContain('<clipPath id="arrowClip">');
  });

  it('requires a pattern', () => {
    expect(() => generateArrow({ color: 'red' })).toThrowError(ZodError);
    expect(() => generateArrow({ pattern: 'zigzag' })).toThrowError(InvalidPatternError);
  });
});
