import { PATTERNS, parsePatternConfig } from '../core/config.js';
import { InvalidPatternError } from '../core/errors.js';
import { MovingFlowGenerator } from './flow/moving-flow.js';
import { SpotlightFlowGenerator } from './flow/spotlight-flow.js';
import { BouncingSpreadGenerator } from './spread/bouncing-spread.js';
import { SpotlightSpreadGenerator } from './spread/spotlight-spread.js';

export type AnyArrowGenerator =
  | MovingFlowGenerator
  | SpotlightFlowGenerator
  | BouncingSpreadGenerator
  | SpotlightSpreadGenerator;

function readPattern(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'pattern' in input) {
    return String(input.pattern);
  }
  return '(missing)';
}

/**
 * Build a generator from a serialisable record such as a parsed
 * `*.arrow.json` file or tool arguments. The `pattern` field selects the
 * variant; every other field is that variant's options.
 */
export function createGenerator(input: unknown): AnyArrowGenerator {
  const name = readPattern(input);
  if (!PATTERNS.some(p => p === name)) throw new InvalidPatternError(name, PATTERNS);

  const config = parsePatternConfig(input);
  switch (config.pattern) {
    case 'moving-flow': {
      const { pattern: _pattern, ...options } = config;
      return new MovingFlowGenerator(options);
    }
    case 'spotlight-flow': {
      const { pattern: _pattern, ...options } = config;
      return new SpotlightFlowGenerator(options);
    }
    case 'bouncing-spread': {
      const { pattern: _pattern, ...options } = config;
      return new BouncingSpreadGenerator(options);
    }
    case 'spotlight-spread': {
      const { pattern: _pattern, ...options } = config;
      return new SpotlightSpreadGenerator(options);
    }
  }
}

export { ArrowGenerator } from './base.js';
export { MovingFlowGenerator, SpotlightFlowGenerator, BouncingSpreadGenerator, SpotlightSpreadGenerator };
