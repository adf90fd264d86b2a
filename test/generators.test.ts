import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError, InvalidDirectionError, InvalidPatternError } from '../src/core/errors.js';
import {
  BouncingSpreadGenerator,
  MovingFlowGenerator,
  SpotlightFlowGenerator,
  SpotlightSpreadGenerator,
  createGenerator,
} from '../src/generators/index.js';
import { renderArrow } from '../src/index.js';

const conflicting = { speedInPxPerSecond: 10, speedInDurationSeconds: 2 };
const unset = { speedInPxPerSecond: null, speedInDurationSeconds: null };

describe('speed validation across patterns', () => {
  const builders: Array<[string, () => unknown, () => unknown]> = [
    ['moving-flow', () => new MovingFlowGenerator(conflicting), () => new MovingFlowGenerator(unset)],
    ['spotlight-flow', () => new SpotlightFlowGenerator(conflicting), () => new SpotlightFlowGenerator(unset)],
    ['bouncing-spread', () => new BouncingSpreadGenerator(conflicting), () => new BouncingSpreadGenerator(unset)],
    ['spotlight-spread', () => new SpotlightSpreadGenerator(conflicting), () => new SpotlightSpreadGenerator(unset)],
  ];

  for (const [name, both, neither] of builders) {
    it(`${name} rejects both speeds and neither`, () => {
      expect(both).toThrowError(ConfigurationError);
      expect(both).toThrowError(/over-specified/);
      expect(neither).toThrowError(/unset/);
    });
  }
});

describe('createGenerator', () => {
  it('builds the variant the pattern names', () => {
    const generator = createGenerator({ pattern: 'moving-flow', direction: 'up' });
    expect(generator).toBeInstanceOf(MovingFlowGenerator);
    expect(generator.config.direction).toBe('up');
    expect(createGenerator({ pattern: 'spotlight-spread' })).toBeInstanceOf(SpotlightSpreadGenerator);
  });

  it('rejects an unknown pattern before validating fields', () => {
    expect(() => createGenerator({ pattern: 'spiral', width: -1 })).toThrowError(InvalidPatternError);
    expect(() => createGenerator({ pattern: 'spiral' })).toThrowError('Unknown arrow pattern: spiral');
    expect(() => createGenerator(null)).toThrowError('Unknown arrow pattern: (missing)');
  });

  it('rejects a direction from the other family', () => {
    expect(() => createGenerator({ pattern: 'spotlight-spread', direction: 'left' })).toThrowError(InvalidDirectionError);
  });

  it('matches the generator it wraps', () => {
    expect(renderArrow({ pattern: 'bouncing-spread', numArrows: 4 })).toBe(new BouncingSpreadGenerator({ numArrows: 4 }).generate());
  });
});

describe('saveToFile', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the generated document', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'arrow-save-'));
    dirs.push(dir);
    const file = path.join(dir, 'flow.svg');
    const generator = new MovingFlowGenerator({ direction: 'left' });

    generator.saveToFile(file);
    expect(fs.readFileSync(file, 'utf8')).toBe(generator.generate());
  });
});
