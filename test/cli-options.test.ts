import { describe, expect, it } from 'vitest';
import { parseBatchArgs, parseGenerateArgs } from '../src/cli-options.js';

describe('parseGenerateArgs', () => {
  it('maps flags onto config fields', () => {
    expect(
      parseGenerateArgs(['moving-flow', '--direction', 'up', '--num-arrows', '6', '--duration', '2', '-o', 'out.svg', '--unique-id=abc'])
    ).toEqual({
      config: { pattern: 'moving-flow', direction: 'up', numArrows: 6, speedInDurationSeconds: 2 },
      output: 'out.svg',
      format: 'text',
      uniqueId: 'abc',
    });
  });

  it('takes the output from a second positional', () => {
    const cmd = parseGenerateArgs(['spotlight-flow', 'arrow.svg', '--format', 'json', '--no-unique-id']);
    expect(cmd.output).toBe('arrow.svg');
    expect(cmd.format).toBe('json');
    expect(cmd.uniqueId).toBe(false);
  });

  it('accepts negative numbers as values', () => {
    expect(parseGenerateArgs(['moving-flow', '--num-arrows', '-3']).config.numArrows).toBe(-3);
  });

  it('rejects unknown flags, missing values and bad numbers', () => {
    expect(() => parseGenerateArgs(['moving-flow', '--bogus'])).toThrowError('Unknown option: --bogus');
    expect(() => parseGenerateArgs(['moving-flow', '--color'])).toThrowError('--color expects a value');
    expect(() => parseGenerateArgs(['moving-flow', '--width', 'wide'])).toThrowError('--width expects a number, got "wide"');
    expect(() => parseGenerateArgs([])).toThrowError('Missing pattern name');
  });
});

describe('parseBatchArgs', () => {
  it('collects globs and switches', () => {
    expect(parseBatchArgs(['configs', '-I', 'a/**/*.arrow.json, b/*.arrow.json', '--no-gitignore', '-n', '--out-dir', 'out'])).toEqual({
      root: 'configs',
      options: {
        outDir: 'out',
        includes: ['a/**/*.arrow.json', 'b/*.arrow.json'],
        useGitignore: false,
        dryRun: true,
      },
      format: 'text',
    });
  });

  it('defaults to the current directory', () => {
    expect(parseBatchArgs(['--unique-id'])).toEqual({ root: '.', options: { uniqueId: true }, format: 'text' });
  });
});
