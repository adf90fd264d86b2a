import { z } from 'zod';
import { ConfigurationError, InvalidDirectionError } from './errors.js';
import {
  EASINGS,
  FLOW_DIRECTIONS,
  SPREAD_DIRECTIONS,
  type FlowDirection,
  type PatternId,
  type SpeedSpec,
  type SpreadDirection,
  type ValueRangeError,
} from './types.js';

export const DEFAULT_COLOR = '#2563eb';

export const PATTERNS: readonly PatternId[] = ['moving-flow', 'spotlight-flow', 'bouncing-spread', 'spotlight-spread'];

const positiveNumber = z.number().finite().positive();

export const SpeedSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('pixelsPerSecond'), value: positiveNumber }),
  z.object({ kind: z.literal('durationSeconds'), value: positiveNumber }),
]);

// Lands verbatim in attributes and CSS declarations
const ColorToken = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^<>"'{};&]+$/, 'Color must be a plain CSS color token');

const baseShape = {
  color: ColorToken.optional(),
  strokeWidth: z.number().int().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  numArrows: z.number().int().optional(),
  speed: SpeedSpecSchema.optional(),
  speedInPxPerSecond: positiveNumber.nullable().optional(),
  speedInDurationSeconds: positiveNumber.nullable().optional(),
  direction: z.string().optional(),
};

export const MovingFlowOptionsSchema = z
  .object({ ...baseShape, animation: z.enum(EASINGS).optional() })
  .strict();

export const SpotlightFlowOptionsSchema = z
  .object({
    ...baseShape,
    spotlightSize: z.number().finite().optional(),
    pathExtensionFactor: z.number().finite().optional(),
    dimOpacity: z.number().finite().optional(),
  })
  .strict();

export const BouncingSpreadOptionsSchema = z
  .object({
    ...baseShape,
    animation: z.enum(EASINGS).optional(),
    centerGapRatio: z.number().finite().optional(),
  })
  .strict();

export const SpotlightSpreadOptionsSchema = z
  .object({
    ...baseShape,
    spotlightSize: z.number().finite().optional(),
    dimOpacity: z.number().finite().optional(),
    centerGapRatio: z.number().finite().optional(),
  })
  .strict();

export type MovingFlowOptions = z.input<typeof MovingFlowOptionsSchema>;
export type SpotlightFlowOptions = z.input<typeof SpotlightFlowOptionsSchema>;
export type BouncingSpreadOptions = z.input<typeof BouncingSpreadOptionsSchema>;
export type SpotlightSpreadOptions = z.input<typeof SpotlightSpreadOptionsSchema>;

export const PatternConfigSchema = z.discriminatedUnion('pattern', [
  MovingFlowOptionsSchema.extend({ pattern: z.literal('moving-flow') }),
  SpotlightFlowOptionsSchema.extend({ pattern: z.literal('spotlight-flow') }),
  BouncingSpreadOptionsSchema.extend({ pattern: z.literal('bouncing-spread') }),
  SpotlightSpreadOptionsSchema.extend({ pattern: z.literal('spotlight-spread') }),
]);

export type PatternConfig = z.input<typeof PatternConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate an option record against a schema, converting zod failures into
 * a ConfigurationError so callers only ever see the project's error types.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError('CFG-INVALID-OPTION', `Invalid options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parsePatternConfig(input: unknown): z.output<typeof PatternConfigSchema> {
  return parseOptions(PatternConfigSchema, input);
}

export interface SpeedOptions {
  speed?: SpeedSpec;
  speedInPxPerSecond?: number | null;
  speedInDurationSeconds?: number | null;
}

/**
 * Reconcile the speed options into exactly one SpeedSpec.
 * `null` marks a flat field as deliberately unset; when every field is
 * absent the pattern's default pixels-per-second applies.
 */
export function resolveSpeedSpec(options: SpeedOptions, defaultPxPerSecond: number): SpeedSpec {
  const px = options.speedInPxPerSecond;
  const dur = options.speedInDurationSeconds;
  const flatCount = (px != null ? 1 : 0) + (dur != null ? 1 : 0);

  if (flatCount === 2 || (options.speed && flatCount > 0)) {
    throw new ConfigurationError(
      'CFG-SPEED-CONFLICT',
      'Speed is over-specified: set either pixels per second or duration seconds, not both',
      'Pass null for the option you do not want.'
    );
  }
  if (options.speed) return options.speed;
  if (px != null) return { kind: 'pixelsPerSecond', value: px };
  if (dur != null) return { kind: 'durationSeconds', value: dur };
  if (px === null || dur === null) {
    throw new ConfigurationError(
      'CFG-SPEED-MISSING',
      'Speed is unset: one of pixels per second or duration seconds is required'
    );
  }
  return { kind: 'pixelsPerSecond', value: defaultPxPerSecond };
}

export function parseFlowDirection(value: string): FlowDirection {
  const normalized = value.toLowerCase();
  const match = FLOW_DIRECTIONS.find(d => d === normalized);
  if (!match) throw new InvalidDirectionError(value, FLOW_DIRECTIONS);
  return match;
}

export function parseSpreadDirection(value: string): SpreadDirection {
  const normalized = value.toLowerCase();
  const match = SPREAD_DIRECTIONS.find(d => d === normalized);
  if (!match) throw new InvalidDirectionError(value, SPREAD_DIRECTIONS);
  return match;
}

/**
 * Collects silent clamps. Out-of-range fields are pulled into range rather
 * than rejected; each adjustment is recorded as a warning.
 */
export class RangeClamp {
  readonly warnings: ValueRangeError[] = [];

  clamp(field: string, value: number, min: number, max = Number.POSITIVE_INFINITY): number {
    const applied = Math.max(min, Math.min(max, value));
    if (applied !== value) {
      const range = Number.isFinite(max) ? `outside [${min}, ${max}]` : `below ${min}`;
      this.warnings.push({
        field,
        given: value,
        applied,
        message: `${field} ${value} is ${range}; using ${applied}`,
        severity: 'warning',
        code: 'CFG-VALUE-CLAMPED',
      });
    }
    return applied;
  }
}
