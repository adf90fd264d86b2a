// Clamped numeric fields are reported, not thrown
export interface ValueRangeError {
  field: string;
  given: number;
  applied: number;
  message: string;
  severity: 'warning';
  code: 'CFG-VALUE-CLAMPED';
  hint?: string;
}

export type SpeedSpec =
  | { kind: 'pixelsPerSecond'; value: number }
  | { kind: 'durationSeconds'; value: number };

export const FLOW_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;
export const SPREAD_DIRECTIONS = ['horizontal', 'vertical'] as const;
export const EASINGS = ['ease', 'ease-in', 'ease-out', 'ease-in-out', 'linear'] as const;

export type FlowDirection = typeof FLOW_DIRECTIONS[number];
export type SpreadDirection = typeof SPREAD_DIRECTIONS[number];
export type Easing = typeof EASINGS[number];

export type PatternId = 'moving-flow' | 'spotlight-flow' | 'bouncing-spread' | 'spotlight-spread';

// true: random suffix, false: keep default ids, string: explicit suffix
export type UniqueIdOption = boolean | string;

export interface BaseConfig {
  readonly color: string;
  readonly strokeWidth: number;
  readonly width: number;
  readonly height: number;
  readonly numArrows: number;
  readonly speed: SpeedSpec;
}

export interface MovingFlowConfig extends BaseConfig {
  readonly direction: FlowDirection;
  readonly animation: Easing;
}

export interface SpotlightFlowConfig extends BaseConfig {
  readonly direction: FlowDirection;
  readonly spotlightSize: number;
  readonly pathExtensionFactor: number;
  readonly dimOpacity: number;
}

export interface BouncingSpreadConfig extends BaseConfig {
  readonly direction: SpreadDirection;
  readonly animation: Easing;
  readonly centerGapRatio: number;
}

export interface SpotlightSpreadConfig extends BaseConfig {
  readonly direction: SpreadDirection;
  readonly spotlightSize: number;
  readonly dimOpacity: number;
  readonly centerGapRatio: number;
}
