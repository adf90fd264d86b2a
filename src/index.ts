// Public SDK surface for programmatic use
export type {
  ValueRangeError,
  SpeedSpec,
  FlowDirection,
  SpreadDirection,
  Easing,
  PatternId,
  UniqueIdOption,
  BaseConfig,
  MovingFlowConfig,
  SpotlightFlowConfig,
  BouncingSpreadConfig,
  SpotlightSpreadConfig,
} from './core/types.js';
export { FLOW_DIRECTIONS, SPREAD_DIRECTIONS, EASINGS } from './core/types.js';

// Errors
export type { ErrorCode } from './core/errors.js';
export {
  ArrowError,
  ConfigurationError,
  InvalidDirectionError,
  InvalidPatternError,
  SceneReferenceError,
  isArrowError,
} from './core/errors.js';

// Options and validation
export type {
  MovingFlowOptions,
  SpotlightFlowOptions,
  BouncingSpreadOptions,
  SpotlightSpreadOptions,
  PatternConfig,
  SpeedOptions,
} from './core/config.js';
export { DEFAULT_COLOR, PATTERNS, parsePatternConfig, resolveSpeedSpec } from './core/config.js';

// Generators
export type { AnyArrowGenerator } from './generators/index.js';
export {
  createGenerator,
  ArrowGenerator,
  MovingFlowGenerator,
  SpotlightFlowGenerator,
  BouncingSpreadGenerator,
  SpotlightSpreadGenerator,
} from './generators/index.js';

// Reporting and batch rendering
export type { Diagnostic, OutputFormat } from './core/format.js';
export { textReport, toJsonResult, fromArrowError, fromValueRange } from './core/format.js';
export type { BatchOptions, BatchItem } from './core/batch.js';
export { renderBatch, listConfigFiles, readConfigFile, outputPathFor } from './core/batch.js';

// Scene internals for custom patterns
export * from './renderer/index.js';

/**
 * Render a pattern from a plain config record in one call.
 */
import { createGenerator as _createGenerator } from './generators/index.js';
import type { UniqueIdOption as _UniqueIdOption } from './core/types.js';

export function renderArrow(config: unknown, uniqueId?: _UniqueIdOption): string {
  return _createGenerator(config).generate(uniqueId);
}
