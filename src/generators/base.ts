import * as fs from 'node:fs';
import { DEFAULT_COLOR, RangeClamp, resolveSpeedSpec, type SpeedOptions } from '../core/config.js';
import type { BaseConfig, UniqueIdOption, ValueRangeError } from '../core/types.js';
import type { ArrowPattern } from '../renderer/interfaces.js';
import type { IdScope } from '../renderer/id-scope.js';
import { fullCanvasClip, type ClipRect } from '../renderer/layout.js';
import { composeScene, renderScene } from '../renderer/scene.js';
import type { SceneDocument, StyleSheet, SvgElement } from '../renderer/scene-types.js';
import { resolveDuration } from '../renderer/timing.js';

export interface BaseOptions extends SpeedOptions {
  color?: string;
  strokeWidth?: number;
  width?: number;
  height?: number;
  numArrows?: number;
}

export interface BaseDefaults {
  strokeWidth: number;
  width: number;
  height: number;
  numArrows: number;
  /** 1 for flow patterns, 2 for patterns split into two groups */
  minArrows: number;
  pxPerSecond: number;
}

export interface Resolved<C extends BaseConfig> {
  config: C;
  warnings: ValueRangeError[];
}

export function resolveBaseConfig(options: BaseOptions, defaults: BaseDefaults, clamp: RangeClamp): BaseConfig {
  return {
    color: options.color ?? DEFAULT_COLOR,
    strokeWidth: clamp.clamp('strokeWidth', options.strokeWidth ?? defaults.strokeWidth, 2),
    width: options.width ?? defaults.width,
    height: options.height ?? defaults.height,
    numArrows: clamp.clamp('numArrows', options.numArrows ?? defaults.numArrows, defaults.minArrows),
    speed: resolveSpeedSpec(options, defaults.pxPerSecond),
  };
}

/**
 * Shared lifecycle of every arrow variant: an immutable configuration
 * resolved at construction, and a `generate()` that composes the scene.
 */
export abstract class ArrowGenerator<C extends BaseConfig> implements ArrowPattern {
  readonly config: Readonly<C>;
  /** Fields that were pulled into range at construction */
  readonly warnings: readonly ValueRangeError[];

  /** Whether `generate()` suffixes ids when called without an argument */
  protected readonly defaultUniqueId: UniqueIdOption = false;

  protected constructor(resolved: Resolved<C>) {
    this.config = Object.freeze({ ...resolved.config });
    this.warnings = Object.freeze([...resolved.warnings]);
  }

  get width(): number {
    return this.config.width;
  }

  get height(): number {
    return this.config.height;
  }

  /** Distance one animation cycle covers, in pixels */
  abstract travelDistance(): number;

  duration(): number {
    return resolveDuration(this.config.speed, this.travelDistance());
  }

  clipBounds(): ClipRect {
    return fullCanvasClip(this.width, this.height);
  }

  buildDefs(_scope: IdScope): SvgElement[] {
    return [];
  }

  abstract buildStyles(scope: IdScope): StyleSheet;

  abstract buildArrows(scope: IdScope): SvgElement[];

  compose(uniqueId: UniqueIdOption = this.defaultUniqueId): SceneDocument {
    return composeScene(this, uniqueId);
  }

  generate(uniqueId: UniqueIdOption = this.defaultUniqueId): string {
    return renderScene(this, uniqueId);
  }

  saveToFile(filePath: string, uniqueId: UniqueIdOption = this.defaultUniqueId): void {
    fs.writeFileSync(filePath, this.generate(uniqueId), 'utf8');
  }
}
