import type { SpeedSpec } from '../core/types.js';
import { formatFixed } from './utils.js';

export const MIN_SPEED = 1e-6;

/**
 * Convert a speed specification into a loop duration in seconds.
 * A fixed duration ignores the travel distance.
 */
export function resolveDuration(spec: SpeedSpec, travelDistance: number): number {
  switch (spec.kind) {
    case 'durationSeconds':
      return spec.value;
    case 'pixelsPerSecond':
      return travelDistance / Math.max(spec.value, MIN_SPEED);
  }
}

/**
 * Negative start offset for the 1-indexed arrow `index`, so each arrow
 * joins the shared loop at a different phase.
 */
export function staggerDelay(index: number, duration: number, count: number): number {
  return -((index - 1) * duration) / count;
}

// Full axis span rounded down to an even number of pixels
export function flowTravelDistance(span: number): number {
  return Math.floor(span / 2) * 2;
}

// The spotlight overshoots the canvas so its fade never cuts at the edge
export function spotlightTravelDistance(span: number, pathExtensionFactor: number): number {
  return span * (1 + pathExtensionFactor);
}

export const BOUNCE_FRACTION = 0.15;

export function bounceTravelDistance(span: number): number {
  const available = span - 2 * Math.floor(span / 8);
  return Math.trunc(available * BOUNCE_FRACTION);
}

export function formatSeconds(seconds: number): string {
  return `${formatFixed(seconds, 2)}s`;
}
