import { describe, expect, it } from 'vitest';
import {
  bounceTravelDistance,
  flowTravelDistance,
  formatSeconds,
  resolveDuration,
  spotlightTravelDistance,
  staggerDelay,
} from '../src/renderer/timing.js';

describe('resolveDuration', () => {
  it('divides the travel distance by pixels per second', () => {
    expect(resolveDuration({ kind: 'pixelsPerSecond', value: 20 }, 100)).toBe(5);
  });

  it('returns a fixed duration regardless of distance', () => {
    expect(resolveDuration({ kind: 'durationSeconds', value: 3 }, 100)).toBe(3);
    expect(resolveDuration({ kind: 'durationSeconds', value: 3 }, 900)).toBe(3);
  });

  it('floors the speed so a zero never divides', () => {
    expect(Number.isFinite(resolveDuration({ kind: 'pixelsPerSecond', value: 0 }, 100))).toBe(true);
  });
});

describe('staggerDelay', () => {
  it('offsets each arrow by an equal share of the loop', () => {
    const delays = [1, 2, 3, 4].map(i => formatSeconds(staggerDelay(i, 5, 4)));
    expect(delays).toEqual(['0.00s', '-1.25s', '-2.50s', '-3.75s']);
  });
});

describe('travel distances', () => {
  it('rounds the flow span down to an even number', () => {
    expect(flowTravelDistance(100)).toBe(100);
    expect(flowTravelDistance(101)).toBe(100);
  });

  it('extends the spotlight path past the canvas', () => {
    expect(spotlightTravelDistance(100, 0.5)).toBe(150);
    expect(spotlightTravelDistance(100, 0)).toBe(100);
  });

  it('bounces a fraction of the span inside the margins', () => {
    expect(bounceTravelDistance(300)).toBe(33);
    expect(bounceTravelDistance(150)).toBe(17);
  });
});

describe('formatSeconds', () => {
  it('never prints a negative zero', () => {
    expect(formatSeconds(-0.001)).toBe('0.00s');
    expect(formatSeconds(7.5)).toBe('7.50s');
  });
});
