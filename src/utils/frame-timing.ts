/**
 * Time to frame-index conversion for fixed-hop feature pipelines.
 *
 * A frame index is `round(seconds * sampleRate / hopsize)`. Ties round up,
 * after snapping the product to nine decimals so that a decimal tie such as
 * 0.265 s at 100 frames/s is decided on 26.5 and not on the binary value
 * 26.500000000000004.
 */

import type { FrameBounds, TimeInterval } from '../types/alignment.types';
import { IndexRangeError } from './errors';

export const FRAME_ROUNDING = 'half-up' as const;

const SNAP_DECIMALS = 1e9;

function assertFrameRate(sampleRate: number, hopsize: number): void {
  if (!(sampleRate > 0) || !Number.isFinite(sampleRate)) {
    throw new IndexRangeError(`Sample rate must be a positive number, got ${sampleRate}`);
  }
  if (!(hopsize > 0) || !Number.isFinite(hopsize)) {
    throw new IndexRangeError(`Hopsize must be a positive number, got ${hopsize}`);
  }
}

function snap(value: number): number {
  return Math.round(value * SNAP_DECIMALS) / SNAP_DECIMALS;
}

export function secondsToFrameIndex(seconds: number, sampleRate: number, hopsize = 1): number {
  assertFrameRate(sampleRate, hopsize);
  return Math.floor(snap(seconds * sampleRate / hopsize) + 0.5);
}

/**
 * Frame bounds of each interval. Every distinct edge time is converted once,
 * so an interval ending where the next one starts always shares its frame.
 */
export function intervalsToFrameBounds(
  intervals: readonly TimeInterval[],
  sampleRate: number,
  hopsize = 1
): FrameBounds[] {
  assertFrameRate(sampleRate, hopsize);

  const edges = new Set<number>();
  for (const interval of intervals) {
    edges.add(interval.start());
    edges.add(interval.end());
  }

  const frameAt = new Map<number, number>();
  for (const edge of [...edges].sort((a, b) => a - b)) {
    frameAt.set(edge, secondsToFrameIndex(edge, sampleRate, hopsize));
  }

  return intervals.map((interval) => [
    frameAt.get(interval.start()) ?? secondsToFrameIndex(interval.start(), sampleRate, hopsize),
    frameAt.get(interval.end()) ?? secondsToFrameIndex(interval.end(), sampleRate, hopsize),
  ]);
}

/** Frame times `start + k * hopsize` covering `[start, start + duration)`. */
export function frameTimes(start: number, duration: number, hopsize: number): number[] {
  if (!(hopsize > 0) || !Number.isFinite(hopsize)) {
    throw new IndexRangeError(`Hopsize must be a positive number of seconds, got ${hopsize}`);
  }
  const count = Math.max(0, Math.ceil(snap(duration / hopsize)));
  return Array.from({ length: count }, (_, k) => start + k * hopsize);
}

/** `count` evenly spaced values from `start` to `stop` inclusive. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, k) => (k === count - 1 ? stop : start + k * step));
}
