import type { TimeInterval } from '../types/alignment.types';

/**
 * Index of the interval containing `time` in a contiguous, time-ordered list,
 * or -1. Intervals are closed at start and open at end, except the last one,
 * which is closed at both ends so the terminal time still resolves.
 *
 * Binary search for the last interval starting at or before `time`; zero-length
 * intervals sharing a start with their successor are skipped by construction.
 */
export function findIntervalIndex(intervals: readonly TimeInterval[], time: number): number {
  if (intervals.length === 0 || Number.isNaN(time)) return -1;

  let left = 0;
  let right = intervals.length - 1;
  let candidate = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    if (intervals[mid].start() <= time) {
      candidate = mid;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  if (candidate === -1) return -1;

  const interval = intervals[candidate];
  if (time < interval.end()) return candidate;
  if (candidate === intervals.length - 1 && time <= interval.end()) return candidate;
  return -1;
}
