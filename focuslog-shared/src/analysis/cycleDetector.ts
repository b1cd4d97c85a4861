/**
 * Bounded cycle detection over the tail of a transition sequence.
 *
 * A cycle of period L is a block of the last L transitions that also occupies
 * the L positions before it, and the L before those. Periods are tried from
 * shortest to longest and the first match wins, so a period-3 hunt is never
 * reported as period 6.
 *
 * @module analysis/cycleDetector
 */

import { DEFAULT_SETTINGS } from '../config';

export type CycleDetection =
  | { detected: true; length: number; pattern: number[] }
  | { detected: false };

export interface CycleDetectorOptions {
  /** Shortest period tried (default 3) */
  minPeriod?: number;
  /** Longest period tried, inclusive (default 14) */
  maxPeriod?: number;
  /** Occurrences of the block required, including the trailing one (default 3) */
  repeats?: number;
}

/** Returns the last `size` elements, or all of them when there are fewer. */
export function tailWindow<T>(values: readonly T[], size = DEFAULT_SETTINGS.windowSize): T[] {
  return values.length > size ? values.slice(values.length - size) : values.slice();
}

function sameBlock(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Finds the shortest period in [minPeriod, maxPeriod] whose block repeats
 * immediately before the tail of `window`.
 */
export function detectCycle(window: readonly number[], options: CycleDetectorOptions = {}): CycleDetection {
  const minPeriod = options.minPeriod ?? DEFAULT_SETTINGS.minPeriod;
  const maxPeriod = options.maxPeriod ?? DEFAULT_SETTINGS.maxPeriod;
  const repeats = options.repeats ?? DEFAULT_SETTINGS.cycleRepeats;
  const n = window.length;

  for (let length = minPeriod; length <= maxPeriod; length++) {
    if (n < length * repeats) continue;

    const pattern = window.slice(n - length);
    const prev = window.slice(n - 2 * length, n - length);
    const prev2 = n >= 3 * length ? window.slice(n - 3 * length, n - 2 * length) : null;

    if (!sameBlock(pattern, prev)) continue;
    if (prev2 !== null && !sameBlock(pattern, prev2)) continue;

    let earlierMatch = true;
    for (let k = 3; k < repeats; k++) {
      if (!sameBlock(pattern, window.slice(n - (k + 1) * length, n - k * length))) {
        earlierMatch = false;
        break;
      }
    }
    if (!earlierMatch) continue;

    return { detected: true, length, pattern };
  }

  return { detected: false };
}
