import { describe, it, expect } from 'vitest';
import { detectCycle, tailWindow } from './cycleDetector';

function repeat(block: number[], times: number): number[] {
  return Array.from({ length: times }, () => block).flat();
}

describe('tailWindow', () => {
  it('keeps the last 50 values by default', () => {
    const values = Array.from({ length: 60 }, (_, i) => i + 1);
    const window = tailWindow(values);
    expect(window).toHaveLength(50);
    expect(window[0]).toBe(11);
    expect(window[49]).toBe(60);
  });

  it('returns everything when shorter than the window', () => {
    expect(tailWindow([1, 2, 3], 50)).toEqual([1, 2, 3]);
  });

  it('honours a custom size', () => {
    expect(tailWindow([1, 2, 3, 4, 5], 2)).toEqual([4, 5]);
  });
});

describe('detectCycle', () => {
  it('detects a period-3 cycle repeated three times', () => {
    expect(detectCycle(repeat([1, 2, 3], 3))).toEqual({ detected: true, length: 3, pattern: [1, 2, 3] });
  });

  it('reports the smallest period when a multiple also repeats', () => {
    // [1, 2, 3] x 6 also repeats at period 6
    expect(detectCycle(repeat([1, 2, 3], 6))).toEqual({ detected: true, length: 3, pattern: [1, 2, 3] });
  });

  it('detects a period-4 cycle', () => {
    expect(detectCycle(repeat([1, 2, 3, 4], 3))).toEqual({ detected: true, length: 4, pattern: [1, 2, 3, 4] });
  });

  it('detects the longest supported period', () => {
    const block = Array.from({ length: 14 }, (_, i) => i * 0.5);
    expect(detectCycle(repeat(block, 3))).toEqual({ detected: true, length: 14, pattern: block });
  });

  it('ignores periods above the maximum', () => {
    const block = Array.from({ length: 15 }, (_, i) => i);
    expect(detectCycle(repeat(block, 3))).toEqual({ detected: false });
  });

  it('requires three occurrences', () => {
    expect(detectCycle([5, 1, 2, 3, 1, 2, 3])).toEqual({ detected: false });
  });

  it('reports a two-value alternation at period 4', () => {
    // period 2 is below the search range; [1, 2, 1, 2] is the first block that repeats
    expect(detectCycle(repeat([1, 2], 10))).toEqual({ detected: true, length: 4, pattern: [1, 2, 1, 2] });
  });

  it('finds period 2 when the search range allows it', () => {
    expect(detectCycle(repeat([1, 2], 10), { minPeriod: 2 })).toEqual({ detected: true, length: 2, pattern: [1, 2] });
  });

  it('does not match when only the tail differs', () => {
    expect(detectCycle([...repeat([1, 2, 3], 3), 4])).toEqual({ detected: false });
  });

  it('returns no cycle for an empty window', () => {
    expect(detectCycle([])).toEqual({ detected: false });
  });

  it('demands extra occurrences when repeats is raised', () => {
    const window = [4, 5, 6, ...repeat([1, 2, 3], 3)];
    expect(detectCycle(window)).toEqual({ detected: true, length: 3, pattern: [1, 2, 3] });
    expect(detectCycle(window, { repeats: 4 })).toEqual({ detected: false });
    expect(detectCycle(repeat([1, 2, 3], 4), { repeats: 4 })).toEqual({ detected: true, length: 3, pattern: [1, 2, 3] });
  });
});
