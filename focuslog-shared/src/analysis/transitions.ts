/**
 * Collapses runs of identical samples into single transitions.
 *
 * `[1, 1, 2, 2, 2, 1]` becomes `[1, 2, 1]`: each element differs from its
 * predecessor. Applying it twice gives the same result as applying it once.
 */
export function compressTransitions(samples: readonly number[]): number[] {
  return samples.reduce<number[]>((transitions, value) => {
    if (transitions.length === 0 || transitions[transitions.length - 1] !== value) {
      transitions.push(value);
    }
    return transitions;
  }, []);
}
