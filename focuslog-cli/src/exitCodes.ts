import type { ExitCodeMode, OscillationStatus } from 'focuslog-shared';

/**
 * Maps an analysis status to a process exit code.
 *
 * `binary` exits 0 only for `converging`, so insufficient data exits 1 like
 * an oscillation. `tri-state` gives insufficient data its own code, 2.
 */
export function exitCodeFor(status: OscillationStatus, mode: ExitCodeMode): number {
  if (mode === 'binary') {
    return status === 'converging' ? 0 : 1;
  }
  switch (status) {
    case 'converging': return 0;
    case 'oscillating': return 1;
    case 'insufficient_data': return 2;
  }
}
