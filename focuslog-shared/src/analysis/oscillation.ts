/**
 * Focus oscillation classifier.
 *
 * Turns a sample sequence into one of three statuses:
 * - `insufficient_data`: too few samples to judge
 * - `oscillating`: the tail of the transition sequence repeats with a fixed period
 * - `converging`: no cycle; the message says CONVERGED when the trailing
 *   samples are flat and CONVERGING otherwise. There is no separate
 *   `converged` status.
 *
 * @module analysis/oscillation
 */

import { resolveSettings } from '../config';
import type { AnalysisSettings } from '../config';
import { readFocusLog } from '../parsers/focusLogParser';
import type { MalformedFocusLine } from '../parsers/focusLogParser';
import { compressTransitions } from './transitions';
import { detectCycle, tailWindow } from './cycleDetector';
import { formatValue } from './rounding';

// ── Types ──

export type OscillationStatus = 'insufficient_data' | 'oscillating' | 'converging';

export interface InsufficientDataResult {
  status: 'insufficient_data';
  /** Number of samples found */
  values: number;
  /** Samples needed for a verdict */
  minSamples: number;
  message: string;
}

interface TrendResultBase {
  /** Number of samples */
  totalValues: number;
  /** Length of the transition sequence */
  uniqueTransitions: number;
  /** Last sample */
  finalValue: number;
  /** Distinct values in the tail window */
  uniqueInWindow: number;
  message: string;
}

export interface OscillatingResult extends TrendResultBase {
  status: 'oscillating';
  cycleLength: number;
  cyclePattern: number[];
}

export interface ConvergingResult extends TrendResultBase {
  status: 'converging';
  /** True when the trailing `stableRun` samples are all identical */
  stable: boolean;
}

export type OscillationAnalysis = InsufficientDataResult | OscillatingResult | ConvergingResult;

export interface FocusLogAnalysis {
  analysis: OscillationAnalysis;
  /** Lines read from the file */
  totalLines: number;
  /** Focus fields skipped as malformed */
  malformed: MalformedFocusLine[];
}

// ── Public API ──

/**
 * Classifies a sample sequence.
 */
export function analyzeSamples(samples: readonly number[], options: Partial<AnalysisSettings> = {}): OscillationAnalysis {
  const settings = resolveSettings(options);

  if (samples.length < settings.minSamples) {
    return {
      status: 'insufficient_data',
      values: samples.length,
      minSamples: settings.minSamples,
      message: `INSUFFICIENT DATA: ${samples.length} focus updates, need at least ${settings.minSamples}`,
    };
  }

  const transitions = compressTransitions(samples);
  const window = tailWindow(transitions, settings.windowSize);
  const cycle = detectCycle(window, {
    minPeriod: settings.minPeriod,
    maxPeriod: settings.maxPeriod,
    repeats: settings.cycleRepeats,
  });

  const finalValue = samples[samples.length - 1];
  const base = {
    totalValues: samples.length,
    uniqueTransitions: transitions.length,
    finalValue,
    uniqueInWindow: new Set(window).size,
  };

  if (cycle.detected) {
    return {
      ...base,
      status: 'oscillating',
      cycleLength: cycle.length,
      cyclePattern: cycle.pattern,
      message: `OSCILLATION DETECTED: Cycling through ${cycle.length} values`,
    };
  }

  const stable = samples.length >= settings.stableRun
    && new Set(samples.slice(samples.length - settings.stableRun)).size === 1;

  return {
    ...base,
    status: 'converging',
    stable,
    message: stable
      ? `CONVERGED: Stable at ${formatValue(finalValue)}`
      : `CONVERGING: Last value ${formatValue(finalValue)}, ${base.uniqueInWindow} unique in last ${settings.windowSize}`,
  };
}

/**
 * Reads a watch log and classifies its focus samples.
 */
export function analyzeFocusLog(filePath: string, options: Partial<AnalysisSettings> = {}): FocusLogAnalysis {
  const settings = resolveSettings(options);
  const extraction = readFocusLog(filePath, settings);
  return {
    analysis: analyzeSamples(extraction.samples, settings),
    totalLines: extraction.totalLines,
    malformed: extraction.malformed,
  };
}
