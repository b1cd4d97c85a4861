/**
 * Plain-text report for an oscillation analysis.
 *
 * The text is fixed; callers that want colour pass {@link ReportStyles} and
 * get the same characters wrapped in their escape codes.
 *
 * @module formatters/oscillationReport
 */

import type { OscillationAnalysis, OscillationStatus } from '../analysis/oscillation';
import { formatValue } from '../analysis/rounding';

export const REPORT_TITLE = 'Focus Oscillation Analysis';
export const BANNER = '='.repeat(60);

export interface ReportStyles {
  banner: (text: string) => string;
  label: (text: string) => string;
  status: (text: string, status: OscillationStatus) => string;
  message: (text: string, status: OscillationStatus) => string;
}

export interface OscillationReportOptions {
  /** Focus fields skipped while parsing; printed when non-zero. */
  malformedCount?: number;
  styles?: Partial<ReportStyles>;
}

const identity = (text: string): string => text;

const PLAIN_STYLES: ReportStyles = {
  banner: identity,
  label: identity,
  status: identity,
  message: identity,
};

/**
 * Renders the report, including the leading blank line and the trailing
 * blank line after the closing banner.
 */
export function formatOscillationReport(
  analysis: OscillationAnalysis,
  options: OscillationReportOptions = {},
): string {
  const s: ReportStyles = { ...PLAIN_STYLES, ...options.styles };
  const malformedCount = options.malformedCount ?? 0;
  const banner = s.banner(BANNER);
  const field = (label: string, value: string): string => `${s.label(label)} ${value}`;

  const lines: string[] = [
    '',
    banner,
    s.banner(REPORT_TITLE),
    banner,
    field('Status:', s.status(analysis.status.toUpperCase(), analysis.status)),
  ];

  if (analysis.status === 'insufficient_data') {
    lines.push(field('Total updates:', String(analysis.values)));
  } else {
    lines.push(field('Total updates:', String(analysis.totalValues)));
    lines.push(field('Unique transitions:', String(analysis.uniqueTransitions)));
    lines.push(field('Final value:', formatValue(analysis.finalValue)));
  }

  if (malformedCount > 0) {
    lines.push(field('Malformed focus fields:', String(malformedCount)));
  }

  if (analysis.status === 'oscillating') {
    lines.push('');
    lines.push(`Cycle detected (${analysis.cycleLength} values):`);
    analysis.cyclePattern.forEach((value, i) => {
      lines.push(`  ${i + 1}. ${formatValue(value)}`);
    });
  }

  lines.push('');
  lines.push(s.message(analysis.message, analysis.status));
  lines.push(banner);
  lines.push('');

  return lines.join('\n') + '\n';
}
