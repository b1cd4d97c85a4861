/**
 * `detect_oscillation <watch_log_file>`: classify the focus samples of a
 * watch log and print the report.
 *
 * Configuration errors and malformed fields in strict mode are reported on
 * stderr. I/O errors are not caught.
 */

import chalk from 'chalk';
import {
  analyzeFocusLog,
  debug,
  formatOscillationReport,
  isFocusLogError,
  loadSettings,
  parseSettingsOverrides,
  warn,
} from 'focuslog-shared';
import type { OscillationStatus, ReportStyles } from 'focuslog-shared';
import { exitCodeFor } from '../exitCodes';

export const USAGE = 'Usage: detect_oscillation <watch_log_file>';

export interface AnalyzeOptions {
  config?: string;
  strict?: boolean;
  axis?: string;
  field?: string;
  window?: number;
  exitCodes?: string;
}

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CommandIO = {
  stdout: text => { process.stdout.write(text); },
  stderr: text => { process.stderr.write(text); },
};

function reportStyles(c: chalk.Chalk): ReportStyles {
  const tone = (status: OscillationStatus): chalk.Chalk => {
    switch (status) {
      case 'oscillating': return c.red.bold;
      case 'converging': return c.green.bold;
      case 'insufficient_data': return c.yellow.bold;
    }
  };
  return {
    banner: text => c.dim(text),
    label: text => c.dim(text),
    status: (text, status) => tone(status)(text),
    message: (text, status) => tone(status)(text),
  };
}

/**
 * Runs the analysis and returns the process exit code.
 */
export function runAnalyze(
  files: string[],
  opts: AnalyzeOptions,
  io: CommandIO = processIO,
  colors: chalk.Chalk = chalk,
): number {
  if (files.length !== 1) {
    io.stdout(USAGE + '\n');
    return 1;
  }
  const [logFile] = files;

  try {
    const settings = loadSettings({
      configPath: opts.config,
      overrides: parseSettingsOverrides({
        strict: opts.strict,
        axis: opts.axis,
        field: opts.field,
        windowSize: opts.window,
        exitCodes: opts.exitCodes,
      }),
    });

    debug(`analyzing ${logFile}`);
    const { analysis, malformed } = analyzeFocusLog(logFile, settings);
    if (malformed.length > 0) {
      warn(`skipped ${malformed.length} malformed "${settings.field}" field(s); use --strict to fail on them`);
    }
    io.stdout(formatOscillationReport(analysis, {
      malformedCount: malformed.length,
      styles: reportStyles(colors),
    }));
    return exitCodeFor(analysis.status, settings.exitCodes);
  } catch (err) {
    if (!isFocusLogError(err)) throw err;
    io.stderr(`Error: ${err.message}\n`);
    return 1;
  }
}

export function analyzeAction(files: string[], opts: AnalyzeOptions): void {
  process.exitCode = runAnalyze(files, opts);
}
