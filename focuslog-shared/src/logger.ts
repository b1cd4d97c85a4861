/**
 * Stderr logger. Debug output is gated on FOCUSLOG_DEBUG and mirrored to
 * FOCUSLOG_LOG_FILE when set. Stdout is reserved for reports.
 */

import * as fs from 'fs';

export function debug(message: string, data?: unknown): void {
  if (!process.env.FOCUSLOG_DEBUG) return;
  const line = `[focuslog DEBUG] ${new Date().toISOString()} ${message}${data !== undefined ? ' ' + JSON.stringify(data) : ''}`;
  process.stderr.write(line + '\n');
  const logFile = process.env.FOCUSLOG_LOG_FILE;
  if (logFile) {
    fs.appendFileSync(logFile, line + '\n');
  }
}

export function warn(message: string): void {
  process.stderr.write(`[focuslog WARN] ${message}\n`);
}
