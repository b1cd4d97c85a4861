/**
 * Analysis settings: schema, defaults and loading.
 *
 * Settings merge as defaults < config file < caller overrides. The file is
 * JSON holding any subset of {@link AnalysisSettings}.
 *
 * @module config
 */

import * as fs from 'fs';
import { z } from 'zod';
import { FocusLogError, FocusLogErrorCode } from './errors';
import { getConfigPath } from './paths';
import { debug } from './logger';

// ── Schema ──

const SettingsShape = z.object({
  /** JSON key holding the coordinate array. */
  field: z.string().min(1).regex(/^[^"\\]+$/, 'must not contain quotes or backslashes'),
  /** Coordinate sampled from each array. */
  axis: z.enum(['x', 'y', 'z']),
  /** Decimals kept when rounding samples. */
  precision: z.number().int().min(0).max(10),
  /** Fewer samples than this report insufficient data. */
  minSamples: z.number().int().min(1),
  /** Trailing transitions searched for cycles. */
  windowSize: z.number().int().min(1),
  minPeriod: z.number().int().min(1),
  maxPeriod: z.number().int().min(1),
  /** Occurrences of a block needed to call it a cycle. */
  cycleRepeats: z.number().int().min(2),
  /** Trailing identical samples needed to report CONVERGED. */
  stableRun: z.number().int().min(1),
  /** Treat malformed focus fields as errors instead of skipping them. */
  strict: z.boolean(),
  exitCodes: z.enum(['binary', 'tri-state']),
});

export const AnalysisSettingsSchema = SettingsShape.refine(
  s => s.minPeriod <= s.maxPeriod,
  { message: 'minPeriod must not exceed maxPeriod', path: ['maxPeriod'] },
);

/** Shape of the config file: every key optional, unknown keys rejected. */
export const ConfigFileSchema = SettingsShape.partial().strict();

export type AnalysisSettings = z.infer<typeof SettingsShape>;
export type FocusAxis = AnalysisSettings['axis'];
export type ExitCodeMode = AnalysisSettings['exitCodes'];

export const DEFAULT_SETTINGS: Readonly<AnalysisSettings> = {
  field: 'focus',
  axis: 'y',
  precision: 2,
  minSamples: 10,
  windowSize: 50,
  minPeriod: 3,
  maxPeriod: 14,
  cycleRepeats: 3,
  stableRun: 20,
  strict: false,
  exitCodes: 'binary',
};

export interface LoadSettingsOptions {
  /** Config file path; falls back to FOCUSLOG_CONFIG, then the default file. */
  configPath?: string;
  /** Values that win over the config file, typically CLI flags. */
  overrides?: Partial<AnalysisSettings>;
}

// ── Public API ──

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Reads and validates a config file. A missing file yields an empty object
 * unless `required` is set.
 */
export function readConfigFile(filePath: string, required: boolean): Partial<AnalysisSettings> {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new FocusLogError(FocusLogErrorCode.INVALID_CONFIG, `Config file not found: ${filePath}`, { path: filePath });
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new FocusLogError(FocusLogErrorCode.INVALID_CONFIG, `Cannot read config file ${filePath}: ${reason}`, { path: filePath });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FocusLogError(
      FocusLogErrorCode.INVALID_CONFIG,
      `Invalid config file ${filePath}: ${formatIssues(parsed.error)}`,
      { path: filePath },
    );
  }
  return parsed.data;
}

/**
 * Validates loosely typed overrides, such as parsed command-line flags.
 * Undefined values are accepted and later ignored by {@link resolveSettings}.
 */
export function parseSettingsOverrides(raw: Record<string, unknown>): Partial<AnalysisSettings> {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FocusLogError(FocusLogErrorCode.INVALID_CONFIG, `Invalid options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merges settings layers over the defaults and validates the result. Keys set
 * to undefined in a layer do not mask lower layers.
 */
export function resolveSettings(...layers: Array<Partial<AnalysisSettings>>): AnalysisSettings {
  const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const parsed = AnalysisSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new FocusLogError(FocusLogErrorCode.INVALID_CONFIG, `Invalid settings: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Loads settings from the config file and applies overrides.
 */
export function loadSettings(options: LoadSettingsOptions = {}): AnalysisSettings {
  const config = getConfigPath(options.configPath);
  const fromFile = readConfigFile(config.path, config.explicit);
  const settings = resolveSettings(fromFile, options.overrides ?? {});
  debug('resolved settings', { configPath: config.path, settings });
  return settings;
}
