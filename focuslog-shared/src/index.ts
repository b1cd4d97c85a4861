/**
 * Public API for focuslog-shared.
 */

// Settings
export type { AnalysisSettings, FocusAxis, ExitCodeMode, LoadSettingsOptions } from './config';
export {
  AnalysisSettingsSchema,
  ConfigFileSchema,
  DEFAULT_SETTINGS,
  loadSettings,
  parseSettingsOverrides,
  readConfigFile,
  resolveSettings,
} from './config';

// Paths
export { getConfigDir, getConfigPath, CONFIG_FILE_NAME } from './paths';

// Errors and logging
export { FocusLogError, FocusLogErrorCode, isFocusLogError } from './errors';
export { debug, warn } from './logger';

// Parsers
export { parseFocusLine, extractSamples, readFocusLog } from './parsers/focusLogParser';
export type { FocusLineResult, FocusParseOptions, FocusExtraction, MalformedFocusLine } from './parsers/focusLogParser';

// Analysis
export { roundHalfEven, formatValue } from './analysis/rounding';
export { compressTransitions } from './analysis/transitions';
export { detectCycle, tailWindow } from './analysis/cycleDetector';
export type { CycleDetection, CycleDetectorOptions } from './analysis/cycleDetector';
export { analyzeSamples, analyzeFocusLog } from './analysis/oscillation';
export type {
  OscillationStatus,
  OscillationAnalysis,
  InsufficientDataResult,
  OscillatingResult,
  ConvergingResult,
  FocusLogAnalysis,
} from './analysis/oscillation';

// Formatters
export { formatOscillationReport, BANNER, REPORT_TITLE } from './formatters/oscillationReport';
export type { ReportStyles, OscillationReportOptions } from './formatters/oscillationReport';
