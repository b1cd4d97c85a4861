/**
 * Focus log parser.
 *
 * Watch logs are free-form text; the lines of interest carry a coordinate
 * array such as `"focus":[0.0,1.25,0.0]`. This module scans each line for that
 * field and turns the selected coordinate into a rounded sample.
 *
 * Field grammar:
 *
 *     focus-field := '"' key '"' ':' '[' number ',' number ',' number ']'
 *     number      := ws* sign? (digits ('.' digits?)? | '.' digits) exponent? ws*
 *     exponent    := ('e' | 'E') sign? digits
 *
 * @module parsers/focusLogParser
 */

import * as fs from 'fs';
import { DEFAULT_SETTINGS } from '../config';
import type { AnalysisSettings, FocusAxis } from '../config';
import { FocusLogError, FocusLogErrorCode } from '../errors';
import { roundHalfEven } from '../analysis/rounding';
import { debug } from '../logger';

// ── Types ──

export type FocusLineResult =
  | { kind: 'sample'; value: number }
  /** The line has no focus field at all. */
  | { kind: 'skip' }
  /** A focus field is present but does not follow the grammar. */
  | { kind: 'malformed'; reason: string };

export type FocusParseOptions = Partial<Pick<AnalysisSettings, 'field' | 'axis' | 'precision' | 'strict'>>;

export interface MalformedFocusLine {
  /** Line number in the original file (1-based) */
  lineNumber: number;
  reason: string;
}

export interface FocusExtraction {
  /** Rounded samples in file order */
  samples: number[];
  /** Number of lines read */
  totalLines: number;
  /** Lines whose focus field was skipped as malformed */
  malformed: MalformedFocusLine[];
}

// ── Constants ──

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const AXIS_INDEX: Record<FocusAxis, number> = { x: 0, y: 1, z: 2 };

type CoordinateParse =
  | { ok: true; coords: number[] }
  | { ok: false; reason: string };

function parseCoordinates(line: string, start: number): CoordinateParse {
  const end = line.indexOf(']', start);
  if (end === -1) return { ok: false, reason: 'unterminated coordinate array' };

  const fields = line.slice(start, end).split(',');
  if (fields.length !== 3) {
    return { ok: false, reason: `expected 3 coordinates, found ${fields.length}` };
  }

  const coords: number[] = [];
  for (let i = 0; i < fields.length; i++) {
    const text = fields[i].trim();
    if (!NUMBER_PATTERN.test(text)) {
      return { ok: false, reason: `coordinate ${i + 1} is not a number: "${text}"` };
    }
    const value = Number(text);
    if (!Number.isFinite(value)) {
      return { ok: false, reason: `coordinate ${i + 1} is out of range: "${text}"` };
    }
    coords.push(value);
  }
  return { ok: true, coords };
}

// ── Public API ──

/**
 * Parses one log line. Every occurrence of the field on the line is tried in
 * order and the first well-formed one wins.
 */
export function parseFocusLine(line: string, options: FocusParseOptions = {}): FocusLineResult {
  const field = options.field ?? DEFAULT_SETTINGS.field;
  const axis = options.axis ?? DEFAULT_SETTINGS.axis;
  const precision = options.precision ?? DEFAULT_SETTINGS.precision;
  const marker = `"${field}":[`;

  let at = line.indexOf(marker);
  if (at === -1) return { kind: 'skip' };

  let firstFailure: string | null = null;
  while (at !== -1) {
    const parsed = parseCoordinates(line, at + marker.length);
    if (parsed.ok) {
      return { kind: 'sample', value: roundHalfEven(parsed.coords[AXIS_INDEX[axis]], precision) };
    }
    if (firstFailure === null) firstFailure = parsed.reason;
    at = line.indexOf(marker, at + 1);
  }

  return { kind: 'malformed', reason: firstFailure ?? 'unparseable field' };
}

/**
 * Extracts samples from log content. Malformed focus fields are collected and
 * skipped, or raise {@link FocusLogErrorCode.MALFORMED_FOCUS_FIELD} in strict
 * mode.
 */
export function extractSamples(content: string, options: FocusParseOptions = {}): FocusExtraction {
  const field = options.field ?? DEFAULT_SETTINGS.field;
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const samples: number[] = [];
  const malformed: MalformedFocusLine[] = [];

  for (let i = 0; i < lines.length; i++) {
    const result = parseFocusLine(lines[i], options);
    switch (result.kind) {
      case 'sample':
        samples.push(result.value);
        break;
      case 'malformed': {
        const lineNumber = i + 1;
        if (options.strict) {
          throw new FocusLogError(
            FocusLogErrorCode.MALFORMED_FOCUS_FIELD,
            `Line ${lineNumber}: malformed "${field}" field: ${result.reason}`,
            { lineNumber, reason: result.reason },
          );
        }
        debug(`skipping line ${lineNumber}: ${result.reason}`);
        malformed.push({ lineNumber, reason: result.reason });
        break;
      }
      case 'skip':
        break;
    }
  }

  return { samples, totalLines: lines.length, malformed };
}

/**
 * Reads a focus log from disk and extracts its samples. I/O errors propagate
 * unchanged.
 */
export function readFocusLog(filePath: string, options: FocusParseOptions = {}): FocusExtraction {
  const content = fs.readFileSync(filePath, 'utf-8');
  const extraction = extractSamples(content, options);
  debug('parsed focus log', {
    filePath,
    totalLines: extraction.totalLines,
    samples: extraction.samples.length,
    malformed: extraction.malformed.length,
  });
  return extraction;
}
