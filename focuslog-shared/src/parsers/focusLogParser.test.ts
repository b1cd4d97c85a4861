import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseFocusLine, extractSamples, readFocusLog } from './focusLogParser';
import { FocusLogError, FocusLogErrorCode } from '../errors';

const SAMPLE_LOG = `2025-03-02T08:00:00.000Z camera update {"focus":[0.0,1.00,0.0],"zoom":2}
2025-03-02T08:00:00.016Z frame rendered
2025-03-02T08:00:00.033Z camera update {"focus":[0.0,1.256,0.0],"zoom":2}
2025-03-02T08:00:00.050Z camera update {"focus":[0.0,oops,0.0],"zoom":2}
2025-03-02T08:00:00.066Z camera update {"focus":[1.5,-2.5,3.5],"zoom":2}
`;

describe('parseFocusLine', () => {
  it('extracts the y coordinate by default', () => {
    expect(parseFocusLine('{"focus":[0.0,1.25,0.0]}')).toEqual({ kind: 'sample', value: 1.25 });
  });

  it('rounds to two decimals', () => {
    expect(parseFocusLine('"focus":[0,3.14159,0]')).toEqual({ kind: 'sample', value: 3.14 });
  });

  it('skips lines without a focus field', () => {
    expect(parseFocusLine('frame rendered in 16ms')).toEqual({ kind: 'skip' });
    expect(parseFocusLine('"target":[0,1,2]')).toEqual({ kind: 'skip' });
  });

  it('accepts signs, exponents and padding around numbers', () => {
    expect(parseFocusLine('"focus":[ -1 , -2.5e1 , +3. ]')).toEqual({ kind: 'sample', value: -25 });
    expect(parseFocusLine('"focus":[.5,.75,1]')).toEqual({ kind: 'sample', value: 0.75 });
  });

  it('selects another axis', () => {
    expect(parseFocusLine('"focus":[1,2,3]', { axis: 'x' })).toEqual({ kind: 'sample', value: 1 });
    expect(parseFocusLine('"focus":[1,2,3]', { axis: 'z' })).toEqual({ kind: 'sample', value: 3 });
  });

  it('reads a custom field name', () => {
    expect(parseFocusLine('"target":[0,4.5,0]', { field: 'target' })).toEqual({ kind: 'sample', value: 4.5 });
  });

  it('honours the precision setting', () => {
    expect(parseFocusLine('"focus":[0,1.2345,0]', { precision: 3 })).toEqual({ kind: 'sample', value: 1.234 });
  });

  it('reports a wrong number of coordinates', () => {
    expect(parseFocusLine('"focus":[1,2]')).toEqual({ kind: 'malformed', reason: 'expected 3 coordinates, found 2' });
    expect(parseFocusLine('"focus":[1,2,3,4]')).toEqual({ kind: 'malformed', reason: 'expected 3 coordinates, found 4' });
  });

  it('reports non-numeric coordinates', () => {
    expect(parseFocusLine('"focus":[0,abc,0]')).toEqual({ kind: 'malformed', reason: 'coordinate 2 is not a number: "abc"' });
    expect(parseFocusLine('"focus":[0,nan,0]')).toEqual({ kind: 'malformed', reason: 'coordinate 2 is not a number: "nan"' });
  });

  it('reports an unterminated array', () => {
    expect(parseFocusLine('"focus":[0,1,2')).toEqual({ kind: 'malformed', reason: 'unterminated coordinate array' });
  });

  it('reports overflowing coordinates', () => {
    expect(parseFocusLine('"focus":[0,1e999,0]')).toEqual({ kind: 'malformed', reason: 'coordinate 2 is out of range: "1e999"' });
  });

  it('uses the first well-formed occurrence on a line', () => {
    expect(parseFocusLine('"focus":[1,2] then "focus":[0,7,0] and "focus":[0,8,0]')).toEqual({ kind: 'sample', value: 7 });
  });
});

describe('extractSamples', () => {
  it('collects samples in file order', () => {
    const result = extractSamples(SAMPLE_LOG);
    expect(result.samples).toEqual([1, 1.26, -2.5]);
    expect(result.totalLines).toBe(5);
  });

  it('records malformed lines with their line numbers', () => {
    const result = extractSamples(SAMPLE_LOG);
    expect(result.malformed).toEqual([
      { lineNumber: 4, reason: 'coordinate 2 is not a number: "oops"' },
    ]);
  });

  it('throws on malformed lines in strict mode', () => {
    let caught: unknown;
    try {
      extractSamples(SAMPLE_LOG, { strict: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FocusLogError);
    if (caught instanceof FocusLogError) {
      expect(caught.code).toBe(FocusLogErrorCode.MALFORMED_FOCUS_FIELD);
      expect(caught.message).toBe('Line 4: malformed "focus" field: coordinate 2 is not a number: "oops"');
      expect(caught.context).toEqual({ lineNumber: 4, reason: 'coordinate 2 is not a number: "oops"' });
    }
  });

  it('returns no samples for empty input', () => {
    expect(extractSamples('')).toEqual({ samples: [], totalLines: 0, malformed: [] });
  });

  it('handles CRLF line endings', () => {
    const result = extractSamples('"focus":[0,1,0]\r\n"focus":[0,2,0]\r\n');
    expect(result.samples).toEqual([1, 2]);
  });
});

describe('readFocusLog', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'focuslog-parser-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads samples from a file', () => {
    const file = path.join(tmpDir, 'watch.log');
    fs.writeFileSync(file, SAMPLE_LOG, 'utf-8');
    expect(readFocusLog(file).samples).toEqual([1, 1.26, -2.5]);
  });

  it('propagates a missing file error', () => {
    const file = path.join(tmpDir, 'missing.log');
    expect(() => readFocusLog(file)).toThrow(/ENOENT/);
  });
});
