/**
 * Typed errors raised by the focuslog library.
 *
 * I/O failures are not wrapped; they propagate as the underlying Node error.
 */

export enum FocusLogErrorCode {
  MALFORMED_FOCUS_FIELD = 'MALFORMED_FOCUS_FIELD',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class FocusLogError extends Error {
  readonly code: FocusLogErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: FocusLogErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'FocusLogError';
    this.code = code;
    this.context = context;
  }
}

export function isFocusLogError(err: unknown): err is FocusLogError {
  return err instanceof FocusLogError;
}
