/**
 * Scanner Module — Type Definitions
 *
 * Configuration and error types shared by the scanner, its sources and the CLI.
 */

// ═══════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════

/** Configuration for a Scanner. Every field is optional. */
export interface ScannerConfig {
  /** Initial buffer capacity in characters. Default: 128 */
  capacity?: number;
  /**
   * Grow the buffer when `readRepeatedly` is given a horizon larger than the
   * current capacity, instead of rejecting the call. Default: false
   */
  growToHorizon?: boolean;
  /** Name bound into this scanner's log lines. Default: 'scanner' */
  label?: string;
}

// ═══════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════

export enum ScannerErrorCode {
  END_OF_INPUT = 'SCN_END_OF_INPUT',
  PRECONDITION_VIOLATION = 'SCN_PRECONDITION_VIOLATION',
  INVALID_PATTERN = 'SCN_INVALID_PATTERN',
  CONCURRENT_ACCESS = 'SCN_CONCURRENT_ACCESS',
  INVALID_CHUNK = 'SCN_INVALID_CHUNK',
  UNEXPECTED_INPUT = 'SCN_UNEXPECTED_INPUT',
}

/** Base error class for all Scanner operations. */
export class ScannerError extends Error {
  public readonly code: ScannerErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ScannerErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScannerError';
    this.code = code;
    this.details = details;
  }
}

/** Raised by `peek()` and `next()` when no character remains. */
export class EndOfInputError extends ScannerError {
  constructor(offset: number) {
    super(ScannerErrorCode.END_OF_INPUT, `No character available at offset ${offset}: end of input`, { offset });
    this.name = 'EndOfInputError';
  }
}

/** Raised when a caller passes a configuration the scanner cannot honour. */
export class PreconditionViolationError extends ScannerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ScannerErrorCode.PRECONDITION_VIOLATION, message, details);
    this.name = 'PreconditionViolationError';
  }
}
