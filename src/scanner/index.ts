/**
 * Scanner Module - Public API
 *
 * Pattern-driven reading over incremental character sources.
 */

export { Scanner, default } from './scanner.js';
export { decodeRegion, writeText } from './char-buffer.js';
export {
  ScannerError,
  ScannerErrorCode,
  EndOfInputError,
  PreconditionViolationError,
} from './types.js';
export type { ScannerConfig } from './types.js';
