/**
 * Stream Scanner - Main Entry Point
 *
 * Exports all public APIs.
 */

// Scanner Module
export {
  Scanner,
  ScannerError,
  ScannerErrorCode,
  EndOfInputError,
  PreconditionViolationError,
  decodeRegion,
  writeText,
} from './scanner/index.js';
export type { ScannerConfig } from './scanner/index.js';

// Pattern Module
export { RegexPattern, LookaheadPattern, toPattern } from './pattern/index.js';
export type { MatchResult, Pattern, PatternInput } from './pattern/index.js';

// Source Module
export { StringSource, IterableSource } from './source/index.js';
export type { CharSource, SourceResult, StringSourceOptions, ChunkIterable } from './source/index.js';

// CLI helpers
export { tokens, runScan, parseArgs, UsageError } from './cli/index.js';
export type { Token, TokenOptions, ScanOptions, ParsedArgs } from './cli/index.js';

// Shared
export { createLogger, DEFAULT_CAPACITY } from './shared/index.js';
export type { DestinationStream, Logger } from './shared/index.js';

// Version
export const VERSION = '0.1.0';
