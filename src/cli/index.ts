/**
 * CLI Module - Public API
 */

export { tokens } from './tokens.js';
export type { Token, TokenOptions } from './tokens.js';
export { runScan } from './run.js';
export { parseArgs, UsageError, HELP_TEXT } from './options.js';
export type { ScanOptions, ParsedArgs } from './options.js';
