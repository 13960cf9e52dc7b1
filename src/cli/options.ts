/**
 * Argument handling for the `scan` CLI.
 */

import { DEFAULT_CAPACITY, DEFAULT_LOOKAHEAD } from '../shared/constants.js';

export interface ScanOptions {
  token: string;
  skip: string | undefined;
  capacity: number;
  /** Characters the token pattern may need past the cursor before a failure is final. */
  lookahead: number;
  json: boolean;
  /** Input file; stdin when undefined. */
  file: string | undefined;
}

export type ParsedArgs = { help: true } | { help: false; options: ScanOptions };

/** Bad command line. The CLI exits with status 2 on this. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set(['--token', '--skip', '--capacity', '--lookahead']);

export const HELP_TEXT = `
Stream Scanner

Usage:
  scan --token <regex> [options] [file]

Options:
  --token <regex>     Pattern for one token (required)
  --skip <regex>      Pattern discarded between tokens, e.g. '\\s+'
  --capacity <n>      Initial buffer capacity (default: ${DEFAULT_CAPACITY})
  --lookahead <n>     Characters a token may need before unexpected input is
                      reported (default: ${DEFAULT_LOOKAHEAD})
  --json              Print {"offset","text"} objects instead of raw tokens
  --help              Show this help message

Environment variables:
  SCANNER_CAPACITY    Initial buffer capacity
  SCANNER_LOOKAHEAD   Token lookahead
  LOG_LEVEL           Logging level (debug, info, warn, error)

Examples:
  echo 'let x = 42;' | scan --token '\\w+|[^\\w\\s]' --skip '\\s+'
  scan --token '[^,\\n]*[,\\n]?' --json data.csv
`;

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  if (args.includes('--help') || args.includes('-h')) {
    return { help: true };
  }

  function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    const value = args[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for --${name}`);
    }
    return value;
  }

  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (arg === '--json') {
      continue;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 1) {
    throw new UsageError(`Expected at most one input file, got ${positional.length}`);
  }

  const token = getArg('token');
  if (token === undefined) {
    throw new UsageError('Missing required option --token');
  }

  const capacity = positiveInt('Capacity', getArg('capacity') ?? env['SCANNER_CAPACITY'], DEFAULT_CAPACITY);
  const lookahead = positiveInt('Lookahead', getArg('lookahead') ?? env['SCANNER_LOOKAHEAD'], DEFAULT_LOOKAHEAD);

  return {
    help: false,
    options: {
      token,
      skip: getArg('skip'),
      capacity,
      lookahead,
      json: args.includes('--json'),
      file: positional[0],
    },
  };
}

function positiveInt(label: string, raw: string | undefined, fallback: number): number {
  const value = raw === undefined ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${label} must be a positive integer, got ${raw}`);
  }
  return value;
}
