#!/usr/bin/env node
/**
 * Scan CLI — split a file or stdin into tokens
 *
 * Usage:
 *   npx tsx src/cli/scan.ts --token '\w+' --skip '\W+' notes.txt
 *   cat notes.txt | npm run scan -- --token '\w+' --skip '\W+'
 *
 * Environment variables:
 *   SCANNER_CAPACITY  - Initial buffer capacity (default: 128)
 *   SCANNER_LOOKAHEAD - Token lookahead before unexpected input is reported (default: 256)
 *   LOG_LEVEL         - Logging level (debug, info, warn, error); records go to stderr
 */

import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import { createLogger } from '../shared/logger.js';
import { HELP_TEXT, parseArgs, UsageError, type ParsedArgs } from './options.js';
import { runScan } from './run.js';

const logger = createLogger('cli');

let parsed: ParsedArgs;
try {
  parsed = parseArgs(process.argv.slice(2));
} catch (err) {
  if (err instanceof UsageError) {
    console.error(`❌ ${err.message}`);
    console.error(`   Run with --help for usage.`);
    process.exit(2);
  }
  throw err;
}

if (parsed.help) {
  console.log(HELP_TEXT);
  process.exit(0);
}

const { options } = parsed;

let input: Readable;
if (options.file !== undefined) {
  input = createReadStream(options.file, { encoding: 'utf8' });
} else {
  process.stdin.setEncoding('utf8');
  input = process.stdin;
}

runScan(options, input, (line) => process.stdout.write(`${line}\n`))
  .then((count) => {
    logger.debug({ count, file: options.file }, 'Scan complete');
  })
  .catch((err: unknown) => {
    logger.error({ err, file: options.file }, 'Scan failed');
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
