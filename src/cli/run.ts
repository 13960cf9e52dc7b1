/**
 * Runs the token loop for one input and writes one line per token.
 */

import { LookaheadPattern } from '../pattern/lookahead-pattern.js';
import { toPattern } from '../pattern/regex-pattern.js';
import { Scanner } from '../scanner/scanner.js';
import { IterableSource, type ChunkIterable } from '../source/iterable-source.js';
import type { ScanOptions } from './options.js';
import { tokens } from './tokens.js';

/**
 * A failed token match becomes final once `options.lookahead` characters are
 * buffered, so unexpected input is reported without reading to the end.
 * @param input - String chunks, e.g. a stream with an encoding set
 * @param write - Receives each output line without a trailing newline
 * @returns Number of tokens written
 */
export async function runScan(
  options: ScanOptions,
  input: ChunkIterable,
  write: (line: string) => void
): Promise<number> {
  const scanner = new Scanner(new IterableSource(input), {
    capacity: options.capacity,
    label: options.file ?? 'stdin',
  });

  const token = new LookaheadPattern(toPattern(options.token), options.lookahead);

  let count = 0;
  for await (const found of tokens(scanner, { token, skip: options.skip })) {
    write(options.json ? JSON.stringify(found) : found.text);
    count++;
  }
  return count;
}
