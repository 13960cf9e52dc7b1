/**
 * Unit tests for the scan CLI: token loop, argument parsing and runner
 */

import { describe, it, expect } from 'vitest';
import { tokens, type Token, type TokenOptions } from '../cli/tokens.js';
import { parseArgs, UsageError } from '../cli/options.js';
import { runScan } from '../cli/run.js';
import { Scanner } from '../scanner/scanner.js';
import { ScannerErrorCode } from '../scanner/types.js';
import { StringSource } from '../source/string-source.js';

async function collect(scanner: Scanner, options: TokenOptions): Promise<Token[]> {
  const result: Token[] = [];
  for await (const token of tokens(scanner, options)) {
    result.push(token);
  }
  return result;
}

const CODE_TOKENS: TokenOptions = { token: /\w+|[^\w\s]/, skip: /\s+/ };

describe('tokens', () => {
  it('should split input into tokens with their offsets', async () => {
    const scanner = new Scanner(new StringSource('let x = 42;'));

    expect(await collect(scanner, CODE_TOKENS)).toEqual([
      { offset: 0, text: 'let' },
      { offset: 4, text: 'x' },
      { offset: 6, text: '=' },
      { offset: 8, text: '42' },
      { offset: 10, text: ';' },
    ]);
  });

  it('should produce the same tokens from a tiny buffer and one-character chunks', async () => {
    const scanner = new Scanner(new StringSource('let x = 42;', { chunkSize: 1 }), { capacity: 2 });
    const result = await collect(scanner, CODE_TOKENS);

    expect(result.map((t) => t.text)).toEqual(['let', 'x', '=', '42', ';']);
  });

  it('should ignore trailing separators', async () => {
    const scanner = new Scanner(new StringSource('  a  '));

    expect(await collect(scanner, CODE_TOKENS)).toEqual([{ offset: 2, text: 'a' }]);
  });

  it('should yield nothing for empty input', async () => {
    const scanner = new Scanner(new StringSource(''));
    expect(await collect(scanner, { token: /\w+/ })).toEqual([]);
  });

  it('should fail on input matching neither pattern', async () => {
    const scanner = new Scanner(new StringSource('12 ab'));

    await expect(collect(scanner, { token: /\d+/, skip: / / })).rejects.toMatchObject({
      code: ScannerErrorCode.UNEXPECTED_INPUT,
      details: { offset: 3, found: 'a' },
    });
  });
});

describe('parseArgs', () => {
  it('should parse token, skip and file', () => {
    expect(parseArgs(['--token', '\\w+', '--skip', '\\s+', 'in.txt'], {})).toEqual({
      help: false,
      options: { token: '\\w+', skip: '\\s+', capacity: 128, lookahead: 256, json: false, file: 'in.txt' },
    });
  });

  it('should read from stdin when no file is given', () => {
    const parsed = parseArgs(['--json', '--token', 'x'], {});
    expect(parsed).toEqual({
      help: false,
      options: { token: 'x', skip: undefined, capacity: 128, lookahead: 256, json: true, file: undefined },
    });
  });

  it('should take the capacity from the environment unless given', () => {
    const fromEnv = parseArgs(['--token', 'x'], { SCANNER_CAPACITY: '64' });
    const fromArg = parseArgs(['--token', 'x', '--capacity', '16'], { SCANNER_CAPACITY: '64' });

    expect(fromEnv.help === false && fromEnv.options.capacity).toBe(64);
    expect(fromArg.help === false && fromArg.options.capacity).toBe(16);
  });

  it('should take the lookahead from the environment unless given', () => {
    const fromEnv = parseArgs(['--token', 'x'], { SCANNER_LOOKAHEAD: '8' });
    const fromArg = parseArgs(['--token', 'x', '--lookahead', '2'], { SCANNER_LOOKAHEAD: '8' });

    expect(fromEnv.help === false && fromEnv.options.lookahead).toBe(8);
    expect(fromArg.help === false && fromArg.options.lookahead).toBe(2);
    expect(() => parseArgs(['--token', 'x', '--lookahead', '1.5'], {})).toThrow(
      'Lookahead must be a positive integer, got 1.5'
    );
  });

  it('should not take another option as a value', () => {
    expect(() => parseArgs(['--token', '--json'], {})).toThrow('Missing value for --token');
    expect(() => parseArgs(['--token', 'x', '--skip', '--capacity', '4'], {})).toThrow('Missing value for --skip');
  });

  it('should recognise help', () => {
    expect(parseArgs(['--token', 'x', '--help'], {})).toEqual({ help: true });
    expect(parseArgs(['-h'], {})).toEqual({ help: true });
  });

  it('should reject bad command lines', () => {
    expect(() => parseArgs([], {})).toThrow(UsageError);
    expect(() => parseArgs(['--token'], {})).toThrow('Missing value for --token');
    expect(() => parseArgs(['--token', 'x', '--capacity', '0'], {})).toThrow(UsageError);
    expect(() => parseArgs(['--token', 'x', '--verbose'], {})).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['--token', 'x', 'a.txt', 'b.txt'], {})).toThrow(UsageError);
  });
});

describe('runScan', () => {
  it('should write one JSON line per token', async () => {
    const lines: string[] = [];
    const count = await runScan(
      { token: '\\w+', skip: ' +', capacity: 4, lookahead: 256, json: true, file: undefined },
      ['a b', ' c'],
      (line) => lines.push(line)
    );

    expect(count).toBe(3);
    expect(lines).toEqual([
      '{"offset":0,"text":"a"}',
      '{"offset":2,"text":"b"}',
      '{"offset":4,"text":"c"}',
    ]);
  });

  it('should report unexpected input without reading the rest of the input', async () => {
    const lines: string[] = [];
    function* chunks(): Generator<string> {
      yield '12 ab';
      throw new Error('input read past the unexpected character');
    }

    await expect(
      runScan(
        { token: '\\d+', skip: ' ', capacity: 128, lookahead: 2, json: false, file: undefined },
        chunks(),
        (line) => lines.push(line)
      )
    ).rejects.toMatchObject({
      code: ScannerErrorCode.UNEXPECTED_INPUT,
      details: { offset: 3, found: 'a' },
    });
    expect(lines).toEqual(['12']);
  });

  it('should write raw tokens without --json', async () => {
    const lines: string[] = [];
    await runScan(
      { token: '[^,]+', skip: ',', capacity: 128, lookahead: 256, json: false, file: 'data.csv' },
      ['x,yy', ',zzz'],
      (line) => lines.push(line)
    );

    expect(lines).toEqual(['x', 'yy', 'zzz']);
  });
});
