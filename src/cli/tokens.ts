/**
 * Token loop used by the `scan` CLI.
 *
 * Alternates between discarding separator input and reading one token until
 * the scanner reaches end of input.
 */

import type { PatternInput } from '../pattern/types.js';
import type { Scanner } from '../scanner/scanner.js';
import { ScannerError, ScannerErrorCode } from '../scanner/types.js';

export interface TokenOptions {
  /** Pattern for one token. Must consume at least one character. */
  token: PatternInput;
  /** Pattern for input between tokens, e.g. whitespace. */
  skip?: PatternInput;
}

export interface Token {
  /** Characters consumed before the token started. */
  offset: number;
  text: string;
}

export async function* tokens(scanner: Scanner, options: TokenOptions): AsyncGenerator<Token> {
  while (true) {
    if (options.skip !== undefined) {
      await scanner.skip(options.skip);
    }
    if (await scanner.atEnd()) return;

    const offset = scanner.offset;
    const text = await scanner.read(options.token);
    if (text === '') {
      const found = await scanner.peek();
      throw new ScannerError(
        ScannerErrorCode.UNEXPECTED_INPUT,
        `Unexpected ${JSON.stringify(found)} at offset ${offset}`,
        { offset, found }
      );
    }

    yield { offset, text };
  }
}
