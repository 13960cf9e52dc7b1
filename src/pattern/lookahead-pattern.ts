/**
 * LookaheadPattern - caps how much input a failed match may wait for.
 *
 * A RegexPattern reports every failure as boundary-limited, so `read` keeps
 * pulling until the source is exhausted before it gives up. Wrapping it here
 * declares that the pattern decides within `lookahead` characters: once that
 * many are buffered past the cursor, a failure is final.
 */

import { PreconditionViolationError } from '../scanner/types.js';
import type { MatchResult, Pattern } from './types.js';

export class LookaheadPattern implements Pattern {
  private readonly inner: Pattern;
  readonly lookahead: number;

  constructor(inner: Pattern, lookahead: number) {
    if (!Number.isInteger(lookahead) || lookahead < 1) {
      throw new PreconditionViolationError(`Lookahead must be a positive integer, got ${lookahead}`, { lookahead });
    }
    this.inner = inner;
    this.lookahead = lookahead;
  }

  lookingAt(text: string, index: number): MatchResult {
    const result = this.inner.lookingAt(text, index);
    if (!result.matched && result.hitEnd && text.length - index >= this.lookahead) {
      return { ...result, hitEnd: false };
    }
    return result;
  }
}

export default LookaheadPattern;
