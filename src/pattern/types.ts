/**
 * Pattern Module — Type Definitions
 */

/** Outcome of one anchored match attempt. */
export interface MatchResult {
  /** Whether the pattern matched at the given index. */
  matched: boolean;
  /** End of the match relative to that index, i.e. its length. 0 when nothing matched. */
  end: number;
  /**
   * Whether the outcome was limited by the end of the text rather than by
   * the pattern itself, i.e. more input could change it.
   */
  hitEnd: boolean;
}

/** A matcher the scanner can run anchored at its cursor. */
export interface Pattern {
  /**
   * Attempts a match starting exactly at `index` of `text`. Everything from
   * `index` to the end of `text` is the buffered, unconsumed input.
   */
  lookingAt(text: string, index: number): MatchResult;
}

/** What scanner operations accept: a Pattern, a RegExp, or an expression source. */
export type PatternInput = Pattern | RegExp | string;
