/**
 * RegexPattern - anchored, boundary-aware matching over JavaScript RegExp.
 *
 * RegExp has no region or hit-end support, so the adapter runs a sticky copy
 * of the expression with `lastIndex` set to the cursor. A match that reaches
 * the end of the text is reported as boundary-limited. A failure is always reported as boundary-limited too:
 * RegExp cannot tell "can never match" from "needs more input".
 */

import { ScannerError, ScannerErrorCode } from '../scanner/types.js';
import type { MatchResult, Pattern, PatternInput } from './types.js';

export class RegexPattern implements Pattern {
  private readonly regex: RegExp;

  /**
   * @param expression - Expression or expression source. `g` is dropped and `y` added.
   * @param flags - Flags for a string expression (ignored for a RegExp)
   */
  constructor(expression: RegExp | string, flags = '') {
    const base = typeof expression === 'string' ? compile(expression, flags) : expression;
    const stickyFlags = base.flags.replace('g', '').replace('y', '') + 'y';
    this.regex = new RegExp(base.source, stickyFlags);
  }

  /** The expression source, without delimiters. */
  get source(): string {
    return this.regex.source;
  }

  lookingAt(text: string, index: number): MatchResult {
    this.regex.lastIndex = index;
    const match = this.regex.exec(text);

    if (match === null) {
      return { matched: false, end: 0, hitEnd: true };
    }

    const end = match[0].length;
    return { matched: true, end, hitEnd: index + end === text.length };
  }

  toString(): string {
    return `/${this.regex.source}/${this.regex.flags}`;
  }
}

function compile(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ScannerError(
      ScannerErrorCode.INVALID_PATTERN,
      `Invalid pattern ${JSON.stringify(source)}: ${error instanceof Error ? error.message : String(error)}`,
      { source, flags }
    );
  }
}

/**
 * Normalizes anything a scanner operation accepts into a Pattern.
 * Strings are compiled as regular-expression sources.
 */
export function toPattern(input: PatternInput): Pattern {
  if (typeof input === 'string' || input instanceof RegExp) {
    return new RegexPattern(input);
  }
  return input;
}

export default RegexPattern;
