/**
 * Scanner - buffered, pattern-driven reading over an incremental CharSource.
 *
 * Callers ask for "as much input as matches this pattern" and the scanner
 * takes care of pulling, buffering and growing. Matches are anchored at the
 * cursor; nothing before the cursor is ever seen again.
 *
 * Buffer layout:
 *
 *   0 ........ start ........ end ........ capacity
 *   [ consumed |  unconsumed   |    free    ]
 *
 * Pulled characters are also decoded once into `text`, which patterns run
 * against. `text` covers stream offsets from `textOrigin` on, so compaction
 * and growth never touch it; consumed text is sliced off once it makes up
 * at least half of the string.
 */

import { toPattern } from '../pattern/regex-pattern.js';
import type { Pattern, PatternInput } from '../pattern/types.js';
import { DEFAULT_CAPACITY, DEFAULT_LABEL } from '../shared/constants.js';
import { createLogger, type Logger } from '../shared/logger.js';
import type { CharSource } from '../source/types.js';
import { decodeRegion } from './char-buffer.js';
import {
  EndOfInputError,
  PreconditionViolationError,
  ScannerError,
  ScannerErrorCode,
  type ScannerConfig,
} from './types.js';

const logger = createLogger('core');

// ═══════════════════════════════════════════════════════════════
// SCANNER
// ═══════════════════════════════════════════════════════════════

export class Scanner {
  private readonly config: Required<ScannerConfig>;
  private readonly source: CharSource;
  private readonly log: Logger;

  private buffer: Uint16Array;
  private start = 0;
  private end = 0;
  private hitEof = false;
  private consumed = 0;
  private busy = false;

  private text = '';
  private textOrigin = 0;

  /**
   * @param source - Where characters come from
   * @param config - Scanner configuration
   */
  constructor(source: CharSource, config: ScannerConfig = {}) {
    this.config = {
      capacity: config.capacity ?? DEFAULT_CAPACITY,
      growToHorizon: config.growToHorizon ?? false,
      label: config.label ?? DEFAULT_LABEL,
    };

    if (!Number.isInteger(this.config.capacity) || this.config.capacity < 1) {
      throw new PreconditionViolationError(
        `Capacity must be a positive integer, got ${this.config.capacity}`,
        { capacity: this.config.capacity }
      );
    }

    this.source = source;
    this.buffer = new Uint16Array(this.config.capacity);
    this.log = logger.child({ scanner: this.config.label });
  }

  /** Characters consumed since construction. */
  get offset(): number {
    return this.consumed;
  }

  /** Current buffer capacity. Only ever grows. */
  get capacity(): number {
    return this.buffer.length;
  }

  /** Characters pulled from the source but not consumed yet. */
  get buffered(): number {
    return this.end - this.start;
  }

  /** Whether the source has signaled end of input. */
  get exhausted(): boolean {
    return this.hitEof;
  }

  /**
   * Consumes the longest prefix the pattern matches at the cursor.
   *
   * A match that ends at the edge of the buffered data is only accepted once
   * the source is exhausted; until then the scanner pulls more input. A full
   * buffer first drops its consumed prefix and doubles once the match alone
   * fills it.
   * @returns The matched text, or '' when the pattern matches nothing here
   */
  read(pattern: PatternInput): Promise<string> {
    return this.exclusive(async () => {
      const p = toPattern(pattern);
      while (true) {
        const result = p.lookingAt(this.text, this.cursor());

        if (!result.hitEnd || this.hitEof) {
          return result.matched ? this.consume(result.end) : '';
        }

        if (this.end === this.buffer.length) {
          if (this.start > 0) {
            this.compact();
          } else {
            this.grow(this.buffer.length * 2);
          }
        }
        await this.pull();
      }
    });
  }

  /**
   * Applies the pattern again and again at the cursor, concatenating every
   * match, until it stops matching. Since the pattern runs repeatedly,
   * `a{1}` can return more than one character.
   *
   * Before each attempt at least `horizon` characters are buffered unless the
   * source is exhausted, so a pattern that needs K characters of context sees
   * them all whenever `horizon >= K`.
   * @param horizon - Minimum characters buffered per attempt; at most the capacity
   * @returns All matched characters ('' when the first attempt fails)
   */
  readRepeatedly(pattern: PatternInput, horizon: number): Promise<string> {
    return this.exclusive(async () => {
      const p = toPattern(pattern);
      this.ensureHorizon(horizon);
      let output = '';

      while (true) {
        if (this.buffer.length - this.start < horizon) {
          this.compact();
        }
        while (this.end - this.start < horizon && !this.hitEof) {
          await this.pull();
        }

        while (true) {
          const match = this.matchNonEmpty(p);
          if (match === 0) {
            return output;
          }
          output += this.consume(match);

          // Below the horizon only a final (exhausted) buffer may be matched further
          if (!this.hitEof && this.end - this.start < horizon) break;
        }
      }
    });
  }

  /**
   * Discards input for as long as the pattern keeps matching.
   * Stops at the first failed or zero-length match, or at end of input.
   */
  skip(pattern: PatternInput): Promise<void> {
    return this.exclusive(async () => {
      const p = toPattern(pattern);
      while (true) {
        while (this.start < this.end) {
          const match = this.matchNonEmpty(p);
          if (match === 0) return;
          this.consume(match);
        }

        this.clear();
        await this.pull();
        if (this.hitEof) return;
      }
    });
  }

  /**
   * Returns the next character without consuming it.
   * @throws EndOfInputError when the source is exhausted
   */
  peek(): Promise<string> {
    return this.exclusive(() => this.peekChar());
  }

  /**
   * Consumes and returns the next character.
   * @throws EndOfInputError when the source is exhausted
   */
  next(): Promise<string> {
    return this.exclusive(async () => {
      const ch = await this.peekChar();
      this.advance(1);
      return ch;
    });
  }

  /** True once everything has been consumed and the source is exhausted. */
  atEnd(): Promise<boolean> {
    return this.exclusive(async () => {
      await this.fill();
      return this.hitEof && this.start === this.end;
    });
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  /** Runs one operation, rejecting any other started before it settles. */
  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new ScannerError(
        ScannerErrorCode.CONCURRENT_ACCESS,
        'Scanner operation started while another is still pending',
        { label: this.config.label }
      );
    }

    this.busy = true;
    try {
      return await operation();
    } finally {
      this.busy = false;
    }
  }

  /** Appends whatever the source has into the free space after `end`. */
  private async pull(): Promise<void> {
    if (this.hitEof) return;

    const count = await this.source.read(this.buffer, this.end, this.buffer.length - this.end);
    if (count === null) {
      this.hitEof = true;
      this.log.debug({ consumed: this.consumed, buffered: this.end - this.start }, 'Source exhausted');
    } else {
      this.text += decodeRegion(this.buffer, this.end, this.end + count);
      this.end += count;
    }
  }

  /** Pulls until something is buffered or the source is exhausted. */
  private async fill(): Promise<void> {
    while (this.start === this.end && !this.hitEof) {
      this.clear();
      await this.pull();
    }
  }

  private async peekChar(): Promise<string> {
    await this.fill();
    if (this.start === this.end) {
      throw new EndOfInputError(this.consumed);
    }
    return String.fromCharCode(this.buffer[this.start]);
  }

  /** Index of the cursor in `text`. */
  private cursor(): number {
    return this.consumed - this.textOrigin;
  }

  /** Length of a non-empty match at the cursor, or 0. */
  private matchNonEmpty(pattern: Pattern): number {
    const result = pattern.lookingAt(this.text, this.cursor());
    return result.matched ? result.end : 0;
  }

  /** Consumes `length` characters and returns them. */
  private consume(length: number): string {
    const from = this.cursor();
    const consumedText = this.text.slice(from, from + length);
    this.advance(length);
    return consumedText;
  }

  private advance(length: number): void {
    this.start += length;
    this.consumed += length;

    const cursor = this.cursor();
    if (cursor * 2 >= this.text.length) {
      this.text = this.text.slice(cursor);
      this.textOrigin = this.consumed;
    }
  }

  /** Reallocates at a larger capacity; content keeps its offsets. */
  private grow(capacity: number): void {
    const next = new Uint16Array(capacity);
    next.set(this.buffer.subarray(0, this.end));
    this.log.debug({ from: this.buffer.length, to: capacity, start: this.start, end: this.end }, 'Buffer grown');
    this.buffer = next;
  }

  /** Shifts `[start, end)` down to index 0 without reallocating. */
  private compact(): void {
    if (this.start === 0) return;
    this.buffer.copyWithin(0, this.start, this.end);
    this.log.debug({ shift: this.start, buffered: this.end - this.start }, 'Buffer compacted');
    this.end -= this.start;
    this.start = 0;
  }

  /** Resets an empty buffer so the whole capacity is free. */
  private clear(): void {
    this.start = 0;
    this.end = 0;
  }

  private ensureHorizon(horizon: number): void {
    if (!Number.isInteger(horizon) || horizon < 1) {
      throw new PreconditionViolationError(`Horizon must be a positive integer, got ${horizon}`, { horizon });
    }
    if (horizon <= this.buffer.length) return;

    if (!this.config.growToHorizon) {
      throw new PreconditionViolationError(
        `Horizon ${horizon} exceeds buffer capacity ${this.buffer.length}`,
        { horizon, capacity: this.buffer.length }
      );
    }

    let capacity = this.buffer.length;
    while (capacity < horizon) capacity *= 2;
    this.grow(capacity);
  }
}

export default Scanner;
