/**
 * StringSource - in-memory CharSource over a string.
 *
 * `chunkSize` caps how much a single read hands out, which makes it easy to
 * reproduce input that arrives in small pieces.
 */

import { writeText } from '../scanner/char-buffer.js';
import { PreconditionViolationError } from '../scanner/types.js';
import type { CharSource, SourceResult } from './types.js';

export interface StringSourceOptions {
  /** Maximum characters delivered per read. Default: unlimited */
  chunkSize?: number;
}

export class StringSource implements CharSource {
  private readonly text: string;
  private readonly chunkSize: number;
  private position = 0;

  constructor(text: string, options: StringSourceOptions = {}) {
    const chunkSize = options.chunkSize ?? Infinity;
    if (chunkSize !== Infinity && !(Number.isInteger(chunkSize) && chunkSize >= 1)) {
      throw new PreconditionViolationError(`Chunk size must be a positive integer, got ${chunkSize}`, { chunkSize });
    }
    this.text = text;
    this.chunkSize = chunkSize;
  }

  read(target: Uint16Array, offset: number, length: number): SourceResult {
    const remaining = this.text.length - this.position;
    if (remaining <= 0) return null;

    const count = Math.min(length, remaining, this.chunkSize);
    writeText(target, offset, this.text, this.position, count);
    this.position += count;
    return count;
  }

  /** Characters not yet handed out. */
  get remaining(): number {
    return this.text.length - this.position;
  }
}

export default StringSource;
