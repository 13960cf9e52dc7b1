/**
 * IterableSource - CharSource over a sync or async iterable of string chunks.
 *
 * Covers generators, arrays of chunks and Node.js Readable streams that have
 * an encoding set (`stream.setEncoding('utf8')`). Chunks larger than the free
 * space offered by the scanner are handed out over several reads.
 */

import { writeText } from '../scanner/char-buffer.js';
import { ScannerError, ScannerErrorCode } from '../scanner/types.js';
import { createLogger } from '../shared/logger.js';
import type { CharSource, SourceResult } from './types.js';

const logger = createLogger('source');

export type ChunkIterable = Iterable<string> | AsyncIterable<string>;

function isAsyncIterable(chunks: ChunkIterable): chunks is AsyncIterable<string> {
  return typeof chunks === 'object' && chunks !== null && Symbol.asyncIterator in chunks;
}

export class IterableSource implements CharSource {
  private readonly iterator: Iterator<unknown> | AsyncIterator<unknown>;
  private pending = '';
  private pendingPos = 0;
  private chunkCount = 0;
  private done = false;

  constructor(chunks: ChunkIterable) {
    this.iterator = isAsyncIterable(chunks)
      ? chunks[Symbol.asyncIterator]()
      : chunks[Symbol.iterator]();
  }

  async read(target: Uint16Array, offset: number, length: number): Promise<SourceResult> {
    while (this.pendingPos >= this.pending.length) {
      if (this.done) return null;

      const next = await this.iterator.next();
      if (next.done === true) {
        this.done = true;
        logger.debug({ chunkCount: this.chunkCount }, 'Chunk iterable exhausted');
        return null;
      }

      if (typeof next.value !== 'string') {
        throw new ScannerError(
          ScannerErrorCode.INVALID_CHUNK,
          `Expected a string chunk, got ${describe(next.value)}. Set an encoding on byte streams.`,
          { chunkIndex: this.chunkCount }
        );
      }

      this.pending = next.value;
      this.pendingPos = 0;
      this.chunkCount++;
    }

    const count = Math.min(length, this.pending.length - this.pendingPos);
    writeText(target, offset, this.pending, this.pendingPos, count);
    this.pendingPos += count;
    return count;
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return `${value.constructor.name}(${value.length})`;
  return typeof value;
}

export default IterableSource;
