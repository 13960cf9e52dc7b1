/**
 * Character buffer helpers.
 *
 * Buffers hold UTF-16 code units, the same units JavaScript strings index by,
 * so offsets in a decoded region line up with offsets in the buffer. Lone
 * surrogates at a chunk edge survive decoding unchanged.
 */

import { DECODE_CHUNK_SIZE } from '../shared/constants.js';

/** Decodes `[start, end)` of a buffer into a string. */
export function decodeRegion(buffer: Uint16Array, start: number, end: number): string {
  let text = '';
  for (let pos = start; pos < end; pos += DECODE_CHUNK_SIZE) {
    const chunk = buffer.subarray(pos, Math.min(end, pos + DECODE_CHUNK_SIZE));
    text += String.fromCharCode(...chunk);
  }
  return text;
}

/**
 * Copies `count` code units of `text`, starting at `from`, into `target` at
 * `offset`. Returns the number copied.
 */
export function writeText(
  target: Uint16Array,
  offset: number,
  text: string,
  from: number,
  count: number
): number {
  for (let i = 0; i < count; i++) {
    target[offset + i] = text.charCodeAt(from + i);
  }
  return count;
}
