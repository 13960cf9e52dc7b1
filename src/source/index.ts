/**
 * Source Module - Public API
 *
 * Adapters that feed characters into a Scanner.
 */

export { StringSource } from './string-source.js';
export type { StringSourceOptions } from './string-source.js';
export { IterableSource } from './iterable-source.js';
export type { ChunkIterable } from './iterable-source.js';
export type { CharSource, SourceResult } from './types.js';
