/**
 * Shared Module - Public API
 */

export { createLogger } from './logger.js';
export type { DestinationStream, Logger } from './logger.js';
export { DEFAULT_CAPACITY, DEFAULT_LABEL, DECODE_CHUNK_SIZE, DEFAULT_LOOKAHEAD, LOG_DESTINATION_FD } from './constants.js';
