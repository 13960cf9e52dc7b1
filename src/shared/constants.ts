/**
 * Stream Scanner — Shared Constants
 */

/** Initial buffer capacity when none is configured. */
export const DEFAULT_CAPACITY = 128;

/** Label bound into a scanner's log lines when none is configured. */
export const DEFAULT_LABEL = 'scanner';

/** Characters per `String.fromCharCode` call when decoding a buffer region. */
export const DECODE_CHUNK_SIZE = 8192;

/** File descriptor log records are written to: stderr. */
export const LOG_DESTINATION_FD = 2;

/** Characters a CLI token pattern may need past the cursor before a failure is final. */
export const DEFAULT_LOOKAHEAD = 256;
