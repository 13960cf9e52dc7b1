/**
 * Source Module — Type Definitions
 */

/** Characters written by one read, or `null` once no more will ever come. */
export type SourceResult = number | null;

/**
 * Anything a Scanner can pull characters from.
 *
 * `read` writes up to `length` UTF-16 code units into `target` starting at
 * `offset` and returns how many it wrote (0 is allowed). After it has returned
 * `null` once, every later call must return `null` as well. Errors thrown or
 * rejected here reach the scanner's caller untouched.
 */
export interface CharSource {
  read(target: Uint16Array, offset: number, length: number): SourceResult | Promise<SourceResult>;
}
