/**
 * Pattern Module - Public API
 */

export { RegexPattern, toPattern, default } from './regex-pattern.js';
export { LookaheadPattern } from './lookahead-pattern.js';
export type { MatchResult, Pattern, PatternInput } from './types.js';
