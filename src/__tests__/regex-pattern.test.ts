/**
 * Unit tests for RegexPattern
 */

import { describe, it, expect } from 'vitest';
import { RegexPattern, toPattern } from '../pattern/regex-pattern.js';
import { ScannerError, ScannerErrorCode } from '../scanner/types.js';
import type { Pattern } from '../pattern/types.js';

describe('RegexPattern', () => {
  describe('Anchoring', () => {
    it('should only match at the start of the region', () => {
      const pattern = new RegexPattern('b');
      expect(pattern.lookingAt('ab', 0)).toEqual({ matched: false, end: 0, hitEnd: true });
    });

    it('should report the match end relative to the region', () => {
      const pattern = new RegexPattern('a+');
      expect(pattern.lookingAt('aab', 0)).toEqual({ matched: true, end: 2, hitEnd: false });
    });

    it('should match at the given index and measure from it', () => {
      const pattern = new RegexPattern('b+');
      expect(pattern.lookingAt('abbc', 1)).toEqual({ matched: true, end: 2, hitEnd: false });
      expect(pattern.lookingAt('abbc', 0)).toEqual({ matched: false, end: 0, hitEnd: true });
    });

    it('should flag a match at an index that runs to the end of the text', () => {
      const pattern = new RegexPattern('c');
      expect(pattern.lookingAt('abc', 2)).toEqual({ matched: true, end: 1, hitEnd: true });
    });

    it('should match the same region again after a previous attempt', () => {
      const pattern = new RegexPattern(/a/g);
      expect(pattern.lookingAt('a', 0).matched).toBe(true);
      expect(pattern.lookingAt('a', 0).matched).toBe(true);
    });
  });

  describe('Boundary detection', () => {
    it('should flag a match that reaches the end of the region', () => {
      const pattern = new RegexPattern('a+');
      expect(pattern.lookingAt('aa', 0)).toEqual({ matched: true, end: 2, hitEnd: true });
    });

    it('should not flag an empty match inside a non-empty region', () => {
      const pattern = new RegexPattern('a*');
      expect(pattern.lookingAt('b', 0)).toEqual({ matched: true, end: 0, hitEnd: false });
    });

    it('should flag an empty match on an empty region', () => {
      const pattern = new RegexPattern('a*');
      expect(pattern.lookingAt('', 0)).toEqual({ matched: true, end: 0, hitEnd: true });
    });
  });

  describe('Flags', () => {
    it('should apply flags given with a string expression', () => {
      const pattern = new RegexPattern('A', 'i');
      expect(pattern.lookingAt('a', 0).matched).toBe(true);
    });

    it('should keep RegExp flags, drop global and add sticky', () => {
      expect(new RegexPattern(/a/gi).toString()).toBe('/a/iy');
      expect(new RegexPattern(/a/).toString()).toBe('/a/y');
    });

    it('should expose the expression source', () => {
      expect(new RegexPattern('[a-z]+').source).toBe('[a-z]+');
    });
  });

  describe('Errors', () => {
    it('should wrap an invalid expression in a ScannerError', () => {
      expect(() => new RegexPattern('[')).toThrow(ScannerError);
      try {
        new RegexPattern('[');
      } catch (error) {
        expect(error).toBeInstanceOf(ScannerError);
        if (error instanceof ScannerError) {
          expect(error.code).toBe(ScannerErrorCode.INVALID_PATTERN);
          expect(error.details).toEqual({ source: '[', flags: '' });
        }
      }
    });
  });

  describe('toPattern', () => {
    it('should compile strings and RegExps', () => {
      expect(toPattern('a')).toBeInstanceOf(RegexPattern);
      expect(toPattern(/a/)).toBeInstanceOf(RegexPattern);
    });

    it('should return custom patterns unchanged', () => {
      const custom: Pattern = { lookingAt: () => ({ matched: false, end: 0, hitEnd: false }) };
      expect(toPattern(custom)).toBe(custom);
    });
  });
});
