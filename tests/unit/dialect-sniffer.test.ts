/**
 * Unit tests for dialect sniffing heuristics
 */

import { describe, it, expect } from 'vitest';
import {
  classifyFormat,
  countOutsideQuotes,
  detectDelimiter,
  detectHeader,
  detectQuoting,
  mode,
} from '../../src/lib/dialect/sniffer.js';
import { defaultClassifier } from '../../src/lib/classifier/index.js';

describe('Dialect Sniffer', () => {
  describe('countOutsideQuotes', () => {
    it('should ignore delimiters inside quotes', () => {
      expect(countOutsideQuotes('"a,b",c', ',', '"')).toBe(1);
      expect(countOutsideQuotes('a,b,c', ',', '"')).toBe(2);
      expect(countOutsideQuotes("'x|y'|z", '|', "'")).toBe(1);
    });
  });

  describe('mode', () => {
    it('should return the most common value', () => {
      expect(mode([4, 4, 1, 4, 2])).toBe(4);
    });

    it('should prefer the value that reached the top count first', () => {
      expect(mode([2, 3, 3, 2])).toBe(3);
    });

    it('should return undefined for no values', () => {
      expect(mode([])).toBeUndefined();
    });
  });

  describe('detectDelimiter', () => {
    it('should prefer the candidate with a consistent field count', () => {
      expect(detectDelimiter(['a,b;c', 'd,e;f', 'g;h'], '"')).toBe(';');
    });

    it('should not count delimiters inside quoted fields', () => {
      expect(detectDelimiter(['"a,b"|c', '"d,e"|f'], '"')).toBe('|');
    });

    it('should detect tabs', () => {
      expect(detectDelimiter(['a\tb\tc', 'd\te\tf'], '"')).toBe('\t');
    });

    it('should return null when nothing splits the lines', () => {
      expect(detectDelimiter(['abc', 'def'], '"')).toBeNull();
    });

    it('should not split on colons inside time values', () => {
      const lines = ['id,created_at', '0,2024-01-01 10:30:00', '1,2024-01-02 11:45:30'];
      expect(detectDelimiter(lines, '"')).toBe(',');
    });

    it('should prefer the earlier candidate when both split consistently', () => {
      expect(detectDelimiter(['0,10:30:00', '1,11:45:30'], '"')).toBe(',');
    });

    it('should only consider the given candidates', () => {
      expect(detectDelimiter(['a,b', 'c,d'], '"', [';'])).toBeNull();
    });
  });

  describe('classifyFormat', () => {
    it('should classify regular multi-field records as csv', () => {
      expect(classifyFormat([['a', 'b'], ['c', 'd']], ['a,b', 'c,d'])).toBe('csv');
    });

    it('should classify ragged records as unknown', () => {
      expect(classifyFormat([['a', 'b'], ['c']], ['a,b', 'c'])).toBe('unknown');
    });

    it('should classify equal-length single-field lines as fixed', () => {
      expect(classifyFormat([['abc'], ['def']], ['abc', 'def'])).toBe('fixed');
    });

    it('should not classify unequal single-field lines as fixed', () => {
      expect(classifyFormat([['abc'], ['de']], ['abc', 'de'])).toBe('unknown');
    });

    it('should need more than one line for fixed', () => {
      expect(classifyFormat([['abc']], ['abc'])).toBe('unknown');
    });

    it('should classify no records as unknown', () => {
      expect(classifyFormat([], [])).toBe('unknown');
    });
  });

  describe('detectQuoting', () => {
    const records = [
      ['1', 'a'],
      ['2', 'b'],
    ];

    it('should detect a column quoted on every record', () => {
      expect(detectQuoting({ records, quotedColumns: [new Set([1]), new Set([1])] })).toBe(true);
    });

    it('should not detect partially quoted columns', () => {
      expect(detectQuoting({ records, quotedColumns: [new Set([1]), new Set()] })).toBe(false);
    });

    it('should ignore empty values when checking a column', () => {
      const withEmpty = [
        ['1', 'a'],
        ['2', ''],
      ];
      expect(detectQuoting({ records: withEmpty, quotedColumns: [new Set([1]), new Set()] })).toBe(true);
    });

    it('should leave the header record out of the vote', () => {
      const sample = {
        records: [
          ['id', 'name'],
          ['1', 'smith'],
          ['2', 'jones'],
        ],
        quotedColumns: [new Set<number>(), new Set([0, 1]), new Set([0, 1])],
      };

      expect(detectQuoting(sample, true)).toBe(true);
      expect(detectQuoting(sample)).toBe(false);
    });

    it('should report no quoting for no records', () => {
      expect(detectQuoting({ records: [], quotedColumns: [] })).toBe(false);
    });
  });

  describe('detectHeader', () => {
    it('should detect names over numeric and fixed-length columns', () => {
      const records = [
        ['id', 'name'],
        ['1', 'smith'],
        ['2', 'jones'],
      ];
      expect(detectHeader(records, defaultClassifier)).toBe(true);
    });

    it('should reject a first record shaped like the data', () => {
      const records = [
        ['1', 'smith'],
        ['2', 'jones'],
        ['3', 'brown'],
      ];
      expect(detectHeader(records, defaultClassifier)).toBe(false);
    });

    it('should ignore unknown values in data columns', () => {
      const records = [
        ['score', 'note'],
        ['12', 'n/a'],
        ['', 'first draft'],
        ['7.5', 'ok'],
      ];
      // score: numeric under a name; note: mixed lengths, no vote
      expect(detectHeader(records, defaultClassifier)).toBe(true);
    });

    it('should not detect a header without data records', () => {
      expect(detectHeader([['id', 'name']], defaultClassifier)).toBe(false);
      expect(detectHeader([], defaultClassifier)).toBe(false);
    });
  });
});
