/**
 * Unit tests for frequency map utilities
 */

import { describe, it, expect } from 'vitest';
import {
  calculateFrequencies,
  countMatching,
  topFrequencies,
  totalCount,
  updateFrequencies,
} from '../../src/utils/frequency-map.js';

describe('Frequency Map Utilities', () => {
  describe('calculateFrequencies', () => {
    it('should count occurrences of each token', () => {
      const result = calculateFrequencies(['a', 'b', 'b']);

      expect(result).toEqual(new Map([['a', 1], ['b', 2]]));
    });

    it('should handle empty input', () => {
      expect(calculateFrequencies([]).size).toBe(0);
    });

    it('should keep empty tokens as their own key', () => {
      const result = calculateFrequencies(['', 'x', '']);

      expect(result.get('')).toBe(2);
      expect(result.get('x')).toBe(1);
    });
  });

  describe('updateFrequencies', () => {
    it('should increment an existing count', () => {
      const frequencies = new Map([['a', 2]]);
      updateFrequencies(frequencies, 'a');
      updateFrequencies(frequencies, 'b');

      expect(frequencies).toEqual(new Map([['a', 3], ['b', 1]]));
    });
  });

  describe('totalCount / countMatching', () => {
    const frequencies = new Map([
      ['n/a', 2],
      ['x', 3],
      ['y', 1],
    ]);

    it('should sum all counts', () => {
      expect(totalCount(frequencies)).toBe(6);
      expect(totalCount(new Map())).toBe(0);
    });

    it('should sum counts of matching tokens', () => {
      expect(countMatching(frequencies, (value) => value === 'n/a')).toBe(2);
      expect(countMatching(frequencies, (value) => value.length === 1)).toBe(4);
    });
  });

  describe('topFrequencies', () => {
    const frequencies = new Map([
      ['a', 1],
      ['c', 3],
      ['b', 3],
      ['d', 2],
    ]);

    it('should order by count descending then value ascending', () => {
      expect(topFrequencies(frequencies, 3)).toEqual([
        { value: 'b', count: 3 },
        { value: 'c', count: 3 },
        { value: 'd', count: 2 },
      ]);
    });

    it('should return everything when the limit exceeds the map', () => {
      expect(topFrequencies(frequencies, 10)).toHaveLength(4);
    });

    it('should return nothing for a zero limit', () => {
      expect(topFrequencies(frequencies, 0)).toEqual([]);
    });
  });
});
