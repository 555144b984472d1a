/**
 * Frequency map utilities for field value distributions
 */

import type { FrequencyMap, ValueCount } from "../types/data-model.js";

/**
 * Calculate frequency distribution from a sequence of tokens
 *
 * @example
 * calculateFrequencies(["a", "b", "b"])
 * // Returns: Map { "a" => 1, "b" => 2 }
 */
export function calculateFrequencies(values: Iterable<string>): FrequencyMap {
  const frequencies: FrequencyMap = new Map();

  for (const value of values) {
    updateFrequencies(frequencies, value);
  }

  return frequencies;
}

/**
 * Add one occurrence of a token to a frequency map
 */
export function updateFrequencies(frequencies: FrequencyMap, value: string): void {
  frequencies.set(value, (frequencies.get(value) ?? 0) + 1);
}

/**
 * Sum of all occurrence counts
 */
export function totalCount(frequencies: FrequencyMap): number {
  let total = 0;
  for (const count of frequencies.values()) {
    total += count;
  }
  return total;
}

/**
 * Sum of counts for the tokens accepted by `predicate`
 */
export function countMatching(
  frequencies: FrequencyMap,
  predicate: (value: string) => boolean,
): number {
  let total = 0;
  for (const [value, count] of frequencies) {
    if (predicate(value)) {
      total += count;
    }
  }
  return total;
}

/**
 * Most frequent values, by count descending then value ascending
 *
 * @param limit - Maximum entries returned
 */
export function topFrequencies(frequencies: FrequencyMap, limit: number): ValueCount[] {
  if (limit <= 0) return [];

  return Array.from(frequencies, ([value, count]) => ({ value, count }))
    .sort((a, b) => {
      if (a.count !== b.count) return b.count - a.count;
      if (a.value === b.value) return 0;
      return a.value < b.value ? -1 : 1;
    })
    .slice(0, limit);
}
