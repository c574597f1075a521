/**
 * Fuzzy Matcher
 *
 * Built for numeric ranges written as free text ("51-200 employees").
 * Integers are pulled out of both values and the two [min, max] ranges are
 * compared with tolerance padding; confidence is the overlap fraction.
 * Values without numbers fall back to character-bigram Jaccard similarity.
 */

import type { FuzzyExpectation } from '../expectation';
import { matchedWith, mismatch, stringifyValue, type MatchOutcome } from './base-matcher';

/** Tolerance for range overlap when none is configured */
export const DEFAULT_RANGE_TOLERANCE = 0.3;

/** Tolerance for the text-similarity fallback when none is configured */
export const DEFAULT_SIMILARITY_TOLERANCE = 0.2;

export function matchFuzzy(expectation: FuzzyExpectation, actual: unknown): MatchOutcome {
  const actualText = stringifyValue(actual).toLowerCase();
  const expectedText = stringifyValue(expectation.expectedValue).toLowerCase();
  const actualNumbers = extractIntegers(actualText);

  if (actualNumbers.length === 0) {
    const tolerance = expectation.fuzzyTolerance ?? DEFAULT_SIMILARITY_TOLERANCE;
    const similarity = bigramSimilarity(expectedText, actualText);
    if (similarity >= 1 - tolerance) {
      return matchedWith(similarity);
    }
    return mismatch(`string similarity too low: ${similarity.toFixed(2)}`, similarity);
  }

  const expectedNumbers = extractIntegers(expectedText);
  if (expectedNumbers.length === 0) {
    return mismatch('could not extract numbers from expected value');
  }

  const tolerance = expectation.fuzzyTolerance ?? DEFAULT_RANGE_TOLERANCE;
  const expectedMin = Math.min(...expectedNumbers);
  const expectedMax = Math.max(...expectedNumbers);
  const actualMin = Math.min(...actualNumbers);
  const actualMax = Math.max(...actualNumbers);
  const padding = tolerance * (expectedMax - expectedMin);

  const overlaps = actualMax >= expectedMin - padding && actualMin <= expectedMax + padding;
  if (!overlaps) {
    return mismatch(
      `range mismatch: expected [${expectedMin},${expectedMax}], got [${actualMin},${actualMax}]`
    );
  }

  const overlapLength = Math.max(
    0,
    Math.min(actualMax, expectedMax + padding) - Math.max(actualMin, expectedMin - padding)
  );
  const totalRange = Math.max(actualMax - actualMin, expectedMax - expectedMin);
  return matchedWith(totalRange > 0 ? overlapLength / totalRange : 1);
}

/**
 * Every run of digits as a non-negative integer:
 * "51-200 employees" -> [51, 200], "250 to 500" -> [250, 500]
 */
export function extractIntegers(text: string): number[] {
  return (text.match(/\d+/g) ?? []).map((digits) => Number.parseInt(digits, 10));
}

/**
 * Jaccard similarity of the character-bigram sets (0-1)
 */
export function bigramSimilarity(left: string, right: string): number {
  if (!left || !right) return 0;

  const leftBigrams = bigrams(left);
  const rightBigrams = bigrams(right);
  let intersection = 0;
  for (const bigram of leftBigrams) {
    if (rightBigrams.has(bigram)) intersection++;
  }
  const union = leftBigrams.size + rightBigrams.size - intersection;
  return union > 0 ? intersection / union : 0;
}

function bigrams(text: string): Set<string> {
  const chars = Array.from(text);
  const result = new Set<string>();
  for (let i = 0; i < chars.length - 1; i++) {
    result.add(chars[i] + chars[i + 1]);
  }
  return result;
}
