import type { KeywordExpectation } from '../expectation';
import { matchedWith, mismatch, stringifyValue, type MatchOutcome } from './base-matcher';

/**
 * Case-insensitive substring search for each keyword.
 * Confidence is the fraction of keywords found.
 */
export function matchKeyword(expectation: KeywordExpectation, actual: unknown): MatchOutcome {
  const { keywords } = expectation;
  if (keywords.length === 0) {
    return mismatch('no keywords configured');
  }

  const actualText = stringifyValue(actual);
  const haystack = actualText.toLowerCase();
  const found = keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));

  if (found.length === 0) {
    return mismatch(`expected keywords [${keywords.join(', ')}], none found in '${actualText}'`);
  }
  return matchedWith(found.length / keywords.length);
}
