import type { RegexExpectation } from '../expectation';
import { errorMessage } from '../errors';
import { matchedWith, mismatch, stringifyValue, type MatchOutcome } from './base-matcher';

/**
 * Case-insensitive search for the pattern anywhere in the value
 */
export function matchRegex(expectation: RegexExpectation, actual: unknown): MatchOutcome {
  const pattern = expectation.regexPattern;
  if (!pattern) {
    return mismatch('no regex pattern configured');
  }

  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'i');
  } catch (error) {
    return mismatch(`invalid regex pattern: ${errorMessage(error)}`);
  }

  const actualText = stringifyValue(actual);
  if (regex.test(actualText)) {
    return matchedWith(1);
  }
  return mismatch(`pattern /${pattern}/ did not match '${actualText}'`);
}
