/**
 * Field Matcher
 *
 * Pure dispatch from an expectation to its strategy matcher. The missing
 * value rule runs before dispatch so optional fields can score zero
 * without being reported as failures.
 */

export * from './base-matcher';
export { matchExact } from './exact';
export { matchKeyword } from './keyword';
export {
  matchFuzzy,
  extractIntegers,
  bigramSimilarity,
  DEFAULT_RANGE_TOLERANCE,
  DEFAULT_SIMILARITY_TOLERANCE,
} from './fuzzy';
export { matchRegex } from './regex';
export { matchCustom } from './custom';

import { assertNever, MatchStrategy, type FieldExpectation } from '../expectation';
import {
  isMissingValue,
  matchedWith,
  mismatch,
  type FieldMatchResult,
  type MatchOutcome,
} from './base-matcher';
import { matchExact } from './exact';
import { matchKeyword } from './keyword';
import { matchFuzzy } from './fuzzy';
import { matchRegex } from './regex';
import { matchCustom } from './custom';

export const MISSING_REQUIRED_DIAGNOSTIC = 'required field missing';

/**
 * Compare an actual value against an expectation.
 * Identical inputs always give identical outcomes.
 */
export function matchField(expectation: FieldExpectation, actual: unknown): MatchOutcome {
  if (isMissingValue(actual)) {
    return expectation.required ? mismatch(MISSING_REQUIRED_DIAGNOSTIC) : matchedWith(0);
  }

  switch (expectation.strategy) {
    case MatchStrategy.EXACT:
      return matchExact(expectation, actual);
    case MatchStrategy.KEYWORD:
      return matchKeyword(expectation, actual);
    case MatchStrategy.FUZZY:
      return matchFuzzy(expectation, actual);
    case MatchStrategy.REGEX:
      return matchRegex(expectation, actual);
    case MatchStrategy.CUSTOM:
      return matchCustom(expectation, actual);
    default:
      return assertNever(expectation);
  }
}

/**
 * Match and package the outcome with the field's identity
 */
export function buildFieldMatchResult(
  expectation: FieldExpectation,
  actual: unknown
): FieldMatchResult {
  return Object.freeze({
    fieldName: expectation.fieldName,
    ...matchField(expectation, actual),
    expectedValue: expectation.expectedValue ?? null,
    actualValue: actual ?? null,
    strategy: expectation.strategy,
  });
}

/**
 * Result for a field that could not be read at all
 */
export function unmatchedFieldResult(
  expectation: FieldExpectation,
  diagnostic: string
): FieldMatchResult {
  return Object.freeze({
    fieldName: expectation.fieldName,
    ...mismatch(diagnostic),
    expectedValue: expectation.expectedValue ?? null,
    actualValue: null,
    strategy: expectation.strategy,
  });
}
