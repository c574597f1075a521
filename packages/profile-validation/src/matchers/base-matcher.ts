/**
 * Base Matcher Types
 *
 * Every strategy matcher is a pure function from (expectation, actual) to
 * a MatchOutcome. A diagnostic is present exactly when the value did not
 * match.
 */

import type { ExpectedValue, FieldExpectation, MatchStrategy } from '../expectation';
import { isValueList } from '../expectation';

/**
 * Outcome of comparing one value
 */
export interface MatchOutcome {
  matched: boolean;
  /** Match quality (0-1), independent of `matched` */
  confidence: number;
  diagnostic: string | null;
}

/**
 * Outcome for one (backend, field) pair, as stored by the runner
 */
export interface FieldMatchResult extends MatchOutcome {
  fieldName: string;
  expectedValue: ExpectedValue | null;
  actualValue: unknown;
  strategy: MatchStrategy;
}

/**
 * Signature shared by the strategy matchers
 */
export type StrategyMatcher<E extends FieldExpectation> = (
  expectation: E,
  actual: unknown
) => MatchOutcome;

export function matchedWith(confidence: number): MatchOutcome {
  return { matched: true, confidence, diagnostic: null };
}

export function mismatch(diagnostic: string, confidence = 0): MatchOutcome {
  return { matched: false, confidence, diagnostic };
}

/**
 * null, undefined and whitespace-only strings count as missing
 */
export function isMissingValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Text form of a value, used by keyword, fuzzy and regex matching
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (isValueList(value)) {
    return `[${value.map(stringifyValue).join(', ')}]`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
