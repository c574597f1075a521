import type { ExactExpectation } from '../expectation';
import { isValueList } from '../expectation';
import { matchedWith, mismatch, stringifyValue, type MatchOutcome } from './base-matcher';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Exact match after coercion: "2013" matches 2013 when a number is
 * expected, 2013 matches "2013" when a string is expected.
 */
export function matchExact(expectation: ExactExpectation, actual: unknown): MatchOutcome {
  const expected = expectation.expectedValue;
  const coerced = coerceActual(expected, actual);

  if (valuesEqual(expected, coerced)) {
    return matchedWith(1);
  }
  return mismatch(`expected ${stringifyValue(expected)}, got ${stringifyValue(coerced)}`);
}

function coerceActual(expected: unknown, actual: unknown): unknown {
  if (typeof expected === 'number' && typeof actual === 'string') {
    const trimmed = actual.trim();
    return INTEGER_TEXT.test(trimmed) ? Number.parseInt(trimmed, 10) : actual;
  }
  if (typeof expected === 'string' && typeof actual === 'number' && Number.isInteger(actual)) {
    return String(actual);
  }
  return actual;
}

function valuesEqual(left: unknown, right: unknown): boolean {
  if (isValueList(left) && isValueList(right)) {
    return left.length === right.length && left.every((item, index) => valuesEqual(item, right[index]));
  }
  return Object.is(left, right) || left === right;
}
