import type { CustomExpectation, ValidatorOutcome } from '../expectation';
import { isValueList } from '../expectation';
import { ValidatorError } from '../errors';
import { matchedWith, mismatch, type MatchOutcome } from './base-matcher';

/**
 * Delegates to the expectation's validator.
 * A throwing validator becomes a non-matching outcome, never an exception.
 */
export function matchCustom(expectation: CustomExpectation, actual: unknown): MatchOutcome {
  const { validator } = expectation;
  if (!validator) {
    return mismatch('no validator configured');
  }

  let outcome: ValidatorOutcome;
  try {
    outcome = validator.validate(actual, expectation.expectedValue);
  } catch (error) {
    return mismatch(new ValidatorError(validator.name, error).message);
  }

  const verdict = readVerdict(outcome);
  if (!verdict) {
    return mismatch('validator returned an invalid result');
  }
  if (verdict.passed) {
    return matchedWith(1);
  }
  return mismatch(verdict.message || `validator '${validator.name}' rejected the value`);
}

function readVerdict(outcome: unknown): { passed: boolean; message: string | null } | null {
  if (typeof outcome === 'boolean') {
    return { passed: outcome, message: null };
  }
  if (isValueList(outcome) && outcome.length >= 1 && outcome.length <= 2) {
    const [passed, message] = outcome;
    if (typeof passed !== 'boolean') return null;
    if (message === undefined || message === null) return { passed, message: null };
    if (typeof message === 'string') return { passed, message };
  }
  return null;
}
