/**
 * Expectation Model
 *
 * Describes how a single field of a structured profile is expected to look
 * and which comparison strategy the matcher applies to it.
 */

import { ConfigurationError, errorMessage } from './errors';

/**
 * Comparison strategies
 * EXACT: identical after numeric/string coercion (e.g. founded year 2013)
 * KEYWORD: contains some of the keywords (e.g. industry mentions "video")
 * FUZZY: numeric ranges in free text ("51-200" vs "100-250")
 * REGEX: case-insensitive pattern search
 * CUSTOM: delegated to a FieldValidator
 */
export enum MatchStrategy {
  EXACT = 'exact',
  KEYWORD = 'keyword',
  FUZZY = 'fuzzy',
  REGEX = 'regex',
  CUSTOM = 'custom',
}

export const MATCH_STRATEGIES: readonly MatchStrategy[] = Object.values(MatchStrategy);

export type ExpectedValue = string | number | boolean | readonly (string | number)[];

/**
 * What a validator may return: a verdict, or a verdict with a message
 */
export type ValidatorOutcome = boolean | readonly [passed: boolean, message?: string | null];

/**
 * Capability used by the CUSTOM strategy
 */
export interface FieldValidator {
  /** Stable name, used in documents and fingerprints */
  name: string;

  validate(actual: unknown, expected: ExpectedValue | undefined): ValidatorOutcome;
}

export function defineValidator(
  name: string,
  validate: FieldValidator['validate']
): FieldValidator {
  return Object.freeze({ name, validate });
}

interface ExpectationBase {
  fieldName: string;
  expectedValue?: ExpectedValue;
  required: boolean;
  description?: string;
}

export interface ExactExpectation extends ExpectationBase {
  strategy: MatchStrategy.EXACT;
}

export interface KeywordExpectation extends ExpectationBase {
  strategy: MatchStrategy.KEYWORD;
  keywords: readonly string[];
}

export interface FuzzyExpectation extends ExpectationBase {
  strategy: MatchStrategy.FUZZY;
  /** 0-1; unset means 0.3 for ranges and 0.2 for text similarity */
  fuzzyTolerance?: number;
}

export interface RegexExpectation extends ExpectationBase {
  strategy: MatchStrategy.REGEX;
  regexPattern: string;
}

export interface CustomExpectation extends ExpectationBase {
  strategy: MatchStrategy.CUSTOM;
  validator: FieldValidator;
}

export type FieldExpectation =
  | ExactExpectation
  | KeywordExpectation
  | FuzzyExpectation
  | RegexExpectation
  | CustomExpectation;

type WithOptionalRequired<T> = T extends FieldExpectation
  ? Omit<T, 'required'> & { required?: boolean }
  : never;

/**
 * Field definition as written by hand; `required` defaults to true
 */
export type FieldExpectationInput = WithOptionalRequired<FieldExpectation>;

/**
 * Validate and freeze a field expectation.
 * Throws ConfigurationError when the definition cannot be matched.
 */
export function defineField(input: FieldExpectationInput): FieldExpectation {
  const fieldName = input.fieldName.trim();
  if (!fieldName) {
    throw new ConfigurationError('Field expectation requires a non-empty field name');
  }

  const base: ExpectationBase = {
    fieldName,
    expectedValue: freezeExpected(input.expectedValue),
    required: input.required ?? true,
    description: input.description,
  };

  switch (input.strategy) {
    case MatchStrategy.EXACT:
      return Object.freeze({ ...base, strategy: input.strategy });

    case MatchStrategy.KEYWORD: {
      const keywords = input.keywords ?? [];
      if (keywords.length === 0) {
        throw new ConfigurationError(`Field '${fieldName}': keyword strategy requires keywords`);
      }
      if (keywords.some((keyword) => !keyword.trim())) {
        throw new ConfigurationError(`Field '${fieldName}': keywords must not be blank`);
      }
      return Object.freeze({ ...base, strategy: input.strategy, keywords: Object.freeze([...keywords]) });
    }

    case MatchStrategy.FUZZY: {
      const tolerance = input.fuzzyTolerance;
      if (tolerance !== undefined && (!Number.isFinite(tolerance) || tolerance < 0 || tolerance > 1)) {
        throw new ConfigurationError(
          `Field '${fieldName}': fuzzy tolerance must be between 0 and 1, got ${tolerance}`
        );
      }
      return Object.freeze({ ...base, strategy: input.strategy, fuzzyTolerance: tolerance });
    }

    case MatchStrategy.REGEX: {
      const pattern = input.regexPattern ?? '';
      if (!pattern) {
        throw new ConfigurationError(`Field '${fieldName}': regex strategy requires a pattern`);
      }
      try {
        new RegExp(pattern, 'i');
      } catch (error) {
        throw new ConfigurationError(
          `Field '${fieldName}': invalid regex pattern '${pattern}' (${errorMessage(error)})`
        );
      }
      return Object.freeze({ ...base, strategy: input.strategy, regexPattern: pattern });
    }

    case MatchStrategy.CUSTOM: {
      if (!input.validator || typeof input.validator.validate !== 'function') {
        throw new ConfigurationError(`Field '${fieldName}': custom strategy requires a validator`);
      }
      return Object.freeze({ ...base, strategy: input.strategy, validator: input.validator });
    }

    default:
      return assertNever(input);
  }
}

export function isValueList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

function freezeExpected(value: ExpectedValue | undefined): ExpectedValue | undefined {
  if (isExpectedList(value)) {
    return Object.freeze([...value]);
  }
  return value;
}

function isExpectedList(value: ExpectedValue | undefined): value is readonly (string | number)[] {
  return Array.isArray(value);
}

export function assertNever(value: never): never {
  throw new ConfigurationError(`Unknown match strategy: ${JSON.stringify(value)}`);
}
