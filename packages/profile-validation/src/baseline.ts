/**
 * Test Baselines
 *
 * A baseline is the versioned set of field expectations for one test
 * subject. Baselines are built once at load time and never modified.
 *
 * INVARIANTS:
 * - Every required field has required=true, every optional field required=false
 * - Field names are unique across both lists
 * - The fingerprint is a SHA-256 over the canonical definition, so the same
 *   definition always yields the same fingerprint
 */

import { createHash } from 'node:crypto';
import { ConfigurationError } from './errors';
import {
  defineField,
  MatchStrategy,
  type ExpectedValue,
  type FieldExpectation,
  type FieldExpectationInput,
} from './expectation';

export interface TestBaseline {
  testName: string;
  subjectName: string;
  description: string;
  version: string;
  requiredFields: readonly FieldExpectation[];
  optionalFields: readonly FieldExpectation[];
  metadata: Readonly<Record<string, unknown>>;
  fingerprint: string;
}

export interface TestBaselineInput {
  testName: string;
  subjectName: string;
  description?: string;
  version?: string;
  requiredFields: FieldExpectationInput[];
  optionalFields?: FieldExpectationInput[];
  metadata?: Record<string, unknown>;
}

export const DEFAULT_BASELINE_VERSION = '1';

export function defineBaseline(input: TestBaselineInput): TestBaseline {
  const testName = input.testName.trim();
  const subjectName = input.subjectName.trim();
  if (!testName) {
    throw new ConfigurationError('Test baseline requires a non-empty test name');
  }
  if (!subjectName) {
    throw new ConfigurationError(`Test baseline '${testName}' requires a subject name`);
  }

  const requiredFields = input.requiredFields.map((field) => defineListedField(testName, field, true));
  const optionalFields = (input.optionalFields ?? []).map((field) =>
    defineListedField(testName, field, false)
  );

  const seen = new Set<string>();
  for (const field of [...requiredFields, ...optionalFields]) {
    if (seen.has(field.fieldName)) {
      throw new ConfigurationError(
        `Test baseline '${testName}' defines field '${field.fieldName}' more than once`
      );
    }
    seen.add(field.fieldName);
  }

  const definition = {
    testName,
    subjectName,
    description: input.description ?? '',
    version: input.version ?? DEFAULT_BASELINE_VERSION,
    requiredFields: Object.freeze(requiredFields),
    optionalFields: Object.freeze(optionalFields),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  };

  return Object.freeze({
    ...definition,
    fingerprint: computeBaselineFingerprint(definition),
  });
}

function defineListedField(
  testName: string,
  input: FieldExpectationInput,
  required: boolean
): FieldExpectation {
  if (input.required !== undefined && input.required !== required) {
    throw new ConfigurationError(
      `Test baseline '${testName}': field '${input.fieldName}' is listed as ` +
        `${required ? 'required' : 'optional'} but declares required=${input.required}`
    );
  }
  return defineField({ ...input, required });
}

/**
 * Every expectation, required fields first, in definition order
 */
export function allExpectations(baseline: TestBaseline): FieldExpectation[] {
  return [...baseline.requiredFields, ...baseline.optionalFields];
}

/**
 * Computes the SHA-256 fingerprint of a baseline definition.
 * DETERMINISTIC: validators contribute their name only.
 */
export function computeBaselineFingerprint(
  baseline: Omit<TestBaseline, 'fingerprint'>
): string {
  const canonical = {
    testName: baseline.testName,
    subjectName: baseline.subjectName,
    description: baseline.description,
    version: baseline.version,
    requiredFields: baseline.requiredFields.map(describeField),
    optionalFields: baseline.optionalFields.map(describeField),
    metadata: baseline.metadata,
  };
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
}

function describeField(field: FieldExpectation): Record<string, ExpectedValue | boolean | string | null> {
  const described: Record<string, ExpectedValue | boolean | string | null> = {
    fieldName: field.fieldName,
    strategy: field.strategy,
    required: field.required,
    expectedValue: field.expectedValue ?? null,
  };
  switch (field.strategy) {
    case MatchStrategy.KEYWORD:
      described.keywords = field.keywords;
      break;
    case MatchStrategy.FUZZY:
      described.fuzzyTolerance = field.fuzzyTolerance ?? null;
      break;
    case MatchStrategy.REGEX:
      described.regexPattern = field.regexPattern;
      break;
    case MatchStrategy.CUSTOM:
      described.validator = field.validator.name;
      break;
    case MatchStrategy.EXACT:
      break;
  }
  return described;
}
