/**
 * Baseline & Registry Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MatchStrategy,
  defineField,
  defineBaseline,
  defineValidator,
  BaselineRegistry,
  createDefaultRegistry,
  ConfigurationError,
  DuplicateNameError,
  NotFoundError,
  type TestBaselineInput,
} from './index';

function acmeInput(overrides: Partial<TestBaselineInput> = {}): TestBaselineInput {
  return {
    testName: 'acme_research',
    subjectName: 'Acme',
    requiredFields: [{ fieldName: 'founded', strategy: MatchStrategy.EXACT, expectedValue: 2013 }],
    optionalFields: [{ fieldName: 'growth_stage', strategy: MatchStrategy.KEYWORD, keywords: ['startup'] }],
    ...overrides,
  };
}

describe('profile-validation:expectation', () => {
  it('should default fields to required', () => {
    const field = defineField({ fieldName: ' founded ', strategy: MatchStrategy.EXACT, expectedValue: 2013 });
    expect(field.required).toBe(true);
    expect(field.fieldName).toBe('founded');
    expect(Object.isFrozen(field)).toBe(true);
  });

  it('should reject an empty field name', () => {
    expect(() => defineField({ fieldName: '  ', strategy: MatchStrategy.EXACT })).toThrow(ConfigurationError);
  });

  it('should reject keyword fields without usable keywords', () => {
    expect(() => defineField({ fieldName: 'industry', strategy: MatchStrategy.KEYWORD, keywords: [] })).toThrow(
      "Field 'industry': keyword strategy requires keywords"
    );
    expect(() =>
      defineField({ fieldName: 'industry', strategy: MatchStrategy.KEYWORD, keywords: ['video', ' '] })
    ).toThrow("Field 'industry': keywords must not be blank");
  });

  it('should reject tolerances outside 0 to 1', () => {
    expect(() =>
      defineField({ fieldName: 'company_size', strategy: MatchStrategy.FUZZY, fuzzyTolerance: 1.5 })
    ).toThrow("Field 'company_size': fuzzy tolerance must be between 0 and 1, got 1.5");
    expect(
      defineField({ fieldName: 'company_size', strategy: MatchStrategy.FUZZY, fuzzyTolerance: 0 }).required
    ).toBe(true);
  });

  it('should reject patterns that do not compile', () => {
    expect(() => defineField({ fieldName: 'website', strategy: MatchStrategy.REGEX, regexPattern: '' })).toThrow(
      "Field 'website': regex strategy requires a pattern"
    );
    expect(() =>
      defineField({ fieldName: 'website', strategy: MatchStrategy.REGEX, regexPattern: '([a-z' })
    ).toThrow(ConfigurationError);
  });

  it('should keep the validator of custom fields', () => {
    const validator = defineValidator('always', () => true);
    const field = defineField({ fieldName: 'founded', strategy: MatchStrategy.CUSTOM, validator });
    expect(field.strategy === MatchStrategy.CUSTOM && field.validator).toBe(validator);
  });
});

describe('profile-validation:baseline', () => {
  it('should set required flags from the list a field is in', () => {
    const baseline = defineBaseline(acmeInput());
    expect(baseline.requiredFields[0].required).toBe(true);
    expect(baseline.optionalFields[0].required).toBe(false);
    expect(baseline.version).toBe('1');
    expect(baseline.description).toBe('');
  });

  it('should reject a field that contradicts its list', () => {
    expect(() =>
      defineBaseline(
        acmeInput({
          optionalFields: [
            { fieldName: 'growth_stage', strategy: MatchStrategy.KEYWORD, keywords: ['startup'], required: true },
          ],
        })
      )
    ).toThrow(
      "Test baseline 'acme_research': field 'growth_stage' is listed as optional but declares required=true"
    );
  });

  it('should reject duplicate field names across both lists', () => {
    expect(() =>
      defineBaseline(
        acmeInput({
          optionalFields: [{ fieldName: 'founded', strategy: MatchStrategy.EXACT, expectedValue: 2013 }],
        })
      )
    ).toThrow("Test baseline 'acme_research' defines field 'founded' more than once");
  });

  it('should require a test name and a subject', () => {
    expect(() => defineBaseline(acmeInput({ testName: ' ' }))).toThrow(ConfigurationError);
    expect(() => defineBaseline(acmeInput({ subjectName: '' }))).toThrow(
      "Test baseline 'acme_research' requires a subject name"
    );
  });

  it('should freeze the baseline', () => {
    const baseline = defineBaseline(acmeInput({ metadata: { difficulty: 'easy' } }));
    expect(Object.isFrozen(baseline)).toBe(true);
    expect(Object.isFrozen(baseline.requiredFields)).toBe(true);
    expect(Object.isFrozen(baseline.metadata)).toBe(true);
  });

  it('should fingerprint definitions deterministically', () => {
    const first = defineBaseline(acmeInput());
    const second = defineBaseline(acmeInput());
    const revised = defineBaseline(acmeInput({ version: '2' }));

    expect(first.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(revised.fingerprint).not.toBe(first.fingerprint);
  });

  it('should fingerprint custom fields by validator name', () => {
    const withValidator = (validate: () => boolean) =>
      defineBaseline(
        acmeInput({
          requiredFields: [
            {
              fieldName: 'founded',
              strategy: MatchStrategy.CUSTOM,
              validator: defineValidator('founding_year', validate),
            },
          ],
        })
      );

    expect(withValidator(() => true).fingerprint).toBe(withValidator(() => false).fingerprint);
  });
});

describe('profile-validation:registry', () => {
  it('should look up baselines case-insensitively', () => {
    const baseline = defineBaseline(acmeInput());
    const registry = new BaselineRegistry().register(baseline);

    expect(registry.lookup('ACME_Research')).toBe(baseline);
    expect(registry.has('acme_research')).toBe(true);
  });

  it('should resolve aliases to the same baseline', () => {
    const baseline = defineBaseline(acmeInput());
    const registry = new BaselineRegistry().register(baseline, { aliases: ['acme'] });

    expect(registry.lookup('Acme')).toBe(baseline);
    expect(registry.listNames()).toEqual(['acme_research', 'acme']);
    expect(registry.listBaselines()).toEqual([baseline]);
    expect(registry.size).toBe(1);
  });

  it('should reject a name that is already taken', () => {
    const registry = new BaselineRegistry().register(defineBaseline(acmeInput()), { aliases: ['acme'] });
    const other = defineBaseline(acmeInput({ testName: 'acme_v2' }));

    expect(() => registry.register(other, { aliases: ['ACME'] })).toThrow(DuplicateNameError);
    expect(() => registry.register(other, { aliases: ['ACME'] })).toThrow(
      "Test baseline 'ACME' is already registered"
    );
    // nothing from the rejected registration is kept
    expect(registry.has('acme_v2')).toBe(false);
  });

  it('should list available names when a lookup fails', () => {
    const registry = new BaselineRegistry().register(defineBaseline(acmeInput()), { aliases: ['acme'] });

    expect(() => registry.lookup('nope')).toThrow(NotFoundError);
    expect(() => registry.lookup('nope')).toThrow(
      "Test baseline 'nope' not found. Available tests: acme_research, acme"
    );
    expect(() => new BaselineRegistry().lookup('nope')).toThrow(
      "Test baseline 'nope' not found. Available tests: (none)"
    );
  });

  it('should refuse registrations once sealed', () => {
    const registry = new BaselineRegistry().seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(defineBaseline(acmeInput()))).toThrow(
      "Cannot register 'acme_research': baseline registry is sealed"
    );
  });
});

describe('profile-validation:default-registry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should load the bundled baselines', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const registry = createDefaultRegistry();
    const baseline = registry.lookup('BitMovin');

    expect(registry.isSealed).toBe(true);
    expect(registry.has('bitmovin_research')).toBe(true);
    expect(baseline.testName).toBe('bitmovin_research');
    expect(baseline.subjectName).toBe('BitMovin');
    expect(baseline.version).toBe('1');
    expect(baseline.requiredFields.map((field) => field.fieldName)).toEqual([
      'company_name',
      'industry',
      'company_size',
      'headquarters',
      'founded',
    ]);
    expect(baseline.optionalFields).toHaveLength(10);
    expect(baseline.metadata).toEqual({
      company_type: 'SaaS',
      domain: 'video_technology',
      difficulty: 'medium',
    });
  });
});
