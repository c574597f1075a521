/**
 * Document & Configuration Tests
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  MatchStrategy,
  defineValidator,
  parseBaselineDocument,
  parseBackendConfigs,
  parseRecordedRuns,
  loadBaselineFile,
  loadBaselineDirectory,
  loadBackendConfigs,
  loadRecordedRuns,
  loadEvaluationConfig,
  validateConfig,
  BaselineRegistry,
  ConfigurationError,
} from './index';
import { formatForPath } from './loader';

const ACME_YAML = `
test_name: acme_research
aliases: [acme]
subject_name: Acme
version: 2
required_fields:
  - field_name: founded
    strategy: custom
    validator: founding_year
    expected_value: 2013
optional_fields:
  - field_name: website
    strategy: regex
    regex_pattern: '^https?://'
metadata:
  difficulty: easy
`;

const foundingYear = defineValidator('founding_year', (actual) => actual === 2013);

describe('profile-validation:schema:baseline', () => {
  it('should build a baseline from YAML', () => {
    const { baseline, aliases } = parseBaselineDocument(ACME_YAML, { validators: [foundingYear] });

    expect(aliases).toEqual(['acme']);
    expect(baseline.testName).toBe('acme_research');
    expect(baseline.version).toBe('2');
    expect(baseline.metadata).toEqual({ difficulty: 'easy' });
    expect(baseline.requiredFields[0]).toMatchObject({
      fieldName: 'founded',
      strategy: MatchStrategy.CUSTOM,
      expectedValue: 2013,
      required: true,
      validator: foundingYear,
    });
    expect(baseline.optionalFields[0]).toMatchObject({
      fieldName: 'website',
      strategy: MatchStrategy.REGEX,
      regexPattern: '^https?://',
      required: false,
    });
  });

  it('should build a baseline from JSON', () => {
    const json = JSON.stringify({
      test_name: 'acme_research',
      subject_name: 'Acme',
      required_fields: [{ field_name: 'industry', strategy: 'keyword', keywords: ['video'] }],
    });
    const { baseline, aliases } = parseBaselineDocument(json, { format: 'json' });

    expect(aliases).toEqual([]);
    expect(baseline.version).toBe('1');
    expect(baseline.optionalFields).toEqual([]);
  });

  it('should reject a reference to an unknown validator', () => {
    expect(() => parseBaselineDocument(ACME_YAML)).toThrow(
      "Invalid baseline document: field 'founded' references unknown validator 'founding_year'"
    );
  });

  it('should report schema problems with their path', () => {
    const doc = ACME_YAML.replace('strategy: custom', 'strategy: semantic');
    expect(() => parseBaselineDocument(doc, { validators: [foundingYear] })).toThrow(
      /^Invalid baseline document: required_fields\.0\.strategy: /
    );
  });

  it('should reject unknown keys', () => {
    const doc = ACME_YAML.replace('version: 2', 'version: 2\nweight: 3');
    expect(() => parseBaselineDocument(doc, { validators: [foundingYear] })).toThrow(ConfigurationError);
  });

  it('should report unparseable text', () => {
    expect(() => parseBaselineDocument('{', { format: 'json', source: 'acme.json' })).toThrow(
      /^Invalid JSON in acme\.json: /
    );
  });

  it('should apply field definition rules', () => {
    const doc = `
test_name: acme_research
subject_name: Acme
required_fields:
  - field_name: industry
    strategy: keyword
`;
    expect(() => parseBaselineDocument(doc)).toThrow("Field 'industry': keyword strategy requires keywords");
  });
});

describe('profile-validation:schema:backends', () => {
  it('should accept a wrapped backend list', () => {
    const yaml = `
backends:
  - name: alpha
    provider_id: model-a
    connection_params:
      temperature: 0
  - name: beta
    provider_id: model-b
`;
    expect(parseBackendConfigs(yaml)).toEqual([
      { name: 'alpha', providerId: 'model-a', connectionParams: { temperature: 0 } },
      { name: 'beta', providerId: 'model-b', connectionParams: {} },
    ]);
  });

  it('should accept a bare JSON list', () => {
    const json = JSON.stringify([{ name: 'alpha', provider_id: 'model-a' }]);
    expect(parseBackendConfigs(json, 'json')).toEqual([
      { name: 'alpha', providerId: 'model-a', connectionParams: {} },
    ]);
  });

  it('should reject duplicate backend names', () => {
    const yaml = `
- name: alpha
  provider_id: model-a
- name: alpha
  provider_id: model-b
`;
    expect(() => parseBackendConfigs(yaml)).toThrow(
      "Invalid backend configuration: backend 'alpha' is listed more than once"
    );
  });
});

describe('profile-validation:schema:recordings', () => {
  it('should read recorded runs keyed by backend', () => {
    const json = JSON.stringify({
      runs: {
        alpha: {
          succeeded: true,
          wall_time_seconds: 4.2,
          iteration_count: 6,
          profile: { company_name: 'Acme' },
        },
        beta: { succeeded: false, error: 'quota exceeded' },
      },
    });
    const runs = parseRecordedRuns(json);

    expect([...runs.keys()]).toEqual(['alpha', 'beta']);
    expect(runs.get('alpha')).toEqual({
      succeeded: true,
      wallTimeSeconds: 4.2,
      iterationCount: 6,
      rawOutput: '',
      profile: { company_name: 'Acme' },
    });
    expect(runs.get('beta')).toMatchObject({ succeeded: false, profile: null, error: 'quota exceeded' });
  });

  it('should reject negative iteration counts', () => {
    const json = JSON.stringify({ runs: { alpha: { succeeded: true, iteration_count: -1 } } });
    expect(() => parseRecordedRuns(json)).toThrow(/^Invalid recorded runs: runs\.alpha\.iteration_count: /);
  });
});

describe('profile-validation:loader', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'profile-eval-'));
    writeFileSync(join(dir, 'acme.yaml'), ACME_YAML);
    writeFileSync(
      join(dir, 'backends.json'),
      JSON.stringify({ backends: [{ name: 'alpha', provider_id: 'model-a' }] })
    );
    writeFileSync(join(dir, 'notes.txt'), 'ignored');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should pick the format from the extension', () => {
    expect(formatForPath('a.YML')).toBe('yaml');
    expect(formatForPath('a.json')).toBe('json');
    expect(() => formatForPath('a.txt')).toThrow(ConfigurationError);
  });

  it('should load a baseline file', () => {
    const { baseline } = loadBaselineFile(join(dir, 'acme.yaml'), { validators: [foundingYear] });
    expect(baseline.subjectName).toBe('Acme');
  });

  it('should report unreadable files', () => {
    expect(() => loadBaselineFile(join(dir, 'missing.yaml'))).toThrow(/\(ENOENT\)$/);
  });

  it('should register only baseline documents from a directory', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const baselinesDir = mkdtempSync(join(dir, 'baselines-'));
    writeFileSync(join(baselinesDir, 'acme.yaml'), ACME_YAML);
    writeFileSync(join(baselinesDir, 'README.md'), '# baselines');

    const registry = new BaselineRegistry();
    const names = loadBaselineDirectory(baselinesDir, registry, { validators: [foundingYear] });

    expect(names).toEqual(['acme_research']);
    expect(registry.lookup('acme').testName).toBe('acme_research');
    expect(console.log).toHaveBeenCalledWith(`[BaselineRegistry] Loaded 1 baseline(s) from ${baselinesDir}`);
  });

  it('should load backend lists and recordings', () => {
    expect(loadBackendConfigs(join(dir, 'backends.json'))).toEqual([
      { name: 'alpha', providerId: 'model-a', connectionParams: {} },
    ]);

    const recordings = join(dir, 'runs.yaml');
    writeFileSync(recordings, 'runs:\n  alpha:\n    succeeded: true\n');
    expect(loadRecordedRuns(recordings).get('alpha')?.succeeded).toBe(true);
  });
});

describe('profile-validation:config', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use defaults when nothing is set', () => {
    expect(loadEvaluationConfig({})).toEqual({
      run: { maxIterations: 10, verbose: false, concurrency: 4, backendTimeoutMs: undefined },
      backendsFile: undefined,
      baselinesDir: undefined,
    });
  });

  it('should read settings from the environment', () => {
    const cfg = loadEvaluationConfig({
      EVAL_MAX_ITERATIONS: '15',
      EVAL_VERBOSE: 'true',
      EVAL_CONCURRENCY: '2',
      EVAL_BACKEND_TIMEOUT_MS: '30000',
      EVAL_BACKENDS_FILE: 'backends.yaml',
      EVAL_BASELINES_DIR: './baselines',
    });

    expect(cfg.run).toEqual({ maxIterations: 15, verbose: true, concurrency: 2, backendTimeoutMs: 30000 });
    expect(cfg.backendsFile).toBe('backends.yaml');
    expect(cfg.baselinesDir).toBe('./baselines');
  });

  it('should report invalid settings', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cfg = loadEvaluationConfig({ EVAL_MAX_ITERATIONS: 'many', EVAL_CONCURRENCY: '0' });

    expect(validateConfig(cfg)).toEqual([
      'Iteration ceiling must be a positive integer (EVAL_MAX_ITERATIONS)',
      'Concurrency must be a positive integer (EVAL_CONCURRENCY)',
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      '[Config] EVAL_BACKENDS_FILE not set - backends must be passed in code'
    );
  });

  it('should accept a complete configuration', () => {
    const cfg = loadEvaluationConfig({ EVAL_BACKENDS_FILE: 'backends.yaml', EVAL_BACKEND_TIMEOUT_MS: '5000' });
    expect(validateConfig(cfg)).toEqual([]);
  });
});
