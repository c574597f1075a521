/**
 * Document Schemas
 *
 * Baselines, backend lists and recorded runs can be written as YAML or
 * JSON documents with snake_case keys. Every document is validated with
 * zod before it is turned into the typed model; problems surface as
 * ConfigurationError at load time.
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import { parse as parseYaml } from 'yaml';
import { defineBaseline, type TestBaseline } from './baseline';
import { ConfigurationError, errorMessage } from './errors';
import type { BackendConfig, BackendRunOutput } from './executor';
import {
  assertNever,
  MatchStrategy,
  type FieldExpectationInput,
  type FieldValidator,
} from './expectation';

export type DocumentFormat = 'yaml' | 'json';

const zExpectedValue = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.union([z.string(), z.number()])),
]);

const zFieldDocument = z
  .object({
    field_name: z.string().trim().min(1),
    strategy: z.nativeEnum(MatchStrategy),
    expected_value: zExpectedValue.nullish(),
    required: z.boolean().optional(),
    keywords: z.array(z.string()).optional(),
    fuzzy_tolerance: z.number().min(0).max(1).optional(),
    regex_pattern: z.string().optional(),
    validator: z.string().trim().min(1).optional(),
    description: z.string().optional(),
  })
  .strict();

const zBaselineDocument = z
  .object({
    test_name: z.string().trim().min(1),
    aliases: z.array(z.string().trim().min(1)).default([]),
    subject_name: z.string().trim().min(1),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    description: z.string().default(''),
    required_fields: z.array(zFieldDocument),
    optional_fields: z.array(zFieldDocument).default([]),
    metadata: z.record(z.unknown()).default({}),
  })
  .strict();

const zBackendConfig = z
  .object({
    name: z.string().trim().min(1),
    provider_id: z.string().trim().min(1),
    connection_params: z.record(z.unknown()).default({}),
  })
  .strict();

const zBackendList = z.union([
  z.array(zBackendConfig),
  z.object({ backends: z.array(zBackendConfig) }).transform((doc) => doc.backends),
]);

const zRecordedRun = z
  .object({
    succeeded: z.boolean(),
    wall_time_seconds: z.number().nonnegative().default(0),
    iteration_count: z.number().int().nonnegative().default(0),
    raw_output: z.string().default(''),
    profile: z.record(z.unknown()).nullable().default(null),
    error: z.string().optional(),
  })
  .strict();

const zRecordingDocument = z.object({
  runs: z.record(zRecordedRun),
});

type FieldDocument = z.infer<typeof zFieldDocument>;

export interface BaselineDocument {
  baseline: TestBaseline;
  aliases: string[];
}

export interface ParseBaselineOptions {
  format?: DocumentFormat;
  /** Validators that CUSTOM fields may reference by name */
  validators?: Iterable<FieldValidator>;
  /** Shown in error messages */
  source?: string;
}

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseDocument<S extends ZodTypeAny>(
  text: string,
  format: DocumentFormat,
  schema: S,
  source: string
): z.output<S> {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${format.toUpperCase()} in ${source}: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Parse a baseline document and build its baseline
 */
export function parseBaselineDocument(
  text: string,
  options: ParseBaselineOptions = {}
): BaselineDocument {
  const source = options.source ?? 'baseline document';
  const doc = parseDocument(text, options.format ?? 'yaml', zBaselineDocument, source);

  const validators = new Map<string, FieldValidator>();
  for (const validator of options.validators ?? []) {
    validators.set(validator.name, validator);
  }

  const toInput = (field: FieldDocument) => toFieldInput(field, validators, source);

  const baseline = defineBaseline({
    testName: doc.test_name,
    subjectName: doc.subject_name,
    description: doc.description,
    version: doc.version,
    requiredFields: doc.required_fields.map(toInput),
    optionalFields: doc.optional_fields.map(toInput),
    metadata: doc.metadata,
  });

  return { baseline, aliases: doc.aliases };
}

function toFieldInput(
  field: FieldDocument,
  validators: ReadonlyMap<string, FieldValidator>,
  source: string
): FieldExpectationInput {
  const common = {
    fieldName: field.field_name,
    expectedValue: field.expected_value ?? undefined,
    required: field.required,
    description: field.description,
  };

  switch (field.strategy) {
    case MatchStrategy.EXACT:
      return { ...common, strategy: MatchStrategy.EXACT };
    case MatchStrategy.KEYWORD:
      return { ...common, strategy: MatchStrategy.KEYWORD, keywords: field.keywords ?? [] };
    case MatchStrategy.FUZZY:
      return { ...common, strategy: MatchStrategy.FUZZY, fuzzyTolerance: field.fuzzy_tolerance };
    case MatchStrategy.REGEX:
      return { ...common, strategy: MatchStrategy.REGEX, regexPattern: field.regex_pattern ?? '' };
    case MatchStrategy.CUSTOM: {
      const validator = field.validator ? validators.get(field.validator) : undefined;
      if (!validator) {
        throw new ConfigurationError(
          `Invalid ${source}: field '${field.field_name}' references unknown validator '${field.validator ?? ''}'`
        );
      }
      return { ...common, strategy: MatchStrategy.CUSTOM, validator };
    }
    default:
      return assertNever(field.strategy);
  }
}

/**
 * Parse a list of backend configurations (a bare list or `{ backends: [...] }`)
 */
export function parseBackendConfigs(
  text: string,
  format: DocumentFormat = 'yaml',
  source = 'backend configuration'
): BackendConfig[] {
  const entries = parseDocument(text, format, zBackendList, source);

  const names = new Set<string>();
  return entries.map((entry) => {
    if (names.has(entry.name)) {
      throw new ConfigurationError(`Invalid ${source}: backend '${entry.name}' is listed more than once`);
    }
    names.add(entry.name);
    return {
      name: entry.name,
      providerId: entry.provider_id,
      connectionParams: entry.connection_params,
    };
  });
}

/**
 * Parse recorded backend runs, keyed by backend name
 */
export function parseRecordedRuns(
  text: string,
  format: DocumentFormat = 'json',
  source = 'recorded runs'
): Map<string, BackendRunOutput> {
  const doc = parseDocument(text, format, zRecordingDocument, source);

  const runs = new Map<string, BackendRunOutput>();
  for (const [backendName, run] of Object.entries(doc.runs)) {
    runs.set(backendName, {
      succeeded: run.succeeded,
      wallTimeSeconds: run.wall_time_seconds,
      iterationCount: run.iteration_count,
      rawOutput: run.raw_output,
      profile: run.profile,
      error: run.error,
    });
  }
  return runs;
}
