/**
 * JSON Report
 *
 * Pure conversion of a test run into plain, JSON-safe data with snake_case
 * keys (the same convention as baseline documents). Backend and field
 * order follow the run; nothing is recomputed.
 */

import type {
  BackendTestResult,
  FieldMatchResult,
  TestExecutionResult,
} from '@profile-eval/validation';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface JsonFieldResult {
  matched: boolean;
  confidence: number;
  expected_value: JsonValue;
  actual_value: JsonValue;
  diagnostic: string | null;
  strategy: string;
}

export interface JsonBackendResult {
  backend_name: string;
  provider_id: string;
  succeeded: boolean;
  wall_time_seconds: number;
  iteration_count: number;
  required_score: number;
  optional_score: number;
  overall_score: number;
  error: string | null;
  field_results: Record<string, JsonFieldResult>;
}

export interface JsonReport {
  test_name: string;
  subject_name: string;
  baseline_version: string;
  baseline_fingerprint: string;
  mean_overall_score: number;
  best_backend: string | null;
  total_wall_time_seconds: number;
  started_at: string;
  completed_at: string;
  backend_results: JsonBackendResult[];
}

const CIRCULAR = '[Circular]';

/**
 * Convert any value a backend produced into JSON-safe data.
 * Non-finite numbers become null, dates ISO strings, bigints strings.
 */
export function toJsonValue(value: unknown): JsonValue {
  return convert(value, new WeakSet<object>());
}

function convert(value: unknown, ancestors: WeakSet<object>): JsonValue {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  // functions, symbols, undefined
  if (typeof value !== 'object' || value === null) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (ancestors.has(value)) return CIRCULAR;

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => convert(item, ancestors));
    }
    const converted: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        converted[key] = convert(entry, ancestors);
      }
    }
    return converted;
  } finally {
    ancestors.delete(value);
  }
}

function toJsonField(field: FieldMatchResult): JsonFieldResult {
  return {
    matched: field.matched,
    confidence: field.confidence,
    expected_value: toJsonValue(field.expectedValue),
    actual_value: toJsonValue(field.actualValue),
    diagnostic: field.diagnostic,
    strategy: field.strategy,
  };
}

function toJsonBackend(result: BackendTestResult): JsonBackendResult {
  const fieldResults: Record<string, JsonFieldResult> = {};
  for (const [fieldName, field] of Object.entries(result.fieldResults)) {
    fieldResults[fieldName] = toJsonField(field);
  }

  return {
    backend_name: result.backendName,
    provider_id: result.providerId,
    succeeded: result.succeeded,
    wall_time_seconds: result.wallTimeSeconds,
    iteration_count: result.iterationCount,
    required_score: result.requiredScore,
    optional_score: result.optionalScore,
    overall_score: result.overallScore,
    error: result.error,
    field_results: fieldResults,
  };
}

export function toJsonReport(result: TestExecutionResult): JsonReport {
  return {
    test_name: result.testName,
    subject_name: result.baseline.subjectName,
    baseline_version: result.baseline.version,
    baseline_fingerprint: result.baseline.fingerprint,
    mean_overall_score: result.meanOverallScore,
    best_backend: result.bestBackend,
    total_wall_time_seconds: result.totalWallTimeSeconds,
    started_at: result.startedAt,
    completed_at: result.completedAt,
    backend_results: result.backendResults.map(toJsonBackend),
  };
}

export function formatJsonReport(result: TestExecutionResult): string {
  return JSON.stringify(toJsonReport(result), null, 2);
}
