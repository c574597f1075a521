/**
 * Text Report
 *
 * Human-readable summary of a test run for terminals and CI logs.
 * Presentation only: scores come from the run as they are.
 */

import {
  getConfidenceLevel,
  stringifyValue,
  type BackendTestResult,
  type FieldMatchResult,
  type TestExecutionResult,
} from '@profile-eval/validation';

export interface TextReportOptions {
  /** Field issues listed per backend before truncating (default: 5) */
  maxIssues?: number;

  /** Matched fields below this confidence are listed as issues (default: 0.8) */
  lowConfidenceThreshold?: number;
}

const DEFAULT_OPTIONS: Required<TextReportOptions> = {
  maxIssues: 5,
  lowConfidenceThreshold: 0.8,
};

const INDENT = '   ';

function formatPercent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function formatValue(value: unknown): string {
  return value === null || value === undefined ? 'none' : stringifyValue(value);
}

/**
 * Fields that did not match, or matched below the threshold
 */
function isIssue(field: FieldMatchResult, threshold: number): boolean {
  return !field.matched || field.confidence < threshold;
}

function describeField(field: FieldMatchResult): string {
  return (
    `${field.matched ? '✅' : '❌'} ${field.fieldName}: ` +
    `${Math.round(field.confidence * 100)}% confidence ` +
    `(expected: ${formatValue(field.expectedValue)}, got: ${formatValue(field.actualValue)})`
  );
}

function renderBackend(result: BackendTestResult, options: Required<TextReportOptions>): string[] {
  const lines = [
    `${result.succeeded ? '✅' : '❌'} ${result.backendName} [${result.providerId}]`,
    `${INDENT}Overall: ${formatPercent(result.overallScore)} (${getConfidenceLevel(result.overallScore)})` +
      ` | Required: ${formatPercent(result.requiredScore)}` +
      ` | Optional: ${formatPercent(result.optionalScore)}`,
    `${INDENT}Time: ${result.wallTimeSeconds.toFixed(2)}s | Iterations: ${result.iterationCount}`,
  ];

  if (result.error) {
    lines.push(`${INDENT}Error: ${result.error}`);
  }

  const issues = Object.values(result.fieldResults)
    .filter((field) => isIssue(field, options.lowConfidenceThreshold))
    .map(describeField);

  if (issues.length > 0) {
    lines.push(`${INDENT}Field issues:`);
    for (const issue of issues.slice(0, options.maxIssues)) {
      lines.push(`${INDENT}  ${issue}`);
    }
    if (issues.length > options.maxIssues) {
      lines.push(`${INDENT}  ... and ${issues.length - options.maxIssues} more issues`);
    }
  }

  return lines;
}

export function formatTextReport(result: TestExecutionResult, options: TextReportOptions = {}): string {
  const resolved: Required<TextReportOptions> = { ...DEFAULT_OPTIONS, ...options };

  const lines = [
    `=== ${result.testName}: ${result.baseline.subjectName} (baseline v${result.baseline.version}) ===`,
    `Mean overall score: ${formatPercent(result.meanOverallScore)}`,
    `Best backend: ${result.bestBackend ?? 'none'}`,
    `Total time: ${result.totalWallTimeSeconds.toFixed(2)}s`,
  ];

  for (const backend of result.backendResults) {
    lines.push('', ...renderBackend(backend, resolved));
  }

  return lines.join('\n');
}
