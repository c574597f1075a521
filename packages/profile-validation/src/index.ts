/**
 * @profile-eval/validation
 *
 * Validates structured company profiles produced by interchangeable model
 * backends against versioned baselines, and ranks the backends.
 *
 * Core principle: backends extract, expectations match, the runner scores.
 *
 * Features:
 * - Five matching strategies (exact, keyword, fuzzy range, regex, custom)
 * - Per-field confidence and two-tier (required/optional) scoring
 * - Per-backend failure isolation
 * - YAML/JSON baseline documents validated with zod
 *
 * @example
 * ```typescript
 * import { TestRunner, createDefaultRegistry } from '@profile-eval/validation';
 *
 * const registry = createDefaultRegistry();
 * const runner = new TestRunner(runResearchAgent);
 *
 * const result = await runner.runTest(registry.lookup('bitmovin'), backends, {
 *   maxIterations: 15,
 * });
 * console.log(`Best backend: ${result.bestBackend}`);
 * ```
 */

// Expectation Model
export {
  MatchStrategy,
  MATCH_STRATEGIES,
  defineField,
  defineValidator,
} from './expectation';
export type {
  ExpectedValue,
  FieldExpectation,
  FieldExpectationInput,
  FieldValidator,
  ValidatorOutcome,
  ExactExpectation,
  KeywordExpectation,
  FuzzyExpectation,
  RegexExpectation,
  CustomExpectation,
} from './expectation';

// Baselines & Registry
export {
  defineBaseline,
  allExpectations,
  computeBaselineFingerprint,
  DEFAULT_BASELINE_VERSION,
} from './baseline';
export type { TestBaseline, TestBaselineInput } from './baseline';
export { BaselineRegistry } from './registry';
export type { RegisterOptions } from './registry';
export { createDefaultRegistry, BUNDLED_BASELINES_DIR } from './default-registry';
export type { DefaultRegistryOptions } from './default-registry';

// Field Matcher
export {
  matchField,
  buildFieldMatchResult,
  unmatchedFieldResult,
  isMissingValue,
  stringifyValue,
  extractIntegers,
  bigramSimilarity,
  MISSING_REQUIRED_DIAGNOSTIC,
  DEFAULT_RANGE_TOLERANCE,
  DEFAULT_SIMILARITY_TOLERANCE,
} from './matchers';
export type { MatchOutcome, FieldMatchResult } from './matchers';

// Test Runner & Scoring
export { TestRunner, runTest, NO_STRUCTURED_OUTPUT_DIAGNOSTIC } from './test-runner';
export type { BackendTestResult, TestExecutionResult, RunOptions } from './test-runner';
export {
  computeBackendScores,
  aggregateBackendResults,
  getConfidenceLevel,
  SCORE_WEIGHTS,
} from './scoring';
export type { BackendScores, AggregateScores } from './scoring';

// Backends
export type {
  BackendConfig,
  BackendExecutor,
  BackendRunRequest,
  BackendRunOutput,
  StructuredProfile,
} from './executor';
export { createReplayExecutor } from './executors/replay';
export type { RecordedRuns } from './executors/replay';

// Documents
export { parseBaselineDocument, parseBackendConfigs, parseRecordedRuns } from './schema';
export type { BaselineDocument, DocumentFormat, ParseBaselineOptions } from './schema';
export {
  loadBaselineFile,
  loadBaselineDirectory,
  loadBackendConfigs,
  loadRecordedRuns,
} from './loader';

// Configuration
export { config, loadEvaluationConfig, validateConfig } from './config';
export type { EvaluationConfig, RunDefaults } from './config';

// Errors
export {
  ConfigurationError,
  DuplicateNameError,
  NotFoundError,
  BackendExecutionError,
  BackendTimeoutError,
  ValidatorError,
} from './errors';
