/**
 * Test Runner
 *
 * Runs one baseline against every configured backend, matches each field,
 * and scores the backends so they can be ranked.
 *
 * Failures are isolated per backend: a throwing, erroring or timed-out
 * backend becomes a failed BackendTestResult and never aborts the run.
 * Results keep the input backend order regardless of concurrency.
 */

import { allExpectations, type TestBaseline } from './baseline';
import { config } from './config';
import {
  BackendExecutionError,
  BackendTimeoutError,
  ConfigurationError,
  errorMessage,
} from './errors';
import type {
  BackendConfig,
  BackendExecutor,
  BackendRunOutput,
  BackendRunRequest,
  StructuredProfile,
} from './executor';
import { buildFieldMatchResult, unmatchedFieldResult, type FieldMatchResult } from './matchers';
import { aggregateBackendResults, computeBackendScores } from './scoring';

export const NO_STRUCTURED_OUTPUT_DIAGNOSTIC = 'no structured output returned';

const NO_FIELD_RESULTS: Readonly<Record<string, FieldMatchResult>> = Object.freeze({});

/**
 * Result of one backend against the baseline
 */
export interface BackendTestResult {
  backendName: string;
  providerId: string;
  /** Backend reported success AND returned a structured profile */
  succeeded: boolean;
  wallTimeSeconds: number;
  iterationCount: number;
  /** Keyed by field name, in baseline order */
  fieldResults: Readonly<Record<string, FieldMatchResult>>;
  requiredScore: number;
  optionalScore: number;
  overallScore: number;
  rawOutput: string;
  error: string | null;
}

/**
 * Complete run across all backends
 */
export interface TestExecutionResult {
  testName: string;
  baseline: TestBaseline;
  backendResults: readonly BackendTestResult[];
  totalWallTimeSeconds: number;
  bestBackend: string | null;
  meanOverallScore: number;
  startedAt: string;
  completedAt: string;
}

/**
 * Run options
 */
export interface RunOptions {
  /** Iteration ceiling forwarded to each backend (default from env or 10) */
  maxIterations: number;

  /** Forwarded to each backend; also enables progress logging */
  verbose: boolean;

  /** Maximum backends running at once (default from env or 4) */
  concurrency: number;

  /** Wall-clock limit per backend in ms (default: none) */
  timeoutMs?: number;
}

const DEFAULT_OPTIONS: RunOptions = {
  maxIterations: config.run.maxIterations,
  verbose: config.run.verbose,
  concurrency: config.run.concurrency,
  timeoutMs: config.run.backendTimeoutMs,
};

export class TestRunner {
  private defaults: RunOptions;

  constructor(
    private readonly executor: BackendExecutor,
    defaults: Partial<RunOptions> = {}
  ) {
    this.defaults = { ...DEFAULT_OPTIONS, ...defaults };
  }

  /**
   * Run a baseline across all backends.
   * Only malformed options throw; everything that goes wrong inside a
   * backend is reported in the result. A backend listed more than once
   * runs once per entry (e.g. to measure variance).
   */
  async runTest(
    baseline: TestBaseline,
    backends: readonly BackendConfig[],
    options: Partial<RunOptions> = {}
  ): Promise<TestExecutionResult> {
    const runOptions: RunOptions = { ...this.defaults, ...options };
    this.assertRunnable(runOptions);

    const startedAt = new Date();
    const start = performance.now();

    const backendResults = await runPool(backends.length, runOptions.concurrency, (index) =>
      this.runBackend(baseline, backends[index], runOptions)
    );

    const { meanOverallScore, bestBackend } = aggregateBackendResults(backendResults);

    return Object.freeze({
      testName: baseline.testName,
      baseline,
      backendResults: Object.freeze(backendResults),
      totalWallTimeSeconds: (performance.now() - start) / 1000,
      bestBackend,
      meanOverallScore,
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
    });
  }

  /**
   * Execute and score a single backend. Never rejects.
   */
  private async runBackend(
    baseline: TestBaseline,
    backend: BackendConfig,
    options: RunOptions
  ): Promise<BackendTestResult> {
    const start = performance.now();
    const elapsedSeconds = () => (performance.now() - start) / 1000;

    if (options.verbose) {
      console.log(
        `[TestRunner] Running '${baseline.testName}' on ${backend.name} (${backend.providerId})`
      );
    }

    let result: BackendTestResult;
    try {
      const output = await this.invoke(backend, baseline.subjectName, options);
      if (output.error) {
        throw new BackendExecutionError(backend.name, output.error);
      }
      result = this.scoreOutput(baseline, backend, output, elapsedSeconds);
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[TestRunner] Backend ${backend.name} failed: ${message}`);
      return this.failedResult(backend, message, elapsedSeconds());
    }

    if (options.verbose) {
      console.log(
        `[TestRunner] ${backend.name} scored ${(result.overallScore * 100).toFixed(1)}% ` +
          `(required ${(result.requiredScore * 100).toFixed(1)}%, optional ${(result.optionalScore * 100).toFixed(1)}%)`
      );
    }

    return result;
  }

  /**
   * Read, match and score one backend's output.
   * Anything thrown here (e.g. a failing getter on the profile) fails only this backend.
   */
  private scoreOutput(
    baseline: TestBaseline,
    backend: BackendConfig,
    output: BackendRunOutput,
    elapsedSeconds: () => number
  ): BackendTestResult {
    const profile = readProfile(output.profile);
    const fieldResults = this.matchProfile(baseline, profile);
    const scores = computeBackendScores(baseline, fieldResults);

    return Object.freeze({
      backendName: backend.name,
      providerId: backend.providerId,
      succeeded: output.succeeded === true && profile !== null,
      wallTimeSeconds: isNonNegative(output.wallTimeSeconds) ? output.wallTimeSeconds : elapsedSeconds(),
      iterationCount: isNonNegative(output.iterationCount) ? Math.floor(output.iterationCount) : 0,
      fieldResults,
      ...scores,
      rawOutput: typeof output.rawOutput === 'string' ? output.rawOutput : '',
      error: null,
    });
  }

  /**
   * Call the executor, enforcing the wall-clock limit when one is set
   */
  private async invoke(
    backend: BackendConfig,
    subjectName: string,
    options: RunOptions
  ): Promise<BackendRunOutput> {
    const controller = new AbortController();
    const request: BackendRunRequest = {
      backend,
      subjectName,
      maxIterations: options.maxIterations,
      verbose: options.verbose,
      signal: controller.signal,
    };

    const execution = Promise.resolve().then(() => this.executor(request));
    const output = await withTimeout(execution, options.timeoutMs, () => {
      controller.abort();
      return new BackendTimeoutError(backend.name, options.timeoutMs ?? 0);
    });

    if (!output || typeof output !== 'object') {
      throw new BackendExecutionError(backend.name, `Backend ${backend.name} returned no result`);
    }
    return output;
  }

  /**
   * Match every expectation against the profile, in baseline order
   */
  private matchProfile(
    baseline: TestBaseline,
    profile: StructuredProfile | null
  ): Readonly<Record<string, FieldMatchResult>> {
    const entries = allExpectations(baseline).map((expectation): [string, FieldMatchResult] => {
      if (profile === null) {
        return [expectation.fieldName, unmatchedFieldResult(expectation, NO_STRUCTURED_OUTPUT_DIAGNOSTIC)];
      }
      const actual = readField(profile, expectation.fieldName);
      return [expectation.fieldName, buildFieldMatchResult(expectation, actual)];
    });
    return Object.freeze(Object.fromEntries(entries));
  }

  private failedResult(
    backend: BackendConfig,
    message: string,
    wallTimeSeconds: number
  ): BackendTestResult {
    return Object.freeze({
      backendName: backend.name,
      providerId: backend.providerId,
      succeeded: false,
      wallTimeSeconds,
      iterationCount: 0,
      fieldResults: NO_FIELD_RESULTS,
      requiredScore: 0,
      optionalScore: 0,
      overallScore: 0,
      rawOutput: '',
      error: message,
    });
  }

  private assertRunnable(options: RunOptions): void {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new ConfigurationError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ConfigurationError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
      throw new ConfigurationError(`timeoutMs must be positive, got ${options.timeoutMs}`);
    }
  }
}

function readProfile(profile: StructuredProfile | null | undefined): StructuredProfile | null {
  if (!profile || typeof profile !== 'object' || Array.isArray(profile)) {
    return null;
  }
  return profile;
}

/**
 * Value of a profile field, own or inherited (accessor-based profiles);
 * names that only exist on Object.prototype count as missing
 */
function readField(profile: StructuredProfile, fieldName: string): unknown {
  if (Object.prototype.hasOwnProperty.call(profile, fieldName)) {
    return profile[fieldName];
  }
  if (fieldName in profile && !(fieldName in Object.prototype)) {
    return profile[fieldName];
  }
  return null;
}

function isNonNegative(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Race a promise against a timer; the timer's error wins if it fires first
 */
async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs === undefined) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    if (error instanceof BackendTimeoutError) {
      const { backendName } = error;
      promise.catch((late: unknown) => {
        console.warn(`[TestRunner] ${backendName} failed after timing out: ${errorMessage(late)}`);
      });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `count` tasks with at most `limit` in flight.
 * Each result lands in the slot of its index.
 */
async function runPool<T>(
  count: number,
  limit: number,
  task: (index: number) => Promise<T>
): Promise<T[]> {
  const results = new Array<T>(count);
  let next = 0;

  const workers = Array.from({ length: Math.min(limit, count) }, async () => {
    while (next < count) {
      const index = next++;
      results[index] = await task(index);
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Convenience: run a baseline with a one-off runner
 */
export function runTest(
  executor: BackendExecutor,
  baseline: TestBaseline,
  backends: readonly BackendConfig[],
  options: Partial<RunOptions> = {}
): Promise<TestExecutionResult> {
  return new TestRunner(executor).runTest(baseline, backends, options);
}
