/**
 * Evaluation Configuration
 *
 * Environment-based defaults for test runs.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Load environment variables from root .env
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenvConfig({ path: resolve(__dirname, '../../../.env') });

export interface RunDefaults {
  /** Iteration ceiling handed to each backend (advisory) */
  maxIterations: number;
  verbose: boolean;
  /** Backends run at the same time */
  concurrency: number;
  /** Wall-clock limit per backend; undefined = none */
  backendTimeoutMs?: number;
}

export interface EvaluationConfig {
  run: RunDefaults;

  /** YAML/JSON list of backend configurations */
  backendsFile?: string;

  /** Extra directory of baseline documents */
  baselinesDir?: string;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

export function loadEvaluationConfig(env: NodeJS.ProcessEnv = process.env): EvaluationConfig {
  return {
    run: {
      maxIterations: parseInt(env.EVAL_MAX_ITERATIONS || '10', 10),
      verbose: env.EVAL_VERBOSE === 'true',
      concurrency: parseInt(env.EVAL_CONCURRENCY || '4', 10),
      backendTimeoutMs: parseOptionalInt(env.EVAL_BACKEND_TIMEOUT_MS),
    },
    backendsFile: env.EVAL_BACKENDS_FILE || undefined,
    baselinesDir: env.EVAL_BASELINES_DIR || undefined,
  };
}

export const config: EvaluationConfig = loadEvaluationConfig();

/**
 * Validate configuration
 */
export function validateConfig(cfg: EvaluationConfig = config): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.run.maxIterations) || cfg.run.maxIterations < 1) {
    errors.push('Iteration ceiling must be a positive integer (EVAL_MAX_ITERATIONS)');
  }

  if (!Number.isInteger(cfg.run.concurrency) || cfg.run.concurrency < 1) {
    errors.push('Concurrency must be a positive integer (EVAL_CONCURRENCY)');
  }

  if (
    cfg.run.backendTimeoutMs !== undefined &&
    (!Number.isFinite(cfg.run.backendTimeoutMs) || cfg.run.backendTimeoutMs <= 0)
  ) {
    errors.push('Backend timeout must be a positive number of milliseconds (EVAL_BACKEND_TIMEOUT_MS)');
  }

  if (!cfg.backendsFile) {
    console.warn('[Config] EVAL_BACKENDS_FILE not set - backends must be passed in code');
  }

  return errors;
}
