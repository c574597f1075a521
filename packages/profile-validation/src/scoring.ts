/**
 * Scoring
 *
 * Turns per-field match results into per-backend scores, and per-backend
 * scores into run-level aggregates.
 */

import type { TestBaseline } from './baseline';
import type { FieldMatchResult } from './matchers';

/**
 * Weights for combining the two tiers (sum to 1)
 */
export const SCORE_WEIGHTS = {
  required: 0.7,
  optional: 0.3,
} as const;

export interface BackendScores {
  /** Mean confidence over required fields (1 when there are none) */
  requiredScore: number;
  /** Confidence of present optional fields over all optional fields */
  optionalScore: number;
  /** 0.7 * required + 0.3 * optional */
  overallScore: number;
}

export interface ScoredBackend {
  backendName: string;
  overallScore: number;
}

export interface AggregateScores {
  meanOverallScore: number;
  /** Highest overall score; ties go to the earliest backend */
  bestBackend: string | null;
}

/**
 * Calculate the two-tier scores for one backend
 */
export function computeBackendScores(
  baseline: TestBaseline,
  fieldResults: Readonly<Record<string, FieldMatchResult>>
): BackendScores {
  const confidenceOf = (fieldName: string): number => fieldResults[fieldName]?.confidence ?? 0;

  const requiredScore =
    baseline.requiredFields.length > 0
      ? baseline.requiredFields.reduce((sum, field) => sum + confidenceOf(field.fieldName), 0) /
        baseline.requiredFields.length
      : 1;

  let optionalScore = 0;
  if (baseline.optionalFields.length > 0) {
    const present = baseline.optionalFields.filter((field) => {
      const result = fieldResults[field.fieldName];
      return result !== undefined && result.actualValue !== null && result.actualValue !== undefined;
    });
    optionalScore =
      present.reduce((sum, field) => sum + confidenceOf(field.fieldName), 0) /
      baseline.optionalFields.length;
  }

  return {
    requiredScore,
    optionalScore,
    overallScore: SCORE_WEIGHTS.required * requiredScore + SCORE_WEIGHTS.optional * optionalScore,
  };
}

/**
 * Mean and best backend across a run
 */
export function aggregateBackendResults(results: readonly ScoredBackend[]): AggregateScores {
  if (results.length === 0) {
    return { meanOverallScore: 0, bestBackend: null };
  }

  let best = results[0];
  let total = 0;
  for (const result of results) {
    total += result.overallScore;
    if (result.overallScore > best.overallScore) {
      best = result;
    }
  }

  return {
    meanOverallScore: total / results.length,
    bestBackend: best.backendName,
  };
}

/**
 * Get human-readable confidence level
 */
export function getConfidenceLevel(score: number): 'high' | 'medium' | 'low' | 'very_low' {
  if (score >= 0.8) return 'high';
  if (score >= 0.6) return 'medium';
  if (score >= 0.4) return 'low';
  return 'very_low';
}
