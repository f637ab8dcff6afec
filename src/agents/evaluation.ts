import { z } from 'zod';

/**
 * One critic verdict. `passed` is whatever the critic claimed; the quality
 * loop recomputes the real decision from `score` and the floors.
 */
export interface EvaluationResult {
  readonly score: number;
  readonly passed: boolean;
  readonly feedback: string;
  readonly criteriaScores: Readonly<Record<string, number>>;
  readonly criteriaWeights: Readonly<Record<string, number>>;
}

export const CRITIC_FALLBACK_FEEDBACK = 'Critic evaluation failed; auto-passed.';

export const MIN_SCORE = 1.0;
export const MAX_SCORE = 10.0;

export function createEvaluation(init: {
  score: number;
  passed?: boolean;
  feedback?: string;
  criteriaScores?: Record<string, number>;
  criteriaWeights?: Record<string, number>;
}): EvaluationResult {
  return Object.freeze({
    score: init.score,
    passed: init.passed ?? false,
    feedback: init.feedback ?? '',
    criteriaScores: Object.freeze({ ...(init.criteriaScores ?? {}) }),
    criteriaWeights: Object.freeze({ ...(init.criteriaWeights ?? {}) }),
  });
}

/**
 * Evaluation substituted when the critic call or its output fails.
 */
export function fallbackEvaluation(qualityThreshold: number): EvaluationResult {
  return createEvaluation({ score: qualityThreshold, passed: true, feedback: CRITIC_FALLBACK_FEEDBACK });
}

/**
 * Strip a surrounding ``` fence (with or without a language tag).
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) {
    return text;
  }

  let lines = text.split('\n').slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === '```') {
    lines = lines.slice(0, -1);
  }
  return lines.join('\n');
}

/**
 * Parse a JSON payload the model may have wrapped in a code fence.
 */
export function parseJsonPayload(raw: string): unknown {
  return JSON.parse(stripCodeFence(raw));
}

const scoreMap = z.record(z.coerce.number().finite());

const evaluationPayloadSchema = z.object({
  score: z.coerce.number().finite(),
  passed: z.boolean().optional(),
  feedback: z.string().optional(),
  criteria_scores: scoreMap.optional(),
  criteria_weights: scoreMap.optional(),
});

/**
 * Parse critic output into an EvaluationResult. Throws on malformed JSON or
 * a missing score.
 */
export function parseEvaluation(raw: string): EvaluationResult {
  const payload = evaluationPayloadSchema.parse(parseJsonPayload(raw));
  return createEvaluation({
    score: Math.min(MAX_SCORE, Math.max(MIN_SCORE, payload.score)),
    passed: payload.passed,
    feedback: payload.feedback,
    criteriaScores: payload.criteria_scores,
    criteriaWeights: payload.criteria_weights,
  });
}

/**
 * Criteria whose score is present and strictly below its floor.
 */
export function floorViolations(
  evaluation: EvaluationResult,
  floors: Readonly<Record<string, number>>
): string[] {
  return Object.entries(floors)
    .filter(([criterion, floor]) => {
      const value = evaluation.criteriaScores[criterion];
      return value !== undefined && value < floor;
    })
    .map(([criterion]) => criterion);
}
