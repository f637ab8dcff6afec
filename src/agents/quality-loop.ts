/**
 * Quality Loop
 *
 * Drives generate -> parse -> critique -> gate-check cycles between a
 * generator role and a critic role. The best-scoring attempt is kept, and the
 * loop stops early as soon as an attempt clears both the threshold and every
 * criterion floor.
 *
 * Parse failures skip the attempt. Critic failures are replaced by a
 * threshold-score evaluation that is marked as a fallback, so callers can
 * tell a degraded pass from a real one. Generator transport errors propagate.
 */

import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Role } from '../llm/role.js';
import { TokenUsage } from './token-usage.js';
import {
  fallbackEvaluation,
  floorViolations,
  parseEvaluation as defaultParseEvaluation,
  type EvaluationResult,
} from './evaluation.js';

export interface QualityLoopConfig {
  readonly qualityThreshold: number;
  readonly maxAttempts: number;
  readonly criterionFloors: Readonly<Record<string, number>>;
}

export type ParseOutcome<T> = { kind: 'ok'; value: T } | { kind: 'skip'; error: unknown };

export type CriticOutcome =
  | { kind: 'ok'; evaluation: EvaluationResult }
  | { kind: 'fallback'; evaluation: EvaluationResult; error: unknown };

export interface AttemptOutcome {
  attempt: number;
  parse: ParseOutcome<unknown>['kind'];
  critic?: CriticOutcome['kind'];
  score?: number;
  belowFloor?: boolean;
  passed?: boolean;
}

export interface AgentResult<T> {
  readonly output: T | undefined;
  /** 1-based index of the attempt the loop stopped at */
  readonly attempts: number;
  readonly finalScore: number;
  readonly passedQualityGate: boolean;
  readonly belowMinimumFloor: boolean;
  readonly evaluationHistory: readonly EvaluationResult[];
  readonly tokenUsage: TokenUsage;
  readonly attemptOutcomes: readonly AttemptOutcome[];
  /** True when at least one recorded evaluation came from the critic fallback */
  readonly criticDegraded: boolean;
}

export interface QualityLoopParams<T> {
  generator: Role;
  critic: Role;
  config: QualityLoopConfig;
  initialPrompt: string;
  parseOutput: (text: string) => T;
  parseEvaluation?: (text: string) => EvaluationResult;
  logger?: Logger;
}

export function buildAttemptPrompt(
  initialPrompt: string,
  feedback: { attempt: number; text: string } | undefined
): string {
  if (!feedback) {
    return initialPrompt;
  }
  return `${initialPrompt}\n\nPrevious attempt feedback (attempt ${feedback.attempt}):\n${feedback.text}`;
}

function tryParse<T>(parse: (text: string) => T, text: string): ParseOutcome<T> {
  try {
    return { kind: 'ok', value: parse(text) };
  } catch (error) {
    return { kind: 'skip', error };
  }
}

async function runCritic(
  critic: Role,
  input: string,
  parse: (text: string) => EvaluationResult,
  qualityThreshold: number,
  usage: TokenUsage
): Promise<CriticOutcome> {
  try {
    const response = await critic.invoke(input);
    usage.add(response.usage);
    return { kind: 'ok', evaluation: parse(response.text) };
  } catch (error) {
    return { kind: 'fallback', evaluation: fallbackEvaluation(qualityThreshold), error };
  }
}

export function validateLoopConfig(config: QualityLoopConfig): void {
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
  }
}

export async function runQualityLoop<T>(params: QualityLoopParams<T>): Promise<AgentResult<T>> {
  const { generator, critic, config, initialPrompt, parseOutput } = params;
  const parseEvaluation = params.parseEvaluation ?? defaultParseEvaluation;
  const logger = params.logger ?? silentLogger;
  validateLoopConfig(config);

  const tokenUsage = new TokenUsage();
  const evaluationHistory: EvaluationResult[] = [];
  const attemptOutcomes: AttemptOutcome[] = [];

  let best: { output: T; score: number; belowFloor: boolean } | undefined;
  let feedback: { attempt: number; text: string } | undefined;
  let criticDegraded = false;
  let attempt = 0;

  while (attempt < config.maxAttempts) {
    attempt++;

    const generated = await generator.invoke(buildAttemptPrompt(initialPrompt, feedback));
    tokenUsage.add(generated.usage);

    const parsed = tryParse(parseOutput, generated.text);
    if (parsed.kind === 'skip') {
      logger.warn(`${generator.name}: could not parse output on attempt ${attempt}, skipping (${errorMessage(parsed.error)})`);
      attemptOutcomes.push({ attempt, parse: 'skip' });
      continue;
    }

    const verdict = await runCritic(critic, generated.text, parseEvaluation, config.qualityThreshold, tokenUsage);
    if (verdict.kind === 'fallback') {
      criticDegraded = true;
      logger.warn(`${critic.name}: evaluation failed on attempt ${attempt}, auto-passing (${errorMessage(verdict.error)})`);
    }

    const { evaluation } = verdict;
    evaluationHistory.push(evaluation);
    feedback = { attempt, text: evaluation.feedback };

    const violations = floorViolations(evaluation, config.criterionFloors);
    const belowFloor = violations.length > 0;

    // Strict comparison against an initial best of 0: ties keep the earlier attempt
    if (evaluation.score > (best?.score ?? 0)) {
      best = { output: parsed.value, score: evaluation.score, belowFloor };
    }

    const passed = evaluation.score >= config.qualityThreshold && !belowFloor;
    attemptOutcomes.push({ attempt, parse: 'ok', critic: verdict.kind, score: evaluation.score, belowFloor, passed });
    logger.debug(
      `${generator.name} attempt ${attempt}: score=${evaluation.score.toFixed(2)}` +
        (belowFloor ? ` below floor on ${violations.join(', ')}` : '')
    );

    if (passed) {
      break;
    }
  }

  const finalScore = best?.score ?? 0.0;
  const belowMinimumFloor = best?.belowFloor ?? false;
  const passedQualityGate = best !== undefined && finalScore >= config.qualityThreshold && !belowMinimumFloor;

  if (passedQualityGate) {
    logger.info(`Quality gate passed on attempt ${attempt} with score ${finalScore.toFixed(2)}`);
  } else {
    logger.info(`Quality gate not passed (score=${finalScore.toFixed(2)}, belowFloor=${belowMinimumFloor})`);
  }

  return {
    output: best?.output,
    attempts: attempt,
    finalScore,
    passedQualityGate,
    belowMinimumFloor,
    evaluationHistory,
    tokenUsage,
    attemptOutcomes,
    criticDegraded,
  };
}
