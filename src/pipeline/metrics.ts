/**
 * Job-level quality and token reports built from agent results.
 */

import { TokenUsage, type TokenUsageSnapshot } from '../agents/token-usage.js';
import type { AgentResult } from '../agents/quality-loop.js';

export interface PageScore {
  pageKey: string;
  score: number;
  passed: boolean;
  belowFloor: boolean;
  attempts: number;
}

export interface QualityReport {
  /** Mean of every final score, two decimals */
  overallScore: number;
  qualityThreshold: number;
  passed: boolean;
  totalPages: number;
  pagesBelowFloor: number;
  /** Some evaluation behind these numbers came from the critic fallback */
  criticDegraded: boolean;
  pageScores: PageScore[];
  structureScore: number | null;
  readmeScore: number | null;
  /** Incremental runs only */
  regeneratedPages?: string[];
}

export interface TokenReport {
  total: TokenUsageSnapshot;
  byAgent: Record<string, TokenUsageSnapshot>;
}

export interface KeyedPageResult {
  pageKey: string;
  result: AgentResult<unknown>;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

export function buildQualityReport(
  structureResult: AgentResult<unknown> | null,
  pageResults: KeyedPageResult[],
  readmeResult: AgentResult<unknown> | null,
  qualityThreshold: number
): QualityReport {
  const scores: number[] = [];
  if (structureResult) scores.push(structureResult.finalScore);
  scores.push(...pageResults.map(({ result }) => result.finalScore));
  if (readmeResult) scores.push(readmeResult.finalScore);

  const overallScore = scores.length > 0 ? round2(scores.reduce((a, b) => a + b, 0) / scores.length) : 0;
  const pagesBelowFloor = pageResults.filter(({ result }) => result.belowMinimumFloor).length;
  const all = [structureResult, readmeResult, ...pageResults.map(({ result }) => result)];

  return {
    overallScore,
    qualityThreshold,
    passed: overallScore >= qualityThreshold && pagesBelowFloor === 0,
    totalPages: pageResults.length,
    pagesBelowFloor,
    criticDegraded: all.some((result) => result?.criticDegraded ?? false),
    pageScores: pageResults.map(({ pageKey, result }) => ({
      pageKey,
      score: result.finalScore,
      passed: result.passedQualityGate,
      belowFloor: result.belowMinimumFloor,
      attempts: result.attempts,
    })),
    structureScore: structureResult?.finalScore ?? null,
    readmeScore: readmeResult?.finalScore ?? null,
  };
}

export function buildTokenReport(byAgent: Record<string, TokenUsageSnapshot[]>): TokenReport {
  const perAgent: Record<string, TokenUsageSnapshot> = {};
  for (const [agent, usages] of Object.entries(byAgent)) {
    perAgent[agent] = TokenUsage.combine(...usages).toJSON();
  }
  return {
    total: TokenUsage.combine(...Object.values(perAgent)).toJSON(),
    byAgent: perAgent,
  };
}

/**
 * Merge per-scope reports. The overall score is the mean of every individual
 * score; structure and README scores become per-scope means.
 */
export function mergeQualityReports(reports: QualityReport[], qualityThreshold: number): QualityReport {
  const pageScores = reports.flatMap((r) => r.pageScores);
  const structureScores = reports.map((r) => r.structureScore).filter((s): s is number => s !== null);
  const readmeScores = reports.map((r) => r.readmeScore).filter((s): s is number => s !== null);
  const scores = [...structureScores, ...pageScores.map((p) => p.score), ...readmeScores];

  const overallScore = scores.length > 0 ? round2(scores.reduce((a, b) => a + b, 0) / scores.length) : 0;
  const pagesBelowFloor = pageScores.filter((p) => p.belowFloor).length;
  const mean = (values: number[]) => (values.length > 0 ? round2(values.reduce((a, b) => a + b, 0) / values.length) : null);

  return {
    overallScore,
    qualityThreshold,
    passed: overallScore >= qualityThreshold && pagesBelowFloor === 0,
    totalPages: pageScores.length,
    pagesBelowFloor,
    criticDegraded: reports.some((r) => r.criticDegraded),
    pageScores,
    structureScore: mean(structureScores),
    readmeScore: mean(readmeScores),
  };
}
