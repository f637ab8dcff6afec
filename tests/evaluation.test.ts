import { describe, it, expect } from 'vitest';
import {
  createEvaluation,
  fallbackEvaluation,
  floorViolations,
  parseEvaluation,
  stripCodeFence,
  CRITIC_FALLBACK_FEEDBACK,
} from '../src/agents/evaluation.js';
import { TokenUsage } from '../src/agents/token-usage.js';

describe('parseEvaluation', () => {
  it('reads every field of the critic payload', () => {
    const evaluation = parseEvaluation(
      JSON.stringify({
        score: 8.5,
        passed: true,
        feedback: 'Solid.',
        criteria_scores: { accuracy: 9, completeness: 8 },
        criteria_weights: { accuracy: 0.6, completeness: 0.4 },
      })
    );

    expect(evaluation).toEqual({
      score: 8.5,
      passed: true,
      feedback: 'Solid.',
      criteriaScores: { accuracy: 9, completeness: 8 },
      criteriaWeights: { accuracy: 0.6, completeness: 0.4 },
    });
  });

  it('accepts JSON wrapped in a fenced block', () => {
    const evaluation = parseEvaluation('```json\n{"score": 6, "feedback": "ok"}\n```');
    expect(evaluation.score).toBe(6);
    expect(evaluation.passed).toBe(false);
    expect(evaluation.criteriaScores).toEqual({});
  });

  it('clamps scores into the 1-10 range', () => {
    expect(parseEvaluation('{"score": 14}').score).toBe(10);
    expect(parseEvaluation('{"score": -2}').score).toBe(1);
  });

  it('coerces numeric strings', () => {
    expect(parseEvaluation('{"score": "7.25"}').score).toBe(7.25);
  });

  it('throws when the score is missing', () => {
    expect(() => parseEvaluation('{"feedback": "no score"}')).toThrow();
  });

  it('throws on malformed JSON', () => {
    expect(() => parseEvaluation('score: 8')).toThrow();
  });
});

describe('stripCodeFence', () => {
  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
  });

  it('removes a fence without a closing line', () => {
    expect(stripCodeFence('```\n{"a": 1}')).toBe('{"a": 1}');
  });
});

describe('fallbackEvaluation', () => {
  it('scores exactly at the threshold and says it auto-passed', () => {
    const evaluation = fallbackEvaluation(7.5);
    expect(evaluation.score).toBe(7.5);
    expect(evaluation.passed).toBe(true);
    expect(evaluation.feedback).toBe(CRITIC_FALLBACK_FEEDBACK);
  });
});

describe('floorViolations', () => {
  const evaluation = createEvaluation({ score: 8, criteriaScores: { accuracy: 4, clarity: 6 } });

  it('lists criteria strictly below their floor', () => {
    expect(floorViolations(evaluation, { accuracy: 5, clarity: 6 })).toEqual(['accuracy']);
  });

  it('ignores floors for criteria the critic did not score', () => {
    expect(floorViolations(evaluation, { coverage: 9 })).toEqual([]);
  });
});

describe('createEvaluation', () => {
  it('returns a frozen value', () => {
    const evaluation = createEvaluation({ score: 5, criteriaScores: { a: 1 } });
    expect(Object.isFrozen(evaluation)).toBe(true);
    expect(Object.isFrozen(evaluation.criteriaScores)).toBe(true);
  });
});

describe('TokenUsage', () => {
  it('counts one call per fromCall', () => {
    expect(TokenUsage.fromCall(12, 8).toJSON()).toEqual({ inputTokens: 12, outputTokens: 8, totalTokens: 20, calls: 1 });
  });

  it('adds field by field in place', () => {
    const usage = TokenUsage.fromCall(10, 5);
    const returned = usage.add({ inputTokens: 1, outputTokens: 2, totalTokens: 3, calls: 1 });

    expect(returned).toBe(usage);
    expect(usage.toJSON()).toEqual({ inputTokens: 11, outputTokens: 7, totalTokens: 18, calls: 2 });
  });

  it('combines without touching its operands', () => {
    const a = TokenUsage.fromCall(10, 5);
    const b = TokenUsage.fromCall(3, 4);
    const total = TokenUsage.combine(a, b);

    expect(total.toJSON()).toEqual({ inputTokens: 13, outputTokens: 9, totalTokens: 22, calls: 2 });
    expect(a.toJSON()).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15, calls: 1 });
  });

  it('starts empty', () => {
    expect(new TokenUsage().toJSON()).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0, calls: 0 });
  });

  it('serializes through JSON.stringify', () => {
    expect(JSON.parse(JSON.stringify(TokenUsage.fromCall(1, 1)))).toEqual({ inputTokens: 1, outputTokens: 1, totalTokens: 2, calls: 1 });
  });
});
