/**
 * Tests for the generator/critic quality loop
 */

import { describe, it, expect } from 'vitest';
import { runQualityLoop, buildAttemptPrompt, type QualityLoopConfig } from '../src/agents/quality-loop.js';
import { CRITIC_FALLBACK_FEEDBACK } from '../src/agents/evaluation.js';
import { TokenUsage } from '../src/agents/token-usage.js';
import type { Role, RoleResponse } from '../src/llm/role.js';

type Step = string | Error;

/**
 * Role that answers from a script and records every prompt it receives.
 */
class ScriptedRole implements Role {
  readonly prompts: string[] = [];
  private index = 0;

  constructor(readonly name: string, private steps: Step[], private usage = { input: 10, output: 5 }) {}

  async invoke(prompt: string): Promise<RoleResponse> {
    this.prompts.push(prompt);
    const step = this.steps[Math.min(this.index, this.steps.length - 1)];
    this.index++;
    if (step instanceof Error) {
      throw step;
    }
    return { text: step, usage: TokenUsage.fromCall(this.usage.input, this.usage.output) };
  }
}

const critique = (score: number, feedback = `scored ${score}`, criteria?: Record<string, number>) =>
  JSON.stringify({ score, passed: score >= 7, feedback, ...(criteria ? { criteria_scores: criteria } : {}) });

const config: QualityLoopConfig = { qualityThreshold: 7.0, maxAttempts: 3, criterionFloors: {} };

const identity = (text: string) => text;

describe('runQualityLoop', () => {
  it('stops at the first attempt that reaches the threshold', async () => {
    const generator = new ScriptedRole('gen', ['draft one', 'draft two', 'draft three']);
    const critic = new ScriptedRole('critic', [critique(5.0), critique(8.0)]);

    const result = await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(result.attempts).toBe(2);
    expect(result.finalScore).toBe(8.0);
    expect(result.passedQualityGate).toBe(true);
    expect(result.output).toBe('draft two');
    expect(result.evaluationHistory).toHaveLength(2);
    expect(generator.prompts).toHaveLength(2);
  });

  it('runs every attempt when the threshold is never reached', async () => {
    const generator = new ScriptedRole('gen', ['a', 'b', 'c']);
    const critic = new ScriptedRole('critic', [critique(6.0)]);

    const result = await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(result.attempts).toBe(3);
    expect(result.finalScore).toBe(6.0);
    expect(result.passedQualityGate).toBe(false);
    expect(result.evaluationHistory).toHaveLength(3);
    // ties keep the earliest attempt
    expect(result.output).toBe('a');
  });

  it('auto-passes at the threshold when the critic throws', async () => {
    const generator = new ScriptedRole('gen', ['first', 'second']);
    const critic = new ScriptedRole('critic', [new Error('critic offline'), critique(9.0)]);

    const result = await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(result.attempts).toBe(1);
    expect(generator.prompts).toEqual(['Write it']);
    expect(result.evaluationHistory.map((e) => e.feedback)).toEqual([CRITIC_FALLBACK_FEEDBACK]);
    expect(result.evaluationHistory[0].score).toBe(7.0);
    expect(result.passedQualityGate).toBe(true);
    expect(result.criticDegraded).toBe(true);
    expect(result.attemptOutcomes).toEqual([
      { attempt: 1, parse: 'ok', critic: 'fallback', score: 7.0, belowFloor: false, passed: true },
    ]);
  });

  it('treats unparsable critic output like a failed critic call', async () => {
    const generator = new ScriptedRole('gen', ['first']);
    const critic = new ScriptedRole('critic', ['this is not json']);

    const result = await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(result.evaluationHistory[0].feedback).toBe(CRITIC_FALLBACK_FEEDBACK);
    expect(result.criticDegraded).toBe(true);
  });

  it('skips attempts whose output cannot be parsed', async () => {
    const generator = new ScriptedRole('gen', ['not json', '{"ok": true}']);
    const critic = new ScriptedRole('critic', [critique(8.0)]);

    const result = await runQualityLoop({
      generator,
      critic,
      config,
      initialPrompt: 'Write it',
      parseOutput: (text) => {
        const value: unknown = JSON.parse(text);
        return value;
      },
    });

    expect(result.attempts).toBe(2);
    expect(result.evaluationHistory).toHaveLength(1);
    expect(result.finalScore).toBe(8.0);
    expect(result.output).toEqual({ ok: true });
    expect(critic.prompts).toHaveLength(1);
    expect(result.attemptOutcomes[0]).toEqual({ attempt: 1, parse: 'skip' });
    // no feedback exists yet, so attempt 2 sees the bare prompt
    expect(generator.prompts[1]).toBe('Write it');
  });

  it('returns no output when every attempt fails to parse', async () => {
    const generator = new ScriptedRole('gen', ['garbage']);
    const critic = new ScriptedRole('critic', [critique(9.0)]);

    const result = await runQualityLoop({
      generator,
      critic,
      config,
      initialPrompt: 'Write it',
      parseOutput: () => {
        throw new Error('bad output');
      },
    });

    expect(result.output).toBeUndefined();
    expect(result.finalScore).toBe(0);
    expect(result.passedQualityGate).toBe(false);
    expect(result.belowMinimumFloor).toBe(false);
    expect(result.evaluationHistory).toHaveLength(0);
    expect(critic.prompts).toHaveLength(0);
  });

  it('feeds the previous critique into the next prompt', async () => {
    const generator = new ScriptedRole('gen', ['a', 'b']);
    const critic = new ScriptedRole('critic', [critique(4.0, 'Add examples.'), critique(8.0)]);

    await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(generator.prompts[0]).toBe('Write it');
    expect(generator.prompts[1]).toBe('Write it\n\nPrevious attempt feedback (attempt 1):\nAdd examples.');
  });

  it('keeps looping while a criterion is below its floor', async () => {
    const generator = new ScriptedRole('gen', ['a', 'b']);
    const critic = new ScriptedRole('critic', [
      critique(9.0, 'inaccurate', { accuracy: 3 }),
      critique(7.5, 'fine', { accuracy: 7 }),
    ]);

    const result = await runQualityLoop({
      generator,
      critic,
      config: { ...config, criterionFloors: { accuracy: 5.0 } },
      initialPrompt: 'Write it',
      parseOutput: identity,
    });

    expect(result.attempts).toBe(2);
    // attempt 1 scored higher, so it stays the best, floor violation and all
    expect(result.output).toBe('a');
    expect(result.finalScore).toBe(9.0);
    expect(result.belowMinimumFloor).toBe(true);
    expect(result.passedQualityGate).toBe(false);
  });

  it('propagates generator errors', async () => {
    const generator = new ScriptedRole('gen', [new Error('rate limited')]);
    const critic = new ScriptedRole('critic', [critique(9.0)]);

    await expect(
      runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity })
    ).rejects.toThrow('rate limited');
  });

  it('sums token usage from both roles', async () => {
    const generator = new ScriptedRole('gen', ['a', 'b'], { input: 100, output: 50 });
    const critic = new ScriptedRole('critic', [critique(5.0), critique(8.0)], { input: 20, output: 10 });

    const result = await runQualityLoop({ generator, critic, config, initialPrompt: 'Write it', parseOutput: identity });

    expect(result.tokenUsage.toJSON()).toEqual({ inputTokens: 240, outputTokens: 120, totalTokens: 360, calls: 4 });
  });

  it('rejects a non-positive attempt budget', async () => {
    const generator = new ScriptedRole('gen', ['a']);
    const critic = new ScriptedRole('critic', [critique(8.0)]);

    await expect(
      runQualityLoop({ generator, critic, config: { ...config, maxAttempts: 0 }, initialPrompt: 'x', parseOutput: identity })
    ).rejects.toThrow(RangeError);
  });
});

describe('buildAttemptPrompt', () => {
  it('returns the prompt unchanged without feedback', () => {
    expect(buildAttemptPrompt('Base', undefined)).toBe('Base');
  });

  it('labels feedback with the attempt it came from', () => {
    expect(buildAttemptPrompt('Base', { attempt: 2, text: 'More detail.' })).toBe(
      'Base\n\nPrevious attempt feedback (attempt 2):\nMore detail.'
    );
  });
});
