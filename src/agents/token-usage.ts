/**
 * Token usage accumulator shared by model roles, the quality loop and the
 * pipeline's per-agent reports.
 */

export interface TokenUsageSnapshot {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  calls: number;
}

export class TokenUsage implements TokenUsageSnapshot {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  calls: number;

  constructor(init: Partial<TokenUsageSnapshot> = {}) {
    this.inputTokens = init.inputTokens ?? 0;
    this.outputTokens = init.outputTokens ?? 0;
    this.totalTokens = init.totalTokens ?? this.inputTokens + this.outputTokens;
    this.calls = init.calls ?? 0;
  }

  static fromCall(inputTokens: number, outputTokens: number): TokenUsage {
    return new TokenUsage({ inputTokens, outputTokens, calls: 1 });
  }

  /**
   * Fold another usage into this one, field by field.
   */
  add(other: TokenUsageSnapshot): this {
    this.inputTokens += other.inputTokens;
    this.outputTokens += other.outputTokens;
    this.totalTokens += other.totalTokens;
    this.calls += other.calls;
    return this;
  }

  /**
   * Pure sum; neither operand changes.
   */
  static combine(...usages: TokenUsageSnapshot[]): TokenUsage {
    return usages.reduce<TokenUsage>((total, usage) => total.add(usage), new TokenUsage());
  }

  toJSON(): TokenUsageSnapshot {
    return {
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.totalTokens,
      calls: this.calls,
    };
  }
}
