import { nanoid } from 'nanoid';
import type { BudgetLimits, BudgetPhase, SearchMetricsSnapshot } from './types.js';

/**
 * Counters for a single search run.
 *
 * Cost is derived from the cumulative token count rather than summed per
 * phase, so the total never drifts from `tokens / 1000 * costPer1kTokens`.
 */
export class SearchMetrics {
  readonly runId: string;
  iterationsCompleted = 0;
  nodesCreated = 0;
  totalTokensUsed = 0;
  totalCostUsd = 0;
  /** Leaf rollouts whose execution or scoring failed and were rewarded 0. */
  failedSimulations = 0;
  readonly phaseTokens: Record<BudgetPhase, number> = { expansion: 0, simulation: 0 };
  readonly startTime: number;
  endTime: number | null = null;

  constructor(now: number = Date.now(), runId: string = nanoid(10)) {
    this.startTime = now;
    this.runId = runId;
  }

  addTokens(phase: BudgetPhase, tokens: number, costPer1kTokens: number): void {
    this.phaseTokens[phase] += tokens;
    this.totalTokensUsed += tokens;
    this.totalCostUsd = (this.totalTokensUsed / 1000) * costPer1kTokens;
  }

  /**
   * True iff tokens or cost reached their ceiling.
   */
  exceedsBudget(limits: BudgetLimits): boolean {
    return (
      this.totalTokensUsed >= limits.maxTotalTokens ||
      this.totalCostUsd >= limits.maxCostUsd
    );
  }

  finish(now: number = Date.now()): void {
    this.endTime = now;
  }

  getDuration(now: number = Date.now()): number {
    return (this.endTime ?? now) - this.startTime;
  }

  toJSON(): SearchMetricsSnapshot {
    return {
      runId: this.runId,
      iterationsCompleted: this.iterationsCompleted,
      nodesCreated: this.nodesCreated,
      totalTokensUsed: this.totalTokensUsed,
      totalCostUsd: this.totalCostUsd,
      failedSimulations: this.failedSimulations,
      phaseTokens: { ...this.phaseTokens },
      startTime: this.startTime,
      endTime: this.endTime,
      durationMs: this.getDuration(),
    };
  }
}
