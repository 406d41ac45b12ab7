import type { BudgetLimits, BudgetPhase } from './types.js';
import type { SearchMetrics } from './metrics.js';
import { formatCost, formatTokens } from '../utils/tokens.js';
import { getLogger } from '../core/logger.js';

/**
 * Circuit breaker over a run's token and cost consumption.
 *
 * Usage is recorded per phase as it happens, but the breaker is only consulted
 * between iterations: an iteration in flight always runs to completion.
 */
export class BudgetTracker {
  private logger = getLogger();

  constructor(
    private metrics: SearchMetrics,
    private limits: BudgetLimits,
  ) {}

  /**
   * Record estimated token usage for a phase
   */
  record(phase: BudgetPhase, tokens: number): void {
    this.metrics.addTokens(phase, tokens, this.limits.costPer1kTokens);
    this.logger.debug(
      { phase, tokens, totalTokens: this.metrics.totalTokensUsed, totalCost: this.metrics.totalCostUsd },
      'Budget update',
    );
  }

  /**
   * Check whether the next iteration may start
   */
  get isTripped(): boolean {
    return this.metrics.exceedsBudget(this.limits);
  }

  get remainingTokens(): number {
    return Math.max(0, this.limits.maxTotalTokens - this.metrics.totalTokensUsed);
  }

  get remainingCost(): number {
    return Math.max(0, this.limits.maxCostUsd - this.metrics.totalCostUsd);
  }

  /**
   * Human-readable usage line, e.g. "5.0K/100.0K tokens, $0.050/$5.00"
   */
  describe(): string {
    return (
      `${formatTokens(this.metrics.totalTokensUsed)}/${formatTokens(this.limits.maxTotalTokens)} tokens, ` +
      `${formatCost(this.metrics.totalCostUsd)}/${formatCost(this.limits.maxCostUsd)}`
    );
  }
}
