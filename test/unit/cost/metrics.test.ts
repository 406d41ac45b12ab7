import { describe, it, expect } from 'vitest';
import { SearchMetrics } from '../../../src/cost/metrics.js';

const limits = { maxTotalTokens: 10_000, maxCostUsd: 0.05, costPer1kTokens: 0.01 };

describe('SearchMetrics', () => {
  it('starts empty', () => {
    const metrics = new SearchMetrics(1000, 'run-1');

    expect(metrics.toJSON()).toEqual({
      runId: 'run-1',
      iterationsCompleted: 0,
      nodesCreated: 0,
      totalTokensUsed: 0,
      totalCostUsd: 0,
      failedSimulations: 0,
      phaseTokens: { expansion: 0, simulation: 0 },
      startTime: 1000,
      endTime: null,
      durationMs: expect.any(Number),
    });
  });

  it('derives cost from the cumulative token count', () => {
    const metrics = new SearchMetrics(0, 'run-1');

    metrics.addTokens('expansion', 206, 0.01);
    metrics.addTokens('simulation', 500, 0.01);

    expect(metrics.totalTokensUsed).toBe(706);
    expect(metrics.phaseTokens).toEqual({ expansion: 206, simulation: 500 });
    expect(metrics.totalCostUsd).toBeCloseTo(0.00706, 10);
  });

  it('exceeds the budget when cost reaches the ceiling exactly', () => {
    const metrics = new SearchMetrics(0, 'run-1');
    metrics.addTokens('simulation', 4999, 0.01);
    expect(metrics.exceedsBudget(limits)).toBe(false);

    metrics.addTokens('simulation', 1, 0.01);
    expect(metrics.totalCostUsd).toBe(0.05);
    expect(metrics.exceedsBudget(limits)).toBe(true);
  });

  it('exceeds the budget when tokens reach the ceiling', () => {
    const metrics = new SearchMetrics(0, 'run-1');
    metrics.addTokens('expansion', 10_000, 0);
    expect(metrics.exceedsBudget(limits)).toBe(true);
  });

  it('measures duration until finish', () => {
    const metrics = new SearchMetrics(1000, 'run-1');

    expect(metrics.getDuration(1500)).toBe(500);
    metrics.finish(1800);
    expect(metrics.getDuration(5000)).toBe(800);
    expect(metrics.toJSON().endTime).toBe(1800);
  });

  it('generates a run id when none is given', () => {
    expect(new SearchMetrics().runId).toHaveLength(10);
  });
});
