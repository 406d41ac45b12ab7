export type BudgetPhase = 'expansion' | 'simulation';

export interface BudgetLimits {
  maxTotalTokens: number;
  maxCostUsd: number;
  costPer1kTokens: number;
}

export interface SearchMetricsSnapshot {
  runId: string;
  iterationsCompleted: number;
  nodesCreated: number;
  totalTokensUsed: number;
  totalCostUsd: number;
  failedSimulations: number;
  phaseTokens: Record<BudgetPhase, number>;
  startTime: number;
  endTime: number | null;
  durationMs: number;
}
