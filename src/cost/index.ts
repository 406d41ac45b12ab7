export { SearchMetrics } from './metrics.js';
export { BudgetTracker } from './budget.js';
export type { BudgetPhase, BudgetLimits, SearchMetricsSnapshot } from './types.js';
