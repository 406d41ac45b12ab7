/**
 * LATS Type Definitions
 * Ports, events and result shapes shared by the search engine and its phases.
 */

import type { MCTSConfig } from '../../core/types.js';
import type { SearchMetricsSnapshot } from '../../cost/types.js';

// ===== Strategies and execution =====

export interface CodeStrategy {
  strategyId: string;
  /** File path -> full new content. */
  fileChanges: Record<string, string>;
  description?: string;
}

export interface ExecutionResult {
  success: boolean;
  output?: string;
  error?: string;
  testsPassed?: number;
  testsTotal?: number;
  durationMs?: number;
}

export interface StrategyEvaluation {
  /** Normalised to [0, 1]. */
  totalScore: number;
  weaknesses?: string;
}

export interface SearchContext {
  problemType?: string;
  /** Guidance built from sibling failures, injected before each expansion. */
  rejectionContext?: string;
  seed?: number;
  [key: string]: unknown;
}

// ===== Ports =====

/**
 * Executor port: the model and sandbox calls the search drives.
 * Failures of the two generation calls are fatal to the run;
 * `executeStrategy` failures are routed to reflexion instead.
 */
export interface LatsExecutor {
  generateNextThoughts(
    currentState: string,
    problem: string,
    context: SearchContext,
    k: number,
  ): Promise<string[]>;
  generateCompleteStrategy(
    thoughtPath: string[],
    problem: string,
    context: SearchContext,
  ): Promise<CodeStrategy>;
  executeStrategy(strategy: CodeStrategy): Promise<ExecutionResult>;
  evaluateThought(partialThought: string): Promise<number>;
}

export interface StrategyScorer {
  score(strategy: CodeStrategy, executionResult: ExecutionResult): Promise<StrategyEvaluation>;
}

/** Heuristic token accounting; swap for provider-reported usage when available. */
export interface TokenEstimator {
  expansion(problem: string, thoughts: string[]): number;
  leafSimulation(): number;
  intermediateSimulation(): number;
}

// ===== Events =====

export type LatsEventType =
  | 'search_start'
  | 'iteration_start'
  | 'selection'
  | 'expansion'
  | 'simulation_start'
  | 'simulation_end'
  | 'backpropagation'
  | 'budget_check'
  | 'early_giveup'
  | 'early_stop'
  | 'search_end';

export interface LatsEvent {
  type: LatsEventType;
  iteration: number;
  message: string;
  nodeId?: string;
  metadata?: Record<string, unknown>;
  timestamp: number;
}

export type LatsEventCallback = (event: LatsEvent) => void;

// ===== Termination =====

export type TerminationState =
  | 'running'
  | 'cancelled'
  | 'budget_exceeded'
  | 'early_giveup'
  | 'early_stop'
  | 'max_iterations'
  | 'failed';

// ===== Results =====

export interface StrategyScore {
  strategyId: string;
  totalScore: number;
  /** Share of root visits that went through the leaf. */
  confidence: number;
  recommendation: string;
}

export interface SearchResult {
  allStrategies: CodeStrategy[];
  executedStrategies: CodeStrategy[];
  scores: Record<string, StrategyScore>;
  bestStrategyId: string | null;
  bestScore: number;
  totalGenerated: number;
  totalExecuted: number;
  totalPassed: number;
  terminationState: TerminationState;
  metrics: SearchMetricsSnapshot;
}

export type SearchConfigSnapshot = Pick<
  MCTSConfig,
  'maxIterations' | 'maxDepth' | 'explorationConstant' | 'strategiesPerExpansion'
>;
