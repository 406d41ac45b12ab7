export { LatsSearchEngine } from './search-engine.js';
export type { LatsSearchEngineOptions, LatsEngineDependencies } from './search-engine.js';
export { LatsNode } from './node.js';
export type { LatsNodeInit } from './node.js';
export { SelectionPolicy } from './selection.js';
export { ExpansionEngine } from './expansion.js';
export type { ExpansionOutcome } from './expansion.js';
export { SimulationEngine } from './simulation.js';
export type { SimulationOutcome, SimulationKind, SimulationConfig } from './simulation.js';
export { BackpropagationEngine } from './backpropagation.js';
export { TerminationPolicy } from './termination.js';
export { heuristicTokenEstimator } from './token-estimator.js';
export { ProviderExecutor, extractJson } from './provider-executor.js';
export type { ProviderExecutorOptions, StrategyRunner } from './provider-executor.js';
export {
  WinningPathSchema,
  extractWinningPath,
  findBestLeaf,
  parseWinningPath,
  serializeWinningPath,
  snapshotConfig,
} from './winning-path.js';
export type { WinningPath, WinningPathInput } from './winning-path.js';
export { countNodes, findNode, getAllLeaves, getMaxDepth, snapshotTree } from './tree-utils.js';
export type { NodeSnapshot } from './tree-utils.js';
export type { SelectionConfig } from './selection.js';
export type { TerminationConfig, TerminationInput } from './termination.js';
export type {
  CodeStrategy,
  ExecutionResult,
  StrategyEvaluation,
  SearchContext,
  LatsExecutor,
  StrategyScorer,
  TokenEstimator,
  LatsEventType,
  LatsEvent,
  LatsEventCallback,
  TerminationState,
  StrategyScore,
  SearchResult,
  SearchConfigSnapshot,
} from './types.js';
