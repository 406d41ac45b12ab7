/**
 * Winning path: the root-to-leaf trace of the best strategy a run found,
 * kept as training data for later runs.
 */

import { z } from 'zod';
import type { MCTSConfig } from '../../core/types.js';
import type { SearchMetrics } from '../../cost/metrics.js';
import type { SearchConfigSnapshot, SearchContext } from './types.js';
import type { LatsNode } from './node.js';
import { getAllLeaves } from './tree-utils.js';
import { WinningPathParseError, toError } from '../../core/errors.js';

const ACCEPT_THRESHOLD = 0.5;

export const WinningPathSchema = z.object({
  runId: z.string(),
  createdAt: z.string(),
  problemDescription: z.string(),
  problemType: z.string(),
  thoughtSequence: z.array(z.string()),
  finalStrategyId: z.string(),
  finalCodeChanges: z.record(z.string()),
  finalQValue: z.number(),
  totalIterations: z.number().int(),
  totalNodesExplored: z.number().int(),
  executionResult: z.record(z.unknown()),
  reflectionVerdict: z.enum(['ACCEPT', 'REVISE']),
  llmModel: z.string(),
  config: z.object({
    maxIterations: z.number(),
    maxDepth: z.number(),
    explorationConstant: z.number(),
    strategiesPerExpansion: z.number(),
  }),
});

type WinningPathData = z.infer<typeof WinningPathSchema>;

export type WinningPath = Readonly<
  Omit<WinningPathData, 'thoughtSequence'> & { thoughtSequence: readonly string[] }
>;

/**
 * Leaf with a completed strategy and the most visits (not the highest
 * q-value), first in BFS order on ties.
 */
export function findBestLeaf(root: LatsNode): LatsNode | null {
  let best: LatsNode | null = null;
  for (const leaf of getAllLeaves(root)) {
    if (!leaf.completedStrategy) continue;
    if (!best || leaf.visitCount > best.visitCount) best = leaf;
  }
  return best;
}

export function snapshotConfig(config: MCTSConfig): SearchConfigSnapshot {
  return {
    maxIterations: config.maxIterations,
    maxDepth: config.maxDepth,
    explorationConstant: config.explorationConstant,
    strategiesPerExpansion: config.strategiesPerExpansion,
  };
}

export interface WinningPathInput {
  root: LatsNode;
  bestStrategyId: string | null;
  problem: string;
  context: SearchContext;
  metrics: SearchMetrics;
  config: MCTSConfig;
  now?: Date;
}

export function extractWinningPath(input: WinningPathInput): WinningPath | null {
  if (!input.bestStrategyId) return null;

  const leaf = getAllLeaves(input.root).find(
    (l) => l.completedStrategy?.strategyId === input.bestStrategyId,
  );
  const strategy = leaf?.completedStrategy;
  if (!leaf || !strategy) return null;

  const executionResult: Record<string, unknown> = leaf.executionResult ? { ...leaf.executionResult } : {};
  const accepted = leaf.executionResult?.success === true && leaf.qValue >= ACCEPT_THRESHOLD;

  const path: WinningPath = {
    runId: input.metrics.runId,
    createdAt: (input.now ?? new Date()).toISOString(),
    problemDescription: input.problem,
    problemType: typeof input.context.problemType === 'string' ? input.context.problemType : 'unknown',
    thoughtSequence: Object.freeze(leaf.getFullPath()),
    finalStrategyId: strategy.strategyId,
    finalCodeChanges: { ...strategy.fileChanges },
    finalQValue: leaf.qValue,
    totalIterations: input.metrics.iterationsCompleted,
    totalNodesExplored: input.metrics.nodesCreated,
    executionResult,
    reflectionVerdict: accepted ? 'ACCEPT' : 'REVISE',
    llmModel: input.config.generatorModel,
    config: snapshotConfig(input.config),
  };

  return Object.freeze(path);
}

/**
 * One JSON object, no trailing newline.
 */
export function serializeWinningPath(path: WinningPath): string {
  return JSON.stringify(path);
}

export function parseWinningPath(line: string, lineNumber?: number): WinningPath {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new WinningPathParseError(`Winning path is not valid JSON: ${toError(err).message}`, lineNumber, toError(err));
  }

  const parsed = WinningPathSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WinningPathParseError(`Winning path failed validation: ${parsed.error.message}`, lineNumber, parsed.error);
  }
  return parsed.data;
}
