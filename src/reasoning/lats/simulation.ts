import type { MCTSConfig } from '../../core/types.js';
import type {
  CodeStrategy,
  ExecutionResult,
  LatsExecutor,
  SearchContext,
  StrategyEvaluation,
  StrategyScorer,
  TokenEstimator,
} from './types.js';
import type { LatsNode } from './node.js';
import type { ReflexionPropagator } from '../reflexion/reflexion-propagator.js';
import { getLogger } from '../../core/logger.js';

const LOW_SCORE_THRESHOLD = 0.5;
const NEUTRAL_SCORE = 0.5;
const WEAKNESS_CHARS = 100;

export type SimulationKind = 'leaf' | 'intermediate';

export interface SimulationOutcome {
  reward: number;
  estimatedTokens: number;
  kind: SimulationKind;
  /** Leaf only: execution or scoring failed and the reward was forced to 0. */
  failed: boolean;
}

export type SimulationConfig = Pick<MCTSConfig, 'maxDepth' | 'thoughtEvalThreshold'>;

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Simulation phase. Nodes at depth >= maxDepth - 1 are rolled out for real:
 * a complete strategy is generated, executed and scored. Shallower nodes are
 * scored as intermediate thoughts.
 */
export class SimulationEngine {
  private logger = getLogger();

  constructor(
    private executor: LatsExecutor,
    private scorer: StrategyScorer,
    private reflexion: ReflexionPropagator,
    private tokenEstimator: TokenEstimator,
    private config: SimulationConfig,
  ) {}

  async simulate(node: LatsNode, problem: string, context: SearchContext): Promise<SimulationOutcome> {
    if (node.depth >= this.config.maxDepth - 1) {
      return this.simulateLeaf(node, problem, context);
    }
    return this.simulateIntermediate(node);
  }

  private async simulateLeaf(
    node: LatsNode,
    problem: string,
    context: SearchContext,
  ): Promise<SimulationOutcome> {
    const estimatedTokens = this.tokenEstimator.leafSimulation();

    // Generation failures are fatal and propagate to the engine.
    const strategy = await this.executor.generateCompleteStrategy(
      node.getFullPath(),
      problem,
      this.reflexion.augmentContext(node, context),
    );
    node.markCompleted(strategy);

    let executionResult: ExecutionResult;
    try {
      executionResult = await this.executor.executeStrategy(strategy);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const reason = this.reflexion.extractFailureReason(node, message);
      this.reflexion.propagateToParent(node, reason);
      this.logger.warn({ nodeId: node.id, strategyId: strategy.strategyId, error: message }, 'SimulationEngine: execution failed');
      return { reward: 0, estimatedTokens, kind: 'leaf', failed: true };
    }
    node.executionResult = executionResult;

    const scored = await this.scoreStrategy(node, strategy, executionResult);
    if (scored === null) {
      return { reward: 0, estimatedTokens, kind: 'leaf', failed: true };
    }

    if (scored.totalScore < LOW_SCORE_THRESHOLD) {
      const weakness = scored.weaknesses ? scored.weaknesses.substring(0, WEAKNESS_CHARS) : 'unknown';
      this.reflexion.propagateToParent(node, `Low score (${scored.totalScore.toFixed(2)}): ${weakness}`);
    }

    this.logger.debug({ nodeId: node.id, score: scored.totalScore }, 'SimulationEngine: leaf simulated');
    return { reward: scored.totalScore, estimatedTokens, kind: 'leaf', failed: false };
  }

  private async scoreStrategy(
    node: LatsNode,
    strategy: CodeStrategy,
    executionResult: ExecutionResult,
  ): Promise<StrategyEvaluation | null> {
    try {
      const evaluation = await this.scorer.score(strategy, executionResult);
      return { totalScore: clamp01(evaluation.totalScore), weaknesses: evaluation.weaknesses };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.reflexion.propagateToParent(node, `Scoring failed: ${message.substring(0, WEAKNESS_CHARS)}`);
      this.logger.warn({ nodeId: node.id, error: message }, 'SimulationEngine: scoring failed');
      return null;
    }
  }

  private async simulateIntermediate(node: LatsNode): Promise<SimulationOutcome> {
    let thoughtScore: number;
    try {
      const raw = await this.executor.evaluateThought(node.partialThought);
      thoughtScore = Number.isNaN(raw) ? NEUTRAL_SCORE : clamp01(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ nodeId: node.id, error: message }, 'SimulationEngine: thought evaluation failed, using neutral score');
      thoughtScore = NEUTRAL_SCORE;
    }

    node.thoughtScore = thoughtScore;
    node.isPromising = thoughtScore >= this.config.thoughtEvalThreshold;

    this.logger.debug(
      { nodeId: node.id, thoughtScore, promising: node.isPromising },
      'SimulationEngine: thought evaluated',
    );

    return {
      reward: thoughtScore,
      estimatedTokens: this.tokenEstimator.intermediateSimulation(),
      kind: 'intermediate',
      failed: false,
    };
  }
}
