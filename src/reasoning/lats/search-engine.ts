/**
 * LatsSearchEngine: Language Agent Tree Search over solution strategies.
 *
 * Each iteration runs Select -> Expand -> Simulate -> Backpropagate against a
 * single tree rooted at the problem statement, then consults the budget and
 * stop conditions. Iterations are strictly sequential: selection reads the
 * whole tree, so no two iterations may overlap.
 *
 * Cancellation is cooperative and coarse: the signal is read between
 * iterations only, an in-flight executor call is never interrupted.
 *
 * Based on: Zhou et al. 2023: "Language Agent Tree Search Unifies Reasoning, Acting, and Planning in Language Models"
 */

import { writeFile } from 'fs/promises';
import type { LatsConfig, MCTSConfig, MCTSConfigInput } from '../../core/types.js';
import type {
  LatsEventCallback,
  LatsExecutor,
  SearchContext,
  SearchResult,
  StrategyScore,
  StrategyScorer,
  TerminationState,
  TokenEstimator,
  CodeStrategy,
} from './types.js';
import type { ExperienceRepository } from '../../memory/experience.js';
import { LatsNode } from './node.js';
import { SelectionPolicy } from './selection.js';
import { ExpansionEngine } from './expansion.js';
import { SimulationEngine, type SimulationOutcome } from './simulation.js';
import { BackpropagationEngine } from './backpropagation.js';
import { TerminationPolicy } from './termination.js';
import { heuristicTokenEstimator } from './token-estimator.js';
import { extractWinningPath, findBestLeaf } from './winning-path.js';
import { countNodes, getAllLeaves, getMaxDepth, snapshotTree } from './tree-utils.js';
import { ReflexionPropagator } from '../reflexion/reflexion-propagator.js';
import { WinningPathStore } from '../../memory/winning-path-store.js';
import { SearchMetrics } from '../../cost/metrics.js';
import { BudgetTracker } from '../../cost/budget.js';
import { SearchEventEmitter } from '../../core/events.js';
import { createMCTSConfig } from '../../core/config.js';
import { ExpansionError, toError } from '../../core/errors.js';
import { createLogger, getLogger, setLogger } from '../../core/logger.js';
import type { LLMProvider } from '../../providers/types.js';
import { ProviderExecutor, type StrategyRunner } from './provider-executor.js';
import { NAME } from '../../version.js';

const PASS_THRESHOLD = 0.6;
const RECOMMEND_THRESHOLD = 0.7;

export interface LatsSearchEngineOptions {
  executor: LatsExecutor;
  scorer: StrategyScorer;
  config?: MCTSConfigInput;
  onEvent?: LatsEventCallback;
  enableReflexion?: boolean;
  /** Winning paths are persisted only when a store is given. */
  winningPathStore?: WinningPathStore;
  tokenEstimator?: TokenEstimator;
  treeDumpPath?: string;
}

interface EngineCollaborators {
  scorer: StrategyScorer;
  onEvent?: LatsEventCallback;
  experienceRepository?: ExperienceRepository;
  tokenEstimator?: TokenEstimator;
}

/**
 * Either a ready executor, or a provider and runner to build a
 * ProviderExecutor from the configuration.
 */
export type LatsEngineDependencies = EngineCollaborators &
  ({ executor: LatsExecutor } | { provider: LLMProvider; runner: StrategyRunner });

export class LatsSearchEngine {
  private readonly config: MCTSConfig;
  private readonly executor: LatsExecutor;
  private readonly scorer: StrategyScorer;
  private readonly events: SearchEventEmitter;
  private readonly reflexion: ReflexionPropagator;
  private readonly selection: SelectionPolicy;
  private readonly backpropagation = new BackpropagationEngine();
  private readonly tokenEstimator: TokenEstimator;
  private readonly winningPathStore: WinningPathStore | undefined;
  private readonly treeDumpPath: string | undefined;
  private logger = getLogger();

  private root: LatsNode | null = null;
  private metrics: SearchMetrics = new SearchMetrics();
  private terminationState: TerminationState = 'running';

  constructor(options: LatsSearchEngineOptions) {
    this.config = createMCTSConfig(options.config);
    this.executor = options.executor;
    this.scorer = options.scorer;
    this.events = new SearchEventEmitter(options.onEvent);
    this.reflexion = new ReflexionPropagator({ enabled: options.enableReflexion ?? true });
    this.selection = new SelectionPolicy(this.config);
    this.tokenEstimator = options.tokenEstimator ?? heuristicTokenEstimator;
    this.winningPathStore = options.winningPathStore;
    this.treeDumpPath = options.treeDumpPath;

    this.logger.info(
      {
        maxIterations: this.config.maxIterations,
        maxDepth: this.config.maxDepth,
        reflexion: this.reflexion.isEnabled,
        saveWinningPaths: this.winningPathStore !== undefined,
      },
      'LatsSearchEngine initialized',
    );
  }

  /**
   * Build an engine from a loaded package configuration. `logging.verbose`
   * switches the process logger to pretty console output first.
   */
  static fromConfig(config: LatsConfig, deps: LatsEngineDependencies): LatsSearchEngine {
    if (config.logging.verbose) {
      setLogger(createLogger(NAME, true));
    }

    const executor = 'executor' in deps
      ? deps.executor
      : ProviderExecutor.fromConfig(config, deps.provider, deps.runner);
    const store = config.persistence.saveWinningPaths
      ? new WinningPathStore(config.persistence.winningPathDir, deps.experienceRepository)
      : undefined;

    return new LatsSearchEngine({
      executor,
      scorer: deps.scorer,
      onEvent: deps.onEvent,
      tokenEstimator: deps.tokenEstimator,
      config: config.search,
      enableReflexion: config.reflexion.enabled,
      winningPathStore: store,
      treeDumpPath: config.persistence.treeDumpPath,
    });
  }

  getConfig(): MCTSConfig {
    return this.config;
  }

  /** Tree of the current or last run; kept after a fatal error. */
  getRoot(): LatsNode | null {
    return this.root;
  }

  getMetrics(): SearchMetrics {
    return this.metrics;
  }

  getTerminationState(): TerminationState {
    return this.terminationState;
  }

  on(...args: Parameters<SearchEventEmitter['on']>): () => void {
    return this.events.on(...args);
  }

  async search(problem: string, context: SearchContext = {}, signal?: AbortSignal): Promise<SearchResult> {
    const config = this.config;
    const metrics = new SearchMetrics();
    const root = LatsNode.root(problem);
    this.metrics = metrics;
    this.root = root;
    this.terminationState = 'running';

    const budget = new BudgetTracker(metrics, config);
    const termination = new TerminationPolicy(config);
    const expansion = new ExpansionEngine(
      this.executor,
      metrics,
      this.tokenEstimator,
      this.reflexion,
      config.strategiesPerExpansion,
    );
    const simulation = new SimulationEngine(
      this.executor,
      this.scorer,
      this.reflexion,
      this.tokenEstimator,
      config,
    );

    let runContext = context;
    if (config.seed !== undefined) {
      runContext = { ...context, seed: config.seed };
      this.logger.info({ seed: config.seed }, 'LatsSearchEngine: deterministic mode');
    }

    this.logger.info({ runId: metrics.runId, problem: problem.substring(0, 50) }, 'LatsSearchEngine: starting search');
    this.events.emit('search_start', 0, `Starting LATS search: ${problem.substring(0, 50)}`);

    for (let i = 0; i < config.maxIterations; i++) {
      const iteration = i + 1;

      if (termination.checkCancelled(signal?.aborted ?? false)) {
        this.logger.warn({ iteration }, 'LatsSearchEngine: cancelled');
        break;
      }

      this.events.emit('iteration_start', iteration, `Iteration ${iteration}/${config.maxIterations}`);

      // 1. Selection
      let node = this.selection.select(root);
      this.events.emit('selection', iteration, `Selected node: ${node.id}`, {
        nodeId: node.id,
        metadata: { qValue: node.qValue, visitCount: node.visitCount, depth: node.depth },
      });

      // 2. Expansion
      if (!node.isTerminal && node.depth < config.maxDepth) {
        this.events.emit('expansion', iteration, 'Expanding node', { nodeId: node.id });
        try {
          const outcome = await expansion.expand(node, problem, runContext);
          budget.record('expansion', outcome.estimatedTokens);
          node = outcome.node;
        } catch (err) {
          throw this.abort(
            termination,
            new ExpansionError(
              `Expansion failed at iteration ${iteration}: ${toError(err).message}`,
              iteration,
              node.id,
              toError(err),
            ),
          );
        }
      }

      // 3. Simulation
      this.events.emit('simulation_start', iteration, 'Simulating node', { nodeId: node.id });
      let simulated: SimulationOutcome;
      try {
        simulated = await simulation.simulate(node, problem, runContext);
      } catch (err) {
        throw this.abort(
          termination,
          new ExpansionError(
            `Strategy generation failed at iteration ${iteration}: ${toError(err).message}`,
            iteration,
            node.id,
            toError(err),
          ),
        );
      }
      budget.record('simulation', simulated.estimatedTokens);
      if (simulated.failed) metrics.failedSimulations += 1;
      this.events.emit('simulation_end', iteration, `Simulation complete: value=${simulated.reward.toFixed(2)}`, {
        nodeId: node.id,
        metadata: { value: simulated.reward, kind: simulated.kind, failed: simulated.failed },
      });

      // 4. Backpropagation
      this.events.emit('backpropagation', iteration, 'Updating Q-values', { nodeId: node.id });
      this.backpropagation.backpropagate(node, simulated.reward);
      metrics.iterationsCompleted = iteration;

      // 5. Budget and stop conditions
      const budgetExceeded = budget.isTripped;
      this.events.emit('budget_check', iteration, budgetExceeded ? `Budget exceeded (${budget.describe()})` : budget.describe(), {
        metadata: {
          tokens: metrics.totalTokensUsed,
          cost: metrics.totalCostUsd,
          remainingTokens: budget.remainingTokens,
          remainingCost: budget.remainingCost,
          exceeded: budgetExceeded,
        },
      });

      const state = termination.evaluate({
        root,
        iterationsCompleted: iteration,
        cancelled: signal?.aborted ?? false,
        budgetExceeded,
      });

      if (state === 'budget_exceeded') {
        this.logger.warn({ iteration, usage: budget.describe() }, 'LatsSearchEngine: budget exceeded');
      } else if (state === 'early_giveup') {
        this.logger.warn({ iteration }, 'LatsSearchEngine: early give-up');
        this.events.emit('early_giveup', iteration, 'Low confidence, giving up');
      } else if (state === 'early_stop') {
        this.logger.info({ iteration }, 'LatsSearchEngine: early stop');
        this.events.emit('early_stop', iteration, 'Early stop (good solution found)');
      } else if (state === 'cancelled') {
        this.logger.warn({ iteration }, 'LatsSearchEngine: cancelled');
      }

      if (termination.isTerminal) break;
    }

    this.terminationState = termination.finish(metrics.iterationsCompleted);
    metrics.finish();

    this.logger.info(
      {
        iterations: metrics.iterationsCompleted,
        tokens: metrics.totalTokensUsed,
        cost: metrics.totalCostUsd,
        durationMs: metrics.getDuration(),
        state: this.terminationState,
        reason: termination.reason,
      },
      'LatsSearchEngine: completed',
    );

    const result = this.buildResult(root, metrics);

    if (this.winningPathStore && result.bestStrategyId) {
      await this.persistWinningPath(root, result.bestStrategyId, problem, runContext, metrics);
    }

    if (this.treeDumpPath && this.logger.isLevelEnabled('debug')) {
      await this.dumpTree(root, metrics, this.treeDumpPath);
    }

    const best = root.bestChild();
    this.events.emit('search_end', metrics.iterationsCompleted, 'LATS search completed', {
      metadata: {
        totalTokens: metrics.totalTokensUsed,
        totalCost: metrics.totalCostUsd,
        bestQValue: best ? best.qValue : 0,
        terminationState: this.terminationState,
      },
    });

    return result;
  }

  private abort(termination: TerminationPolicy, error: ExpansionError): ExpansionError {
    this.terminationState = termination.fail(error.message);
    this.metrics.finish();
    this.logger.error(
      { error: error.message, iterations: this.metrics.iterationsCompleted, state: this.terminationState },
      'LatsSearchEngine: search aborted',
    );
    return error;
  }

  private buildResult(root: LatsNode, metrics: SearchMetrics): SearchResult {
    const allStrategies: CodeStrategy[] = [];
    const executedStrategies: CodeStrategy[] = [];
    const scores: Record<string, StrategyScore> = {};

    for (const leaf of getAllLeaves(root)) {
      const strategy = leaf.completedStrategy;
      if (!strategy) continue;

      allStrategies.push(strategy);
      if (leaf.executionResult) executedStrategies.push(strategy);

      scores[strategy.strategyId] = {
        strategyId: strategy.strategyId,
        totalScore: leaf.qValue,
        confidence: root.visitCount > 0 ? leaf.visitCount / root.visitCount : 0,
        recommendation: leaf.qValue >= RECOMMEND_THRESHOLD ? 'LATS selected' : 'Consider alternatives',
      };
    }

    const bestLeaf = findBestLeaf(root);

    return {
      allStrategies,
      executedStrategies,
      scores,
      bestStrategyId: bestLeaf?.completedStrategy?.strategyId ?? null,
      bestScore: bestLeaf ? bestLeaf.qValue : 0,
      totalGenerated: allStrategies.length,
      totalExecuted: executedStrategies.length,
      totalPassed: Object.values(scores).filter((s) => s.totalScore >= PASS_THRESHOLD).length,
      terminationState: this.terminationState,
      metrics: metrics.toJSON(),
    };
  }

  private async persistWinningPath(
    root: LatsNode,
    bestStrategyId: string,
    problem: string,
    context: SearchContext,
    metrics: SearchMetrics,
  ): Promise<void> {
    const store = this.winningPathStore;
    if (!store) return;

    const winningPath = extractWinningPath({
      root,
      bestStrategyId,
      problem,
      context,
      metrics,
      config: this.config,
    });
    if (!winningPath) return;

    try {
      await store.save(winningPath);
    } catch (err) {
      this.logger.error({ error: toError(err).message }, 'LatsSearchEngine: failed to persist winning path');
    }
  }

  private async dumpTree(root: LatsNode, metrics: SearchMetrics, outputPath: string): Promise<void> {
    const dump = {
      problem: root.partialThought.substring(0, 100),
      totalNodes: countNodes(root),
      maxDepth: getMaxDepth(root),
      metrics: metrics.toJSON(),
      tree: snapshotTree(root),
    };

    try {
      await writeFile(outputPath, JSON.stringify(dump, null, 2), 'utf-8');
      this.logger.debug({ outputPath }, 'LatsSearchEngine: tree dumped');
    } catch (err) {
      this.logger.warn({ outputPath, error: toError(err).message }, 'LatsSearchEngine: tree dump failed');
    }
  }
}
