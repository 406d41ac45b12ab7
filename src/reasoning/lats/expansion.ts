import type { LatsExecutor, SearchContext, TokenEstimator } from './types.js';
import type { LatsNode } from './node.js';
import type { SearchMetrics } from '../../cost/metrics.js';
import type { ReflexionPropagator } from '../reflexion/reflexion-propagator.js';
import { getLogger } from '../../core/logger.js';

export interface ExpansionOutcome {
  /** First created child, or the input node when nothing was generated. */
  node: LatsNode;
  created: LatsNode[];
  estimatedTokens: number;
}

/**
 * Expansion phase: ask the executor for up to k next thoughts and attach them
 * as children. Executor failures propagate unchanged; the caller treats them
 * as fatal for the run.
 */
export class ExpansionEngine {
  private logger = getLogger();

  constructor(
    private executor: LatsExecutor,
    private metrics: SearchMetrics,
    private tokenEstimator: TokenEstimator,
    private reflexion: ReflexionPropagator,
    private k: number,
  ) {}

  async expand(node: LatsNode, problem: string, context: SearchContext): Promise<ExpansionOutcome> {
    const expansionContext = this.reflexion.augmentContext(node, context);

    const thoughts = await this.executor.generateNextThoughts(
      node.getSummary(),
      problem,
      expansionContext,
      this.k,
    );

    const created: LatsNode[] = [];
    for (const thought of thoughts.slice(0, this.k)) {
      created.push(node.createChild(thought));
      this.metrics.nodesCreated += 1;
    }

    this.logger.debug(
      { nodeId: node.id, created: created.length, withRejections: expansionContext.rejectionContext !== undefined },
      'ExpansionEngine: node expanded',
    );

    return {
      node: created.length > 0 ? created[0] : node,
      created,
      estimatedTokens: this.tokenEstimator.expansion(problem, thoughts),
    };
  }
}
