import type { MCTSConfig } from '../../core/types.js';
import type { TerminationState } from './types.js';
import type { LatsNode } from './node.js';
import { getAllLeaves } from './tree-utils.js';

export type TerminationConfig = Pick<
  MCTSConfig,
  | 'maxIterations'
  | 'earlyStopThreshold'
  | 'enableEarlyGiveup'
  | 'earlyGiveupIterations'
  | 'earlyGiveupThreshold'
>;

export interface TerminationInput {
  root: LatsNode;
  iterationsCompleted: number;
  cancelled: boolean;
  budgetExceeded: boolean;
}

/**
 * Stop conditions as a one-way state machine: `running` moves to exactly one
 * terminal state and stays there.
 *
 * Checked after every completed iteration, first match wins:
 * cancelled, budget_exceeded, early_giveup, early_stop. A loop that runs out
 * of iterations ends in max_iterations; a fatal error ends it in failed.
 */
export class TerminationPolicy {
  private _state: TerminationState = 'running';
  private _reason = '';

  constructor(private config: TerminationConfig) {}

  get state(): TerminationState {
    return this._state;
  }

  get reason(): string {
    return this._reason;
  }

  get isTerminal(): boolean {
    return this._state !== 'running';
  }

  /**
   * Top-of-iteration check: only the cancellation flag is consulted here.
   */
  checkCancelled(cancelled: boolean): boolean {
    if (this.isTerminal) return true;
    if (cancelled) this.transition('cancelled', 'Cancellation requested');
    return this.isTerminal;
  }

  evaluate(input: TerminationInput): TerminationState {
    if (this.isTerminal) return this._state;

    if (input.cancelled) {
      this.transition('cancelled', 'Cancellation requested');
    } else if (input.budgetExceeded) {
      this.transition('budget_exceeded', 'Token or cost budget exhausted');
    } else if (this.shouldGiveUp(input.root, input.iterationsCompleted)) {
      this.transition(
        'early_giveup',
        `Best leaf q-value below ${this.config.earlyGiveupThreshold} after ${input.iterationsCompleted} iterations`,
      );
    } else if (this.hasGoodSolution(input.root)) {
      this.transition('early_stop', `A leaf reached q-value ${this.config.earlyStopThreshold}`);
    } else if (input.iterationsCompleted >= this.config.maxIterations) {
      this.transition('max_iterations', `Completed ${input.iterationsCompleted} iterations`);
    }

    return this._state;
  }

  /**
   * Mark a loop that ended without any other condition firing.
   */
  finish(iterationsCompleted: number): TerminationState {
    if (!this.isTerminal) {
      this.transition('max_iterations', `Completed ${iterationsCompleted} iterations`);
    }
    return this._state;
  }

  /**
   * Fatal error: the run stops without a result.
   */
  fail(reason: string): TerminationState {
    if (!this.isTerminal) this.transition('failed', reason);
    return this._state;
  }

  /**
   * Give-up is only considered once more than `earlyGiveupIterations` iterations ran.
   */
  shouldGiveUp(root: LatsNode, iterationsCompleted: number): boolean {
    if (!this.config.enableEarlyGiveup) return false;
    if (iterationsCompleted <= this.config.earlyGiveupIterations) return false;

    const leaves = getAllLeaves(root);
    if (leaves.length === 0) return false;

    const best = leaves.reduce((max, leaf) => Math.max(max, leaf.qValue), -Infinity);
    return best < this.config.earlyGiveupThreshold;
  }

  hasGoodSolution(root: LatsNode): boolean {
    return getAllLeaves(root).some((leaf) => leaf.qValue >= this.config.earlyStopThreshold);
  }

  private transition(state: TerminationState, reason: string): void {
    this._state = state;
    this._reason = reason;
  }
}
