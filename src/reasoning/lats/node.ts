/**
 * LatsNode: a vertex of the search tree.
 *
 * Children are owned and kept in insertion order; `parent` is a back-reference
 * set exactly once by `addChild`. Nodes are never re-parented, so the tree
 * stays acyclic and `depth === parent.depth + 1` holds for every non-root node.
 */

import type { CodeStrategy, ExecutionResult } from './types.js';

const UCB_EPSILON = 1e-6;
const DEFAULT_SUMMARY_CHARS = 500;
const SUMMARY_RECENT_STEPS = 3;

export interface LatsNodeInit {
  id: string;
  partialThought: string;
  thoughtDiff?: string;
}

export class LatsNode {
  readonly id: string;
  readonly partialThought: string;
  readonly thoughtDiff: string;
  readonly children: LatsNode[] = [];
  readonly rejectedReasons: string[] = [];

  private _parent: LatsNode | null = null;
  private _depth = 0;
  private _completedStrategy: CodeStrategy | undefined;

  visitCount = 0;
  qValue = 0;
  /** Set only when the node was simulated as an intermediate thought. */
  thoughtScore: number | undefined;
  isTerminal = false;
  isPromising = false;
  executionResult: ExecutionResult | undefined;

  constructor(init: LatsNodeInit) {
    this.id = init.id;
    this.partialThought = init.partialThought;
    this.thoughtDiff = init.thoughtDiff ?? init.partialThought;
  }

  static root(problem: string): LatsNode {
    return new LatsNode({ id: 'root', partialThought: `Problem: ${problem}` });
  }

  get parent(): LatsNode | null {
    return this._parent;
  }

  get depth(): number {
    return this._depth;
  }

  get completedStrategy(): CodeStrategy | undefined {
    return this._completedStrategy;
  }

  addChild(child: LatsNode): LatsNode {
    if (child._parent !== null || child === this) {
      throw new Error(`Node ${child.id} already belongs to a tree`);
    }
    child._parent = this;
    child._depth = this._depth + 1;
    this.children.push(child);
    return child;
  }

  /**
   * Create and attach a child whose id is `{parentId}-{childIndex}`.
   */
  createChild(thought: string): LatsNode {
    return this.addChild(
      new LatsNode({
        id: `${this.id}-${this.children.length}`,
        partialThought: thought,
        thoughtDiff: thought,
      }),
    );
  }

  isLeaf(): boolean {
    return this.children.length === 0;
  }

  /**
   * UCB1 score. Only meaningful for visited children: selection handles
   * unvisited ones before comparing scores.
   */
  ucb(explorationConstant: number): number {
    const parentVisits = this._parent ? this._parent.visitCount : this.visitCount;
    const exploration = Math.sqrt(
      Math.log(parentVisits + 1) / (this.visitCount + UCB_EPSILON),
    );
    return this.qValue + explorationConstant * exploration;
  }

  /**
   * Incremental mean: after rewards r1..rk, qValue === mean(r1..rk).
   */
  updateQValue(reward: number): void {
    this.visitCount += 1;
    this.qValue += (reward - this.qValue) / this.visitCount;
  }

  /**
   * Attach a (new) strategy. Any result of a previous strategy is dropped.
   */
  markCompleted(strategy: CodeStrategy): void {
    this._completedStrategy = strategy;
    this.executionResult = undefined;
    this.isTerminal = true;
  }

  addRejectionReason(reason: string): void {
    this.rejectedReasons.push(reason);
  }

  /**
   * Partial thoughts from the root down to this node.
   */
  getFullPath(): string[] {
    const path: string[] = [];
    let current: LatsNode | null = this;
    while (current) {
      path.push(current.partialThought);
      current = current._parent;
    }
    return path.reverse();
  }

  /**
   * Bounded projection of the path, used to keep expansion prompts small.
   */
  getSummary(maxChars: number = DEFAULT_SUMMARY_CHARS): string {
    const path = this.getFullPath();
    const recent = path.slice(-SUMMARY_RECENT_STEPS);
    const omitted = path.length - recent.length;

    const lines: string[] = [`Depth ${this._depth}`];
    if (omitted > 0) {
      lines.push(`(${omitted} earlier step${omitted === 1 ? '' : 's'} omitted)`);
    }
    recent.forEach((thought, i) => {
      lines.push(`${omitted + i}. ${thought}`);
    });

    const summary = lines.join('\n');
    if (summary.length <= maxChars) return summary;
    return summary.slice(0, Math.max(0, maxChars - 3)) + '...';
  }

  /**
   * Child with the highest q-value, first one on ties.
   */
  bestChild(): LatsNode | null {
    let best: LatsNode | null = null;
    for (const child of this.children) {
      if (!best || child.qValue > best.qValue) best = child;
    }
    return best;
  }
}
