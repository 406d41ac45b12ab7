import type { MCTSConfig } from '../../core/types.js';
import type { LatsNode } from './node.js';

export type SelectionConfig = Pick<MCTSConfig, 'maxDepth' | 'explorationConstant'>;

/**
 * UCT walk from the root to a frontier node.
 *
 * Unvisited children are taken first, in insertion order; among visited
 * children the highest UCB1 wins, first-encountered on ties. Pure: reads the
 * tree, never mutates it.
 */
export class SelectionPolicy {
  constructor(private config: SelectionConfig) {}

  select(root: LatsNode): LatsNode {
    let node = root;

    while (!node.isLeaf() && node.depth < this.config.maxDepth) {
      node = this.pickChild(node);
    }

    return node;
  }

  private pickChild(node: LatsNode): LatsNode {
    const unvisited = node.children.find((c) => c.visitCount === 0);
    if (unvisited) return unvisited;

    let best = node.children[0];
    let bestScore = best.ucb(this.config.explorationConstant);
    for (let i = 1; i < node.children.length; i++) {
      const child = node.children[i];
      const score = child.ucb(this.config.explorationConstant);
      if (score > bestScore) {
        best = child;
        bestScore = score;
      }
    }
    return best;
  }
}
