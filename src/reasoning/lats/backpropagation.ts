import type { LatsNode } from './node.js';
import { getLogger } from '../../core/logger.js';

/**
 * Backpropagation phase: fold a reward into every node on the single parent
 * chain from `node` up to and including the root.
 */
export class BackpropagationEngine {
  private logger = getLogger();

  backpropagate(node: LatsNode, reward: number): number {
    const updates: string[] = [];
    let current: LatsNode | null = node;
    let touched = 0;

    while (current) {
      const before = current.qValue;
      current.updateQValue(reward);
      updates.push(`${current.id}: ${before.toFixed(2)} -> ${current.qValue.toFixed(2)}`);
      touched++;
      current = current.parent;
    }

    this.logger.debug({ reward, path: updates.join(' <- ') }, 'BackpropagationEngine: q-values updated');
    return touched;
  }
}
