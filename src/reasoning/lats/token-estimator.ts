import type { TokenEstimator } from './types.js';
import { countWords } from '../../utils/tokens.js';

/**
 * Word-count approximation of model usage. Not measured usage: adapters that
 * see provider-reported token counts should supply their own estimator.
 */
export const heuristicTokenEstimator: TokenEstimator = {
  expansion(problem: string): number {
    return countWords(problem) * 2 + 200;
  },
  leafSimulation(): number {
    return 500;
  },
  intermediateSimulation(): number {
    return 50;
  },
};
