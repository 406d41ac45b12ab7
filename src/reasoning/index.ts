// Reasoning: tree search over code strategies

// LATS
export * from './lats/index.js';

// Reflexion
export { ReflexionPropagator } from './reflexion/reflexion-propagator.js';
export type { ReflexionPropagatorOptions } from './reflexion/reflexion-propagator.js';

// Thought scoring
export { ThoughtEvaluator, scoreThoughtHeuristic, parseJudgeScore } from './tot/evaluator.js';
export type { ThoughtEvaluatorOptions } from './tot/evaluator.js';
