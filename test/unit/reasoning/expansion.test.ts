import { describe, it, expect, beforeEach } from 'vitest';
import { LatsNode } from '../../../src/reasoning/lats/node.js';
import { ExpansionEngine } from '../../../src/reasoning/lats/expansion.js';
import { heuristicTokenEstimator } from '../../../src/reasoning/lats/token-estimator.js';
import { ReflexionPropagator } from '../../../src/reasoning/reflexion/reflexion-propagator.js';
import { SearchMetrics } from '../../../src/cost/metrics.js';
import { MockExecutor } from '../../helpers/mock-executor.js';

describe('ExpansionEngine', () => {
  let metrics: SearchMetrics;
  let reflexion: ReflexionPropagator;

  beforeEach(() => {
    metrics = new SearchMetrics(0, 'run-1');
    reflexion = new ReflexionPropagator();
  });

  it('attaches up to k children and returns the first one', async () => {
    const executor = new MockExecutor();
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 2);
    const root = LatsNode.root('fix the bug');

    const outcome = await engine.expand(root, 'fix the bug', {});

    expect(root.children.map((c) => c.partialThought)).toEqual(['thought 0', 'thought 1']);
    expect(outcome.node).toBe(root.children[0]);
    expect(outcome.created).toHaveLength(2);
    expect(outcome.estimatedTokens).toBe(206);
    expect(metrics.nodesCreated).toBe(2);
  });

  it('passes the node summary and k to the executor', async () => {
    const executor = new MockExecutor();
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 3);
    const root = LatsNode.root('fix the bug');

    await engine.expand(root, 'fix the bug', { problemType: 'bug_fix' });

    expect(executor.thoughtCalls).toHaveLength(1);
    expect(executor.thoughtCalls[0].currentState).toBe('Depth 0\n0. Problem: fix the bug');
    expect(executor.thoughtCalls[0].k).toBe(3);
    expect(executor.thoughtCalls[0].context).toEqual({ problemType: 'bug_fix' });
  });

  it('ignores thoughts beyond k', async () => {
    const executor = new MockExecutor({ thoughts: () => ['a', 'b', 'c', 'd'] });
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 2);
    const root = LatsNode.root('p');

    const outcome = await engine.expand(root, 'p', {});

    expect(outcome.created.map((c) => c.partialThought)).toEqual(['a', 'b']);
    expect(metrics.nodesCreated).toBe(2);
  });

  it('returns the input node when no thoughts come back', async () => {
    const executor = new MockExecutor({ thoughts: () => [] });
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 2);
    const root = LatsNode.root('p');

    const outcome = await engine.expand(root, 'p', {});

    expect(outcome.node).toBe(root);
    expect(outcome.created).toEqual([]);
    expect(root.isLeaf()).toBe(true);
  });

  it('adds sibling failures as rejection context without touching the caller context', async () => {
    const executor = new MockExecutor();
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 1);
    const root = LatsNode.root('p');
    const failed = root.createChild('failed');
    const sibling = root.createChild('sibling');
    reflexion.propagateToParent(failed, 'Syntax error: the generated code does not parse');
    const context = { problemType: 'bug_fix' };

    await engine.expand(sibling, 'p', context);

    expect(executor.thoughtCalls[0].context).toEqual({
      problemType: 'bug_fix',
      rejectionContext:
        'Previously rejected approaches (avoid these failure modes):\n' +
        '- Syntax error: the generated code does not parse',
    });
    expect(context).toEqual({ problemType: 'bug_fix' });
  });

  it('propagates executor failures', async () => {
    const executor = new MockExecutor({ failThoughtsOnCall: 0 });
    const engine = new ExpansionEngine(executor, metrics, heuristicTokenEstimator, reflexion, 2);
    const root = LatsNode.root('p');

    await expect(engine.expand(root, 'p', {})).rejects.toThrow('model unavailable');
    expect(root.isLeaf()).toBe(true);
    expect(metrics.nodesCreated).toBe(0);
  });
});
