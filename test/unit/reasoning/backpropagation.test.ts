import { describe, it, expect } from 'vitest';
import { LatsNode } from '../../../src/reasoning/lats/node.js';
import { BackpropagationEngine } from '../../../src/reasoning/lats/backpropagation.js';

describe('BackpropagationEngine', () => {
  const engine = new BackpropagationEngine();

  it('updates every node from the leaf up to the root', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const a0 = a.createChild('a0');

    expect(engine.backpropagate(a0, 1)).toBe(3);
    expect([root.visitCount, a.visitCount, a0.visitCount]).toEqual([1, 1, 1]);
    expect([root.qValue, a.qValue, a0.qValue]).toEqual([1, 1, 1]);
  });

  it('leaves nodes off the path untouched', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');
    const a0 = a.createChild('a0');

    engine.backpropagate(a0, 1);
    expect(engine.backpropagate(a, 0)).toBe(2);

    expect(root.visitCount).toBe(2);
    expect(root.qValue).toBe(0.5);
    expect(a.qValue).toBe(0.5);
    expect(a0.visitCount).toBe(1);
    expect(b.visitCount).toBe(0);
    expect(b.qValue).toBe(0);
  });

  it('keeps root visits equal to the number of backpropagations', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');

    engine.backpropagate(a, 0.2);
    engine.backpropagate(b, 0.6);
    engine.backpropagate(root, 0.4);

    expect(root.visitCount).toBe(3);
    expect(root.qValue).toBeCloseTo(0.4);
  });
});
