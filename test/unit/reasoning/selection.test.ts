import { describe, it, expect } from 'vitest';
import { LatsNode } from '../../../src/reasoning/lats/node.js';
import { SelectionPolicy } from '../../../src/reasoning/lats/selection.js';

function visit(node: LatsNode, visits: number, q: number): void {
  node.visitCount = visits;
  node.qValue = q;
}

describe('SelectionPolicy', () => {
  const policy = new SelectionPolicy({ maxDepth: 3, explorationConstant: 1.414 });

  it('returns the root while it has no children', () => {
    const root = LatsNode.root('p');
    expect(policy.select(root)).toBe(root);
  });

  it('takes unvisited children first, in insertion order', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');
    root.createChild('c');

    expect(policy.select(root)).toBe(a);

    visit(root, 1, 0.9);
    visit(a, 1, 0.9);
    expect(policy.select(root)).toBe(b);
  });

  it('picks the highest UCB among visited children', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');
    visit(root, 2, 0.55);
    visit(a, 1, 0.2);
    visit(b, 1, 0.9);

    expect(policy.select(root)).toBe(b);
  });

  it('prefers the less visited child when q-values are equal', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');
    visit(root, 4, 0.5);
    visit(a, 3, 0.5);
    visit(b, 1, 0.5);

    expect(policy.select(root)).toBe(b);
  });

  it('breaks exact UCB ties toward the first child', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const b = root.createChild('b');
    visit(root, 2, 0.5);
    visit(a, 1, 0.5);
    visit(b, 1, 0.5);

    expect(policy.select(root)).toBe(a);
  });

  it('descends until a leaf', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    const a0 = a.createChild('a0');
    visit(root, 1, 0.5);
    visit(a, 1, 0.5);

    expect(policy.select(root)).toBe(a0);
  });

  it('stops at maxDepth even when the node has children', () => {
    const shallow = new SelectionPolicy({ maxDepth: 1, explorationConstant: 1.414 });
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    a.createChild('a0');
    visit(root, 1, 0.5);
    visit(a, 1, 0.5);

    expect(shallow.select(root)).toBe(a);
  });

  it('does not mutate the tree', () => {
    const root = LatsNode.root('p');
    const a = root.createChild('a');
    visit(root, 1, 0.3);
    visit(a, 1, 0.3);

    policy.select(root);
    expect(root.visitCount).toBe(1);
    expect(a.visitCount).toBe(1);
    expect(a.qValue).toBe(0.3);
  });
});
