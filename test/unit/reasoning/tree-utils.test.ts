import { describe, it, expect } from 'vitest';
import { LatsNode } from '../../../src/reasoning/lats/node.js';
import {
  countNodes,
  findNode,
  getAllLeaves,
  getMaxDepth,
  snapshotTree,
} from '../../../src/reasoning/lats/tree-utils.js';

function sampleTree(): { root: LatsNode; a: LatsNode; b: LatsNode; a0: LatsNode; a1: LatsNode } {
  const root = LatsNode.root('p');
  const a = root.createChild('a');
  const b = root.createChild('b');
  const a0 = a.createChild('a0');
  const a1 = a.createChild('a1');
  return { root, a, b, a0, a1 };
}

describe('tree utilities', () => {
  it('getAllLeaves returns leaves in breadth-first order', () => {
    const { root, b, a0, a1 } = sampleTree();
    expect(getAllLeaves(root)).toEqual([b, a0, a1]);
  });

  it('a lone root is its own leaf', () => {
    const root = LatsNode.root('p');
    expect(getAllLeaves(root)).toEqual([root]);
  });

  it('countNodes and getMaxDepth cover the whole tree', () => {
    const { root } = sampleTree();
    expect(countNodes(root)).toBe(5);
    expect(getMaxDepth(root)).toBe(2);
  });

  it('findNode searches breadth-first', () => {
    const { root, a1 } = sampleTree();
    expect(findNode(root, (n) => n.id === 'root-0-1')).toBe(a1);
    expect(findNode(root, (n) => n.id === 'missing')).toBeNull();
  });

  it('handles deep chains without recursion', () => {
    const root = LatsNode.root('p');
    let node = root;
    for (let i = 0; i < 20000; i++) node = node.createChild(`s${i}`);

    expect(countNodes(root)).toBe(20001);
    expect(getMaxDepth(root)).toBe(20000);
    const leaves = getAllLeaves(root);
    expect(leaves).toHaveLength(1);
    expect(leaves[0]).toBe(node);
  });

  it('snapshotTree projects node state in insertion order', () => {
    const { root, a, a0 } = sampleTree();
    a.qValue = 0.12345;
    a.visitCount = 2;
    a.thoughtScore = 0.66666;
    a.isPromising = true;
    a0.markCompleted({ strategyId: 's1', fileChanges: {} });
    root.addRejectionReason('Unknown failure');

    const snapshot = snapshotTree(root);

    expect(snapshot.id).toBe('root');
    expect(snapshot.rejectedReasons).toEqual(['Unknown failure']);
    expect(snapshot.children.map((c) => c.id)).toEqual(['root-0', 'root-1']);
    expect(snapshot.children[0]).toMatchObject({
      thought: 'a',
      qValue: 0.123,
      visitCount: 2,
      thoughtScore: 0.667,
      isPromising: true,
      depth: 1,
      strategyId: null,
    });
    expect(snapshot.children[1].thoughtScore).toBeNull();
    expect(snapshot.children[0].children[0]).toMatchObject({ id: 'root-0-0', isTerminal: true, strategyId: 's1' });
  });

  it('snapshotTree truncates long thoughts', () => {
    const root = LatsNode.root('x'.repeat(60));
    expect(snapshotTree(root).thought).toBe(`Problem: ${'x'.repeat(41)}...`);
  });
});
