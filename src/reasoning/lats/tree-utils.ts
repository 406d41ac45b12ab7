/**
 * Tree utilities. All traversals use explicit work-lists so deep or wide
 * trees never hit the call-stack limit.
 */

import type { LatsNode } from './node.js';

export interface NodeSnapshot {
  id: string;
  thought: string;
  qValue: number;
  visitCount: number;
  thoughtScore: number | null;
  isPromising: boolean;
  isTerminal: boolean;
  depth: number;
  strategyId: string | null;
  rejectedReasons: string[];
  children: NodeSnapshot[];
}

const SNAPSHOT_THOUGHT_CHARS = 50;

/**
 * Leaves in breadth-first order.
 */
export function getAllLeaves(root: LatsNode): LatsNode[] {
  const leaves: LatsNode[] = [];
  const queue: LatsNode[] = [root];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    if (current.isLeaf()) {
      leaves.push(current);
    } else {
      queue.push(...current.children);
    }
  }

  return leaves;
}

export function countNodes(root: LatsNode): number {
  let count = 0;
  const stack: LatsNode[] = [root];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    count++;
    stack.push(...current.children);
  }
  return count;
}

export function getMaxDepth(root: LatsNode): number {
  let max = root.depth;
  const stack: LatsNode[] = [root];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.depth > max) max = current.depth;
    stack.push(...current.children);
  }
  return max;
}

export function findNode(root: LatsNode, predicate: (node: LatsNode) => boolean): LatsNode | null {
  const queue: LatsNode[] = [root];
  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    if (predicate(current)) return current;
    queue.push(...current.children);
  }
  return null;
}

function snapshotOf(node: LatsNode): NodeSnapshot {
  const thought = node.partialThought.length > SNAPSHOT_THOUGHT_CHARS
    ? node.partialThought.substring(0, SNAPSHOT_THOUGHT_CHARS) + '...'
    : node.partialThought;

  return {
    id: node.id,
    thought,
    qValue: Math.round(node.qValue * 1000) / 1000,
    visitCount: node.visitCount,
    thoughtScore: node.thoughtScore === undefined ? null : Math.round(node.thoughtScore * 1000) / 1000,
    isPromising: node.isPromising,
    isTerminal: node.isTerminal,
    depth: node.depth,
    strategyId: node.completedStrategy ? node.completedStrategy.strategyId : null,
    rejectedReasons: [...node.rejectedReasons],
    children: [],
  };
}

/**
 * Nested JSON-ready projection of the whole tree, children in insertion order.
 */
export function snapshotTree(root: LatsNode): NodeSnapshot {
  const rootSnapshot = snapshotOf(root);
  const stack: Array<[LatsNode, NodeSnapshot]> = [[root, rootSnapshot]];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const [node, snapshot] = entry;
    for (const child of node.children) {
      const childSnapshot = snapshotOf(child);
      snapshot.children.push(childSnapshot);
      stack.push([child, childSnapshot]);
    }
  }

  return rootSnapshot;
}
