/**
 * ReflexionPropagator: sideways failure knowledge for tree search.
 *
 * When a leaf fails to execute or scores poorly, a short verbal reason is
 * recorded on its parent. The next expansion under that parent receives the
 * accumulated reasons as guidance, so siblings steer away from known failure
 * modes without re-running them.
 *
 * Based on: Shinn et al. 2023: "Reflexion: Language Agents with Verbal Reinforcement Learning"
 */

import type { LatsNode } from '../lats/node.js';
import type { SearchContext } from '../lats/types.js';
import { getLogger } from '../../core/logger.js';

const RAW_ERROR_FALLBACK_CHARS = 100;
const LOW_VALUE_THRESHOLD = 0.3;

interface FailurePattern {
  test: RegExp;
  reason: string;
}

/** Checked in order, first match wins. */
const FAILURE_PATTERNS: FailurePattern[] = [
  {
    test: /IndexError|RangeError|index out of (range|bounds)|out of range/i,
    reason: 'Index out of range: check collection bounds before indexing',
  },
  {
    test: /TypeError|type mismatch|unsupported operand/i,
    reason: 'Type mismatch: a value is used with an incompatible type',
  },
  {
    test: /AttributeError|has no attribute|Cannot read propert(y|ies) of|is not a function/i,
    reason: 'Missing attribute: the accessed member does not exist on the object',
  },
  {
    test: /ModuleNotFoundError|ImportError|Cannot find module|No module named/i,
    reason: 'Missing module: the import cannot be resolved',
  },
  {
    test: /SyntaxError|invalid syntax|Unexpected token/i,
    reason: 'Syntax error: the generated code does not parse',
  },
  {
    test: /NameError|ReferenceError|is not defined/i,
    reason: 'Undefined name: a referenced variable or function is never declared',
  },
];

export interface ReflexionPropagatorOptions {
  enabled?: boolean;
  maxContextItems?: number;
}

export class ReflexionPropagator {
  private enabled: boolean;
  private maxContextItems: number;
  private logger = getLogger();

  constructor(options: ReflexionPropagatorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.maxContextItems = options.maxContextItems ?? 5;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Turn a raw execution error, or the node's own statistics, into a short reason.
   */
  extractFailureReason(node: LatsNode, rawError?: string): string {
    if (rawError !== undefined && rawError.trim() !== '') {
      for (const pattern of FAILURE_PATTERNS) {
        if (pattern.test.test(rawError)) return pattern.reason;
      }
      return rawError.trim().substring(0, RAW_ERROR_FALLBACK_CHARS);
    }

    if (node.visitCount > 0 && node.qValue < LOW_VALUE_THRESHOLD) {
      return `Low Q-value (${node.qValue.toFixed(2)}) after ${node.visitCount} visit${node.visitCount === 1 ? '' : 's'}`;
    }
    if (node.thoughtScore !== undefined && node.thoughtScore < LOW_VALUE_THRESHOLD) {
      return `Low thought score (${node.thoughtScore.toFixed(2)})`;
    }
    return 'Unknown failure';
  }

  /**
   * Record a reason on the parent. No-op for the root or when disabled.
   */
  propagateToParent(node: LatsNode, reason: string): void {
    if (!this.enabled) return;

    const parent = node.parent;
    if (!parent) return;

    parent.addRejectionReason(reason);
    this.logger.debug(
      { nodeId: node.id, parentId: parent.id, reason },
      'ReflexionPropagator: reason propagated to parent',
    );
  }

  /**
   * Guidance text for the next expansion under `node`, or "" when nothing was rejected.
   * Holds at most `maxContextItems` distinct reasons, most recent kept.
   */
  getRejectionContext(node: LatsNode): string {
    if (node.rejectedReasons.length === 0) return '';

    const unique = [...new Set(node.rejectedReasons)].slice(-this.maxContextItems);
    return [
      'Previously rejected approaches (avoid these failure modes):',
      ...unique.map((reason) => `- ${reason}`),
    ].join('\n');
  }

  /**
   * Context for generating under `node`: reasons recorded on its parent, i.e.
   * the failures of its siblings, become `rejectionContext`. The root uses its own.
   */
  augmentContext(node: LatsNode, context: SearchContext): SearchContext {
    if (!this.enabled) return context;

    const rejectionContext = this.getRejectionContext(node.parent ?? node);
    return rejectionContext ? { ...context, rejectionContext } : context;
  }
}
