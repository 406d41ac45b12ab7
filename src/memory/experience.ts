/**
 * Experience store port: long-term memory of solved problems.
 *
 * Winning paths are mirrored here as `AgentExperience` records. The store is
 * optional and best-effort: the search never depends on a save succeeding.
 */

import type { WinningPath } from '../reasoning/lats/winning-path.js';

export const PROBLEM_TYPES = [
  'bug_fix',
  'feature',
  'refactor',
  'performance',
  'security',
  'test',
  'documentation',
  'other',
] as const;

export type ProblemType = (typeof PROBLEM_TYPES)[number];

export interface AgentExperience {
  problemDescription: string;
  problemType: ProblemType;
  strategyId: string;
  strategyType: 'LATS';
  filePaths: string[];
  success: boolean;
  totScore: number;
  reflectionVerdict: string;
  testPassRate: number | null;
  tags: string[];
  createdAt: string;
}

export interface ExperienceRepository {
  save(record: AgentExperience): Promise<void> | void;
}

export function toProblemType(value: string): ProblemType {
  const normalized = value.trim().toLowerCase();
  return PROBLEM_TYPES.find((t) => t === normalized) ?? 'other';
}

export function toAgentExperience(path: WinningPath): AgentExperience {
  const { testsPassed, testsTotal } = path.executionResult;
  const testPassRate =
    typeof testsPassed === 'number' && typeof testsTotal === 'number' && testsTotal > 0
      ? testsPassed / testsTotal
      : null;

  return {
    problemDescription: path.problemDescription,
    problemType: toProblemType(path.problemType),
    strategyId: path.finalStrategyId,
    strategyType: 'LATS',
    filePaths: Object.keys(path.finalCodeChanges),
    success: path.reflectionVerdict === 'ACCEPT',
    totScore: path.finalQValue,
    reflectionVerdict: path.reflectionVerdict,
    testPassRate,
    tags: ['lats', `iterations_${path.totalIterations}`],
    createdAt: path.createdAt,
  };
}

/**
 * Process-local repository, for tests and embedding hosts without a database.
 */
export class InMemoryExperienceRepository implements ExperienceRepository {
  private records: AgentExperience[] = [];

  save(record: AgentExperience): void {
    this.records.push(record);
  }

  getAll(): AgentExperience[] {
    return [...this.records];
  }

  findByProblemType(problemType: ProblemType): AgentExperience[] {
    return this.records.filter((r) => r.problemType === problemType);
  }

  get count(): number {
    return this.records.length;
  }
}
