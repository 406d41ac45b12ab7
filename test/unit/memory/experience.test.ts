import { describe, it, expect } from 'vitest';
import {
  InMemoryExperienceRepository,
  toAgentExperience,
  toProblemType,
} from '../../../src/memory/experience.js';
import type { WinningPath } from '../../../src/reasoning/lats/winning-path.js';

const path: WinningPath = {
  runId: 'run-1',
  createdAt: '2024-01-02T03:04:05.000Z',
  problemDescription: 'speed up search',
  problemType: 'Performance',
  thoughtSequence: ['Problem: speed up search'],
  finalStrategyId: 's3',
  finalCodeChanges: { 'src/search.ts': '', 'src/index.ts': '' },
  finalQValue: 0.4,
  totalIterations: 7,
  totalNodesExplored: 9,
  executionResult: { success: true, testsPassed: 3, testsTotal: 4 },
  reflectionVerdict: 'REVISE',
  llmModel: 'test-model',
  config: { maxIterations: 10, maxDepth: 3, explorationConstant: 1.414, strategiesPerExpansion: 3 },
};

describe('toProblemType', () => {
  it('normalises known types and falls back to other', () => {
    expect(toProblemType(' Bug_Fix ')).toBe('bug_fix');
    expect(toProblemType('unknown')).toBe('other');
  });
});

describe('toAgentExperience', () => {
  it('maps a winning path to an experience record', () => {
    expect(toAgentExperience(path)).toEqual({
      problemDescription: 'speed up search',
      problemType: 'performance',
      strategyId: 's3',
      strategyType: 'LATS',
      filePaths: ['src/search.ts', 'src/index.ts'],
      success: false,
      totScore: 0.4,
      reflectionVerdict: 'REVISE',
      testPassRate: 0.75,
      tags: ['lats', 'iterations_7'],
      createdAt: '2024-01-02T03:04:05.000Z',
    });
  });

  it('leaves the pass rate empty without test counts', () => {
    expect(toAgentExperience({ ...path, executionResult: { success: false } }).testPassRate).toBeNull();
  });
});

describe('InMemoryExperienceRepository', () => {
  it('stores records and filters by problem type', () => {
    const repository = new InMemoryExperienceRepository();
    repository.save(toAgentExperience(path));
    repository.save(toAgentExperience({ ...path, problemType: 'bug_fix' }));

    expect(repository.count).toBe(2);
    expect(repository.findByProblemType('bug_fix')).toHaveLength(1);
    expect(repository.findByProblemType('security')).toEqual([]);
  });
});
