import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/core/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/core/logger.js')>();
  const { default: pino } = await import('pino');
  return { ...actual, createLogger: vi.fn(() => pino({ level: 'silent' })) };
});

import { LatsSearchEngine } from '../../src/reasoning/lats/search-engine.js';
import { LatsConfigSchema } from '../../src/core/types.js';
import { createLogger } from '../../src/core/logger.js';
import type { StrategyRunner } from '../../src/reasoning/lats/provider-executor.js';
import { MockExecutor, MockScorer } from '../helpers/mock-executor.js';
import { MockProvider } from '../helpers/mock-provider.js';

describe('LatsSearchEngine.fromConfig', () => {
  beforeEach(() => {
    vi.mocked(createLogger).mockClear();
  });

  it('builds a provider-backed executor from the evaluator and search sections', async () => {
    const provider = new MockProvider(['["add a guard clause"]', '0.9']);
    const runner: StrategyRunner = { run: vi.fn(async () => ({ success: true })) };
    const config = LatsConfigSchema.parse({
      search: { maxIterations: 1, maxDepth: 3, strategiesPerExpansion: 1, generatorModel: 'gen-model' },
      evaluator: { heuristicWeight: 0, modelWeight: 1, verifierModel: 'judge-model', temperature: 0.1 },
      persistence: { saveWinningPaths: false },
    });

    const engine = LatsSearchEngine.fromConfig(config, { provider, runner, scorer: new MockScorer() });
    await engine.search('fix the bug');

    expect(provider.calls).toHaveLength(2);
    expect(provider.calls[0].model).toBe('gen-model');
    expect(provider.calls[0].temperature).toBe(0.7);
    expect(provider.calls[1].model).toBe('judge-model');
    expect(provider.calls[1].temperature).toBe(0.1);
    expect(engine.getRoot()?.children[0].thoughtScore).toBeCloseTo(0.9);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it('switches to the verbose logger when logging.verbose is set', () => {
    const config = LatsConfigSchema.parse({
      persistence: { saveWinningPaths: false },
      logging: { verbose: true },
    });

    LatsSearchEngine.fromConfig(config, { executor: new MockExecutor(), scorer: new MockScorer() });

    expect(createLogger).toHaveBeenCalledWith('lats', true);
  });

  it('keeps the current logger when logging.verbose is off', () => {
    const config = LatsConfigSchema.parse({ persistence: { saveWinningPaths: false } });

    LatsSearchEngine.fromConfig(config, { executor: new MockExecutor(), scorer: new MockScorer() });

    expect(createLogger).not.toHaveBeenCalled();
  });
});
