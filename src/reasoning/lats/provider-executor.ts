/**
 * ProviderExecutor: a LatsExecutor backed by an LLM provider.
 *
 * Thought and strategy generation are prompted through the provider and
 * validated with zod. Execution is delegated to a StrategyRunner (a sandbox,
 * a test harness) and thought scoring to the hybrid ThoughtEvaluator.
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { LLMProvider } from '../../providers/types.js';
import type { CodeStrategy, ExecutionResult, LatsExecutor, SearchContext } from './types.js';
import { ThoughtEvaluator } from '../tot/evaluator.js';
import type { LatsConfig } from '../../core/types.js';
import { retry, withTimeout } from '../../utils/retry.js';
import { ExecutorError, toError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

/** Default of `search.generatorModel`: let the provider pick its own. */
const UNKNOWN_MODEL = 'unknown';

const ThoughtListSchema = z.array(z.string().min(1));

const StrategyReplySchema = z.object({
  description: z.string().optional(),
  fileChanges: z.record(z.string()),
});

/**
 * Runs a complete strategy (applies its file changes somewhere isolated and
 * runs the checks). Throwing means the strategy could not be executed at all.
 */
export interface StrategyRunner {
  run(strategy: CodeStrategy): Promise<ExecutionResult>;
}

export interface ProviderExecutorOptions {
  model?: string;
  thoughtTemperature?: number;
  strategyTemperature?: number;
  maxTokens?: number;
  /** Extra attempts per provider call. */
  retries?: number;
  retryBaseDelay?: number;
  /** Per provider call; unset means no timeout. */
  timeoutMs?: number;
}

/**
 * First JSON value of the given kind in a model reply, fenced or not.
 */
export function extractJson(content: string, kind: 'array' | 'object'): unknown {
  const pattern = kind === 'array' ? /\[[\s\S]*\]/ : /\{[\s\S]*\}/;
  const match = content.match(pattern);
  if (!match) throw new Error(`No JSON ${kind} found`);
  return JSON.parse(match[0]);
}

function describeContext(context: SearchContext): string {
  const lines: string[] = [];
  if (context.problemType) lines.push(`Problem type: ${context.problemType}`);
  if (context.rejectionContext) lines.push('', context.rejectionContext);
  return lines.join('\n');
}

export class ProviderExecutor implements LatsExecutor {
  private options: Required<Omit<ProviderExecutorOptions, 'model' | 'timeoutMs'>> &
    Pick<ProviderExecutorOptions, 'model' | 'timeoutMs'>;
  private logger = getLogger();

  constructor(
    private provider: LLMProvider,
    private runner: StrategyRunner,
    private evaluator: ThoughtEvaluator,
    options: ProviderExecutorOptions = {},
  ) {
    this.options = {
      model: options.model,
      thoughtTemperature: options.thoughtTemperature ?? 0.7,
      strategyTemperature: options.strategyTemperature ?? 0.2,
      maxTokens: options.maxTokens ?? 4096,
      retries: options.retries ?? 2,
      retryBaseDelay: options.retryBaseDelay ?? 1000,
      timeoutMs: options.timeoutMs,
    };
  }

  /**
   * Executor whose thought judge is built from the `evaluator` section and
   * whose generator model is `search.generatorModel`.
   */
  static fromConfig(
    config: LatsConfig,
    provider: LLMProvider,
    runner: StrategyRunner,
    options: Omit<ProviderExecutorOptions, 'model'> = {},
  ): ProviderExecutor {
    const evaluator = new ThoughtEvaluator(provider, config.evaluator);
    const model = config.search.generatorModel === UNKNOWN_MODEL ? undefined : config.search.generatorModel;
    return new ProviderExecutor(provider, runner, evaluator, { ...options, model });
  }

  async generateNextThoughts(
    currentState: string,
    problem: string,
    context: SearchContext,
    k: number,
  ): Promise<string[]> {
    const systemPrompt = `You are an expert software engineer planning a fix step by step. Propose exactly ${k} distinct next steps that continue the reasoning so far. Each step should be concrete and different from the others.

Respond with ONLY a JSON array of strings:
["first candidate step", "second candidate step", ...]

Do not include any other text.`;

    const userPrompt = [
      `## Problem\n${problem}`,
      `## Reasoning so far\n${currentState}`,
      describeContext(context),
    ].filter((part) => part !== '').join('\n\n');

    const content = await this.complete('generateNextThoughts', systemPrompt, userPrompt, this.options.thoughtTemperature);

    let raw: unknown;
    try {
      raw = extractJson(content, 'array');
    } catch (err) {
      throw new ExecutorError(`Unparseable thought list: ${toError(err).message}`, 'generateNextThoughts', toError(err));
    }
    const parsed = ThoughtListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExecutorError(`Invalid thought list: ${parsed.error.message}`, 'generateNextThoughts', parsed.error);
    }

    this.logger.debug({ requested: k, received: parsed.data.length }, 'ProviderExecutor: thoughts generated');
    return parsed.data.slice(0, k);
  }

  async generateCompleteStrategy(
    thoughtPath: string[],
    problem: string,
    context: SearchContext,
  ): Promise<CodeStrategy> {
    const systemPrompt = `You are an expert software engineer. Turn the reasoning path into a complete code change that solves the problem.

Respond with ONLY a JSON object:
{ "description": "one sentence summary", "fileChanges": { "relative/path.ts": "full new file content" } }

Do not include any other text.`;

    const steps = thoughtPath.map((thought, i) => `${i}. ${thought}`).join('\n');
    const userPrompt = [
      `## Problem\n${problem}`,
      `## Reasoning path\n${steps}`,
      describeContext(context),
    ].filter((part) => part !== '').join('\n\n');

    const content = await this.complete('generateCompleteStrategy', systemPrompt, userPrompt, this.options.strategyTemperature);

    let raw: unknown;
    try {
      raw = extractJson(content, 'object');
    } catch (err) {
      throw new ExecutorError(`Unparseable strategy: ${toError(err).message}`, 'generateCompleteStrategy', toError(err));
    }
    const parsed = StrategyReplySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExecutorError(`Invalid strategy: ${parsed.error.message}`, 'generateCompleteStrategy', parsed.error);
    }

    return {
      strategyId: `strategy-${nanoid(8)}`,
      fileChanges: parsed.data.fileChanges,
      description: parsed.data.description,
    };
  }

  async executeStrategy(strategy: CodeStrategy): Promise<ExecutionResult> {
    return this.runner.run(strategy);
  }

  async evaluateThought(partialThought: string): Promise<number> {
    return this.evaluator.evaluate(partialThought);
  }

  private async complete(
    operation: string,
    systemPrompt: string,
    userPrompt: string,
    temperature: number,
  ): Promise<string> {
    const call = async (): Promise<string> => {
      const request = this.provider.complete({
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        model: this.options.model,
        temperature,
        maxTokens: this.options.maxTokens,
      });
      const response = this.options.timeoutMs !== undefined
        ? await withTimeout(request, this.options.timeoutMs, `${operation} timed out after ${this.options.timeoutMs}ms`)
        : await request;
      return response.content;
    };

    try {
      return await retry(call, {
        maxRetries: this.options.retries,
        baseDelay: this.options.retryBaseDelay,
        onRetry: (attempt, error) => {
          this.logger.warn({ operation, attempt, error: error.message }, 'ProviderExecutor: provider call failed, retrying');
        },
      });
    } catch (err) {
      throw new ExecutorError(`Provider call failed: ${toError(err).message}`, operation, toError(err));
    }
  }
}
