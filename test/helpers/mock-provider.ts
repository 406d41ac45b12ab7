/**
 * Mock LLM Provider for Testing
 */

import type { LLMProvider, LLMRequest, LLMResponse } from '../../src/providers/types.js';

export class MockProvider implements LLMProvider {
  name = 'mock';
  defaultModel = 'mock-model';
  responses: Array<string | Error>;
  calls: LLMRequest[] = [];
  private responseIndex = 0;

  constructor(responses: Array<string | Error> = ['Mock response']) {
    this.responses = responses;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    const next = this.responses[this.responseIndex % this.responses.length];
    this.responseIndex++;
    if (next instanceof Error) throw next;
    return {
      content: next,
      model: request.model ?? this.defaultModel,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      finishReason: 'stop',
    };
  }
}
