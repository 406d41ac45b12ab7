export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
}

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * Minimal completion surface the search needs from a model provider.
 * One adapter per provider; the search never branches on provider identity.
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(request: LLMRequest): Promise<LLMResponse>;
}
