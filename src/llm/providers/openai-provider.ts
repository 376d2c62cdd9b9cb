import OpenAI from 'openai';
import {
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';

/**
 * OpenAI provider adapter.
 *
 * JSON mode is handled via `response_format: { type: 'json_object' }`.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private client: OpenAI;
  private config: LLMProviderConfig;

  constructor(config: LLMProviderConfig, client?: OpenAI) {
    this.model = config.model;
    this.config = config;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: request.signal },
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty response content');
    }

    const usage = completion.usage;

    return {
      content,
      model: completion.model ?? this.model,
      provider: 'openai',
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}
