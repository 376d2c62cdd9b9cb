import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import {
  LLMMessage,
  LLMProvider,
  LLMProviderConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';

/**
 * Google Gemini provider adapter.
 *
 * Key differences from OpenAI:
 * 1. System instruction is a separate parameter, not in the messages array.
 * 2. Role mapping: 'assistant' → 'model', 'user' stays 'user'.
 * 3. JSON mode via `generationConfig: { responseMimeType: 'application/json' }`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private config: LLMProviderConfig;

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.config = config;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemInstruction = '';
    const nonSystemMessages: LLMMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system') {
        systemInstruction += (systemInstruction ? '\n\n' : '') + msg.content;
      } else {
        nonSystemMessages.push(msg);
      }
    }

    const model = this.genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: systemInstruction || undefined,
      generationConfig: {
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxTokens,
        ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
      },
    });

    const result = await model.generateContent({ contents: buildContents(nonSystemMessages) }, { signal: request.signal });
    const response = result.response;
    const content = response.text();

    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usageMetadata = response.usageMetadata;

    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Gemini uses 'user' and 'model' roles with parts: [{ text }].
 * Consecutive same-role messages are merged; the first message must be 'user'.
 */
function buildContents(messages: LLMMessage[]): Content[] {
  const contents: Content[] = [];

  for (const msg of messages) {
    const role = msg.role === 'assistant' ? 'model' : 'user';
    const prev = contents[contents.length - 1];
    if (prev && prev.role === role) {
      prev.parts.push({ text: msg.content });
    } else {
      contents.push({ role, parts: [{ text: msg.content }] });
    }
  }

  if (contents.length === 0 || contents[0].role !== 'user') {
    contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
  }

  return contents;
}
