// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  /** Hint providers to produce JSON output */
  jsonMode: boolean;
  /** Aborts the HTTP request; retries are the caller's business */
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Raw text from the model (must be JSON-parseable when jsonMode was true) */
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations map the generic message format to provider-specific APIs
   * and leave SDK-level retries off.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}
