/**
 * LLM message format (OpenAI-compatible)
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * One text-in/text-out request
 */
export interface CompletionRequest {
  prompt: string;

  /** Optional system instruction sent ahead of the prompt */
  system?: string;

  /** Upper bound on generated tokens */
  maxTokens: number;

  /** Hard limit for the whole call, response body included */
  timeoutMs: number;
}

/**
 * Text completion capability. Failures reject with `CompletionError`.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * LLM configuration
 */
export interface LLMConfig {
  /** API base URL, e.g. https://openrouter.ai/api/v1 */
  baseUrl: string;

  /** API key */
  apiKey: string;

  /** Model name */
  model: string;

  /** Temperature (0-2, provider default when omitted) */
  temperature?: number;
}
