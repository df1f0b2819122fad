import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { CompletionError, describeError } from '../errors.js';
import type { CompletionClient, CompletionRequest, LLMConfig, LLMMessage } from './types.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * OpenAI-compatible chat completions client (OpenRouter, OpenAI, DeepSeek, ...).
 * Makes exactly one attempt per call; retrying is left to the caller.
 */
export class OpenAICompatibleClient implements CompletionClient {
  private readonly baseUrl: string;

  constructor(
    private readonly logger: Logger,
    private readonly config: LLMConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.logger.info('llm-client', `Initialized ${config.model} at ${this.baseUrl}`);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const startTime = Date.now();
    const messages: LLMMessage[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    this.logger.debug(
      'llm-client',
      `Completion request: ${request.prompt.length} chars, model=${this.config.model}, maxTokens=${request.maxTokens}`,
    );

    const body: Record<string, unknown> = {
      model: this.config.model,
      messages,
      max_tokens: request.maxTokens,
    };
    if (this.config.temperature !== undefined) {
      body.temperature = this.config.temperature;
    }

    let payload: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(request.timeoutMs),
      });

      if (!response.ok) {
        const errorText = await response.text();
        this.logger.error(
          'llm-client',
          `LLM API error (${response.status}): ${errorText.substring(0, 100)}`,
        );
        throw new CompletionError('status', `LLM API error (${response.status})`, {
          status: response.status,
        });
      }

      payload = await response.json();
    } catch (err) {
      if (err instanceof CompletionError) throw err;
      if (isTimeout(err)) {
        this.logger.error('llm-client', `Request timed out after ${request.timeoutMs}ms`);
        throw new CompletionError('timeout', `LLM request timed out after ${request.timeoutMs}ms`, {
          cause: err,
        });
      }
      this.logger.error('llm-client', `Transport failure: ${describeError(err)}`);
      throw new CompletionError('transport', `LLM transport failure: ${describeError(err)}`, {
        cause: err,
      });
    }

    const parsed = ChatCompletionSchema.safeParse(payload);
    const content = parsed.success ? parsed.data.choices[0].message.content?.trim() : undefined;
    if (!content) {
      throw new CompletionError('empty', 'No content in LLM response');
    }

    this.logger.debug(
      'llm-client',
      `Completion finished in ${Date.now() - startTime}ms, ${content.length} chars`,
    );
    return content;
  }
}
