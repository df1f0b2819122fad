import type { DigestSettings } from '../../infra/config/config.js';
import type { Logger } from '../../infra/logger/logger.js';
import { CompletionError } from '../errors.js';
import type { CompletionClient } from '../llm/types.js';
import type { ChatStore } from '../storage/types.js';
import { buildDigestPrompt, DIGEST_SYSTEM_PROMPT } from './prompts.js';
import { formatInZone, formatTranscript, PERIOD_FORMAT } from './transcript.js';

const HOUR_MS = 3_600_000;

export type DigestFailureReason = 'chat not found' | 'no messages in window' | 'generation failed';

export type DigestResult =
  | {
      status: 'success';
      summary: string;
      messageCount: number;
      /** Send time of the first and last message included */
      periodStart: Date;
      periodEnd: Date;
    }
  | { status: 'failure'; reason: DigestFailureReason };

export interface DigestPipelineOptions {
  settings: DigestSettings;
  timezone: string;
  timeoutMs: number;
  now?: () => Date;
}

/**
 * Turns the trailing window of a chat into one completion. Read-only against the store.
 */
export class DigestPipeline {
  private readonly settings: DigestSettings;
  private readonly timezone: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: ChatStore,
    private readonly completion: CompletionClient,
    private readonly logger: Logger,
    options: DigestPipelineOptions,
  ) {
    this.settings = options.settings;
    this.timezone = options.timezone;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  async generateDigest(chatId: number): Promise<DigestResult> {
    const chat = await this.store.getChat(chatId);
    if (!chat) {
      return { status: 'failure', reason: 'chat not found' };
    }

    // Oldest first: when the window holds more than the cap, the earliest messages are kept
    const since = new Date(this.now().getTime() - this.settings.windowHours * HOUR_MS);
    const messages = await this.store.digestMessages(chatId, {
      since,
      limit: this.settings.maxMessages,
    });
    const first = messages[0];
    const last = messages[messages.length - 1];
    if (!first || !last) {
      this.logger.debug('digest', `Chat ${chatId} has no messages since ${since.toISOString()}`);
      return { status: 'failure', reason: 'no messages in window' };
    }

    const prompt = buildDigestPrompt({
      chatTitle: chat.title ?? `Chat ${chatId}`,
      periodStart: formatInZone(first.sentAt, this.timezone, PERIOD_FORMAT),
      periodEnd: formatInZone(last.sentAt, this.timezone, PERIOD_FORMAT),
      messageCount: messages.length,
      transcript: formatTranscript(messages, this.timezone, this.settings.maxMessageChars),
    });

    this.logger.info('digest', `Generating digest for chat ${chatId} from ${messages.length} messages`);

    let summary: string;
    try {
      summary = await this.completion.complete({
        prompt,
        system: DIGEST_SYSTEM_PROMPT,
        maxTokens: this.settings.maxOutputTokens,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (!(err instanceof CompletionError)) throw err;
      this.logger.warn('digest', `Digest for chat ${chatId} failed (${err.kind}): ${err.message}`);
      return { status: 'failure', reason: 'generation failed' };
    }

    return {
      status: 'success',
      summary,
      messageCount: messages.length,
      periodStart: first.sentAt,
      periodEnd: last.sentAt,
    };
  }
}
