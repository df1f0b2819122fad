import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { buildStrategyPrompt, STRATEGY_SYSTEM_PROMPT } from '../digest/prompts.js';
import { formatInZone, formatTaggedTranscript } from '../digest/transcript.js';
import { CompletionError } from '../errors.js';
import type { CompletionClient } from '../llm/types.js';
import type { ChatStore } from '../storage/types.js';

export const StrategyPeriodSchema = z.enum(['week', 'month']);
export type StrategyPeriod = z.infer<typeof StrategyPeriodSchema>;

export const STRATEGY_PERIOD_DAYS: Record<StrategyPeriod, number> = { week: 7, month: 30 };

const MAX_MESSAGES = 500;
const MAX_MESSAGE_CHARS = 300;
const MAX_TOKENS = 800;
const TIMEOUT_MS = 45_000;
const RANGE_FORMAT = 'dd.MM.yyyy';

export type StrategyFailureReason =
  | 'invalid period'
  | 'chat not found'
  | 'no messages in period'
  | 'generation failed';

export type StrategyResult =
  | {
      status: 'success';
      chatKind: string;
      period: StrategyPeriod;
      /** Local dates of the oldest and newest message analyzed */
      dateRange: string;
      messagesAnalyzed: number;
      report: string;
    }
  | { status: 'failure'; reason: StrategyFailureReason };

export interface ContentStrategyOptions {
  timezone: string;
}

/**
 * Content report over a chat's recent week or month: what drew activity,
 * what to do more or less of, and post ideas.
 */
export class ContentStrategy {
  private readonly timezone: string;

  constructor(
    private readonly store: ChatStore,
    private readonly completion: CompletionClient,
    private readonly logger: Logger,
    options: ContentStrategyOptions,
  ) {
    this.timezone = options.timezone;
  }

  async generate(chatId: number, periodInput: string = 'week'): Promise<StrategyResult> {
    const parsedPeriod = StrategyPeriodSchema.safeParse(periodInput);
    if (!parsedPeriod.success) {
      return { status: 'failure', reason: 'invalid period' };
    }
    const period = parsedPeriod.data;

    const chat = await this.store.getChat(chatId);
    if (!chat) {
      return { status: 'failure', reason: 'chat not found' };
    }

    // Newest first from the store so the cap keeps the latest; the prompt reads in time order
    const recent = await this.store.periodMessages(chatId, STRATEGY_PERIOD_DAYS[period], MAX_MESSAGES);
    const messages = [...recent].reverse();
    const first = messages[0];
    const last = messages[messages.length - 1];
    if (!first || !last) {
      return { status: 'failure', reason: 'no messages in period' };
    }

    const dateRange = [first, last]
      .map((m) => formatInZone(m.sentAt, this.timezone, RANGE_FORMAT))
      .join(' - ');

    const prompt = buildStrategyPrompt({
      chatKind: chat.kind,
      period,
      chatTitle: chat.title ?? `Chat ${chatId}`,
      dateRange,
      messageCount: messages.length,
      transcript: formatTaggedTranscript(messages, this.timezone, MAX_MESSAGE_CHARS),
    });

    this.logger.info(
      'strategy',
      `Generating strategy for chat ${chatId}, period=${period}, ${messages.length} messages`,
    );

    let report: string;
    try {
      report = await this.completion.complete({
        prompt,
        system: STRATEGY_SYSTEM_PROMPT,
        maxTokens: MAX_TOKENS,
        timeoutMs: TIMEOUT_MS,
      });
    } catch (err) {
      if (!(err instanceof CompletionError)) throw err;
      this.logger.warn('strategy', `Strategy for chat ${chatId} failed (${err.kind}): ${err.message}`);
      return { status: 'failure', reason: 'generation failed' };
    }

    return {
      status: 'success',
      chatKind: chat.kind,
      period,
      dateRange,
      messagesAnalyzed: messages.length,
      report,
    };
  }
}
