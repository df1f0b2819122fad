import { DateTime } from 'luxon';
import { z } from 'zod';
import type { ActivityAnalytics } from '../../core/analytics/ActivityAnalytics.js';
import type { ContentStrategy } from '../../core/analytics/ContentStrategy.js';
import type { DigestPipeline } from '../../core/digest/DigestPipeline.js';
import { describeError, StorageError } from '../../core/errors.js';
import { MessageKind } from '../../core/model/Message.js';
import type { ChatStore } from '../../core/storage/types.js';
import type { Logger } from '../../infra/logger/logger.js';

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiDependencies {
  store: ChatStore;
  analytics: ActivityAnalytics;
  /** null when no completion service is configured */
  digest: DigestPipeline | null;
  /** null when no completion service is configured */
  strategy: ContentStrategy | null;
  /** Zone the daily listing reads calendar days in */
  timezone: string;
  logger: Logger;
}

const ChatIdSchema = z
  .string()
  .regex(/^-?\d+$/)
  .transform(Number)
  .refine(Number.isSafeInteger);

const PageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const MessageQuerySchema = PageSchema.extend({
  kind: z.nativeEnum(MessageKind).optional(),
});

const LocalDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((value) => DateTime.fromISO(value).isValid);

// `to` widens the listing to a range of days
const DayQuerySchema = z
  .object({ date: LocalDateSchema, to: LocalDateSchema.optional() })
  .refine((q) => q.to === undefined || q.to >= q.date);

// Period values are checked by ContentStrategy
const StrategyQuerySchema = z.object({ period: z.string().default('week') });

const ok = (body: unknown): ApiResponse => ({ status: 200, body });
const fail = (status: number, error: string): ApiResponse => ({ status, body: { error } });

/**
 * Transport-agnostic JSON handlers. The express router only moves
 * params in and `{ status, body }` out.
 */
export class ApiController {
  constructor(private readonly deps: ApiDependencies) {}

  health(): ApiResponse {
    return ok({ status: 'ok' });
  }

  dashboard(): Promise<ApiResponse> {
    return this.run('dashboard', async () => ok({ chats: await this.deps.store.dashboard() }));
  }

  stats(): Promise<ApiResponse> {
    return this.run('stats', async () => ok(await this.deps.store.stats()));
  }

  chats(): Promise<ApiResponse> {
    return this.run('chats', async () => ok({ chats: await this.deps.store.listChats() }));
  }

  chat(chatIdParam: string): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'chat', async (chatId) => {
      const chat = await this.deps.store.getChat(chatId);
      return chat ? ok(chat) : fail(404, 'chat not found');
    });
  }

  messages(chatIdParam: string, query: unknown): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'messages', async (chatId) => {
      const parsed = MessageQuerySchema.safeParse(query);
      if (!parsed.success) return fail(400, 'invalid query');
      if (!(await this.deps.store.getChat(chatId))) return fail(404, 'chat not found');
      return ok({ messages: await this.deps.store.listMessages(chatId, parsed.data) });
    });
  }

  messagesByDate(chatIdParam: string, query: unknown): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'messagesByDate', async (chatId) => {
      const parsed = DayQuerySchema.safeParse(query);
      if (!parsed.success) return fail(400, 'date parameter required (YYYY-MM-DD)');
      if (!(await this.deps.store.getChat(chatId))) return fail(404, 'chat not found');
      const { date, to = date } = parsed.data;
      const messages = await this.deps.store.messagesByDate(chatId, date, to);
      return ok({ chatId, from: date, to, timezone: this.deps.timezone, count: messages.length, messages });
    });
  }

  users(query: unknown): Promise<ApiResponse> {
    return this.run('users', async () => {
      const parsed = PageSchema.safeParse(query);
      if (!parsed.success) return fail(400, 'invalid query');
      return ok({ users: await this.deps.store.listUsers(parsed.data) });
    });
  }

  analytics(chatIdParam: string): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'analytics', async (chatId) => {
      const activity = await this.deps.analytics.weekly(chatId);
      return activity ? ok(activity) : fail(404, 'chat not found');
    });
  }

  digest(chatIdParam: string): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'digest', async (chatId) => {
      if (!this.deps.digest) return fail(503, 'digests are disabled');
      const result = await this.deps.digest.generateDigest(chatId);
      if (result.status === 'success') return ok(result);
      switch (result.reason) {
        case 'chat not found':
          return { status: 404, body: result };
        case 'generation failed':
          return { status: 502, body: result };
        case 'no messages in window':
          return ok(result);
      }
    });
  }

  strategy(chatIdParam: string, query: unknown): Promise<ApiResponse> {
    return this.withChatId(chatIdParam, 'strategy', async (chatId) => {
      if (!this.deps.strategy) return fail(503, 'strategy reports are disabled');
      const parsed = StrategyQuerySchema.safeParse(query);
      if (!parsed.success) return fail(400, 'invalid query');
      const result = await this.deps.strategy.generate(chatId, parsed.data.period);
      if (result.status === 'success') return ok(result);
      switch (result.reason) {
        case 'invalid period':
          return { status: 400, body: result };
        case 'chat not found':
          return { status: 404, body: result };
        case 'generation failed':
          return { status: 502, body: result };
        case 'no messages in period':
          return ok(result);
      }
    });
  }

  private withChatId(
    chatIdParam: string,
    operation: string,
    handler: (chatId: number) => Promise<ApiResponse>,
  ): Promise<ApiResponse> {
    const parsed = ChatIdSchema.safeParse(chatIdParam);
    if (!parsed.success) return Promise.resolve(fail(400, 'invalid chat id'));
    return this.run(operation, () => handler(parsed.data));
  }

  private async run(operation: string, handler: () => Promise<ApiResponse>): Promise<ApiResponse> {
    try {
      return await handler();
    } catch (err) {
      if (err instanceof StorageError) {
        this.deps.logger.warn('http', `${operation}: ${err.message}`);
        return fail(503, 'storage unavailable');
      }
      this.deps.logger.error('http', `${operation} failed: ${describeError(err)}`);
      return fail(500, 'internal error');
    }
  }
}
