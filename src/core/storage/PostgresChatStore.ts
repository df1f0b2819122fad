import type { Logger } from '../../infra/logger/logger.js';
import { withTransaction, type SqlPool } from '../../infra/db/postgres.js';
import { StorageError } from '../errors.js';
import { toChatKind, type StoredChat } from '../model/Chat.js';
import { toMessageKind, type MessageRecord } from '../model/Message.js';
import { UNKNOWN_AUTHOR } from '../model/User.js';
import {
  DAILY_MESSAGE_COUNTS,
  DASHBOARD,
  DELETE_CHAT,
  DELETE_USER,
  DIGEST_MESSAGES,
  LIST_CHATS,
  LIST_MESSAGES,
  LIST_USERS,
  MESSAGES_BY_DATE,
  OVERVIEW_STATS,
  PERIOD_MESSAGES,
  SELECT_CHAT,
  SELECT_MESSAGE,
  UPSERT_CHAT,
  UPSERT_MESSAGE,
  UPSERT_USER,
} from './queries.js';
import {
  CONTRIBUTOR_WINDOW_DAYS,
  TOP_CONTRIBUTORS,
  type ChatListEntry,
  type ChatStore,
  type DailyCount,
  type DashboardChat,
  type DigestMessage,
  type DigestWindow,
  type MessageQuery,
  type MessageView,
  type OverviewStats,
  type PageOptions,
  type PeriodMessage,
  type StoreOptions,
  type TopContributor,
  type UserListEntry,
  type WriteRequest,
} from './types.js';

// BIGINT columns arrive as strings
type BigIntColumn = string;

interface ChatRow {
  id: BigIntColumn;
  type: string;
  title: string | null;
  username: string | null;
  first_seen_at: Date;
  last_updated_at: Date;
}

interface MessageRow {
  chat_id: BigIntColumn;
  message_id: BigIntColumn;
  user_id: BigIntColumn | null;
  message_type: string;
  text: string | null;
  caption: string | null;
  reply_to_message_id: BigIntColumn | null;
  forward_from_chat_id: BigIntColumn | null;
  sent_at: Date;
  edited_at: Date | null;
  raw_message: unknown;
}

interface DashboardRow {
  id: BigIntColumn;
  title: string | null;
  total_messages: number;
  today_messages: number;
  last_text: string | null;
  last_author: string | null;
  last_sent_at: Date | null;
  top_contributors: Array<{ userId: number | string; name: string; count: number | string }>;
}

interface DigestRow {
  text: string;
  author: string;
  sent_at: Date;
}

interface PeriodRow {
  text: string;
  author: string;
  sent_at: Date;
  message_type: string;
}

interface StatsRow {
  total_chats: number;
  total_users: number;
  total_messages: number;
  messages_today: number;
  messages_by_kind: Record<string, number>;
}

interface ChatListRow {
  id: BigIntColumn;
  type: string;
  title: string | null;
  username: string | null;
  message_count: number;
  user_count: number;
  last_message_at: Date | null;
  first_seen_at: Date;
}

interface MessageViewRow {
  message_id: BigIntColumn;
  message_type: string;
  text: string | null;
  caption: string | null;
  sent_at: Date;
  edited_at: Date | null;
  reply_to_message_id: BigIntColumn | null;
  user_id: BigIntColumn | null;
  first_name: string | null;
  last_name: string | null;
  username: string | null;
}

interface UserListRow {
  id: BigIntColumn;
  first_name: string | null;
  last_name: string | null;
  username: string | null;
  is_bot: boolean;
  is_premium: boolean;
  language_code: string | null;
  first_seen_at: Date;
  message_count: number;
}

interface DailyCountRow {
  day: string;
  count: number;
}

function toOptionalNumber(value: BigIntColumn | null): number | null {
  return value === null ? null : Number(value);
}

function toMessageView(row: MessageViewRow): MessageView {
  return {
    messageId: Number(row.message_id),
    kind: toMessageKind(row.message_type),
    text: row.text,
    caption: row.caption,
    sentAt: row.sent_at,
    editedAt: row.edited_at,
    replyToMessageId: toOptionalNumber(row.reply_to_message_id),
    author:
      row.user_id === null
        ? null
        : {
            id: Number(row.user_id),
            firstName: row.first_name,
            lastName: row.last_name,
            handle: row.username,
          },
  };
}

/**
 * ChatStore backed by PostgreSQL. Conflict handling lives in the SQL
 * (`ON CONFLICT ... DO UPDATE`), so concurrent writers need no application lock.
 */
export class PostgresChatStore implements ChatStore {
  private readonly timezone: string;
  private readonly topContributors: number;
  private readonly contributorWindowDays: number;

  constructor(
    private readonly pool: SqlPool,
    private readonly logger: Logger,
    options: StoreOptions,
  ) {
    this.timezone = options.timezone;
    this.topContributors = options.topContributors ?? TOP_CONTRIBUTORS;
    this.contributorWindowDays = options.contributorWindowDays ?? CONTRIBUTOR_WINDOW_DAYS;
  }

  async persist(request: WriteRequest): Promise<void> {
    const { chat, user, message, isEdit } = request;
    await this.run('persist', () =>
      withTransaction(this.pool, this.logger, async (client) => {
        await client.query(UPSERT_CHAT, [chat.id, chat.kind, chat.title, chat.handle]);
        await client.query(UPSERT_USER, [
          user.id,
          user.isBot,
          user.firstName,
          user.lastName,
          user.handle,
          user.languageCode,
          user.isPremium,
        ]);
        await client.query(UPSERT_MESSAGE, [
          message.chatId,
          message.messageId,
          message.userId,
          message.kind,
          message.text,
          message.caption,
          message.replyToMessageId,
          message.forwardFromChatId,
          message.sentAt,
          message.editedAt,
          JSON.stringify(message.raw ?? null),
          isEdit,
        ]);
      }),
    );
    this.logger.debug(
      'pg-store',
      `Persisted ${isEdit ? 'edit of ' : ''}message ${message.messageId} in chat ${chat.id}`,
    );
  }

  async getChat(chatId: number): Promise<StoredChat | null> {
    const result = await this.run('getChat', () =>
      this.pool.query<ChatRow>(SELECT_CHAT, [chatId]),
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: Number(row.id),
      kind: toChatKind(row.type),
      title: row.title,
      handle: row.username,
      firstSeenAt: row.first_seen_at,
      lastUpdatedAt: row.last_updated_at,
    };
  }

  async getMessage(chatId: number, messageId: number): Promise<MessageRecord | null> {
    const result = await this.run('getMessage', () =>
      this.pool.query<MessageRow>(SELECT_MESSAGE, [chatId, messageId]),
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      chatId: Number(row.chat_id),
      messageId: Number(row.message_id),
      userId: toOptionalNumber(row.user_id),
      kind: toMessageKind(row.message_type),
      text: row.text,
      caption: row.caption,
      replyToMessageId: toOptionalNumber(row.reply_to_message_id),
      forwardFromChatId: toOptionalNumber(row.forward_from_chat_id),
      sentAt: row.sent_at,
      editedAt: row.edited_at,
      raw: row.raw_message,
    };
  }

  async dashboard(): Promise<DashboardChat[]> {
    const result = await this.run('dashboard', () =>
      this.pool.query<DashboardRow>(DASHBOARD, [
        this.timezone,
        this.topContributors,
        this.contributorWindowDays,
      ]),
    );

    return result.rows.map((row) => {
      const topContributors: TopContributor[] = (row.top_contributors ?? []).map((entry) => ({
        userId: Number(entry.userId),
        name: entry.name,
        count: Number(entry.count),
      }));
      return {
        chatId: Number(row.id),
        title: row.title,
        totalMessages: row.total_messages,
        todayMessages: row.today_messages,
        lastMessage:
          row.last_text !== null && row.last_sent_at !== null
            ? { text: row.last_text, author: row.last_author ?? UNKNOWN_AUTHOR, sentAt: row.last_sent_at }
            : null,
        topContributors,
      };
    });
  }

  async digestMessages(chatId: number, window: DigestWindow): Promise<DigestMessage[]> {
    const result = await this.run('digestMessages', () =>
      this.pool.query<DigestRow>(DIGEST_MESSAGES, [chatId, window.since, window.limit]),
    );
    return result.rows.map((row) => ({ text: row.text, author: row.author, sentAt: row.sent_at }));
  }

  async periodMessages(chatId: number, days: number, limit: number): Promise<PeriodMessage[]> {
    const result = await this.run('periodMessages', () =>
      this.pool.query<PeriodRow>(PERIOD_MESSAGES, [chatId, days, limit]),
    );
    return result.rows.map((row) => ({
      text: row.text,
      author: row.author,
      sentAt: row.sent_at,
      kind: toMessageKind(row.message_type),
    }));
  }

  async stats(): Promise<OverviewStats> {
    const result = await this.run('stats', () =>
      this.pool.query<StatsRow>(OVERVIEW_STATS, [this.timezone]),
    );
    const row = result.rows[0];
    if (!row) {
      return { totalChats: 0, totalUsers: 0, totalMessages: 0, messagesToday: 0, messagesByKind: {} };
    }
    return {
      totalChats: row.total_chats,
      totalUsers: row.total_users,
      totalMessages: row.total_messages,
      messagesToday: row.messages_today,
      messagesByKind: row.messages_by_kind,
    };
  }

  async listChats(): Promise<ChatListEntry[]> {
    const result = await this.run('listChats', () => this.pool.query<ChatListRow>(LIST_CHATS));
    return result.rows.map((row) => ({
      id: Number(row.id),
      kind: row.type,
      title: row.title,
      handle: row.username,
      messageCount: row.message_count,
      userCount: row.user_count,
      lastMessageAt: row.last_message_at,
      firstSeenAt: row.first_seen_at,
    }));
  }

  async listMessages(chatId: number, query: MessageQuery): Promise<MessageView[]> {
    const result = await this.run('listMessages', () =>
      this.pool.query<MessageViewRow>(LIST_MESSAGES, [
        chatId,
        query.kind ?? null,
        query.limit,
        query.offset,
      ]),
    );
    return result.rows.map(toMessageView);
  }

  async messagesByDate(chatId: number, from: string, to: string): Promise<MessageView[]> {
    const result = await this.run('messagesByDate', () =>
      this.pool.query<MessageViewRow>(MESSAGES_BY_DATE, [chatId, this.timezone, from, to]),
    );
    return result.rows.map(toMessageView);
  }

  async listUsers(page: PageOptions): Promise<UserListEntry[]> {
    const result = await this.run('listUsers', () =>
      this.pool.query<UserListRow>(LIST_USERS, [page.limit, page.offset]),
    );
    return result.rows.map((row) => ({
      id: Number(row.id),
      firstName: row.first_name,
      lastName: row.last_name,
      handle: row.username,
      isBot: row.is_bot,
      isPremium: row.is_premium,
      languageCode: row.language_code,
      firstSeenAt: row.first_seen_at,
      messageCount: row.message_count,
    }));
  }

  async dailyMessageCounts(chatId: number, days: number): Promise<DailyCount[]> {
    const result = await this.run('dailyMessageCounts', () =>
      this.pool.query<DailyCountRow>(DAILY_MESSAGE_COUNTS, [chatId, this.timezone, days]),
    );
    return result.rows.map((row) => ({ date: row.day, count: row.count }));
  }

  async removeUser(userId: number): Promise<boolean> {
    const result = await this.run('removeUser', () => this.pool.query(DELETE_USER, [userId]));
    return (result.rowCount ?? 0) > 0;
  }

  async removeChat(chatId: number): Promise<boolean> {
    const result = await this.run('removeChat', () => this.pool.query(DELETE_CHAT, [chatId]));
    return (result.rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('pg-store', 'Pool closed');
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(operation, err);
    }
  }
}
