import { DateTime } from 'luxon';
import type { StoredChat } from '../model/Chat.js';
import type { MessageRecord } from '../model/Message.js';
import { displayName, type StoredUser } from '../model/User.js';
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

const DAY_MS = 86_400_000;

export interface InMemoryStoreOptions extends StoreOptions {
  now?: () => Date;
}

function byTimeAsc(a: MessageRecord, b: MessageRecord): number {
  return a.sentAt.getTime() - b.sentAt.getTime() || a.messageId - b.messageId;
}

function byTimeDesc(a: MessageRecord, b: MessageRecord): number {
  return byTimeAsc(b, a);
}

/**
 * ChatStore kept in process memory, for local runs without Postgres.
 * Follows the same upsert, cascade and ordering rules as the SQL store.
 * Every write completes synchronously, so a persist is never observed half-applied.
 */
export class InMemoryChatStore implements ChatStore {
  private chats = new Map<number, StoredChat>();
  private users = new Map<number, StoredUser>();
  private messages = new Map<string, MessageRecord>();

  private readonly timezone: string;
  private readonly topContributors: number;
  private readonly contributorWindowDays: number;
  private readonly now: () => Date;

  constructor(options: InMemoryStoreOptions) {
    this.timezone = options.timezone;
    this.topContributors = options.topContributors ?? TOP_CONTRIBUTORS;
    this.contributorWindowDays = options.contributorWindowDays ?? CONTRIBUTOR_WINDOW_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  async persist(request: WriteRequest): Promise<void> {
    const now = this.now();
    const { chat, user, message, isEdit } = request;

    const existingChat = this.chats.get(chat.id);
    this.chats.set(chat.id, {
      ...chat,
      firstSeenAt: existingChat?.firstSeenAt ?? now,
      lastUpdatedAt: now,
    });

    const existingUser = this.users.get(user.id);
    this.users.set(user.id, {
      ...user,
      isBot: existingUser?.isBot ?? user.isBot,
      firstSeenAt: existingUser?.firstSeenAt ?? now,
      lastUpdatedAt: now,
    });

    const key = this.messageKey(message.chatId, message.messageId);
    const existing = this.messages.get(key);
    if (!existing) {
      this.messages.set(key, { ...message });
      return;
    }
    this.messages.set(key, {
      ...existing,
      text: message.text,
      caption: message.caption,
      editedAt: message.editedAt ?? existing.editedAt,
      raw: isEdit ? message.raw : existing.raw,
    });
  }

  async getChat(chatId: number): Promise<StoredChat | null> {
    const chat = this.chats.get(chatId);
    return chat ? { ...chat } : null;
  }

  async getMessage(chatId: number, messageId: number): Promise<MessageRecord | null> {
    const message = this.messages.get(this.messageKey(chatId, messageId));
    return message ? { ...message } : null;
  }

  async dashboard(): Promise<DashboardChat[]> {
    const now = this.now();
    const startOfToday = this.startOfDay(now);
    const contributorsSince = now.getTime() - this.contributorWindowDays * DAY_MS;

    const summaries = [...this.chats.values()].map((chat): DashboardChat => {
      const messages = this.messagesOf(chat.id);
      const lastText = messages.filter((m) => m.text !== null).sort(byTimeDesc)[0];

      return {
        chatId: chat.id,
        title: chat.title,
        totalMessages: messages.length,
        todayMessages: messages.filter((m) => m.sentAt >= startOfToday).length,
        lastMessage:
          lastText && lastText.text !== null
            ? { text: lastText.text, author: this.authorName(lastText.userId), sentAt: lastText.sentAt }
            : null,
        topContributors: this.rankContributors(
          messages.filter((m) => m.sentAt.getTime() >= contributorsSince),
        ),
      };
    });

    return summaries.sort((a, b) => b.totalMessages - a.totalMessages || a.chatId - b.chatId);
  }

  async digestMessages(chatId: number, window: DigestWindow): Promise<DigestMessage[]> {
    const selected: DigestMessage[] = [];
    for (const m of this.messagesOf(chatId).sort(byTimeAsc)) {
      if (selected.length >= window.limit) break;
      if (m.text === null || m.sentAt < window.since) continue;
      selected.push({ text: m.text, author: this.authorName(m.userId), sentAt: m.sentAt });
    }
    return selected;
  }

  async periodMessages(chatId: number, days: number, limit: number): Promise<PeriodMessage[]> {
    const since = this.now().getTime() - days * DAY_MS;
    const selected: PeriodMessage[] = [];
    for (const m of this.messagesOf(chatId).sort(byTimeDesc)) {
      if (selected.length >= limit) break;
      const text = m.text ?? m.caption;
      if (text === null || m.sentAt.getTime() < since) continue;
      selected.push({ text, author: this.authorName(m.userId), sentAt: m.sentAt, kind: m.kind });
    }
    return selected;
  }

  async stats(): Promise<OverviewStats> {
    const startOfToday = this.startOfDay(this.now());
    const messagesByKind: Record<string, number> = {};
    let messagesToday = 0;
    for (const m of this.messages.values()) {
      messagesByKind[m.kind] = (messagesByKind[m.kind] ?? 0) + 1;
      if (m.sentAt >= startOfToday) messagesToday += 1;
    }
    return {
      totalChats: this.chats.size,
      totalUsers: this.users.size,
      totalMessages: this.messages.size,
      messagesToday,
      messagesByKind,
    };
  }

  async listChats(): Promise<ChatListEntry[]> {
    const entries = [...this.chats.values()].map((chat): ChatListEntry => {
      const messages = this.messagesOf(chat.id);
      const authors = new Set(messages.flatMap((m) => (m.userId === null ? [] : [m.userId])));
      const latest = messages.sort(byTimeDesc)[0];
      return {
        id: chat.id,
        kind: chat.kind,
        title: chat.title,
        handle: chat.handle,
        messageCount: messages.length,
        userCount: authors.size,
        lastMessageAt: latest?.sentAt ?? null,
        firstSeenAt: chat.firstSeenAt,
      };
    });
    return entries.sort((a, b) => b.messageCount - a.messageCount || a.id - b.id);
  }

  async listMessages(chatId: number, query: MessageQuery): Promise<MessageView[]> {
    return this.messagesOf(chatId)
      .filter((m) => query.kind === undefined || m.kind === query.kind)
      .sort(byTimeDesc)
      .slice(query.offset, query.offset + query.limit)
      .map((m) => this.toView(m));
  }

  async messagesByDate(chatId: number, from: string, to: string): Promise<MessageView[]> {
    return this.messagesOf(chatId)
      .filter((m) => {
        const day = this.localDay(m.sentAt);
        return day >= from && day <= to;
      })
      .sort(byTimeAsc)
      .map((m) => this.toView(m));
  }

  async listUsers(page: PageOptions): Promise<UserListEntry[]> {
    const counts = new Map<number, number>();
    for (const m of this.messages.values()) {
      if (m.userId !== null) counts.set(m.userId, (counts.get(m.userId) ?? 0) + 1);
    }
    return [...this.users.values()]
      .map((user) => ({
        id: user.id,
        firstName: user.firstName,
        lastName: user.lastName,
        handle: user.handle,
        isBot: user.isBot,
        isPremium: user.isPremium,
        languageCode: user.languageCode,
        firstSeenAt: user.firstSeenAt,
        messageCount: counts.get(user.id) ?? 0,
      }))
      .sort((a, b) => b.messageCount - a.messageCount || a.id - b.id)
      .slice(page.offset, page.offset + page.limit);
  }

  async dailyMessageCounts(chatId: number, days: number): Promise<DailyCount[]> {
    const since = this.now().getTime() - days * DAY_MS;
    const counts = new Map<string, number>();
    for (const m of this.messagesOf(chatId)) {
      if (m.sentAt.getTime() < since) continue;
      const day = this.localDay(m.sentAt);
      counts.set(day, (counts.get(day) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, count]) => ({ date, count }));
  }

  async removeUser(userId: number): Promise<boolean> {
    if (!this.users.delete(userId)) return false;
    for (const [key, m] of this.messages) {
      if (m.userId === userId) this.messages.set(key, { ...m, userId: null });
    }
    return true;
  }

  async removeChat(chatId: number): Promise<boolean> {
    if (!this.chats.delete(chatId)) return false;
    for (const [key, m] of this.messages) {
      if (m.chatId === chatId) this.messages.delete(key);
    }
    return true;
  }

  async close(): Promise<void> {
    this.chats.clear();
    this.users.clear();
    this.messages.clear();
  }

  /** Row count per table (for debugging and tests) */
  getSizes(): { chats: number; users: number; messages: number } {
    return { chats: this.chats.size, users: this.users.size, messages: this.messages.size };
  }

  private messageKey(chatId: number, messageId: number): string {
    return `${chatId}:${messageId}`;
  }

  private messagesOf(chatId: number): MessageRecord[] {
    return [...this.messages.values()].filter((m) => m.chatId === chatId);
  }

  private authorName(userId: number | null): string {
    return displayName(userId === null ? null : this.users.get(userId));
  }

  private toView(m: MessageRecord): MessageView {
    const user = m.userId === null ? undefined : this.users.get(m.userId);
    return {
      messageId: m.messageId,
      kind: m.kind,
      text: m.text,
      caption: m.caption,
      sentAt: m.sentAt,
      editedAt: m.editedAt,
      replyToMessageId: m.replyToMessageId,
      author: user
        ? { id: user.id, firstName: user.firstName, lastName: user.lastName, handle: user.handle }
        : null,
    };
  }

  private localDay(at: Date): string {
    return DateTime.fromJSDate(at).setZone(this.timezone).toFormat('yyyy-MM-dd');
  }

  private startOfDay(at: Date): Date {
    return DateTime.fromJSDate(at).setZone(this.timezone).startOf('day').toJSDate();
  }

  private rankContributors(messages: MessageRecord[]): TopContributor[] {
    const counts = new Map<number, number>();
    for (const m of messages) {
      if (m.userId === null || !this.users.has(m.userId)) continue;
      counts.set(m.userId, (counts.get(m.userId) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([idA, countA], [idB, countB]) => countB - countA || idA - idB)
      .slice(0, this.topContributors)
      .map(([userId, count]) => ({ userId, name: this.authorName(userId), count }));
  }
}
