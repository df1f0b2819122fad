/**
 * Storage contract shared by the Postgres store and the in-memory store.
 */
import type { ChatRecord, StoredChat } from '../model/Chat.js';
import type { MessageKind, MessageRecord } from '../model/Message.js';
import type { UserRecord } from '../model/User.js';

export type MessageWrite = Omit<MessageRecord, 'userId'> & { userId: number };

/**
 * Everything one inbound event contributes to the store.
 * `isEdit` marks an edited-message event: it sets `editedAt` and replaces the raw payload.
 */
export interface WriteRequest {
  chat: ChatRecord;
  user: UserRecord;
  message: MessageWrite;
  isEdit: boolean;
}

export interface LastMessage {
  text: string;
  author: string;
  sentAt: Date;
}

export interface TopContributor {
  userId: number;
  name: string;
  count: number;
}

export interface DashboardChat {
  chatId: number;
  title: string | null;
  totalMessages: number;
  todayMessages: number;
  lastMessage: LastMessage | null;
  /** Trailing-week ranking, count desc then user id asc */
  topContributors: TopContributor[];
}

export interface DigestMessage {
  text: string;
  author: string;
  sentAt: Date;
}

/** Text or caption of one message, with its kind for non-text tagging */
export interface PeriodMessage {
  text: string;
  author: string;
  sentAt: Date;
  kind: MessageKind;
}

export interface OverviewStats {
  totalChats: number;
  totalUsers: number;
  totalMessages: number;
  messagesToday: number;
  messagesByKind: Record<string, number>;
}

export interface ChatListEntry {
  id: number;
  kind: string;
  title: string | null;
  handle: string | null;
  messageCount: number;
  userCount: number;
  lastMessageAt: Date | null;
  firstSeenAt: Date;
}

export interface MessageAuthor {
  id: number;
  firstName: string | null;
  lastName: string | null;
  handle: string | null;
}

export interface MessageView {
  messageId: number;
  kind: MessageKind;
  text: string | null;
  caption: string | null;
  sentAt: Date;
  editedAt: Date | null;
  replyToMessageId: number | null;
  author: MessageAuthor | null;
}

export interface UserListEntry {
  id: number;
  firstName: string | null;
  lastName: string | null;
  handle: string | null;
  isBot: boolean;
  isPremium: boolean;
  languageCode: string | null;
  firstSeenAt: Date;
  messageCount: number;
}

export interface DailyCount {
  /** Local calendar day, YYYY-MM-DD */
  date: string;
  count: number;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface MessageQuery extends PageOptions {
  kind?: MessageKind;
}

export interface DigestWindow {
  since: Date;
  limit: number;
}

export interface ChatStore {
  /** Idempotent write of one event's chat, user and message as a single unit. */
  persist(request: WriteRequest): Promise<void>;

  getChat(chatId: number): Promise<StoredChat | null>;
  getMessage(chatId: number, messageId: number): Promise<MessageRecord | null>;

  /** Per-chat summaries, busiest chat first, in a bounded number of round-trips. */
  dashboard(): Promise<DashboardChat[]>;

  /** Text messages sent at or after `since`, oldest first, at most `limit`. */
  digestMessages(chatId: number, window: DigestWindow): Promise<DigestMessage[]>;

  /**
   * Messages with a text or caption from the last `days` days,
   * the most recent `limit` of them, newest first.
   */
  periodMessages(chatId: number, days: number, limit: number): Promise<PeriodMessage[]>;

  /** Every message of the local days `from`..`to` (`yyyy-MM-dd`, inclusive), oldest first. */
  messagesByDate(chatId: number, from: string, to: string): Promise<MessageView[]>;

  stats(): Promise<OverviewStats>;
  listChats(): Promise<ChatListEntry[]>;
  listMessages(chatId: number, query: MessageQuery): Promise<MessageView[]>;
  listUsers(page: PageOptions): Promise<UserListEntry[]>;
  dailyMessageCounts(chatId: number, days: number): Promise<DailyCount[]>;

  // administrative removal; never called on the ingestion path
  removeUser(userId: number): Promise<boolean>;
  removeChat(chatId: number): Promise<boolean>;

  close(): Promise<void>;
}

export interface StoreOptions {
  /** IANA zone whose midnight starts "today" */
  timezone: string;
  topContributors?: number;
  contributorWindowDays?: number;
}

export const TOP_CONTRIBUTORS = 3;
export const CONTRIBUTOR_WINDOW_DAYS = 7;
