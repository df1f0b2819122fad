import { describe, it, expect, vi } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';
import { StorageError } from '../../../../src/core/errors.js';
import { normalizeEvent } from '../../../../src/core/ingest/entityNormalizer.js';
import { PostgresChatStore } from '../../../../src/core/storage/PostgresChatStore.js';
import {
  DASHBOARD,
  DIGEST_MESSAGES,
  MESSAGES_BY_DATE,
  PERIOD_MESSAGES,
  UPSERT_CHAT,
  UPSERT_MESSAGE,
  UPSERT_USER,
} from '../../../../src/core/storage/queries.js';
import type { WriteRequest } from '../../../../src/core/storage/types.js';
import type { SqlClient, SqlPool } from '../../../../src/infra/db/postgres.js';
import { editedEvent, messageEvent, mockLogger } from '../../fixtures.js';

type Responder = (text: string, params: unknown[] | undefined) => QueryResult;

function result(rows: QueryResultRow[] = [], rowCount: number = rows.length): QueryResult {
  return { command: 'SELECT', rowCount, oid: 0, fields: [], rows };
}

const empty: Responder = () => result();

class FakeClient implements SqlClient {
  readonly statements: string[] = [];
  readonly params: Array<unknown[] | undefined> = [];
  readonly release = vi.fn();

  constructor(private readonly respond: Responder) {}

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>> {
    this.statements.push(text);
    this.params.push(params);
    return this.respond(text, params);
  }
}

class FakePool implements SqlPool {
  readonly statements: string[] = [];
  readonly params: Array<unknown[] | undefined> = [];
  readonly client: FakeClient;
  readonly end = vi.fn(async () => {});

  constructor(
    private readonly respond: Responder = empty,
    clientRespond: Responder = empty,
  ) {
    this.client = new FakeClient(clientRespond);
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>> {
    this.statements.push(text);
    this.params.push(params);
    return this.respond(text, params);
  }

  async connect(): Promise<SqlClient> {
    return this.client;
  }
}

function toRequest(event: Parameters<typeof normalizeEvent>[0]): WriteRequest {
  const normalized = normalizeEvent(event);
  if (!normalized.accepted) throw new Error(`fixture rejected: ${normalized.reason}`);
  return normalized.request;
}

function dashboardRow(id: number): QueryResultRow {
  return {
    id: String(id),
    title: `Chat ${id}`,
    total_messages: 10,
    today_messages: 2,
    last_text: 'latest',
    last_author: 'ann',
    last_sent_at: new Date('2024-05-10T09:00:00Z'),
    top_contributors: [
      { userId: 5, name: 'ann', count: 6 },
      { userId: 7, name: 'bob', count: 4 },
    ],
  };
}

describe('PostgresChatStore', () => {
  describe('persist', () => {
    it('should write chat, user and message inside one transaction', async () => {
      const pool = new FakePool();
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });
      const event = messageEvent({ chatId: -100, messageId: 10, userId: 42, text: 'hi' });

      await store.persist(toRequest(event));

      expect(pool.statements).toEqual([]);
      expect(pool.client.statements).toEqual([
        'BEGIN',
        UPSERT_CHAT,
        UPSERT_USER,
        UPSERT_MESSAGE,
        'COMMIT',
      ]);
      expect(pool.client.params[1]).toEqual([-100, 'supergroup', 'Test Group', null]);
      expect(pool.client.params[3]).toEqual([
        -100,
        10,
        42,
        'text',
        'hi',
        null,
        null,
        null,
        new Date(1_700_000_000_000),
        null,
        JSON.stringify(event.payload),
        false,
      ]);
      expect(pool.client.release).toHaveBeenCalledTimes(1);
    });

    it('should flag edits so the stored raw payload is replaced', async () => {
      const pool = new FakePool();
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      await store.persist(toRequest(editedEvent({ text: 'b', editDate: 1_700_000_060 })));

      const messageParams = pool.client.params[3];
      expect(messageParams?.[9]).toEqual(new Date(1_700_000_060_000));
      expect(messageParams?.[11]).toBe(true);
    });

    it('should roll back and raise StorageError when a statement fails', async () => {
      const pool = new FakePool(empty, (text) => {
        if (text === UPSERT_USER) throw new Error('connection reset');
        return result();
      });
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      const error = await store.persist(toRequest(messageEvent({ text: 'hi' }))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ operation: 'persist' });
      expect(pool.client.statements).toEqual(['BEGIN', UPSERT_CHAT, UPSERT_USER, 'ROLLBACK']);
      expect(pool.client.release).toHaveBeenCalledTimes(1);
    });

    it('should raise StorageError when no connection can be acquired', async () => {
      const pool = new FakePool();
      vi.spyOn(pool, 'connect').mockRejectedValue(new Error('timeout exceeded when trying to connect'));
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      await expect(store.persist(toRequest(messageEvent({ text: 'hi' })))).rejects.toThrow(
        'Storage operation "persist" failed: timeout exceeded when trying to connect',
      );
    });
  });

  describe('dashboard', () => {
    it('should issue a single query no matter how many chats exist', async () => {
      for (const chatCount of [1, 50]) {
        const rows = Array.from({ length: chatCount }, (_, i) => dashboardRow(i + 1));
        const pool = new FakePool(() => result(rows));
        const store = new PostgresChatStore(pool, mockLogger, { timezone: 'Europe/Moscow' });

        const chats = await store.dashboard();

        expect(chats).toHaveLength(chatCount);
        expect(pool.statements).toEqual([DASHBOARD]);
        expect(pool.params).toEqual([['Europe/Moscow', 3, 7]]);
      }
    });

    it('should convert bigint columns and nested contributors', async () => {
      const pool = new FakePool(() => result([dashboardRow(-1001)]));
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      const [chat] = await store.dashboard();

      expect(chat).toEqual({
        chatId: -1001,
        title: 'Chat -1001',
        totalMessages: 10,
        todayMessages: 2,
        lastMessage: { text: 'latest', author: 'ann', sentAt: new Date('2024-05-10T09:00:00Z') },
        topContributors: [
          { userId: 5, name: 'ann', count: 6 },
          { userId: 7, name: 'bob', count: 4 },
        ],
      });
    });

    it('should report no last message for chats without text', async () => {
      const row = { ...dashboardRow(1), last_text: null, last_author: null, last_sent_at: null, top_contributors: [] };
      const pool = new FakePool(() => result([row]));
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      const [chat] = await store.dashboard();

      expect(chat.lastMessage).toBeNull();
      expect(chat.topContributors).toEqual([]);
    });

    it('should pass custom contributor settings', async () => {
      const pool = new FakePool();
      const store = new PostgresChatStore(pool, mockLogger, {
        timezone: 'UTC',
        topContributors: 5,
        contributorWindowDays: 30,
      });

      await store.dashboard();

      expect(pool.params).toEqual([['UTC', 5, 30]]);
    });

    it('should fail as a whole with StorageError', async () => {
      const pool = new FakePool(() => {
        throw new Error('relation "chats" does not exist');
      });
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      await expect(store.dashboard()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('reads', () => {
    it('should query the digest window oldest first', async () => {
      const sentAt = new Date('2024-05-10T08:00:00Z');
      const pool = new FakePool(() => result([{ text: 'hello', author: 'ann', sent_at: sentAt }]));
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });
      const since = new Date('2024-05-09T12:00:00Z');

      const messages = await store.digestMessages(-100, { since, limit: 500 });

      expect(messages).toEqual([{ text: 'hello', author: 'ann', sentAt }]);
      expect(pool.statements).toEqual([DIGEST_MESSAGES]);
      expect(pool.params).toEqual([[-100, since, 500]]);
      expect(DIGEST_MESSAGES).toContain('ORDER BY m.sent_at ASC, m.message_id ASC');
    });

    it('should query period messages newest first and map their kind', async () => {
      const sentAt = new Date('2024-05-10T08:00:00Z');
      const pool = new FakePool(() =>
        result([{ text: 'pic', author: 'ann', sent_at: sentAt, message_type: 'photo' }]),
      );
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      const messages = await store.periodMessages(-100, 30, 500);

      expect(messages).toEqual([{ text: 'pic', author: 'ann', sentAt, kind: 'photo' }]);
      expect(pool.statements).toEqual([PERIOD_MESSAGES]);
      expect(pool.params).toEqual([[-100, 30, 500]]);
      expect(PERIOD_MESSAGES).toContain('ORDER BY m.sent_at DESC, m.message_id DESC');
    });

    it('should list a day range in the configured zone', async () => {
      const sentAt = new Date('2024-05-09T08:00:00Z');
      const pool = new FakePool(() =>
        result([
          {
            message_id: '5',
            message_type: 'text',
            text: 'hi',
            caption: null,
            sent_at: sentAt,
            edited_at: null,
            reply_to_message_id: '4',
            user_id: '42',
            first_name: 'Ann',
            last_name: null,
            username: 'ann',
          },
        ]),
      );
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'Europe/Moscow' });

      const messages = await store.messagesByDate(-100, '2024-05-09', '2024-05-10');

      expect(messages).toEqual([
        {
          messageId: 5,
          kind: 'text',
          text: 'hi',
          caption: null,
          sentAt,
          editedAt: null,
          replyToMessageId: 4,
          author: { id: 42, firstName: 'Ann', lastName: null, handle: 'ann' },
        },
      ]);
      expect(pool.statements).toEqual([MESSAGES_BY_DATE]);
      expect(pool.params).toEqual([[-100, 'Europe/Moscow', '2024-05-09', '2024-05-10']]);
    });

    it('should return null for an unknown chat', async () => {
      const store = new PostgresChatStore(new FakePool(), mockLogger, { timezone: 'UTC' });

      expect(await store.getChat(123)).toBeNull();
    });

    it('should map a stored message row', async () => {
      const sentAt = new Date('2024-05-10T08:00:00Z');
      const pool = new FakePool(() =>
        result([
          {
            chat_id: '-100',
            message_id: '10',
            user_id: null,
            message_type: 'sticker',
            text: null,
            caption: null,
            reply_to_message_id: '9',
            forward_from_chat_id: null,
            sent_at: sentAt,
            edited_at: null,
            raw_message: { message_id: 10 },
          },
        ]),
      );
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      expect(await store.getMessage(-100, 10)).toEqual({
        chatId: -100,
        messageId: 10,
        userId: null,
        kind: 'sticker',
        text: null,
        caption: null,
        replyToMessageId: 9,
        forwardFromChatId: null,
        sentAt,
        editedAt: null,
        raw: { message_id: 10 },
      });
    });

    it('should return zeroed stats when the query yields no row', async () => {
      const store = new PostgresChatStore(new FakePool(), mockLogger, { timezone: 'UTC' });

      expect(await store.stats()).toEqual({
        totalChats: 0,
        totalUsers: 0,
        totalMessages: 0,
        messagesToday: 0,
        messagesByKind: {},
      });
    });

    it('should report whether a removal deleted anything', async () => {
      const pool = new FakePool((_text, params) => result([], params?.[0] === 5 ? 1 : 0));
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      expect(await store.removeUser(5)).toBe(true);
      expect(await store.removeUser(6)).toBe(false);
    });

    it('should end the pool on close', async () => {
      const pool = new FakePool();
      const store = new PostgresChatStore(pool, mockLogger, { timezone: 'UTC' });

      await store.close();

      expect(pool.end).toHaveBeenCalledTimes(1);
    });
  });
});
