import { beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { ApiController } from '../../../src/adapter/http/ApiController.js';
import { ActivityAnalytics } from '../../../src/core/analytics/ActivityAnalytics.js';
import { ContentStrategy } from '../../../src/core/analytics/ContentStrategy.js';
import { DigestPipeline } from '../../../src/core/digest/DigestPipeline.js';
import { CompletionError, StorageError } from '../../../src/core/errors.js';
import { normalizeEvent } from '../../../src/core/ingest/entityNormalizer.js';
import type { CompletionRequest } from '../../../src/core/llm/types.js';
import { MessageKind } from '../../../src/core/model/Message.js';
import { InMemoryChatStore } from '../../../src/core/storage/InMemoryChatStore.js';
import { messageEvent, mockLogger, type PayloadOptions } from '../fixtures.js';

const NOW = new Date('2024-05-10T12:00:00Z');
const RECENT = Date.parse('2024-05-10T09:00:00Z') / 1000;

describe('ApiController', () => {
  let store: InMemoryChatStore;
  let complete: Mock<(request: CompletionRequest) => Promise<string>>;
  let controller: ApiController;

  function build(withCompletion: boolean): ApiController {
    const completion = { complete };
    const digest = withCompletion
      ? new DigestPipeline(store, completion, mockLogger, {
          settings: { windowHours: 24, maxMessages: 500, maxMessageChars: 500, maxOutputTokens: 500 },
          timezone: 'UTC',
          timeoutMs: 30_000,
          now: () => NOW,
        })
      : null;
    const analytics = new ActivityAnalytics(store, completion, mockLogger, {
      timezone: 'UTC',
      timeoutMs: 30_000,
      now: () => NOW,
    });
    const strategy = withCompletion
      ? new ContentStrategy(store, completion, mockLogger, { timezone: 'UTC' })
      : null;
    return new ApiController({ store, analytics, digest, strategy, timezone: 'UTC', logger: mockLogger });
  }

  async function persist(options: PayloadOptions): Promise<void> {
    const result = normalizeEvent(messageEvent({ chatId: -100, date: RECENT, ...options }));
    if (!result.accepted) throw new Error(`fixture rejected: ${result.reason}`);
    await store.persist(result.request);
  }

  beforeEach(() => {
    store = new InMemoryChatStore({ timezone: 'UTC', now: () => NOW });
    complete = vi.fn(async (_request: CompletionRequest) => 'All quiet.');
    controller = build(true);
  });

  it('should answer health checks', () => {
    expect(controller.health()).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('should return the dashboard', async () => {
    await persist({ messageId: 1, text: 'hi' });

    const response = await controller.dashboard();

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ chats: await store.dashboard() });
  });

  it('should reject a malformed chat id', async () => {
    expect(await controller.chat('abc')).toEqual({ status: 400, body: { error: 'invalid chat id' } });
    expect(await controller.chat('1.5')).toEqual({ status: 400, body: { error: 'invalid chat id' } });
  });

  it('should return 404 for an unknown chat', async () => {
    expect(await controller.chat('-999')).toEqual({ status: 404, body: { error: 'chat not found' } });
    expect(await controller.messages('-999', {})).toEqual({
      status: 404,
      body: { error: 'chat not found' },
    });
    expect(await controller.analytics('-999')).toEqual({
      status: 404,
      body: { error: 'chat not found' },
    });
  });

  it('should page and filter messages from query strings', async () => {
    await persist({ messageId: 1, text: 'a' });
    await persist({ messageId: 2, extra: { photo: [{}] } });
    await persist({ messageId: 3, text: 'c' });

    const response = await controller.messages('-100', { limit: '1', kind: 'text' });

    const expected = await store.listMessages(-100, { limit: 1, offset: 0, kind: MessageKind.Text });
    expect(expected.map((m) => m.messageId)).toEqual([3]);
    expect(response).toEqual({ status: 200, body: { messages: expected } });
  });

  it('should reject out-of-range paging', async () => {
    await persist({ messageId: 1, text: 'a' });

    expect(await controller.messages('-100', { limit: '0' })).toEqual({
      status: 400,
      body: { error: 'invalid query' },
    });
    expect(await controller.users({ offset: '-1' })).toEqual({
      status: 400,
      body: { error: 'invalid query' },
    });
  });

  it('should return a generated digest', async () => {
    await persist({ messageId: 1, text: 'hello' });

    const response = await controller.digest('-100');

    expect(response).toEqual({
      status: 200,
      body: {
        status: 'success',
        summary: 'All quiet.',
        messageCount: 1,
        periodStart: new Date(RECENT * 1000),
        periodEnd: new Date(RECENT * 1000),
      },
    });
  });

  it('should map digest failures to status codes', async () => {
    expect(await controller.digest('-100')).toEqual({
      status: 404,
      body: { status: 'failure', reason: 'chat not found' },
    });

    await persist({ messageId: 1, text: 'hello', date: RECENT - 2 * 86_400 });
    expect(await controller.digest('-100')).toEqual({
      status: 200,
      body: { status: 'failure', reason: 'no messages in window' },
    });

    await persist({ messageId: 2, text: 'hello' });
    complete.mockRejectedValueOnce(new CompletionError('transport', 'LLM transport failure: fetch failed'));
    expect(await controller.digest('-100')).toEqual({
      status: 502,
      body: { status: 'failure', reason: 'generation failed' },
    });
  });

  it('should report digests as unavailable without a completion service', async () => {
    controller = build(false);

    expect(await controller.digest('-100')).toEqual({
      status: 503,
      body: { error: 'digests are disabled' },
    });
  });

  it('should list the messages of one day with a count', async () => {
    await persist({ messageId: 1, text: 'before', date: Date.parse('2024-05-09T23:59:00Z') / 1000 });
    await persist({ messageId: 3, text: 'late', date: RECENT + 60 });
    await persist({ messageId: 2, text: 'early', date: RECENT });

    const response = await controller.messagesByDate('-100', { date: '2024-05-10' });

    const expected = await store.messagesByDate(-100, '2024-05-10', '2024-05-10');
    expect(expected.map((m) => m.messageId)).toEqual([2, 3]);
    expect(response).toEqual({
      status: 200,
      body: { chatId: -100, from: '2024-05-10', to: '2024-05-10', timezone: 'UTC', count: 2, messages: expected },
    });
  });

  it('should widen the daily listing to a range when given an end date', async () => {
    await persist({ messageId: 1, text: 'before', date: Date.parse('2024-05-09T23:59:00Z') / 1000 });
    await persist({ messageId: 2, text: 'early', date: RECENT });

    const response = await controller.messagesByDate('-100', { date: '2024-05-09', to: '2024-05-10' });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ from: '2024-05-09', to: '2024-05-10', count: 2 });
  });

  it('should reject a missing or malformed date', async () => {
    await persist({ messageId: 1, text: 'a' });
    const invalid = { status: 400, body: { error: 'date parameter required (YYYY-MM-DD)' } };

    expect(await controller.messagesByDate('-100', {})).toEqual(invalid);
    expect(await controller.messagesByDate('-100', { date: '10.05.2024' })).toEqual(invalid);
    expect(await controller.messagesByDate('-100', { date: '2024-02-30' })).toEqual(invalid);
    expect(await controller.messagesByDate('-100', { date: '2024-05-10', to: '2024-05-09' })).toEqual(invalid);
    expect(await controller.messagesByDate('-999', { date: '2024-05-10' })).toEqual({
      status: 404,
      body: { error: 'chat not found' },
    });
  });

  it('should return a strategy report for the requested period', async () => {
    await persist({ messageId: 1, text: 'hello' });

    const response = await controller.strategy('-100', { period: 'month' });

    expect(response).toEqual({
      status: 200,
      body: {
        status: 'success',
        chatKind: 'supergroup',
        period: 'month',
        dateRange: '10.05.2024 - 10.05.2024',
        messagesAnalyzed: 1,
        report: 'All quiet.',
      },
    });
  });

  it('should map strategy failures to status codes', async () => {
    expect(await controller.strategy('-100', {})).toEqual({
      status: 404,
      body: { status: 'failure', reason: 'chat not found' },
    });

    await persist({ messageId: 1, text: 'hello' });
    expect(await controller.strategy('-100', { period: 'year' })).toEqual({
      status: 400,
      body: { status: 'failure', reason: 'invalid period' },
    });
    expect(await controller.strategy('-100', { period: ['week', 'month'] })).toEqual({
      status: 400,
      body: { error: 'invalid query' },
    });

    complete.mockRejectedValueOnce(new CompletionError('status', 'LLM API error (500)', { status: 500 }));
    expect(await controller.strategy('-100', { period: 'week' })).toEqual({
      status: 502,
      body: { status: 'failure', reason: 'generation failed' },
    });
  });

  it('should report strategy as unavailable without a completion service', async () => {
    controller = build(false);

    expect(await controller.strategy('-100', {})).toEqual({
      status: 503,
      body: { error: 'strategy reports are disabled' },
    });
  });

  it('should answer 503 when storage is unavailable', async () => {
    vi.spyOn(store, 'dashboard').mockRejectedValue(new StorageError('dashboard', new Error('ECONNREFUSED')));

    expect(await controller.dashboard()).toEqual({
      status: 503,
      body: { error: 'storage unavailable' },
    });
  });

  it('should answer 500 for unexpected errors', async () => {
    vi.spyOn(store, 'stats').mockRejectedValue(new Error('boom'));

    expect(await controller.stats()).toEqual({ status: 500, body: { error: 'internal error' } });
  });
});
