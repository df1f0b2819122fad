import { DateTime } from 'luxon';
import type { Logger } from '../../infra/logger/logger.js';
import { buildActivityPrompt, ACTIVITY_SYSTEM_PROMPT } from '../digest/prompts.js';
import { CompletionError } from '../errors.js';
import type { CompletionClient } from '../llm/types.js';
import type { ChatStore, DailyCount } from '../storage/types.js';

export const ACTIVITY_DAYS = 7;
const COMMENT_MAX_TOKENS = 150;

export interface WeeklyActivity {
  chatId: number;
  chatKind: string;
  /** Local dates, `yyyy-MM-dd` */
  periodStart: string;
  periodEnd: string;
  days: DailyCount[];
  total: number;
  average: number;
  comment: string | null;
  commentError: string | null;
}

export interface ActivityAnalyticsOptions {
  timezone: string;
  timeoutMs: number;
  now?: () => Date;
}

/**
 * Expand sparse per-day counts into a contiguous series ending today,
 * with zero for days that had no messages.
 */
export function fillMissingDays(
  counts: DailyCount[],
  today: DateTime,
  days: number = ACTIVITY_DAYS,
): DailyCount[] {
  const known = new Map(counts.map((c) => [c.date, c.count]));
  const series: DailyCount[] = [];
  for (let offset = days - 1; offset >= 0; offset--) {
    const date = today.minus({ days: offset }).toFormat('yyyy-MM-dd');
    series.push({ date, count: known.get(date) ?? 0 });
  }
  return series;
}

/**
 * Weekly activity series per chat, optionally annotated by the completion service.
 */
export class ActivityAnalytics {
  private readonly timezone: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: ChatStore,
    private readonly completion: CompletionClient | null,
    private readonly logger: Logger,
    options: ActivityAnalyticsOptions,
  ) {
    this.timezone = options.timezone;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /** Returns null for an unknown chat */
  async weekly(chatId: number): Promise<WeeklyActivity | null> {
    const chat = await this.store.getChat(chatId);
    if (!chat) return null;

    const today = DateTime.fromJSDate(this.now(), { zone: this.timezone });
    const counts = await this.store.dailyMessageCounts(chatId, ACTIVITY_DAYS);
    const days = fillMissingDays(counts, today);
    const total = days.reduce((sum, d) => sum + d.count, 0);

    const activity: WeeklyActivity = {
      chatId,
      chatKind: chat.kind,
      periodStart: days[0]?.date ?? today.toFormat('yyyy-MM-dd'),
      periodEnd: today.toFormat('yyyy-MM-dd'),
      days,
      total,
      average: total / ACTIVITY_DAYS,
      comment: null,
      commentError: null,
    };

    if (total === 0 || !this.completion) {
      return activity;
    }

    try {
      activity.comment = await this.completion.complete({
        prompt: buildActivityPrompt({
          chatKind: chat.kind,
          periodStart: activity.periodStart,
          periodEnd: activity.periodEnd,
          dailyData: days.map((d) => `${d.date}: ${d.count}`).join(', '),
          total,
          average: activity.average,
        }),
        system: ACTIVITY_SYSTEM_PROMPT,
        maxTokens: COMMENT_MAX_TOKENS,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (!(err instanceof CompletionError)) throw err;
      this.logger.warn('analytics', `Activity comment for chat ${chatId} failed: ${err.message}`);
      activity.commentError = 'Activity comment unavailable';
    }

    return activity;
  }
}
