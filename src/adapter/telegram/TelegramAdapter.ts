import { Telegraf } from 'telegraf';
import type { Update } from 'telegraf/types';
import type { Logger } from '../../infra/logger/logger.js';
import { describeError, QueueFullError } from '../../core/errors.js';
import type { InboundEvent } from '../../core/events/InboundEvent.js';

export const ALLOWED_UPDATES = ['message', 'edited_message'] as const;

// Updates queued while the collector was down are skipped on launch
export const LAUNCH_OPTIONS = {
  allowedUpdates: [...ALLOWED_UPDATES],
  dropPendingUpdates: true,
};

export interface EventSink {
  submit(event: InboundEvent): void;
}

/**
 * Pick the message out of a Bot API update. Other update types yield null.
 */
export function toInboundEvent(update: Update): InboundEvent | null {
  if ('message' in update) {
    return { kind: 'message', payload: update.message };
  }
  if ('edited_message' in update) {
    return { kind: 'edited_message', payload: update.edited_message };
  }
  return null;
}

/**
 * Telegram adapter - long polling via telegraf.
 * Forwards new and edited messages to the ingestion pool without awaiting storage.
 */
export class TelegramAdapter {
  private bot: Telegraf;
  private polling: Promise<void> | null = null;

  constructor(
    token: string,
    private readonly sink: EventSink,
    private readonly logger: Logger,
  ) {
    this.bot = new Telegraf(token);

    this.bot.use(async (ctx, next) => {
      const event = toInboundEvent(ctx.update);
      if (event) {
        this.accept(event);
      }
      await next();
    });

    this.bot.catch((err) => {
      this.logger.error('telegram', `Update handling failed: ${describeError(err)}`);
    });
  }

  public start(): void {
    if (this.polling) return;
    this.polling = this.bot
      .launch(LAUNCH_OPTIONS, () => {
        this.logger.info('telegram', 'Long polling started');
      })
      .catch((err: unknown) => {
        this.logger.error('telegram', `Polling stopped with error: ${describeError(err)}`);
      });
  }

  public async stop(): Promise<void> {
    if (!this.polling) return;
    try {
      this.bot.stop('shutdown');
    } catch (err) {
      // telegraf throws when polling already ended on its own
      this.logger.debug('telegram', `Stop skipped: ${describeError(err)}`);
    }
    await this.polling;
    this.polling = null;
    this.logger.info('telegram', 'Stopped');
  }

  private accept(event: InboundEvent): void {
    try {
      this.sink.submit(event);
    } catch (err) {
      // Overflow is already logged by the pool; the update is dropped
      if (err instanceof QueueFullError) return;
      this.logger.warn('telegram', `Update not accepted: ${describeError(err)}`);
    }
  }
}
