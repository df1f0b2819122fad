/**
 * @file IngestionPool - bounded worker pool between the transport and the store
 *
 * - Events wait in a FIFO queue of at most `maxQueue` entries
 * - At most `concurrency` events are handled at once, one per worker
 * - A failed event is logged with its identity and dropped; no retry
 */
import type { Logger } from '../../infra/logger/logger.js';
import { describeError, QueueFullError } from '../errors.js';
import type { InboundEvent } from '../events/InboundEvent.js';
import { describeMessageIdentity } from './telegramMessage.js';

export type EventHandler = (event: InboundEvent) => Promise<unknown>;

export interface IngestionPoolOptions {
  concurrency: number;
  maxQueue: number;
}

export class IngestionPool {
  private queue: InboundEvent[] = [];
  private active = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly maxQueue: number;

  constructor(
    private readonly handler: EventHandler,
    private readonly logger: Logger,
    options: IngestionPoolOptions,
  ) {
    this.concurrency = Math.max(1, options.concurrency);
    this.maxQueue = Math.max(0, options.maxQueue);
  }

  /**
   * Enqueue an event. Throws `QueueFullError` on overflow and a plain
   * Error once the pool is stopped.
   */
  submit(event: InboundEvent): void {
    if (this.stopped) {
      throw new Error('Ingestion pool is stopped');
    }
    if (this.queue.length >= this.maxQueue) {
      this.logger.warn(
        'ingest-pool',
        `Queue full (${this.maxQueue}), dropping ${event.kind} for ${describeMessageIdentity(event.payload)}`,
      );
      throw new QueueFullError(this.maxQueue);
    }
    this.queue.push(event);
    this.pump();
  }

  /** Resolves once the queue is empty and every worker is idle */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Refuse new events and wait for the queued ones to finish */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.drain();
    this.logger.info('ingest-pool', 'Stopped');
  }

  getPendingCount(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.active;
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const event = this.queue.shift();
      if (!event) break;
      this.active += 1;
      // runOne settles on its own and never rejects
      void this.runOne(event);
    }
  }

  private async runOne(event: InboundEvent): Promise<void> {
    try {
      await this.handler(event);
    } catch (err) {
      this.logger.error(
        'ingest-pool',
        `Failed to ingest ${event.kind} for ${describeMessageIdentity(event.payload)}: ${describeError(err)}`,
      );
    } finally {
      this.active -= 1;
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
