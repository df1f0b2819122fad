import type { Logger } from '../../infra/logger/logger.js';
import type { InboundEvent } from '../events/InboundEvent.js';
import type { ChatStore } from '../storage/types.js';
import { normalizeEvent, type RejectReason } from './entityNormalizer.js';

export type IngestOutcome =
  | { status: 'stored'; chatId: number; messageId: number; isEdit: boolean }
  | { status: 'rejected'; reason: RejectReason };

/**
 * normalize → persist for a single event. Rejections are outcomes; storage
 * failures propagate as `StorageError`.
 */
export class IngestionService {
  constructor(
    private readonly store: ChatStore,
    private readonly logger: Logger,
  ) {}

  async ingest(event: InboundEvent): Promise<IngestOutcome> {
    const result = normalizeEvent(event);
    if (!result.accepted) {
      this.logger.debug('ingest', `Rejected ${event.kind} (${result.reason})`);
      return { status: 'rejected', reason: result.reason };
    }

    const { message, isEdit } = result.request;
    await this.store.persist(result.request);
    return { status: 'stored', chatId: message.chatId, messageId: message.messageId, isEdit };
  }
}
