import type { InboundEvent } from '../../src/core/events/InboundEvent.js';
import type { Logger } from '../../src/infra/logger/logger.js';

export const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

export interface PayloadOptions {
  chatId?: number;
  chatType?: string;
  /** null leaves the title out */
  chatTitle?: string | null;
  messageId?: number;
  userId?: number;
  username?: string;
  firstName?: string;
  /** Unix seconds */
  date?: number;
  editDate?: number;
  text?: string;
  noSender?: boolean;
  extra?: Record<string, unknown>;
}

/** Bot API message payload with just the fields the normalizer reads */
export function telegramPayload(options: PayloadOptions = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    message_id: options.messageId ?? 1,
    date: options.date ?? 1_700_000_000,
    chat: {
      id: options.chatId ?? -100,
      type: options.chatType ?? 'supergroup',
      ...(options.chatTitle === null ? {} : { title: options.chatTitle ?? 'Test Group' }),
    },
    ...options.extra,
  };
  if (!options.noSender) {
    payload.from = {
      id: options.userId ?? 42,
      is_bot: false,
      first_name: options.firstName ?? 'Alice',
      ...(options.username ? { username: options.username } : {}),
    };
  }
  if (options.text !== undefined) payload.text = options.text;
  if (options.editDate !== undefined) payload.edit_date = options.editDate;
  return payload;
}

export function messageEvent(options: PayloadOptions = {}): InboundEvent {
  return { kind: 'message', payload: telegramPayload(options) };
}

export function editedEvent(options: PayloadOptions = {}): InboundEvent {
  return { kind: 'edited_message', payload: telegramPayload(options) };
}
