import type { InboundEvent } from '../events/InboundEvent.js';
import { isCollectedChatKind } from '../model/Chat.js';
import type { WriteRequest } from '../storage/types.js';
import { detectMessageKind } from './messageKind.js';
import { TelegramMessageSchema, type TelegramMessage } from './telegramMessage.js';

export type RejectReason = 'malformed' | 'chat-kind' | 'no-sender' | 'command';

export type NormalizeResult =
  | { accepted: true; request: WriteRequest }
  | { accepted: false; reason: RejectReason };

/**
 * Source chat of a forwarded message. Forwards from users carry no chat id.
 */
export function forwardSourceChatId(message: TelegramMessage): number | null {
  const origin = message.forward_origin;
  if (origin?.type === 'channel' && origin.chat) return origin.chat.id;
  if (origin?.type === 'chat' && origin.sender_chat) return origin.sender_chat.id;
  return message.forward_from_chat?.id ?? null;
}

/** `/start`, `/digest@SomeBot` and the like: a bot_command entity opening the text */
export function isBotCommand(message: TelegramMessage): boolean {
  const first = message.entities?.[0];
  return message.text !== undefined && first?.type === 'bot_command' && first.offset === 0;
}

function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Turn one inbound update into the chat/user/message rows it implies.
 * Only group and supergroup traffic with an identifiable sender is kept;
 * bot commands are not conversation and are dropped.
 */
export function normalizeEvent(event: InboundEvent): NormalizeResult {
  const parsed = TelegramMessageSchema.safeParse(event.payload);
  if (!parsed.success) {
    return { accepted: false, reason: 'malformed' };
  }

  const msg = parsed.data;
  if (!isCollectedChatKind(msg.chat.type)) {
    return { accepted: false, reason: 'chat-kind' };
  }

  const from = msg.from;
  if (!from) {
    return { accepted: false, reason: 'no-sender' };
  }

  if (isBotCommand(msg)) {
    return { accepted: false, reason: 'command' };
  }

  const isEdit = event.kind === 'edited_message';

  const request: WriteRequest = {
    chat: {
      id: msg.chat.id,
      kind: msg.chat.type,
      title: msg.chat.title ?? null,
      handle: msg.chat.username ?? null,
    },
    user: {
      id: from.id,
      isBot: from.is_bot,
      firstName: from.first_name ?? null,
      lastName: from.last_name ?? null,
      handle: from.username ?? null,
      languageCode: from.language_code ?? null,
      isPremium: from.is_premium ?? false,
    },
    message: {
      chatId: msg.chat.id,
      messageId: msg.message_id,
      userId: from.id,
      kind: detectMessageKind(msg),
      text: msg.text || null,
      caption: msg.caption || null,
      replyToMessageId: msg.reply_to_message?.message_id ?? null,
      forwardFromChatId: forwardSourceChatId(msg),
      sentAt: fromUnixSeconds(msg.date),
      editedAt: isEdit ? fromUnixSeconds(msg.edit_date ?? msg.date) : null,
      raw: event.payload,
    },
    isEdit,
  };

  return { accepted: true, request };
}
