import { MessageKind } from '../model/Message.js';
import type { TelegramMessage } from './telegramMessage.js';

export interface MessageKindRule {
  kind: MessageKind;
  matches: (message: TelegramMessage) => boolean;
}

/**
 * Content detection in precedence order; the first matching rule wins and
 * messages matching none are tagged `other`.
 */
export const MESSAGE_KIND_RULES: readonly MessageKindRule[] = [
  { kind: MessageKind.Text, matches: (m) => typeof m.text === 'string' && m.text.length > 0 },
  { kind: MessageKind.Photo, matches: (m) => Array.isArray(m.photo) && m.photo.length > 0 },
  { kind: MessageKind.Video, matches: (m) => m.video != null },
  { kind: MessageKind.Document, matches: (m) => m.document != null },
  { kind: MessageKind.Sticker, matches: (m) => m.sticker != null },
  { kind: MessageKind.Voice, matches: (m) => m.voice != null },
];

export function detectMessageKind(
  message: TelegramMessage,
  rules: readonly MessageKindRule[] = MESSAGE_KIND_RULES,
): MessageKind {
  return rules.find((rule) => rule.matches(message))?.kind ?? MessageKind.Other;
}
