export enum MessageKind {
  Text = 'text',
  Photo = 'photo',
  Video = 'video',
  Document = 'document',
  Sticker = 'sticker',
  Voice = 'voice',
  Other = 'other',
}

export interface MessageRecord {
  chatId: number;
  messageId: number;
  /** Weak reference: null once the author row is removed */
  userId: number | null;
  kind: MessageKind;
  text: string | null;
  caption: string | null;
  replyToMessageId: number | null;
  forwardFromChatId: number | null;
  sentAt: Date;
  editedAt: Date | null;
  /** Original platform payload, kept verbatim for reprocessing */
  raw: unknown;
}

const MESSAGE_KINDS: readonly MessageKind[] = Object.values(MessageKind);

export function toMessageKind(value: string): MessageKind {
  return MESSAGE_KINDS.find((kind) => kind === value) ?? MessageKind.Other;
}
