export const CHAT_KINDS = ['private', 'group', 'supergroup', 'channel'] as const;

export type ChatKind = (typeof CHAT_KINDS)[number];

/** Chat attributes as observed on an inbound event. */
export interface ChatRecord {
  id: number;
  kind: ChatKind;
  title: string | null;
  handle: string | null;
}

export interface StoredChat extends ChatRecord {
  firstSeenAt: Date;
  lastUpdatedAt: Date;
}

const COLLECTED_KINDS: ReadonlySet<ChatKind> = new Set<ChatKind>(['group', 'supergroup']);

export function isCollectedChatKind(kind: ChatKind): boolean {
  return COLLECTED_KINDS.has(kind);
}

export function toChatKind(value: string): ChatKind {
  return CHAT_KINDS.find((kind) => kind === value) ?? 'group';
}
