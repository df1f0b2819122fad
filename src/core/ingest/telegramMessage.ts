import { z } from 'zod';
import { CHAT_KINDS } from '../model/Chat.js';

/**
 * Telegram Bot API `Message` fields read during normalization:
 * https://core.telegram.org/bots/api#message
 * Anything not listed here is carried along untouched in the raw payload.
 */
const ChatRefSchema = z.object({ id: z.number().int() });

export const TelegramMessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  edit_date: z.number().int().optional(),
  chat: z.object({
    id: z.number().int(),
    type: z.enum(CHAT_KINDS),
    title: z.string().optional(),
    username: z.string().optional(),
  }),
  from: z
    .object({
      id: z.number().int(),
      is_bot: z.boolean(),
      first_name: z.string().optional(),
      last_name: z.string().optional(),
      username: z.string().optional(),
      language_code: z.string().optional(),
      is_premium: z.boolean().optional(),
    })
    .optional(),
  text: z.string().optional(),
  entities: z.array(z.object({ type: z.string(), offset: z.number().int() })).optional(),
  caption: z.string().optional(),
  photo: z.array(z.unknown()).optional(),
  video: z.unknown().optional(),
  document: z.unknown().optional(),
  sticker: z.unknown().optional(),
  voice: z.unknown().optional(),
  reply_to_message: z.object({ message_id: z.number().int() }).optional(),
  // Bot API 7.0+: MessageOriginUser | MessageOriginHiddenUser | MessageOriginChat | MessageOriginChannel
  forward_origin: z
    .object({
      type: z.string(),
      chat: ChatRefSchema.optional(),
      sender_chat: ChatRefSchema.optional(),
    })
    .optional(),
  // pre-7.0 field, still sent by some clients
  forward_from_chat: ChatRefSchema.optional(),
});

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;

const MessageIdentitySchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() }),
});

/** `chat <id> message <id>` for log lines, or `unidentified payload` */
export function describeMessageIdentity(payload: unknown): string {
  const parsed = MessageIdentitySchema.safeParse(payload);
  return parsed.success
    ? `chat ${parsed.data.chat.id} message ${parsed.data.message_id}`
    : 'unidentified payload';
}
