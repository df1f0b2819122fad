import { DateTime } from 'luxon';
import { MessageKind } from '../model/Message.js';
import type { DigestMessage, PeriodMessage } from '../storage/types.js';

export const PERIOD_FORMAT = 'dd.MM.yyyy HH:mm';

/** Clip to `max` code points so surrogate pairs are never split */
export function clipText(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}

export function formatInZone(at: Date, timezone: string, format: string): string {
  return DateTime.fromJSDate(at, { zone: timezone }).toFormat(format);
}

/**
 * One line per message: `[HH:mm] @author: text`
 */
export function formatTranscript(
  messages: DigestMessage[],
  timezone: string,
  maxMessageChars: number,
): string {
  return messages
    .map(
      (m) =>
        `[${formatInZone(m.sentAt, timezone, 'HH:mm')}] @${m.author}: ${clipText(m.text, maxMessageChars)}`,
    )
    .join('\n');
}

/**
 * Like `formatTranscript`, with the day in the stamp and non-text kinds tagged:
 * `[dd.MM HH:mm] @author: [photo] caption`
 */
export function formatTaggedTranscript(
  messages: PeriodMessage[],
  timezone: string,
  maxMessageChars: number,
): string {
  return messages
    .map((m) => {
      const stamp = formatInZone(m.sentAt, timezone, 'dd.MM HH:mm');
      const tag = m.kind === MessageKind.Text ? '' : `[${m.kind}] `;
      return `[${stamp}] @${m.author}: ${tag}${clipText(m.text, maxMessageChars)}`;
    })
    .join('\n');
}
