/**
 * Prompt templates for digest, activity commentary and content strategy
 */

export const DIGEST_SYSTEM_PROMPT =
  'You are a chat analyst. You read messages from group chats and write short, informative digests.';

export interface DigestPromptInput {
  chatTitle: string;
  periodStart: string;
  periodEnd: string;
  messageCount: number;
  transcript: string;
}

export function buildDigestPrompt(input: DigestPromptInput): string {
  const lines = [
    'Analyze the messages from a group chat over the last day.',
    '',
    `Chat: ${input.chatTitle}`,
    `Period: ${input.periodStart} - ${input.periodEnd}`,
    `Messages: ${input.messageCount}`,
    '',
    'Messages:',
    input.transcript,
    '',
    'Write a short digest:',
    '1. Main discussion topics (2-3 points)',
    '2. Key decisions or agreements (if any)',
    '3. Important unanswered questions (if any)',
    '',
    'Be concise, 200 words at most.',
  ];
  return lines.join('\n');
}

export const ACTIVITY_SYSTEM_PROMPT =
  'You are a chat activity analyst. You give short, factual comments on message statistics.';

export interface ActivityPromptInput {
  chatKind: string;
  periodStart: string;
  periodEnd: string;
  dailyData: string;
  total: number;
  average: number;
}

export function buildActivityPrompt(input: ActivityPromptInput): string {
  const lines = [
    'Give a short comment (2-3 sentences) on the weekly message statistics.',
    '',
    `Chat type: ${input.chatKind === 'channel' ? 'channel' : 'group'}`,
    `Period: ${input.periodStart} - ${input.periodEnd}`,
    `Per day: ${input.dailyData}`,
    `Total messages: ${input.total}`,
    `Daily average: ${input.average.toFixed(1)}`,
    '',
    'Point out:',
    '- Peaks and dips in activity',
    '- Likely reasons (weekday, weekend and so on)',
    '',
    'Be concise, 50 words at most.',
  ];
  return lines.join('\n');
}

export const STRATEGY_SYSTEM_PROMPT =
  'You are a content strategist. You analyze messages from chats and channels and give practical content recommendations.';

export interface StrategyPromptInput {
  chatKind: string;
  period: 'week' | 'month';
  chatTitle: string;
  dateRange: string;
  messageCount: number;
  transcript: string;
}

export function buildStrategyPrompt(input: StrategyPromptInput): string {
  const source = input.chatKind === 'channel' ? 'channel' : 'group';
  const lines = [
    `Analyze the messages from a ${source} over the last ${input.period}.`,
    '',
    `Title: ${input.chatTitle}`,
    `Type: ${source}`,
    `Period: ${input.dateRange}`,
    `Messages analyzed: ${input.messageCount}`,
    '',
    'Messages:',
    input.transcript,
    '',
    'Write a report:',
    '',
    '## What worked',
    '- Topics that drew the most activity or reactions (2-3 points)',
    '',
    '## Recommendations',
    '- What the author should do more or less of (2-3 tips)',
    '',
    '## Post ideas',
    '- 3 concrete ideas based on what the audience cares about',
    '',
    '300 words at most.',
  ];
  return lines.join('\n');
}
