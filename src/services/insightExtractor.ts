import type { Reply } from '../types';

export const MIN_INSIGHT_SCORE = 5;
export const MAX_INSIGHTS = 3;
export const MAX_INSIGHT_LENGTH = 200;

// Phrases that usually mark actionable advice
export const ADVICE_MARKERS: readonly string[] = [
  'make sure',
  "don't forget",
  'important',
  'tip:',
  'pro tip',
  'advice',
  'recommend',
  'should',
  'must',
];

/**
 * Pull short advice snippets out of well-received replies.
 *
 * A snippet is the reply text up to its first period, so abbreviations such as
 * "e.g." cut it short. Replies are taken in the order given.
 */
export function extractInsights(replies: readonly Reply[]): string[] {
  const insights: string[] = [];

  for (const reply of replies) {
    if (reply.score < MIN_INSIGHT_SCORE) continue;

    const lower = reply.body.toLowerCase();
    if (!ADVICE_MARKERS.some(marker => lower.includes(marker))) continue;

    insights.push(reply.body.split('.')[0].slice(0, MAX_INSIGHT_LENGTH));
    if (insights.length === MAX_INSIGHTS) break;
  }

  return insights;
}
