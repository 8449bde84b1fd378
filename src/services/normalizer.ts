import { z } from 'zod';
import { DELETED_AUTHOR, type Reply, type Thread } from '../types';
import type { RelevanceScorer } from './relevanceScorer';

export const THREAD_BODY_LIMIT = 2000;
export const REPLY_BODY_LIMIT = 1500;

const REMOVED_BODIES = new Set(['[deleted]', '[removed]']);

export const rawThreadSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  selftext: z.string().nullish(),
  permalink: z.string().nullish(),
  score: z.number().nullish(),
  num_comments: z.number().nullish(),
  created_utc: z.number().nullish(),
  author: z.string().nullish(),
  link_flair_text: z.string().nullish(),
});

export const rawReplySchema = z.object({
  id: z.string().min(1),
  body: z.string().nullish(),
  score: z.number().nullish(),
  author: z.string().nullish(),
  created_utc: z.number().nullish(),
  is_submitter: z.boolean().nullish(),
});

export type RawThread = z.infer<typeof rawThreadSchema>;
export type RawReply = z.infer<typeof rawReplySchema>;

const fromEpochSeconds = (seconds: number | null | undefined): Date => new Date((seconds ?? 0) * 1000);

/**
 * Map a listing entry onto a Thread. Relevance is scored over the title and
 * the full body, before the body is cut down.
 */
export function normalizeThread(raw: RawThread, source: string, scorer: RelevanceScorer): Thread {
  const title = raw.title ?? '';
  const body = raw.selftext ?? '';

  return {
    id: raw.id,
    source,
    title,
    body: body.slice(0, THREAD_BODY_LIMIT),
    url: `https://reddit.com${raw.permalink ?? ''}`,
    score: raw.score ?? 0,
    numComments: raw.num_comments ?? 0,
    createdAt: fromEpochSeconds(raw.created_utc),
    author: raw.author || DELETED_AUTHOR,
    relevance: scorer.score(`${title} ${body}`),
    category: raw.link_flair_text ?? null,
  };
}

/**
 * Map a comment onto a Reply, or `null` when the comment has no usable body
 * (empty, deleted or removed).
 */
export function normalizeReply(raw: RawReply, threadId: string, scorer: RelevanceScorer): Reply | null {
  const body = raw.body ?? '';

  if (body === '' || REMOVED_BODIES.has(body)) {
    return null;
  }

  return {
    id: raw.id,
    threadId,
    body: body.slice(0, REPLY_BODY_LIMIT),
    score: raw.score ?? 0,
    author: raw.author || DELETED_AUTHOR,
    createdAt: fromEpochSeconds(raw.created_utc),
    relevance: scorer.score(body),
    isOp: raw.is_submitter ?? false,
  };
}
