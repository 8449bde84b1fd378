import { z } from 'zod';
import type { ListingSort, Reply, Thread } from '../types';
import type { HttpFetcher } from '../utils/fetcher';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { normalizeReply, normalizeThread, rawReplySchema, rawThreadSchema } from './normalizer';
import { RelevanceScorer } from './relevanceScorer';

export const PAGE_SIZE = 25;

const childSchema = z.object({
  kind: z.string(),
  data: z.unknown(),
});

const listingSchema = z.object({
  data: z.object({
    children: z.array(childSchema).default([]),
    after: z.string().nullish(),
  }),
});

const threadDetailSchema = z.tuple([z.unknown(), listingSchema]).rest(z.unknown());

export interface RedditServiceOptions {
  fetcher: HttpFetcher;
  scorer?: RelevanceScorer;
  baseUrl?: string;
  logger?: Logger;
}

/**
 * Reads the public JSON listing and thread endpoints. No API key involved.
 */
export class RedditService {
  private readonly fetcher: HttpFetcher;
  private readonly scorer: RelevanceScorer;
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(options: RedditServiceOptions) {
    this.fetcher = options.fetcher;
    this.scorer = options.scorer ?? new RelevanceScorer();
    this.baseUrl = options.baseUrl ?? 'https://www.reddit.com';
    this.log = (options.logger ?? rootLogger).child({ component: 'reddit' });
  }

  /**
   * Fetch up to `limit` threads from a source, following the `after` cursor
   * until enough threads are collected or the source runs out of pages.
   */
  async fetchThreads(source: string, sort: ListingSort, limit: number): Promise<Thread[]> {
    const threads: Thread[] = [];
    let after: string | null | undefined = null;

    while (threads.length < limit) {
      let url = `${this.baseUrl}/r/${source}/${sort}.json?limit=${PAGE_SIZE}`;
      if (after) {
        url += `&after=${encodeURIComponent(after)}`;
      }

      const payload = await this.fetcher.fetchPage(url);
      const listing = listingSchema.safeParse(payload);

      if (!listing.success) {
        break;
      }

      const { children } = listing.data.data;
      if (children.length === 0) {
        break;
      }

      for (const child of children) {
        const raw = rawThreadSchema.safeParse(child.data);
        if (!raw.success) {
          this.log.debug({ source }, 'Skipping malformed listing entry');
          continue;
        }

        threads.push(normalizeThread(raw.data, source, this.scorer));
        if (threads.length >= limit) {
          break;
        }
      }

      after = listing.data.data.after;
      if (!after) {
        break;
      }
    }

    this.log.info(`✅ Fetched ${threads.length} ${sort} threads from r/${source}`);
    return threads;
  }

  /**
   * Fetch the top-level replies of a thread, highest score first
   */
  async fetchReplies(source: string, threadId: string, limit: number = 20): Promise<Reply[]> {
    const url = `${this.baseUrl}/r/${source}/comments/${threadId}.json?limit=${limit}&sort=top`;
    const payload = await this.fetcher.fetchPage(url);
    const detail = threadDetailSchema.safeParse(payload);

    if (!detail.success) {
      return [];
    }

    const replies: Reply[] = [];

    for (const child of detail.data[1].data.children.slice(0, limit)) {
      if (child.kind !== 't1') {
        continue;
      }

      const raw = rawReplySchema.safeParse(child.data);
      if (!raw.success) {
        continue;
      }

      const reply = normalizeReply(raw.data, threadId, this.scorer);
      if (reply) {
        replies.push(reply);
      }
    }

    replies.sort((a, b) => b.score - a.score);

    this.log.debug(`Fetched ${replies.length} replies for thread ${threadId}`);
    return replies;
  }
}
