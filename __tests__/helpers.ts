/**
 * Shared fixtures for the test suite: in-process HTTP stubs and record builders
 */

import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { HttpFetcher } from '../src/utils/fetcher';
import type { Relevance, Reply, Thread } from '../src/types';

export interface StubResponse {
  status: number;
  data?: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>;

/**
 * An axios instance whose adapter answers from `handler` instead of the network
 */
export function stubClient(handler: StubHandler): AxiosInstance {
  return axios.create({
    adapter: async config => {
      const { status, data } = await handler(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
}

export const noSleep = async (): Promise<void> => {};

export const BASE_URL = 'https://forum.test';

/**
 * Fetcher that serves JSON payloads keyed by path (query string ignored).
 * Unknown paths answer 404, so the fetcher ends up returning null.
 */
export function forumFetcher(pages: Record<string, unknown>, requested: string[] = []): HttpFetcher {
  const client = stubClient(config => {
    const url = config.url ?? '';
    requested.push(url);
    const path = url.replace(BASE_URL, '').split('?')[0];
    return path in pages ? { status: 200, data: pages[path] } : { status: 404 };
  });
  return new HttpFetcher({ client, sleep: noSleep });
}

export const NOW = new Date('2026-01-31T00:00:00Z');
export const DAY_SECONDS = 24 * 60 * 60;

export const daysAgo = (days: number): number => NOW.getTime() / 1000 - days * DAY_SECONDS;

export function rawThread(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    title: `Thread ${id}`,
    selftext: '',
    permalink: `/r/dubai/comments/${id}/thread/`,
    score: 1,
    num_comments: 0,
    created_utc: daysAgo(1),
    author: 'poster',
    ...overrides,
  };
}

export function rawReply(id: string, score: number, body: string): Record<string, unknown> {
  return { id, body, score, author: 'helper', created_utc: daysAgo(1), is_submitter: false };
}

export function listing(entries: Record<string, unknown>[], after: string | null = null, kind: string = 't3') {
  return {
    kind: 'Listing',
    data: {
      children: entries.map(data => ({ kind, data })),
      after,
    },
  };
}

export function makeRelevance(combined: number): Relevance {
  return { legal: combined, translation: combined, combined, legalMatches: 0, translationMatches: 0 };
}

export function makeThread(overrides: Partial<Thread> = {}): Thread {
  const id = overrides.id ?? 't1';
  return {
    id,
    source: 'dubai',
    title: `Thread ${id}`,
    body: '',
    url: `https://reddit.com/r/dubai/comments/${id}/thread/`,
    score: 0,
    numComments: 0,
    createdAt: NOW,
    author: 'poster',
    relevance: makeRelevance(0),
    category: null,
    ...overrides,
  };
}

export function makeReply(overrides: Partial<Reply> = {}): Reply {
  return {
    id: 'c1',
    threadId: 't1',
    body: '',
    score: 0,
    author: 'helper',
    createdAt: NOW,
    relevance: makeRelevance(0),
    isOp: false,
    ...overrides,
  };
}

/**
 * One relevant thread with a reply holding advice, and one irrelevant thread
 */
export const FORUM_PAGES: Record<string, unknown> = {
  '/r/dubai/new.json': listing([
    rawThread('a', {
      title: 'Golden visa attestation',
      selftext: 'Need Arabic translation of my degree',
      score: 10,
      num_comments: 2,
      created_utc: daysAgo(1),
    }),
    rawThread('b', { title: 'Best brunch spots this weekend', score: 40 }),
  ]),
  '/r/dubai/hot.json': listing([]),
  '/r/dubai/comments/a.json': [
    listing([rawThread('a')]),
    listing([rawReply('c1', 12, 'You should get the degree attested first. Then translate.')], null, 't1'),
  ],
};
