import type { RelevanceCategory, SortBy, Thread } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DECAY_WINDOW_DAYS = 30;
const RECENCY_FLOOR = 0.1;

/**
 * Linear decay over 30 days, never below 0.1. Age is counted in whole days.
 */
export function recencyFactor(createdAt: Date, now: Date = new Date()): number {
  const daysOld = Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS);
  return Math.max(RECENCY_FLOOR, 1 - daysOld / DECAY_WINDOW_DAYS);
}

export function compositeScore(thread: Thread, now: Date = new Date()): number {
  return thread.relevance.combined * recencyFactor(thread.createdAt, now) + thread.score / 1000;
}

/**
 * Return a new array ordered by the chosen key, highest first. Ties keep
 * their input order.
 */
export function sortThreads(threads: readonly Thread[], sortBy: SortBy = 'relevance_date', now: Date = new Date()): Thread[] {
  const sorted = [...threads];

  switch (sortBy) {
    case 'relevance':
      return sorted.sort((a, b) => b.relevance.combined - a.relevance.combined);
    case 'date':
      return sorted.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    case 'relevance_date': {
      const keys = new Map(threads.map(thread => [thread, compositeScore(thread, now)]));
      return sorted.sort((a, b) => (keys.get(b) ?? 0) - (keys.get(a) ?? 0));
    }
    case 'engagement':
      return sorted.sort((a, b) => b.numComments + b.score - (a.numComments + a.score));
  }
}

/**
 * Keep threads whose relevance for `category` is at least `minScore`.
 * Order is preserved.
 */
export function filterByRelevance(
  threads: readonly Thread[],
  minScore: number = 0.1,
  category: RelevanceCategory = 'combined'
): Thread[] {
  return threads.filter(thread => thread.relevance[category] >= minScore);
}
