import type { Thread } from '../types';
import type { RelevanceScorer } from './relevanceScorer';

export interface KeywordCount {
  keyword: string;
  count: number;
}

export interface TopicsReport {
  legal: KeywordCount[];
  translation: KeywordCount[];
  relevantBySource: { source: string; count: number }[];
}

export interface TopicsOptions {
  legalTop?: number;
  translationTop?: number;
  /** Threads above this combined score count towards their source */
  minRelevance?: number;
}

const mostCommon = (counts: Map<string, number>, top: number): KeywordCount[] =>
  [...counts.entries()]
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, top);

/**
 * Count how many threads mention each keyword, and how many relevant threads
 * each source produced.
 */
export function trendingTopics(threads: readonly Thread[], scorer: RelevanceScorer, options: TopicsOptions = {}): TopicsReport {
  const { legalTop = 15, translationTop = 10, minRelevance = 0.1 } = options;

  const legal = new Map<string, number>();
  const translation = new Map<string, number>();
  const bySource = new Map<string, number>();

  for (const thread of threads) {
    const matches = scorer.matchedKeywords(`${thread.title} ${thread.body}`);
    matches.legal.forEach(kw => legal.set(kw, (legal.get(kw) ?? 0) + 1));
    matches.translation.forEach(kw => translation.set(kw, (translation.get(kw) ?? 0) + 1));

    if (thread.relevance.combined > minRelevance) {
      bySource.set(thread.source, (bySource.get(thread.source) ?? 0) + 1);
    }
  }

  return {
    legal: mostCommon(legal, legalTop),
    translation: mostCommon(translation, translationTop),
    relevantBySource: [...bySource.entries()]
      .map(([source, count]) => ({ source, count }))
      .sort((a, b) => b.count - a.count),
  };
}
