import { describe, it, expect } from 'vitest';
import { RelevanceScorer } from '../../src/services/relevanceScorer';
import { trendingTopics } from '../../src/services/topicsService';
import { makeThread } from '../helpers';

const scorer = new RelevanceScorer();

const thread = (id: string, source: string, title: string, body: string = '') =>
  makeThread({ id, source, title, body, relevance: scorer.score(`${title} ${body}`) });

describe('trendingTopics', () => {
  const threads = [
    thread('t1', 'dubai', 'Golden visa renewal'),
    thread('t2', 'abudhabi', 'Visa question', 'Need Arabic translation'),
    thread('t3', 'dubai', 'Best brunch spots this weekend'),
  ];

  it('should count keyword mentions per vocabulary, most common first', () => {
    const topics = trendingTopics(threads, scorer);

    expect(topics.legal).toEqual([
      { keyword: 'visa', count: 2 },
      { keyword: 'golden visa', count: 1 },
    ]);
    expect(topics.translation).toEqual([
      { keyword: 'translation', count: 1 },
      { keyword: 'arabic', count: 1 },
    ]);
  });

  it('should count relevant threads per source', () => {
    expect(trendingTopics(threads, scorer).relevantBySource).toEqual([
      { source: 'dubai', count: 1 },
      { source: 'abudhabi', count: 1 },
    ]);
  });

  it('should respect the top and threshold options', () => {
    const topics = trendingTopics(threads, scorer, { legalTop: 1, translationTop: 0, minRelevance: 0.4 });

    expect(topics.legal).toEqual([{ keyword: 'visa', count: 2 }]);
    expect(topics.translation).toEqual([]);
    expect(topics.relevantBySource).toEqual([{ source: 'abudhabi', count: 1 }]);
  });

  it('should return empty lists for no threads', () => {
    expect(trendingTopics([], scorer)).toEqual({ legal: [], translation: [], relevantBySource: [] });
  });
});
