import { describe, it, expect } from 'vitest';
import { createVocabularies } from '../../src/config/vocabularies';
import { normalizeThread } from '../../src/services/normalizer';
import { compositeScore, filterByRelevance, recencyFactor, sortThreads } from '../../src/services/ranker';
import { RelevanceScorer } from '../../src/services/relevanceScorer';
import { DAY_SECONDS, NOW, daysAgo, makeRelevance, makeThread } from '../helpers';

const createdDaysAgo = (days: number): Date => new Date(NOW.getTime() - days * DAY_SECONDS * 1000);

describe('recencyFactor', () => {
  it('should decay linearly over whole days', () => {
    expect(recencyFactor(NOW, NOW)).toBe(1);
    expect(recencyFactor(createdDaysAgo(1.5), NOW)).toBeCloseTo(1 - 1 / 30);
    expect(recencyFactor(createdDaysAgo(15), NOW)).toBeCloseTo(0.5);
  });

  it('should never drop below 0.1', () => {
    expect(recencyFactor(createdDaysAgo(29), NOW)).toBe(0.1);
    expect(recencyFactor(createdDaysAgo(400), NOW)).toBe(0.1);
  });
});

describe('compositeScore', () => {
  it('should add a score bonus to decayed relevance', () => {
    const thread = makeThread({ relevance: makeRelevance(0.5), score: 250 });

    expect(compositeScore(thread, NOW)).toBeCloseTo(0.75);
  });
});

describe('sortThreads', () => {
  it('should rank a fresh moderately relevant thread above a stale highly relevant one', () => {
    const stale = makeThread({ id: 'stale', relevance: makeRelevance(1.0), createdAt: createdDaysAgo(40) });
    const fresh = makeThread({ id: 'fresh', relevance: makeRelevance(0.5), createdAt: createdDaysAgo(2) });

    const sorted = sortThreads([stale, fresh], 'relevance_date', NOW);

    expect(sorted.map(t => t.id)).toEqual(['fresh', 'stale']);
  });

  it('should order by relevance, date and engagement', () => {
    const threads = [
      makeThread({ id: 'a', relevance: makeRelevance(0.2), createdAt: createdDaysAgo(3), score: 40, numComments: 1 }),
      makeThread({ id: 'b', relevance: makeRelevance(0.9), createdAt: createdDaysAgo(5), score: 2, numComments: 2 }),
      makeThread({ id: 'c', relevance: makeRelevance(0.5), createdAt: createdDaysAgo(1), score: 5, numComments: 30 }),
    ];

    expect(sortThreads(threads, 'relevance', NOW).map(t => t.id)).toEqual(['b', 'c', 'a']);
    expect(sortThreads(threads, 'date', NOW).map(t => t.id)).toEqual(['c', 'a', 'b']);
    expect(sortThreads(threads, 'engagement', NOW).map(t => t.id)).toEqual(['a', 'c', 'b']);
  });

  it('should keep input order for ties', () => {
    const threads = ['x', 'y', 'z'].map(id => makeThread({ id, relevance: makeRelevance(0.4) }));

    expect(sortThreads(threads, 'relevance', NOW).map(t => t.id)).toEqual(['x', 'y', 'z']);
    expect(sortThreads(threads, 'relevance_date', NOW).map(t => t.id)).toEqual(['x', 'y', 'z']);
  });

  it('should give the same order on repeated calls', () => {
    const threads = [
      makeThread({ id: 'older', relevance: makeRelevance(0.5), createdAt: new Date(NOW.getTime() - 5 * DAY_SECONDS * 1000) }),
      makeThread({ id: 'newer', relevance: makeRelevance(0.5) }),
    ];

    expect(sortThreads(threads, 'relevance_date', NOW)).toEqual(sortThreads(threads, 'relevance_date', NOW));
  });

  it('should not mutate its input', () => {
    const threads = [
      makeThread({ id: 'low', relevance: makeRelevance(0.1) }),
      makeThread({ id: 'high', relevance: makeRelevance(0.9) }),
    ];

    const sorted = sortThreads(threads, 'relevance', NOW);

    expect(sorted).not.toBe(threads);
    expect(threads.map(t => t.id)).toEqual(['low', 'high']);
  });
});

describe('filterByRelevance', () => {
  const threads = [
    makeThread({ id: 'a', relevance: makeRelevance(0.3) }),
    makeThread({ id: 'b', relevance: makeRelevance(0.05) }),
    makeThread({ id: 'c', relevance: makeRelevance(0.1) }),
  ];

  it('should keep threads at or above the threshold in order', () => {
    expect(filterByRelevance(threads).map(t => t.id)).toEqual(['a', 'c']);
  });

  it('should be idempotent', () => {
    const once = filterByRelevance(threads, 0.2);

    expect(filterByRelevance(once, 0.2)).toEqual(once);
  });

  it('should filter on the chosen category', () => {
    const legalOnly = makeThread({
      id: 'legal',
      relevance: { legal: 0.4, translation: 0, combined: 0.33, legalMatches: 2, translationMatches: 0 },
    });

    expect(filterByRelevance([legalOnly], 0.35, 'legal')).toHaveLength(1);
    expect(filterByRelevance([legalOnly], 0.35, 'translation')).toHaveLength(0);
    expect(filterByRelevance([legalOnly], 0.35)).toHaveLength(0);
  });
});

describe('ranking pipeline', () => {
  it('should keep only threads with two or more matches, ranked by recency-weighted relevance', () => {
    const scorer = new RelevanceScorer(
      createVocabularies({
        legal: ['alpha', 'bravo', 'charlie', 'delta', 'echo'],
        translation: ['xray', 'yankee', 'zulu'],
      })
    );

    const raw = [
      { id: 'n1', title: 'alpha', score: 900, created_utc: daysAgo(0) },
      { id: 'q1', title: 'alpha bravo', score: 0, created_utc: daysAgo(0) },
      { id: 'n2', title: 'zulu', score: 500, created_utc: daysAgo(0) },
      { id: 'q2', title: 'alpha bravo charlie xray', score: 0, created_utc: daysAgo(10) },
      { id: 'q3', title: 'alpha xray yankee zulu bravo charlie', score: 50, created_utc: daysAgo(45) },
      { id: 'n3', title: 'nothing here', score: 1000, created_utc: daysAgo(0) },
      { id: 'q4', title: 'delta echo', score: 100, created_utc: daysAgo(3) },
      { id: 'n4', title: 'echo chamber', score: 0, created_utc: daysAgo(1) },
      { id: 'q5', title: 'xray yankee zulu', score: 0, created_utc: daysAgo(1) },
      { id: 'n5', title: 'yankee', score: 20, created_utc: daysAgo(2) },
      { id: 'q6', title: 'charlie zulu', score: 0, created_utc: daysAgo(20) },
      { id: 'n6', title: '', score: 0, created_utc: daysAgo(0) },
    ];
    const threads = raw.map(entry => normalizeThread(entry, 'dubai', scorer));

    const ranked = filterByRelevance(sortThreads(threads, 'relevance_date', NOW), 0.2);

    expect(ranked.map(t => t.id)).toEqual(['q5', 'q2', 'q4', 'q1', 'q3', 'q6']);
  });
});
