import type { Relevance, Vocabularies } from '../types';
import { DEFAULT_VOCABULARIES } from '../config/vocabularies';

const LEGAL_CAP = 5;
const TRANSLATION_CAP = 3;
const COMBINED_CAP = 6;

/**
 * Keyword relevance for the legal and translation vocabularies.
 *
 * Matching is plain case-insensitive substring containment: each keyword counts
 * once no matter how often it appears, and there is no tokenizing or stemming,
 * so "ban" also matches "urban". Stateless; one instance can be shared freely.
 */
export class RelevanceScorer {
  constructor(private readonly vocabularies: Vocabularies = DEFAULT_VOCABULARIES) {}

  score(text: string): Relevance {
    const { legal, translation } = this.matchedKeywords(text);
    const legalMatches = legal.length;
    const translationMatches = translation.length;

    return {
      legal: Math.min(legalMatches / LEGAL_CAP, 1.0),
      translation: Math.min(translationMatches / TRANSLATION_CAP, 1.0),
      combined: Math.min((legalMatches + translationMatches) / COMBINED_CAP, 1.0),
      legalMatches,
      translationMatches,
    };
  }

  matchedKeywords(text: string): { legal: string[]; translation: string[] } {
    const lower = text.toLowerCase();
    return {
      legal: this.vocabularies.legal.filter(kw => lower.includes(kw.toLowerCase())),
      translation: this.vocabularies.translation.filter(kw => lower.includes(kw.toLowerCase())),
    };
  }
}
