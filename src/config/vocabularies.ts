import { z } from 'zod';
import type { Vocabularies } from '../types';
import raw from './vocabularies.json';

const vocabulariesSchema = z.object({
  legal: z.array(z.string().min(1)),
  translation: z.array(z.string().min(1)),
});

export function createVocabularies(input: unknown): Vocabularies {
  const parsed = vocabulariesSchema.parse(input);
  return Object.freeze({
    legal: Object.freeze(parsed.legal.map(kw => kw.toLowerCase())),
    translation: Object.freeze(parsed.translation.map(kw => kw.toLowerCase())),
  });
}

export const DEFAULT_VOCABULARIES: Vocabularies = createVocabularies(raw);
