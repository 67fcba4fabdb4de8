/**
 * Canonical id minting.
 *
 * Ids are readable slugs built from the query that created the topic:
 * "How do I register for courses?" -> `register_courses`.
 */

import { z } from 'zod';
import { readDataFile } from './data-files';
import { normalizeText } from './embeddings';
import type { TopicStore } from './topic-store';

export const MAX_ID_LENGTH = 30;
export const FALLBACK_ID = 'topic';
const KEY_WORDS = 3;

const StopWordsSchema = z.object({
  english: z.array(z.string()),
  arabic: z.array(z.string()),
});

const TransliterationSchema = z.record(z.string());

const stopWords = (() => {
  const lists = readDataFile('stop-words.json', StopWordsSchema);
  return new Set([...lists.english, ...lists.arabic]);
})();

const transliteration = new Map(Object.entries(readDataFile('transliteration.json', TransliterationSchema)));

/** Latin rendering of Arabic letters; anything outside `[a-z0-9_]` is dropped */
export function transliterate(text: string): string {
  let out = '';
  for (const char of text) {
    const latin = transliteration.get(char);
    if (latin !== undefined) out += latin;
    else if (/[a-z0-9_]/.test(char)) out += char;
  }
  return out;
}

/** Slug from the first three meaningful words of `query` */
export function slugFromQuery(query: string): string {
  const words = normalizeText(query)
    .split(' ')
    .map((word) => word.replace(/[^\p{L}\p{N}]/gu, ''))
    .filter((word) => word.length > 1 && !stopWords.has(word));

  const slug = transliterate(words.slice(0, KEY_WORDS).join('_'))
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .slice(0, MAX_ID_LENGTH)
    .replace(/_$/, '');

  return slug || FALLBACK_ID;
}

/**
 * Mint an id for a new topic. When the slug is taken, or equals `avoid`
 * (a near match the arbiter rejected), `_2`, `_3`, ... is appended.
 */
export async function mintCanonicalId(query: string, topics: TopicStore, avoid?: string): Promise<string> {
  const base = slugFromQuery(query);
  let candidate = base;

  for (let n = 2; candidate === avoid || (await topics.exists(candidate)); n++) {
    const suffix = `_${n}`;
    candidate = `${base.slice(0, MAX_ID_LENGTH - suffix.length).replace(/_$/, '')}${suffix}`;
  }

  return candidate;
}
