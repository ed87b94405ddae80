/**
 * Keyword Utilities
 * Tokenization, stopword-filtered keyword extraction and overlap ratios
 * shared by the conversation connector, concept extraction and fuzzy dedup
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

function loadStopwords(): Set<string> {
  const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Stopword list at ${STOPWORDS_PATH} is not an array`);
  }
  return new Set(parsed.filter((word): word is string => typeof word === 'string'));
}

/**
 * Common English stopwords to filter out
 */
export const STOPWORDS: ReadonlySet<string> = loadStopwords();

/**
 * Lower-cased word tokens, punctuation stripped, apostrophes folded
 */
export function tokenize(text: string): string[] {
  const normalized = text
    .toLowerCase()
    .replace(/'/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return normalized.length === 0 ? [] : normalized.split(' ');
}

/**
 * Extract keywords from text
 * Filters out stopwords and short words
 */
export function extractKeywords(text: string, minWordLength = 3): Set<string> {
  const keywords = new Set<string>();

  for (const word of tokenize(text)) {
    if (word.length >= minWordLength && !STOPWORDS.has(word)) {
      keywords.add(word);
    }
  }

  return keywords;
}

/**
 * Share of the query keywords that also occur in the other set (0-1)
 */
export function queryCoverage(query: ReadonlySet<string>, other: ReadonlySet<string>): number {
  if (query.size === 0) {
    return 0;
  }

  let matched = 0;
  for (const word of query) {
    if (other.has(word)) matched++;
  }
  return matched / query.size;
}

/**
 * Jaccard ratio |A ∩ B| / |A ∪ B| (0-1). Two empty sets score 0.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const word of a) {
    if (b.has(word)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Truncate a message to a maximum length, preferring a word boundary
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  const cut = lastSpace > maxLength * 0.8 ? truncated.slice(0, lastSpace) : truncated;
  return `${cut}...`;
}
