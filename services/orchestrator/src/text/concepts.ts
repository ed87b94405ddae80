/**
 * Concept Extraction
 * Upper-cased concept names for MENTIONS edges at ingestion and for graph lookups at query time.
 * Both sides use this extractor so query concepts line up with stored ones.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { STOPWORDS, tokenize } from './keywords.js';

const DOMAIN_TERMS_PATH = fileURLToPath(new URL('../../data/domain-terms.json', import.meta.url));

function loadDomainTerms(): string[] {
  const parsed: unknown = JSON.parse(readFileSync(DOMAIN_TERMS_PATH, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Domain term list at ${DOMAIN_TERMS_PATH} is not an array`);
  }
  return parsed.filter((term): term is string => typeof term === 'string').map((term) => term.toLowerCase());
}

/**
 * Terms recognised as concepts whenever they occur as a word
 */
export const DOMAIN_TERMS: readonly string[] = loadDomainTerms();

export const MAX_CONCEPTS_PER_TEXT = 10;

const ACRONYM_PATTERN = /\b[A-Z]{2,}\b/g;
const ENDPOINT_PATTERN = /\/api\/[A-Za-z0-9/_-]+/g;
const CAMEL_CASE_PATTERN = /\b[A-Z]?[a-z]+(?:[A-Z][a-z0-9]+)+\b/g;
const MIN_FREQUENT_KEYWORD_LENGTH = 4;

/**
 * Keywords that occur at least twice, most frequent first (ties by first appearance)
 */
function frequentKeywords(tokens: string[]): string[] {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    if (token.length < MIN_FREQUENT_KEYWORD_LENGTH || STOPWORDS.has(token) || /^\d+$/.test(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  // Map iteration preserves first appearance; sort is stable
  return [...counts.entries()]
    .filter(([, count]) => count >= 2)
    .sort((a, b) => b[1] - a[1])
    .map(([token]) => token);
}

/**
 * Extract up to `maxConcepts` concept names, upper-cased and unique.
 *
 * Order: domain terms, acronyms, API endpoint names, CamelCase identifiers,
 * then frequent keywords.
 */
export function extractConcepts(text: string, maxConcepts: number = MAX_CONCEPTS_PER_TEXT): string[] {
  const concepts: string[] = [];
  const seen = new Set<string>();

  const add = (term: string): void => {
    const concept = term.trim().toUpperCase();
    if (concept.length < 2 || seen.has(concept)) return;
    seen.add(concept);
    concepts.push(concept);
  };

  const tokens = tokenize(text);
  const words = new Set(tokens);

  for (const term of DOMAIN_TERMS) {
    if (words.has(term)) add(term);
  }

  for (const acronym of text.match(ACRONYM_PATTERN) ?? []) {
    add(acronym);
  }

  for (const endpoint of text.match(ENDPOINT_PATTERN) ?? []) {
    add(endpoint.replace('/api/', '').replace(/\/+$/, ''));
  }

  for (const identifier of text.match(CAMEL_CASE_PATTERN) ?? []) {
    add(identifier);
  }

  for (const keyword of frequentKeywords(tokens)) {
    add(keyword);
  }

  return concepts.slice(0, Math.max(0, maxConcepts));
}

/**
 * Case-insensitive occurrences of a concept in a text, at least 1
 * (used as the MENTIONS edge weight)
 */
export function conceptWeight(concept: string, text: string): number {
  const needle = concept.toLowerCase();
  const haystack = text.toLowerCase();
  if (needle.length === 0) return 1;

  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return Math.max(1, count);
}
