import { z } from 'zod';
import vocabularyFile from '../data/vocabulary.json';
import type { ExtractedTerm, TermKind } from '../types';

const aliasGroup = z.record(z.array(z.string()));

const vocabularySchema = z.object({
  corrections: z.record(z.string()),
  terms: z.object({
    category: aliasGroup,
    fabric: aliasGroup,
    occasion: aliasGroup,
    region: aliasGroup,
    gender: aliasGroup
  })
});

const vocabulary = vocabularySchema.parse(vocabularyFile);

const CORRECTIONS = new Map(Object.entries(vocabulary.corrections));

// alias -> canonical term, e.g. "shaadi" -> { term: "wedding", kind: "occasion" }
const ALIASES = new Map<string, ExtractedTerm>();
const KINDS: TermKind[] = ['category', 'fabric', 'occasion', 'region', 'gender'];
KINDS.forEach(kind => {
  Object.entries(vocabulary.terms[kind]).forEach(([term, aliases]) => {
    [term, ...aliases].forEach(alias => ALIASES.set(alias, { term, kind }));
  });
});

const WORD_PATTERN = /[a-z0-9]+(?:-[a-z0-9]+)*/g;

export const tokenize = (text: string): string[] => text.toLowerCase().match(WORD_PATTERN) ?? [];

/**
 * Lower-cases the text and fixes common misspellings ("weding sare" -> "wedding saree").
 */
export const cleanQuery = (text: string): string =>
  tokenize(text).map(word => CORRECTIONS.get(word) ?? word).join(' ');

// Tolerates plurals: sarees, dhotis, parties
const lookup = (phrase: string): ExtractedTerm | undefined => {
  const exact = ALIASES.get(phrase);
  if (exact) return exact;
  if (phrase.endsWith('ies')) {
    const singular = ALIASES.get(`${phrase.slice(0, -3)}y`);
    if (singular) return singular;
  }
  if (phrase.endsWith('s')) {
    const singular = ALIASES.get(phrase.slice(0, -1));
    if (singular) return singular;
  }
  if (phrase.endsWith('es')) {
    return ALIASES.get(phrase.slice(0, -2));
  }
  return undefined;
};

/**
 * Garment vocabulary found in the text, in order of first appearance.
 * Two-word phrases ("nehru jacket", "indo western") win over single words.
 */
export const extractTerms = (text: string): ExtractedTerm[] => {
  const words = tokenize(cleanQuery(text));
  const found: ExtractedTerm[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < words.length; i++) {
    let match: ExtractedTerm | undefined;
    if (i + 1 < words.length) {
      match = lookup(`${words[i]} ${words[i + 1]}`);
      if (match) i++;
    }
    if (!match) match = lookup(words[i]);

    if (match && !seen.has(match.term)) {
      seen.add(match.term);
      found.push(match);
    }
  }
  return found;
};

/**
 * Keywords for the garment lookup of one chat turn. They come from the user's
 * message; when it names no garment type, the first type the reply suggests is added.
 */
export const buildKeywords = (message: string, reply: string): ExtractedTerm[] => {
  const keywords = extractTerms(message);
  if (keywords.some(t => t.kind === 'category')) return keywords;

  const suggested = extractTerms(reply).find(t => t.kind === 'category');
  return suggested ? [...keywords, suggested] : keywords;
};
