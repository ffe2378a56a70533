import natural from 'natural';
import { ANALYSIS_CONFIG } from '../config';
import DUTCH_STOPWORDS from '../data/stopwords-nl.json';
import type { LexicalSummary, LexicalTopTerm } from '../types';

const { PorterStemmerNl } = natural;

const STOPWORDS = new Set<string>(DUTCH_STOPWORDS);

function removeDiacritics(input: string): string {
  return input.normalize('NFD').replace(/\p{Diacritic}/gu, '');
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function tokenize(text: string, minTokenLength = ANALYSIS_CONFIG.minTokenLength): string[] {
  return removeDiacritics(text.toLowerCase())
    .split(/[^a-z0-9]+/u)
    .filter(token => token.length >= minTokenLength && !/^\d+$/.test(token));
}

/**
 * Word count plus the most frequent content words. Words sharing a Dutch stem are
 * counted together and reported under the first spelling seen.
 */
export function summarizeText(text: string, limit = ANALYSIS_CONFIG.topTermsLimit): LexicalSummary {
  const stemFrequency = new Map<string, LexicalTopTerm>();

  for (const token of tokenize(text)) {
    if (STOPWORDS.has(token)) continue;
    const stem = PorterStemmerNl.stem(token);
    const entry = stemFrequency.get(stem);
    if (entry) entry.frequency++;
    else stemFrequency.set(stem, { term: token, frequency: 1 });
  }

  const topTerms = Array.from(stemFrequency.values())
    .sort((a, b) => b.frequency - a.frequency)
    .slice(0, limit)
    .map(entry => ({ ...entry }));

  return { wordCount: countWords(text), topTerms };
}
