import { ANALYSIS_CONFIG } from '../config';
import type { ArticleRecord, ContextualSignals, KeywordAnalysis, KeywordMatch } from '../types';

export interface KeywordAnalyzerOptions {
  /** Characters kept on each side of an occurrence in `contextWindow`. */
  contextRadius?: number;
  /** Maximum distance from an occurrence at which numbers and dates still count as nearby. */
  signalRadius?: number;
}

interface Span {
  start: number;
  end: number;
}

const MONTH_NAMES = [
  // nl
  'januari', 'februari', 'maart', 'april', 'mei', 'juni', 'juli', 'augustus', 'september', 'oktober', 'november', 'december',
  // en, where different
  'january', 'february', 'march', 'may', 'june', 'july', 'august', 'october',
  'jan', 'feb', 'mrt', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'okt', 'oct', 'nov', 'dec'
];

const MONTH_ALTERNATION = [...new Set(MONTH_NAMES)].sort((a, b) => b.length - a.length).join('|');

const DATE_PATTERN = new RegExp(
  [
    '\\b\\d{4}-\\d{2}-\\d{2}\\b',
    '\\b\\d{1,2}[-/.]\\d{1,2}[-/.]\\d{4}\\b',
    `\\b\\d{1,2}\\s+(?:${MONTH_ALTERNATION})\\.?(?:\\s+\\d{4})?\\b`
  ].join('|'),
  'gi'
);

const NUMBER_PATTERN = /\b\d+(?:[.,]\d+)*\b/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isSentenceTerminator(text: string, index: number): boolean {
  const character = text[index];
  if (character !== '.' && character !== '!' && character !== '?') return false;
  return index + 1 >= text.length || /\s/.test(text[index + 1]);
}

export function findOccurrences(text: string, keyword: string): number[] {
  if (!keyword) return [];
  const pattern = new RegExp(escapeRegExp(keyword), 'gi');
  return Array.from(text.matchAll(pattern), match => match.index ?? 0);
}

export function extractContextWindow(text: string, offset: number, keywordLength: number, radius: number): string {
  const start = Math.max(0, offset - radius);
  const end = Math.min(text.length, offset + keywordLength + radius);
  return text.slice(start, end);
}

/** The sentence around an occurrence; `.`, `!` and `?` only end a sentence when followed by whitespace or the end of the text. */
export function extractContainingSentence(text: string, offset: number, keywordLength: number): string {
  let start = 0;
  for (let index = offset - 1; index >= 0; index--) {
    if (isSentenceTerminator(text, index)) {
      start = index + 1;
      break;
    }
  }

  let end = text.length;
  for (let index = offset + keywordLength; index < text.length; index++) {
    if (isSentenceTerminator(text, index)) {
      end = index + 1;
      break;
    }
  }

  return text.slice(start, end).trim();
}

function collectNearby(text: string, pattern: RegExp, regions: Span[]): string[] {
  const seenValues = new Set<string>();
  const values: string[] = [];

  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (!regions.some(region => start >= region.start && end <= region.end)) continue;
    if (seenValues.has(match[0])) continue;
    seenValues.add(match[0]);
    values.push(match[0]);
  }

  return values;
}

export function extractContextualSignals(
  text: string,
  offsets: number[],
  keywordLength: number,
  signalRadius: number
): ContextualSignals {
  const regions = offsets.map(offset => ({
    start: Math.max(0, offset - signalRadius),
    end: Math.min(text.length, offset + keywordLength + signalRadius)
  }));

  return {
    nearbyNumbers: collectNearby(text, NUMBER_PATTERN, regions),
    nearbyDates: collectNearby(text, DATE_PATTERN, regions)
  };
}

/**
 * Finds every case-insensitive occurrence of `keyword` in the record's text.
 * Returns `{ matched: false }` for irrelevant records; that is the normal filter outcome, not a failure.
 */
export function analyzeKeyword(
  record: Pick<ArticleRecord, 'fullText'>,
  keyword: string,
  options: KeywordAnalyzerOptions = {}
): KeywordAnalysis {
  const contextRadius = options.contextRadius ?? ANALYSIS_CONFIG.contextRadius;
  const signalRadius = options.signalRadius ?? ANALYSIS_CONFIG.signalRadius;
  const text = record.fullText;
  const offsets = findOccurrences(text, keyword);

  if (offsets.length === 0) return { matched: false };

  const matches: KeywordMatch[] = offsets.map((offset, occurrenceIndex) => ({
    occurrenceIndex,
    charOffset: offset,
    contextWindow: extractContextWindow(text, offset, keyword.length, contextRadius),
    containingSentence: extractContainingSentence(text, offset, keyword.length)
  }));

  return {
    matched: true,
    matches,
    signals: extractContextualSignals(text, offsets, keyword.length, signalRadius)
  };
}
