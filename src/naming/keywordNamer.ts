/**
 * Keyword derivation for artifact names
 *
 * Primary: statistical extraction. Fallback: stopword-filtered word
 * frequencies. Never returns an empty list.
 */

import type { Logger } from 'pino';
import type { KeywordLanguage } from '../types/crawl.types';
import { StatisticalKeywordExtractor } from './keywordExtractor';
import {
  FALLBACK_KEYWORD,
  FREQUENT_WORD_COUNT,
  MIN_KEYWORD_LENGTH,
  MIN_KEYWORD_TEXT_LENGTH,
  MIN_STATISTICAL_KEYWORDS,
} from '../config/constants';
import { errorMessage } from '../utils/errors';

/**
 * Function words ignored by the frequency fallback (German + English)
 */
const FREQUENCY_STOPWORDS = new Set([
  'der', 'die', 'das', 'den', 'dem', 'des', 'ein', 'eine', 'einer', 'eines',
  'und', 'oder', 'aber', 'mit', 'für', 'auf', 'in', 'zu', 'von', 'nach',
  'the', 'a', 'an', 'and', 'or', 'but', 'with', 'for', 'on', 'to', 'of',
  'ist', 'sind', 'wird', 'werden', 'kann', 'könnte', 'sollte',
  'is', 'are', 'was', 'were', 'can', 'could', 'should', 'would',
]);

export interface KeywordNamerOptions {
  numKeywords: number;
  maxNgram: number;
  language: KeywordLanguage;
}

/**
 * Lowercase, drop characters other than letters, digits, underscore,
 * whitespace and hyphen, collapse whitespace
 */
export function cleanKeyword(keyword: string): string {
  return keyword
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ')
    .toLowerCase();
}

/**
 * Most frequent 4+-letter words, ties in order of first occurrence
 */
export function extractFrequentWords(text: string, limit = FREQUENT_WORD_COUNT): string[] {
  const counts = new Map<string, number>();

  for (const word of text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []) {
    if (!/^[a-zäöüß]{4,}$/.test(word) || FREQUENCY_STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

export class KeywordNamer {
  private readonly extractor: StatisticalKeywordExtractor;

  constructor(
    private readonly options: KeywordNamerOptions,
    private readonly logger?: Logger
  ) {
    this.extractor = new StatisticalKeywordExtractor({
      language: options.language,
      maxNgram: options.maxNgram,
      top: options.numKeywords,
    });
  }

  /**
   * Derive up to `numKeywords` keywords from page text
   *
   * @returns Lowercase keywords; ["content"] for short or keyword-less text
   */
  extract(text: string): string[] {
    if (!text || text.trim().length < MIN_KEYWORD_TEXT_LENGTH) {
      return [FALLBACK_KEYWORD];
    }

    let keywords: string[];
    try {
      keywords = this.extractor
        .extract(text)
        .map((candidate) => cleanKeyword(candidate.keyword))
        .filter((keyword) => keyword.length >= MIN_KEYWORD_LENGTH);

      if (keywords.length < MIN_STATISTICAL_KEYWORDS) {
        keywords = keywords.concat(extractFrequentWords(text));
      }
    } catch (error) {
      this.logger?.warn({ error: errorMessage(error) }, 'Keyword extraction failed');
      keywords = extractFrequentWords(text);
    }

    const unique = Array.from(new Set(keywords)).slice(0, this.options.numKeywords);
    return unique.length > 0 ? unique : [FALLBACK_KEYWORD];
  }
}
