/**
 * Statistical keyword extraction (YAKE-style)
 *
 * Scores single terms from local features only (casing, position,
 * frequency, context spread, sentence spread) and combines them into
 * n-gram candidate scores. Lower score = more relevant.
 *
 * Campos et al., "YAKE! Keyword extraction from single documents using
 * multiple local features", Information Sciences 509 (2020).
 */

import type { KeywordLanguage } from '../types/crawl.types';
import germanStopwords from './stopwords/de.json';
import englishStopwords from './stopwords/en.json';

export interface ScoredKeyword {
  keyword: string;
  score: number;
}

export interface KeywordExtractorOptions {
  language: KeywordLanguage;
  maxNgram: number;
  top: number;
  /** Candidates more similar than this to an already selected one are skipped */
  dedupThreshold?: number;
  /** Co-occurrence window in tokens */
  windowSize?: number;
}

const STOPWORDS: Record<KeywordLanguage, ReadonlySet<string>> = {
  de: new Set(germanStopwords),
  en: new Set(englishStopwords),
};

const TOKEN_PATTERN = /[\p{L}\p{N}][\p{L}\p{N}'’_-]*|[^\s\p{L}\p{N}]/gu;
const WORD_PATTERN = /^[\p{L}\p{N}]/u;
const NUMERIC_PATTERN = /^[\p{N}.,'’_-]+$/u;

interface TermStats {
  tf: number;
  tfAcronym: number;
  tfCapital: number;
  sentences: Set<number>;
  left: string[];
  right: string[];
  stopword: boolean;
}

interface CandidateStats {
  terms: string[];
  tf: number;
}

/**
 * Split text into sentences, then each sentence into blocks of word tokens
 * separated by punctuation or numbers
 */
function segment(text: string): string[][][] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .map((sentence) => {
      const blocks: string[][] = [];
      let block: string[] = [];

      for (const token of sentence.match(TOKEN_PATTERN) ?? []) {
        if (WORD_PATTERN.test(token) && !NUMERIC_PATTERN.test(token)) {
          block.push(token);
        } else if (block.length > 0) {
          blocks.push(block);
          block = [];
        }
      }
      if (block.length > 0) blocks.push(block);

      return blocks;
    })
    .filter((blocks) => blocks.length > 0);
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Normalized Levenshtein similarity in [0, 1]
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }

  return 1 - previous[b.length] / longest;
}

export class StatisticalKeywordExtractor {
  private readonly stopwords: ReadonlySet<string>;
  private readonly dedupThreshold: number;
  private readonly windowSize: number;

  constructor(private readonly options: KeywordExtractorOptions) {
    this.stopwords = STOPWORDS[options.language];
    this.dedupThreshold = options.dedupThreshold ?? 0.9;
    this.windowSize = options.windowSize ?? 1;
  }

  /**
   * Extract up to `top` keywords, best first
   */
  extract(text: string): ScoredKeyword[] {
    const sentences = segment(text);
    if (sentences.length === 0) return [];

    const terms = this.collectTerms(sentences);
    const termScores = this.scoreTerms(terms, sentences.length);
    const candidates = this.collectCandidates(sentences, terms);

    const scored: ScoredKeyword[] = [];
    for (const [keyword, candidate] of candidates) {
      let product = 1;
      let sum = 0;
      for (const term of candidate.terms) {
        if (terms.get(term)?.stopword) continue;
        const score = termScores.get(term) ?? 0;
        product *= score;
        sum += score;
      }
      scored.push({ keyword, score: product / (candidate.tf * (1 + sum)) });
    }

    scored.sort((a, b) => a.score - b.score);

    const selected: ScoredKeyword[] = [];
    for (const candidate of scored) {
      if (selected.length >= this.options.top) break;
      const duplicate = selected.some(
        (chosen) => similarity(chosen.keyword, candidate.keyword) > this.dedupThreshold
      );
      if (!duplicate) selected.push(candidate);
    }

    return selected;
  }

  private isStopword(term: string): boolean {
    return term.length < 3 || this.stopwords.has(term);
  }

  private collectTerms(sentences: string[][][]): Map<string, TermStats> {
    const terms = new Map<string, TermStats>();

    sentences.forEach((blocks, sentenceIndex) => {
      let position = 0;
      for (const block of blocks) {
        block.forEach((token, index) => {
          const key = token.toLowerCase();
          let stats = terms.get(key);
          if (!stats) {
            stats = {
              tf: 0,
              tfAcronym: 0,
              tfCapital: 0,
              sentences: new Set(),
              left: [],
              right: [],
              stopword: this.isStopword(key),
            };
            terms.set(key, stats);
          }

          stats.tf++;
          stats.sentences.add(sentenceIndex);
          if (token.length > 1 && token === token.toUpperCase() && token !== token.toLowerCase()) {
            stats.tfAcronym++;
          } else if (position > 0 && /^\p{Lu}/u.test(token)) {
            stats.tfCapital++;
          }

          for (let offset = 1; offset <= this.windowSize && index - offset >= 0; offset++) {
            const neighbour = block[index - offset].toLowerCase();
            stats.left.push(neighbour);
            terms.get(neighbour)?.right.push(key);
          }

          position++;
        });
      }
    });

    return terms;
  }

  private scoreTerms(terms: Map<string, TermStats>, sentenceCount: number): Map<string, number> {
    const contentTfs = Array.from(terms.values())
      .filter((stats) => !stats.stopword)
      .map((stats) => stats.tf);
    const maxTf = Math.max(...Array.from(terms.values()).map((stats) => stats.tf));
    const meanTf = contentTfs.length > 0 ? contentTfs.reduce((a, b) => a + b, 0) / contentTfs.length : 0;
    const stdTf =
      contentTfs.length > 0
        ? Math.sqrt(contentTfs.reduce((acc, tf) => acc + (tf - meanTf) ** 2, 0) / contentTfs.length)
        : 0;

    const scores = new Map<string, number>();
    for (const [term, stats] of terms) {
      const casing = Math.max(stats.tfAcronym, stats.tfCapital) / (1 + Math.log(stats.tf));
      const position = Math.log(Math.log(3 + median(Array.from(stats.sentences))));
      const frequency = meanTf + stdTf > 0 ? stats.tf / (meanTf + stdTf) : 0;
      const leftSpread = stats.left.length > 0 ? new Set(stats.left).size / stats.left.length : 0;
      const rightSpread = stats.right.length > 0 ? new Set(stats.right).size / stats.right.length : 0;
      const relatedness = 1 + (leftSpread + rightSpread) * (stats.tf / maxTf);
      const spread = stats.sentences.size / sentenceCount;

      const score =
        (relatedness * position) / (casing + frequency / relatedness + spread / relatedness);
      scores.set(term, score);
    }

    return scores;
  }

  private collectCandidates(
    sentences: string[][][],
    terms: Map<string, TermStats>
  ): Map<string, CandidateStats> {
    const candidates = new Map<string, CandidateStats>();

    for (const blocks of sentences) {
      for (const block of blocks) {
        const keys = block.map((token) => token.toLowerCase());

        for (let start = 0; start < keys.length; start++) {
          for (let size = 1; size <= this.options.maxNgram && start + size <= keys.length; size++) {
            const gram = keys.slice(start, start + size);
            const first = terms.get(gram[0]);
            const last = terms.get(gram[gram.length - 1]);
            if (!first || !last || first.stopword || last.stopword) continue;

            const keyword = gram.join(' ');
            const existing = candidates.get(keyword);
            if (existing) {
              existing.tf++;
            } else {
              candidates.set(keyword, { terms: gram, tf: 1 });
            }
          }
        }
      }
    }

    return candidates;
  }
}
