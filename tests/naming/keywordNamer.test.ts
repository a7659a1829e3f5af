/**
 * Tests for keyword derivation and its fallbacks
 */

import { describe, it, expect } from 'vitest';
import { cleanKeyword, extractFrequentWords, KeywordNamer } from '../../src/naming/keywordNamer';

describe('cleanKeyword', () => {
  it('lowercases and strips punctuation', () => {
    expect(cleanKeyword('Garten-Tools!')).toBe('garten-tools');
    expect(cleanKeyword('  Foo   Bar ')).toBe('foo bar');
    expect(cleanKeyword('Öffnungszeiten?')).toBe('öffnungszeiten');
  });
});

describe('extractFrequentWords', () => {
  it('ranks words of four or more letters by frequency', () => {
    const text = 'Garten Garten Blume Blume Blume und und und Baum';
    expect(extractFrequentWords(text)).toEqual(['blume', 'garten', 'baum']);
  });

  it('ignores stopwords, short words and tokens with digits', () => {
    expect(extractFrequentWords('werden werden the a Haus2 Haus2 sonne')).toEqual(['sonne']);
  });

  it('keeps first-occurrence order for ties and respects the limit', () => {
    expect(extractFrequentWords('zebra apfel birne kirsche mango traube', 3)).toEqual([
      'zebra',
      'apfel',
      'birne',
    ]);
  });
});

describe('KeywordNamer', () => {
  const namer = new KeywordNamer({ numKeywords: 3, maxNgram: 2, language: 'de' });

  it("returns ['content'] for text shorter than 50 characters", () => {
    expect(namer.extract('Kurzer Text über Gartengeräte.')).toEqual(['content']);
    expect(namer.extract('')).toEqual(['content']);
    expect(namer.extract(`${' '.repeat(60)}kurz`)).toEqual(['content']);
  });

  it('returns up to numKeywords unique, filename-friendly keywords', () => {
    const text = [
      'Gartengeräte für Hobbygärtner und Profis.',
      'Unsere Gartengeräte werden aus geschmiedetem Stahl gefertigt.',
      'Jede Gartenschere hat zehn Jahre Garantie.',
    ].join('\n');

    const keywords = namer.extract(text);

    expect(keywords.length).toBeGreaterThanOrEqual(1);
    expect(keywords.length).toBeLessThanOrEqual(3);
    expect(new Set(keywords).size).toBe(keywords.length);
    for (const keyword of keywords) {
      expect(keyword).toBe(keyword.toLowerCase());
      expect(keyword.length).toBeGreaterThanOrEqual(3);
      expect(keyword).toMatch(/^[\p{L}\p{N}_\s-]+$/u);
    }
  });

  it('honours numKeywords of one', () => {
    const single = new KeywordNamer({ numKeywords: 1, maxNgram: 1, language: 'en' });
    const text = 'Bicycle repair shop offering bicycle servicing, bicycle parts and friendly advice.';
    expect(single.extract(text)).toHaveLength(1);
  });

  it('falls back to frequent words when every term is a stopword', () => {
    const text = 'nicht nicht nicht haben haben ' + 'ab cd ef gh ij kl mn op qr st uv wx yz '.repeat(2);
    expect(namer.extract(text)).toEqual(['nicht', 'haben']);
  });

  it('tops up a single statistical keyword with frequent words', () => {
    const text = '1234 5678 ' + 'ab cd ef gh ij kl mn op qr st uv wx yz '.repeat(2) + 'kaffee';
    expect(namer.extract(text)).toEqual(['kaffee']);
  });
});
