/**
 * Tests for text extraction and the line noise heuristics
 */

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  countContentChars,
  extractContent,
  filterLines,
  flattenToLines,
  isNoiseLine,
} from '../../src/extraction/contentExtractor';

// ---------------------------------------------------------------------------
// isNoiseLine
// ---------------------------------------------------------------------------

describe('isNoiseLine', () => {
  it('drops empty lines', () => {
    expect(isNoiseLine('')).toBe(true);
    expect(isNoiseLine('   ')).toBe(true);
  });

  it('keeps five colons and drops six', () => {
    expect(isNoiseLine('a:b:c:d:e:f')).toBe(false);
    expect(isNoiseLine('a:b:c:d:e:f:g')).toBe(true);
  });

  it('keeps five day.month dates and drops six', () => {
    expect(isNoiseLine('01.02 03.04 05.06 07.08 09.10')).toBe(false);
    expect(isNoiseLine('01.02 03.04 05.06 07.08 09.10 11.12')).toBe(true);
  });

  it('keeps three weekday tokens and drops four', () => {
    expect(isNoiseLine('Mon Tue Wed open late')).toBe(false);
    expect(isNoiseLine('Montag Dienstag Mittwoch Donnerstag')).toBe(true);
  });

  it('keeps ordinary prose', () => {
    expect(isNoiseLine('Opening hours: weekdays from nine.')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// flattenToLines
// ---------------------------------------------------------------------------

describe('flattenToLines', () => {
  it('breaks lines at block boundaries and <br>, joining inline text', () => {
    const $ = cheerio.load('<div><p>Hello <b>bold</b> world</p><p>Line one<br>Line two</p></div>');
    expect(flattenToLines($)).toEqual(['Hello bold world', 'Line one', 'Line two']);
  });

  it('collapses runs of whitespace', () => {
    const $ = cheerio.load('<p>  spaced \t  out   text </p>');
    expect(flattenToLines($)).toEqual(['spaced out text']);
  });
});

// ---------------------------------------------------------------------------
// extractContent
// ---------------------------------------------------------------------------

describe('extractContent', () => {
  it('removes scripts, navigation, header, footer and sidebars', () => {
    const html = `
      <html><head><title>Bakery</title><style>p { color: red }</style></head>
      <body>
        <header>Site header</header>
        <nav><a href="/">Home</a></nav>
        <main><p>Fresh bread every morning.</p></main>
        <aside>Related links</aside>
        <footer>Imprint</footer>
        <script>console.log('x')</script>
      </body></html>`;

    expect(extractContent(html)).toEqual(['Bakery', 'Fresh bread every morning.']);
  });

  it('removes tables entirely', () => {
    const html = '<p>Before</p><table><tr><td>Mon</td><td>9-17</td></tr></table><p>After</p>';
    expect(extractContent(html)).toEqual(['Before', 'After']);
  });

  it('removes containers whose class or id names a schedule', () => {
    const html = `
      <div class="Course-List"><p>Yoga at 9</p></div>
      <section id="booking-widget"><p>Book now</p></section>
      <div class="intro"><p>About our studio</p></div>`;

    expect(extractContent(html)).toEqual(['About our studio']);
  });

  it('filters noise lines', () => {
    const html = '<p>Real sentence here.</p><p>Mo: 1: 2: 3: 4: 5: 6:</p>';
    expect(extractContent(html)).toEqual(['Real sentence here.']);
  });

  it('returns an empty list for empty markup', () => {
    expect(extractContent('')).toEqual([]);
  });

  it('decodes entities in prose', () => {
    const html = '<p>Use &lt;script&gt;init()&lt;/script&gt; in the page head.</p><p>Tom &amp;amp; Jerry</p>';
    expect(extractContent(html)).toEqual(['Use <script>init()</script> in the page head.', 'Tom &amp; Jerry']);
  });

  it('gives the same lines when run on its own output', () => {
    const html =
      '<p>Use &lt;script&gt;init()&lt;/script&gt; in the page head.</p>' +
      '<p>If x&lt;y then stop.</p><p>Tom &amp;amp; Jerry</p>';
    const once = extractContent(html);

    expect(extractContent(once.join('\n'))).toEqual(once);
    expect(extractContent(once)).toEqual(once);
  });

  it('takes lines starting with a tag-like token as text when given as a list', () => {
    const lines = ['<br> is a line break', 'plain prose'];
    expect(extractContent(lines)).toEqual(lines);
  });
});

describe('filterLines', () => {
  it('trims lines and drops noise without parsing markup', () => {
    expect(filterLines(['  a < b & c  ', '', 'a:b:c:d:e:f:g', 'x'])).toEqual(['a < b & c', 'x']);
  });
});

describe('countContentChars', () => {
  it('counts characters other than whitespace', () => {
    expect(countContentChars(['abc def', ' g '])).toBe(7);
    expect(countContentChars([])).toBe(0);
  });
});
