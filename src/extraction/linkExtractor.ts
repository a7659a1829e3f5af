/**
 * Link discovery for the frontier
 */

import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import type { NormalizedUrl } from '../types/crawl.types';
import { isHttpUrl, resolveUrl } from '../core/urlNormalizer';
import { errorMessage } from '../utils/errors';

/**
 * Extract all crawlable links from a page
 *
 * Fragment-only and blank hrefs are skipped; everything else is resolved
 * against the page URL, kept if http(s), and normalized. Scope and ignore
 * rules are applied by the frontier.
 *
 * @param html - Raw HTML string
 * @param pageUrl - URL the markup was loaded from
 * @returns Unique normalized URLs in document order
 */
export function extractLinks(html: string, pageUrl: string, logger?: Logger): NormalizedUrl[] {
  if (!html) return [];

  try {
    const $ = cheerio.load(html);
    const links = new Set<NormalizedUrl>();

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href') ?? '';
      if (!href.trim() || href.startsWith('#')) return;

      const resolved = resolveUrl(href.trim(), pageUrl);
      if (resolved && isHttpUrl(resolved)) {
        links.add(resolved);
      }
    });

    return Array.from(links);
  } catch (error) {
    logger?.warn({ url: pageUrl, error: errorMessage(error) }, 'Link extraction failed');
    return [];
  }
}
