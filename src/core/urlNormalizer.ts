/**
 * URL Normalizer - CRITICAL COMPONENT
 * All deduplication depends on consistent URL normalization
 *
 * The identity of a page = normalized URL
 */

import type { DomainScope, NormalizedUrl } from '../types/crawl.types';

/**
 * Normalize a URL for consistent comparison and deduplication
 *
 * Rules (applied in order):
 * 1. Add https:// if protocol missing
 * 2. Parse with URL API
 * 3. Rewrite http to https
 * 4. Remove query string and fragment
 * 5. Remove trailing slashes (empty path becomes /)
 *
 * URLs differing only in query parameters are the same page.
 * Never throws: input that cannot be parsed is returned unchanged.
 *
 * @param url - Raw URL string
 * @returns Normalized URL
 */
export function normalizeUrl(url: string): NormalizedUrl {
  if (!url) return url;

  try {
    let normalized = url.trim();

    // Add protocol if missing
    if (!/^[a-z][a-z\d+.-]*:\/\//i.test(normalized)) {
      normalized = `https://${normalized}`;
    }

    const urlObj = new URL(normalized);

    if (urlObj.protocol === 'http:') {
      urlObj.protocol = 'https:';
    }

    urlObj.search = '';
    urlObj.hash = '';
    urlObj.pathname = urlObj.pathname.replace(/\/+$/, '') || '/';

    return urlObj.toString();
  } catch {
    return url;
  }
}

/**
 * Extract domain from URL
 *
 * @param url - Full URL
 * @returns Hostname (e.g., "example.com"), empty string when unparseable
 */
export function extractDomain(url: string): string {
  try {
    return new URL(normalizeUrl(url)).hostname;
  } catch {
    return '';
  }
}

/**
 * Network location (host with port) of a URL
 */
export function extractNetloc(url: string): string {
  try {
    return new URL(normalizeUrl(url)).host;
  } catch {
    return '';
  }
}

/**
 * Resolve a relative URL against a base URL
 *
 * @param relativeUrl - Relative URL (e.g., "/about", "../contact")
 * @param baseUrl - Base URL to resolve against
 * @returns Absolute normalized URL, or null when it cannot be resolved or
 *   is not http(s) (mailto:, tel:, javascript:)
 */
export function resolveUrl(relativeUrl: string, baseUrl: string): NormalizedUrl | null {
  try {
    const resolved = new URL(relativeUrl, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }
    return normalizeUrl(resolved.toString());
  } catch {
    return null;
  }
}

/**
 * Only http(s) links are crawlable
 */
export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

/**
 * Case-insensitive substring match against ignore patterns
 */
export function matchesIgnorePattern(url: string, patterns: readonly string[]): boolean {
  const lower = url.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern.toLowerCase()));
}

/**
 * Domain scoping against the seed's network location
 *
 * 'contains' accepts any host containing the seed's (www.example.com and
 * shop.example.com for a seed of example.com). 'exact' requires equality.
 */
export function isInScope(url: string, seedNetloc: string, scope: DomainScope): boolean {
  const netloc = extractNetloc(url);
  if (!netloc || !seedNetloc) return false;

  return scope === 'exact' ? netloc === seedNetloc : netloc.includes(seedNetloc);
}

/**
 * Check if two URLs are equivalent (after normalization)
 */
export function areUrlsEquivalent(url1: string, url2: string): boolean {
  return normalizeUrl(url1) === normalizeUrl(url2);
}
