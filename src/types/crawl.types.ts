/**
 * Crawl-related type definitions
 */

/**
 * Canonical URL key: https scheme, no query or fragment, no trailing slash
 */
export type NormalizedUrl = string;

export type DomainScope = 'contains' | 'exact';

export type KeywordLanguage = 'de' | 'en';

/**
 * Immutable configuration for one run
 */
export interface CrawlConfig {
  readonly startUrl: string;
  readonly maxPages: number;
  readonly outputDir: string;
  readonly delayMs: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly batchSize: number;
  readonly ignorePatterns: readonly string[];
  readonly numKeywords: number;
  readonly keywordMaxNgram: number;
  readonly language: KeywordLanguage;
  readonly domainScope: DomainScope;
  readonly maxNameLength: number;
  readonly userAgent: string;
}

export type FrontierStatus = 'idle' | 'discovering' | 'exhausted';

/**
 * Result of fetching one URL through all its attempts
 */
export type FetchOutcome =
  | { status: 'success'; markup: string; attempts: number }
  | { status: 'failed'; reason: string; attempts: number };

/**
 * Cleaned page text, ready for naming and assembly
 */
export interface ExtractedDocument {
  url: NormalizedUrl;
  lines: string[];
  index: number;
  total: number;
}

export type PageErrorKind = 'fetch' | 'content' | 'render';

export interface PageError {
  kind: PageErrorKind;
  url: string;
  reason: string;
}

/**
 * Run statistics
 */
export interface RunStatistics {
  urlsCrawled: number;
  artifactsCreated: number;
  errors: number;
  startTime: Date;
  endTime?: Date;
}

/**
 * Discovery manifest written after the discovery phase
 */
export interface DiscoveryManifest {
  start_url: string;
  timestamp: string;
  total_urls: number;
  urls: NormalizedUrl[];
}
