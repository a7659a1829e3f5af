/**
 * Crawl frontier: breadth-first queue plus visited bookkeeping
 *
 * idle --seed()--> discovering --(queue empty | discovered === maxPages)--> exhausted
 *
 * Capacity is enforced when candidates are offered: once
 * discovered + queued reaches maxPages, further candidates are dropped.
 */

import type { DomainScope, FrontierStatus, NormalizedUrl } from '../types/crawl.types';
import { FrontierError } from '../utils/errors';
import { extractNetloc, isInScope, matchesIgnorePattern, normalizeUrl } from './urlNormalizer';

export interface FrontierOptions {
  maxPages: number;
  ignorePatterns: readonly string[];
  domainScope: DomainScope;
}

/**
 * Why a candidate was not enqueued
 */
export type RejectReason = 'seen' | 'ignored' | 'out_of_scope' | 'capacity';

export interface OfferResult {
  enqueued: NormalizedUrl[];
  rejected: Record<RejectReason, number>;
}

export class Frontier {
  private readonly visited = new Set<NormalizedUrl>();
  private readonly pending = new Set<NormalizedUrl>();
  private readonly queue: NormalizedUrl[] = [];
  private readonly discoveredUrls: NormalizedUrl[] = [];
  private seedNetloc = '';
  private state: FrontierStatus = 'idle';

  constructor(private readonly options: FrontierOptions) {}

  get status(): FrontierStatus {
    return this.state;
  }

  get discovered(): readonly NormalizedUrl[] {
    return this.discoveredUrls;
  }

  get queued(): readonly NormalizedUrl[] {
    return this.queue;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Enqueue the start URL. Must be called exactly once.
   */
  seed(url: string): NormalizedUrl {
    if (this.state !== 'idle') {
      throw new FrontierError('Frontier has already been seeded');
    }

    const normalized = normalizeUrl(url);
    this.seedNetloc = extractNetloc(normalized);
    this.queue.push(normalized);
    this.pending.add(normalized);
    this.state = 'discovering';

    return normalized;
  }

  /**
   * Pop the head of the queue (FIFO)
   *
   * Visited bookkeeping is left to the caller (markVisited / markDiscovered).
   *
   * @returns Next URL, or null once the frontier is exhausted
   */
  next(): NormalizedUrl | null {
    if (this.state !== 'discovering') {
      return null;
    }

    while (this.queue.length > 0 && this.discoveredUrls.length < this.options.maxPages) {
      const url = this.queue.shift();
      if (url === undefined) break;
      this.pending.delete(url);

      if (!this.visited.has(url)) {
        return url;
      }
    }

    this.state = 'exhausted';
    return null;
  }

  /**
   * Record that a fetch of this URL has been attempted
   */
  markVisited(url: NormalizedUrl): void {
    this.visited.add(url);
  }

  /**
   * Record a successfully fetched page as a discovery result
   */
  markDiscovered(url: NormalizedUrl): void {
    this.visited.add(url);
    if (this.discoveredUrls.includes(url)) {
      return;
    }
    if (this.discoveredUrls.length >= this.options.maxPages) {
      return;
    }
    this.discoveredUrls.push(url);
  }

  isVisited(url: string): boolean {
    return this.visited.has(normalizeUrl(url));
  }

  /**
   * Offer candidate links for the queue
   *
   * Never fails: candidates that are already known, ignored, out of scope
   * or over capacity are dropped.
   */
  offer(urls: Iterable<string>): OfferResult {
    const result: OfferResult = {
      enqueued: [],
      rejected: { seen: 0, ignored: 0, out_of_scope: 0, capacity: 0 },
    };

    for (const candidate of urls) {
      const url = normalizeUrl(candidate);

      if (this.visited.has(url) || this.pending.has(url)) {
        result.rejected.seen++;
        continue;
      }

      if (matchesIgnorePattern(url, this.options.ignorePatterns)) {
        result.rejected.ignored++;
        continue;
      }

      if (!isInScope(url, this.seedNetloc, this.options.domainScope)) {
        result.rejected.out_of_scope++;
        continue;
      }

      if (this.discoveredUrls.length + this.queue.length >= this.options.maxPages) {
        result.rejected.capacity++;
        continue;
      }

      this.queue.push(url);
      this.pending.add(url);
      result.enqueued.push(url);
    }

    return result;
  }
}
