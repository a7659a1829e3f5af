/**
 * Explicit per-run state passed to each phase
 *
 * Owns the run statistics and the page-error ledger; everything else reads
 * them through snapshots.
 */

import type { Logger } from 'pino';
import type { CrawlConfig, PageError, PageErrorKind, RunStatistics } from '../types/crawl.types';
import { RunAbortedError } from '../utils/errors';

export class RunContext {
  private readonly stats: RunStatistics;
  private readonly pageErrors: PageError[] = [];

  constructor(
    public readonly runId: string,
    public readonly config: CrawlConfig,
    public readonly logger: Logger,
    public readonly signal?: AbortSignal,
    now: Date = new Date()
  ) {
    this.stats = {
      urlsCrawled: 0,
      artifactsCreated: 0,
      errors: 0,
      startTime: now,
    };
  }

  recordCrawled(): void {
    this.stats.urlsCrawled++;
  }

  recordArtifact(): void {
    this.stats.artifactsCreated++;
  }

  /**
   * Count one page-level error
   */
  recordError(kind: PageErrorKind, url: string, reason: string): void {
    this.stats.errors++;
    this.pageErrors.push({ kind, url, reason });
  }

  finish(now: Date = new Date()): RunStatistics {
    this.stats.endTime = now;
    return this.snapshot();
  }

  snapshot(): RunStatistics {
    return { ...this.stats };
  }

  get errors(): readonly PageError[] {
    return this.pageErrors;
  }

  /**
   * @throws RunAbortedError once the run's signal has fired
   */
  throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new RunAbortedError('Run interrupted');
    }
  }
}
