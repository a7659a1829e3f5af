/**
 * Fetch controller: timeout, retry/backoff and renderer recycling
 *
 * The only component that fails a URL permanently. Every failure cause takes
 * the same path: wait, recycle the renderer, try the same URL again.
 */

import type { FetchOutcome } from '../types/crawl.types';
import type { RendererSession } from '../rendering/pageRenderer';
import type { RunContext } from './runContext';
import { errorMessage, RendererInitError, RunAbortedError } from '../utils/errors';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';

export class FetchController {
  private processedSinceRecycle = 0;

  constructor(
    private readonly session: RendererSession,
    private readonly context: RunContext,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Fetch a URL with up to `maxRetries` attempts
   *
   * Records exactly one page error when every attempt failed.
   *
   * @throws RendererInitError when the renderer cannot be recreated
   * @throws RunAbortedError when the run is interrupted
   */
  async fetch(url: string): Promise<FetchOutcome> {
    const { maxRetries, retryDelayMs, timeoutMs } = this.context.config;
    const logger = this.context.logger;
    let reason = 'No attempt made';

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      this.context.throwIfAborted();

      try {
        const markup = await this.session.render(url, timeoutMs);
        if (attempt > 1) {
          logger.info({ url, attempt }, 'Fetch succeeded after retry');
        }
        return { status: 'success', markup, attempts: attempt };
      } catch (error) {
        if (error instanceof RendererInitError || error instanceof RunAbortedError) {
          throw error;
        }
        reason = errorMessage(error);
      }

      if (attempt < maxRetries) {
        logger.warn({ url, attempt, maxRetries, error: reason }, 'Fetch attempt failed');
        await this.sleep(retryDelayMs, this.context.signal);
        await this.session.recycle('failure');
      }
    }

    logger.error({ url, attempts: maxRetries, error: reason }, 'All retry attempts failed');
    this.context.recordError('fetch', url, reason);

    return { status: 'failed', reason, attempts: maxRetries };
  }

  /**
   * Count a successfully processed URL; recycles the renderer after every
   * `batchSize` of them while work remains
   *
   * @param remaining - URLs still to process after this one
   * @returns True when the renderer was recycled
   */
  async notifyProcessed(remaining: number): Promise<boolean> {
    this.processedSinceRecycle++;

    if (this.processedSinceRecycle < this.context.config.batchSize || remaining <= 0) {
      return false;
    }

    this.processedSinceRecycle = 0;
    await this.session.recycle('batch');
    return true;
  }
}
