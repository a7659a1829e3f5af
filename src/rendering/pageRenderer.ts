/**
 * Page renderer contract and the owned session around it
 *
 * A renderer turns a URL into markup. It is stateful and assumed to degrade
 * after failures, so the session can tear it down and build a fresh one.
 */

import type { Logger } from 'pino';
import { errorMessage, RendererInitError } from '../utils/errors';

export interface PageRenderer {
  /**
   * Load a URL and return its markup
   *
   * Rejects with RenderTimeoutError or TransportError.
   */
  render(url: string, timeoutMs: number): Promise<string>;

  close(): Promise<void>;
}

export type PageRendererFactory = () => Promise<PageRenderer>;

export type RecycleReason = 'failure' | 'batch';

/**
 * Owned renderer handle with explicit acquire / recycle / release
 */
export class RendererSession {
  private renderer: PageRenderer | null = null;
  private recycleCount = 0;

  constructor(
    private readonly factory: PageRendererFactory,
    private readonly logger: Logger
  ) {}

  get isActive(): boolean {
    return this.renderer !== null;
  }

  get recycles(): number {
    return this.recycleCount;
  }

  /**
   * @throws RendererInitError when the factory fails
   */
  async acquire(): Promise<void> {
    if (this.renderer) return;

    try {
      this.renderer = await this.factory();
    } catch (error) {
      throw new RendererInitError(`Failed to initialize page renderer: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.logger.debug('Page renderer initialized');
  }

  async render(url: string, timeoutMs: number): Promise<string> {
    if (!this.renderer) {
      await this.acquire();
    }
    if (!this.renderer) {
      throw new RendererInitError('Page renderer unavailable');
    }
    return this.renderer.render(url, timeoutMs);
  }

  /**
   * Tear down the current renderer and create a new one
   */
  async recycle(reason: RecycleReason): Promise<void> {
    this.logger.info({ reason }, 'Recycling page renderer');
    await this.release();
    await this.acquire();
    this.recycleCount++;
  }

  /**
   * Close the renderer. Close failures are logged, not rethrown.
   */
  async release(): Promise<void> {
    const renderer = this.renderer;
    this.renderer = null;
    if (!renderer) return;

    try {
      await renderer.close();
      this.logger.debug('Page renderer closed');
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Failed to close page renderer');
    }
  }
}

/**
 * Run `fn` with an acquired session; the session is released on every exit path
 */
export async function withRendererSession<T>(
  factory: PageRendererFactory,
  logger: Logger,
  fn: (session: RendererSession) => Promise<T>
): Promise<T> {
  const session = new RendererSession(factory, logger);
  await session.acquire();

  try {
    return await fn(session);
  } finally {
    await session.release();
  }
}
