/**
 * HTTP page renderer backed by an undici Agent
 *
 * One Agent (connection pool) per renderer, so recycling the session drops
 * every open connection. Markup is returned as served; scripts are not run.
 */

import { Agent, errors, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { PageRenderer, PageRendererFactory } from './pageRenderer';
import { errorMessage, RenderTimeoutError, RunAbortedError, TransportError } from '../utils/errors';
import { USER_AGENT } from '../config/constants';

export interface HttpPageRendererOptions {
  userAgent?: string;
  maxRedirections?: number;
  acceptLanguage?: string;
  /** Replaces the renderer's own Agent; closed together with the renderer */
  dispatcher?: Dispatcher;
  /** Run signal; cancels the request in flight */
  signal?: AbortSignal;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError ||
    (error instanceof Error && error.name === 'TimeoutError')
  );
}

export class HttpPageRenderer implements PageRenderer {
  private readonly agent: Dispatcher;

  constructor(private readonly options: HttpPageRendererOptions = {}) {
    this.agent = options.dispatcher ?? new Agent({ connections: 2, keepAliveTimeout: 10_000 });
  }

  async render(url: string, timeoutMs: number): Promise<string> {
    const { signal } = this.options;
    const timeout = AbortSignal.timeout(timeoutMs);
    let response: Dispatcher.ResponseData;

    try {
      response = await request(url, {
        method: 'GET',
        dispatcher: this.agent,
        maxRedirections: this.options.maxRedirections ?? 5,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        headers: {
          'user-agent': this.options.userAgent ?? USER_AGENT,
          accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
          'accept-language': this.options.acceptLanguage ?? 'de,en;q=0.8',
        },
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new RunAbortedError();
      }
      if (isTimeoutError(error)) {
        throw new RenderTimeoutError(url, timeoutMs);
      }
      throw new TransportError(url, `Request failed for ${url}: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    const { statusCode, headers, body } = response;

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new TransportError(url, `HTTP ${statusCode} for ${url}`, statusCode);
    }

    const contentType = String(headers['content-type'] ?? '').toLowerCase();
    if (contentType && !HTML_CONTENT_TYPES.some((type) => contentType.includes(type))) {
      await body.dump();
      throw new TransportError(url, `Unsupported content type "${contentType}" for ${url}`, statusCode);
    }

    try {
      return await body.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new RunAbortedError();
      }
      if (isTimeoutError(error)) {
        throw new RenderTimeoutError(url, timeoutMs);
      }
      throw new TransportError(url, `Failed to read body of ${url}: ${errorMessage(error)}`, statusCode, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

export function createHttpRendererFactory(options: HttpPageRendererOptions = {}): PageRendererFactory {
  return async () => new HttpPageRenderer(options);
}
