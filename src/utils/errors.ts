/**
 * Error hierarchy for the crawler
 *
 * Page-level errors (render, content, document) are counted and skipped.
 * Config and renderer-init errors are fatal.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'RENDER_TIMEOUT'
  | 'TRANSPORT_FAILED'
  | 'RENDERER_INIT_FAILED'
  | 'INSUFFICIENT_CONTENT'
  | 'DOCUMENT_RENDER_FAILED'
  | 'FRONTIER_MISUSE'
  | 'RUN_ABORTED';

/**
 * Base class for every error raised by this project
 */
export class SitepressError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/**
 * Invalid configuration, reported before any crawling starts
 */
export class ConfigError extends SitepressError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIG_INVALID');
    this.issues = issues;
  }
}

/**
 * Page render exceeded its timeout
 */
export class RenderTimeoutError extends SitepressError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms loading ${url}`, 'RENDER_TIMEOUT');
  }
}

/**
 * Network failure or a non-success response while rendering a page
 */
export class TransportError extends SitepressError {
  constructor(
    public readonly url: string,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'TRANSPORT_FAILED', options);
  }
}

/**
 * The page renderer could not be created (or re-created after a recycle)
 */
export class RendererInitError extends SitepressError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RENDERER_INIT_FAILED', options);
  }
}

/**
 * Extracted text is too short to produce a document
 */
export class InsufficientContentError extends SitepressError {
  constructor(
    public readonly url: string,
    public readonly characters: number
  ) {
    super(`Insufficient content for ${url} (${characters} characters)`, 'INSUFFICIENT_CONTENT');
  }
}

export class DocumentRenderError extends SitepressError {
  constructor(
    public readonly outputPath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'DOCUMENT_RENDER_FAILED', options);
  }
}

export class FrontierError extends SitepressError {
  constructor(message: string) {
    super(message, 'FRONTIER_MISUSE');
  }
}

/**
 * Run interrupted from outside (SIGINT)
 */
export class RunAbortedError extends SitepressError {
  constructor(message = 'Run aborted') {
    super(message, 'RUN_ABORTED');
  }
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof SitepressError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
