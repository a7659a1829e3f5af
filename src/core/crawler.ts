/**
 * Pipeline orchestrator
 * Phase 1: breadth-first discovery of in-scope URLs, written to the manifest
 * Phase 2: re-fetch, extract, name and render one document per URL
 */

import path from 'path';
import type { NormalizedUrl, ExtractedDocument, RunStatistics } from '../types/crawl.types';
import type { DocumentRenderer } from '../rendering/documentRenderer';
import { withRendererSession, type PageRendererFactory } from '../rendering/pageRenderer';
import { Frontier } from './frontier';
import { FetchController } from './fetchController';
import type { RunContext } from './runContext';
import { extractLinks } from '../extraction/linkExtractor';
import { countContentChars, extractContent } from '../extraction/contentExtractor';
import { KeywordNamer } from '../naming/keywordNamer';
import { buildArtifactName } from '../naming/artifactName';
import { assembleDocument } from '../document/documentAssembler';
import { buildManifest, writeManifest } from '../output/manifest';
import { logCrawlProgress, logCrawlStats } from '../utils/logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';
import { errorMessage, InsufficientContentError } from '../utils/errors';
import { MIN_CONTENT_CHARS } from '../config/constants';

export interface CrawlDependencies {
  rendererFactory: PageRendererFactory;
  documentRenderer: DocumentRenderer;
  /**
   * Asked once after discovery; generation only runs on true.
   * Without it generation starts right away.
   */
  confirm?: (discoveredCount: number) => Promise<boolean>;
  sleep?: Sleep;
  now?: () => Date;
}

export type RunStatus = 'completed' | 'cancelled' | 'empty';

export interface CrawlResult {
  status: RunStatus;
  discovered: NormalizedUrl[];
  manifestPath?: string;
  artifacts: string[];
  stats: RunStatistics;
}

/**
 * Breadth-first discovery from the configured start URL
 *
 * @returns Discovered URLs in BFS order
 */
export async function runDiscovery(
  context: RunContext,
  fetcher: FetchController,
  sleep: Sleep = defaultSleep
): Promise<NormalizedUrl[]> {
  const { config, logger } = context;
  const frontier = new Frontier({
    maxPages: config.maxPages,
    ignorePatterns: config.ignorePatterns,
    domainScope: config.domainScope,
  });

  const seed = frontier.seed(config.startUrl);
  logger.info({ runId: context.runId, seed, maxPages: config.maxPages }, 'Starting discovery');

  for (let url = frontier.next(); url !== null; url = frontier.next()) {
    context.throwIfAborted();
    frontier.markVisited(url);

    const outcome = await fetcher.fetch(url);

    if (outcome.status === 'success') {
      frontier.markDiscovered(url);
      context.recordCrawled();
      logCrawlProgress(logger, 'discovery', frontier.discovered.length, config.maxPages, url);

      const links = extractLinks(outcome.markup, url, logger);
      const offered = frontier.offer(links);
      logger.debug(
        { url, links: links.length, enqueued: offered.enqueued.length, rejected: offered.rejected },
        'Links offered to frontier'
      );
    }

    await sleep(config.delayMs, context.signal);
  }

  logger.info({ discovered: frontier.discovered.length }, 'Discovery complete');
  return [...frontier.discovered];
}

/**
 * Generate one document per URL
 *
 * Page-level failures are counted and skipped; they never stop the phase.
 *
 * @returns Paths of the written artifacts
 */
export async function runGeneration(
  context: RunContext,
  fetcher: FetchController,
  urls: readonly NormalizedUrl[],
  documentRenderer: DocumentRenderer,
  options: { sleep?: Sleep; now?: () => Date } = {}
): Promise<string[]> {
  const { config, logger } = context;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const namer = new KeywordNamer(
    { numKeywords: config.numKeywords, maxNgram: config.keywordMaxNgram, language: config.language },
    logger
  );
  const total = urls.length;
  const artifacts: string[] = [];

  logger.info({ total, batchSize: config.batchSize }, 'Starting document generation');

  for (const [position, url] of urls.entries()) {
    context.throwIfAborted();
    const index = position + 1;
    logCrawlProgress(logger, 'generation', index, total, url);

    const outcome = await fetcher.fetch(url);
    let artifact: string | null = null;

    if (outcome.status === 'success') {
      const lines = extractContent(outcome.markup, logger);
      const characters = countContentChars(lines);

      if (characters < MIN_CONTENT_CHARS) {
        const error = new InsufficientContentError(url, characters);
        logger.warn({ url, characters }, 'Insufficient content');
        context.recordError('content', url, error.message);
      } else {
        const document: ExtractedDocument = { url, lines, index, total };
        const keywords = namer.extract(lines.join('\n'));
        const createdAt = now();
        const model = assembleDocument(document, { keywords, createdAt, language: config.language });
        const name = buildArtifactName({
          index,
          url,
          keywords,
          timestamp: createdAt,
          maxLength: config.maxNameLength,
        });
        const outputPath = path.join(config.outputDir, name);

        try {
          await documentRenderer.render(model, outputPath);
          context.recordArtifact();
          artifacts.push(outputPath);
          artifact = outputPath;
          logger.info({ url, file: name, keywords }, 'Document created');
        } catch (error) {
          logger.error({ url, error: errorMessage(error) }, 'Document rendering failed');
          context.recordError('render', url, errorMessage(error));
        }
      }
    }

    await sleep(config.delayMs, context.signal);

    if (artifact) {
      await fetcher.notifyProcessed(total - index);
    }
  }

  return artifacts;
}

/**
 * Run both phases with one renderer session
 *
 * The session is released on every exit path, including interruption.
 */
export async function runCrawl(context: RunContext, deps: CrawlDependencies): Promise<CrawlResult> {
  const { config, logger } = context;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());

  return withRendererSession(deps.rendererFactory, logger, async (session): Promise<CrawlResult> => {
    const fetcher = new FetchController(session, context, sleep);

    const discovered = await runDiscovery(context, fetcher, sleep);
    if (discovered.length === 0) {
      logger.error({ startUrl: config.startUrl }, 'No URLs found');
      return { status: 'empty', discovered, artifacts: [], stats: context.finish(now()) };
    }

    const manifestPath = await writeManifest(
      config.outputDir,
      buildManifest(config.startUrl, discovered, now())
    );
    logger.info({ manifestPath, total: discovered.length }, 'Discovery manifest written');

    const confirmed = deps.confirm ? await deps.confirm(discovered.length) : true;
    if (!confirmed) {
      logger.info('Document generation cancelled by user');
      return { status: 'cancelled', discovered, manifestPath, artifacts: [], stats: context.finish(now()) };
    }

    const artifacts = await runGeneration(context, fetcher, discovered, deps.documentRenderer, {
      sleep,
      now,
    });

    const stats = context.finish(now());
    logCrawlStats(logger, stats);

    return { status: 'completed', discovered, manifestPath, artifacts, stats };
  });
}
