#!/usr/bin/env node

/**
 * CLI entry point
 */

import { Command, InvalidArgumentError } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import * as dotenv from 'dotenv';
import { runCrawl, type CrawlResult } from './core/crawler';
import { RunContext } from './core/runContext';
import {
  configFromEnv,
  createCrawlConfig,
  loadConfigFile,
  saveConfigFile,
  type CrawlConfigOverrides,
} from './config/crawlConfig';
import { createHttpRendererFactory } from './rendering/httpPageRenderer';
import { PdfDocumentRenderer } from './rendering/pdfDocumentRenderer';
import { confirmGeneration, createPrompter, promptMaxPages, promptStartUrl, type Prompter } from './cli/prompts';
import { createLogger, type Logger } from './utils/logger';
import { ConfigError, errorMessage, RunAbortedError, SitepressError } from './utils/errors';
import type { CrawlConfig, DomainScope, KeywordLanguage } from './types/crawl.types';
import {
  APP_NAME,
  APP_VERSION,
  DEFAULT_MAX_PAGES,
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
} from './config/constants';

// Load environment variables
dotenv.config();

interface CliOptions {
  maxPages?: number;
  output?: string;
  delay?: number;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  batchSize?: number;
  ignore?: string[];
  language?: KeywordLanguage;
  keywords?: number;
  scope?: DomainScope;
  yes?: boolean;
  config?: string;
  saveConfig?: string;
  debug?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a whole number greater than 0.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a whole number.');
  }
  return parsed;
}

function parseLanguage(value: string): KeywordLanguage {
  if (value === 'de' || value === 'en') {
    return value;
  }
  throw new InvalidArgumentError('Allowed: de, en.');
}

function parseScope(value: string): DomainScope {
  if (value === 'contains' || value === 'exact') {
    return value;
  }
  throw new InvalidArgumentError('Allowed: contains, exact.');
}

const program = new Command();

program
  .name('sitepress')
  .description('Crawl one website and write a keyword-named PDF per page')
  .version(APP_VERSION)
  .argument('[url]', 'Start URL (asked interactively when omitted)')
  .option('-m, --max-pages <number>', 'Maximum pages to discover', parsePositiveInt)
  .option('-o, --output <dir>', 'Output folder')
  .option('--delay <ms>', 'Pause after every request', parseNonNegativeInt)
  .option('--timeout <ms>', 'Page load timeout', parsePositiveInt)
  .option('--retries <count>', 'Attempts per page', parsePositiveInt)
  .option('--retry-delay <ms>', 'Pause between attempts', parseNonNegativeInt)
  .option('--batch-size <count>', 'Documents per renderer session', parsePositiveInt)
  .option('--ignore <patterns...>', 'URL substrings to skip (replaces the defaults)')
  .option('--language <lang>', 'Keyword and label language (de|en)', parseLanguage)
  .option('--keywords <count>', 'Keywords per file name (1-3)', parsePositiveInt)
  .option('--scope <mode>', 'Domain scope (contains|exact)', parseScope)
  .option('-y, --yes', 'Generate documents without asking')
  .option('-c, --config <file>', 'Read settings from a JSON file')
  .option('--save-config <file>', 'Write the effective settings to a JSON file')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (url: string | undefined, options: CliOptions) => {
    process.exitCode = await main(url, options);
  });

/**
 * Settings given as flags
 */
function cliOverrides(options: CliOptions): CrawlConfigOverrides {
  const overrides: CrawlConfigOverrides = {};

  if (options.maxPages !== undefined) overrides.maxPages = options.maxPages;
  if (options.output !== undefined) overrides.outputDir = options.output;
  if (options.delay !== undefined) overrides.delayMs = options.delay;
  if (options.timeout !== undefined) overrides.timeoutMs = options.timeout;
  if (options.retries !== undefined) overrides.maxRetries = options.retries;
  if (options.retryDelay !== undefined) overrides.retryDelayMs = options.retryDelay;
  if (options.batchSize !== undefined) overrides.batchSize = options.batchSize;
  if (options.ignore !== undefined) overrides.ignorePatterns = options.ignore;
  if (options.language !== undefined) overrides.language = options.language;
  if (options.keywords !== undefined) overrides.numKeywords = options.keywords;
  if (options.scope !== undefined) overrides.domainScope = options.scope;

  return overrides;
}

/**
 * Main run
 *
 * @returns Process exit code
 */
async function main(urlArg: string | undefined, cliOptions: CliOptions): Promise<number> {
  const runId = uuidv4();
  const logger = createLogger({ level: cliOptions.debug ? 'debug' : undefined }).child({ runId });
  const controller = new AbortController();

  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn('Interrupt received, stopping');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  let prompter: Prompter | undefined;
  const getPrompter = (): Prompter => {
    prompter ??= createPrompter(controller.signal, onInterrupt);
    return prompter;
  };

  try {
    const merged: CrawlConfigOverrides = {
      ...(cliOptions.config ? await loadConfigFile(cliOptions.config) : {}),
      ...configFromEnv(),
      ...cliOverrides(cliOptions),
    };
    const interactive = process.stdin.isTTY === true;

    let startUrl = urlArg ?? merged.startUrl;
    if (startUrl === undefined) {
      if (!interactive) {
        throw new ConfigError('Start URL is required', ['startUrl: missing']);
      }
      startUrl = await promptStartUrl(getPrompter());
    }

    let maxPages = merged.maxPages;
    if (maxPages === undefined) {
      maxPages = interactive ? await promptMaxPages(getPrompter()) : DEFAULT_MAX_PAGES;
    }

    const config = createCrawlConfig({ ...merged, startUrl, maxPages });
    logger.info({ config }, `${APP_NAME} v${APP_VERSION} starting`);

    if (cliOptions.saveConfig) {
      await saveConfigFile(cliOptions.saveConfig, config);
      logger.info({ file: cliOptions.saveConfig }, 'Configuration saved');
    }

    const context = new RunContext(runId, config, logger, controller.signal);
    const result = await runCrawl(context, {
      rendererFactory: createHttpRendererFactory({ userAgent: config.userAgent, signal: controller.signal }),
      documentRenderer: new PdfDocumentRenderer(),
      confirm: cliOptions.yes ? undefined : (count) => confirmGeneration(getPrompter(), count),
    });

    displaySummary(runId, config, result);

    switch (result.status) {
      case 'completed':
        return 0;
      case 'cancelled':
        return EXIT_CANCELLED;
      case 'empty':
        return EXIT_FAILURE;
    }
  } catch (error) {
    return reportFailure(logger, error);
  } finally {
    prompter?.close();
    process.removeListener('SIGINT', onInterrupt);
  }
}

function reportFailure(logger: Logger, error: unknown): number {
  if (error instanceof RunAbortedError) {
    logger.warn('Run interrupted by user');
    return EXIT_INTERRUPTED;
  }

  if (error instanceof ConfigError) {
    logger.error({ issues: error.issues }, error.message);
    return EXIT_FAILURE;
  }

  logger.error(
    { error: errorMessage(error), code: error instanceof SitepressError ? error.code : undefined },
    'Run failed'
  );
  return EXIT_FAILURE;
}

/**
 * Display run summary
 */
function displaySummary(runId: string, config: CrawlConfig, result: CrawlResult): void {
  const { stats } = result;
  const durationMs = stats.endTime ? stats.endTime.getTime() - stats.startTime.getTime() : 0;
  const durationSec = Math.round(durationMs / 1000);
  const minutes = Math.floor(durationSec / 60);
  const seconds = durationSec % 60;

  const heading: Record<CrawlResult['status'], string> = {
    completed: '✅ Run Complete',
    cancelled: '⏹  Generation Cancelled',
    empty: '❌ No URLs Found',
  };

  console.log('\n' + '='.repeat(60));
  console.log(heading[result.status]);
  console.log('='.repeat(60));
  console.log(`Run ID: ${runId}`);
  console.log(`Start URL: ${config.startUrl}`);
  console.log('');
  console.log('📊 Statistics:');
  console.log(`  • URLs discovered:        ${result.discovered.length.toLocaleString()}`);
  console.log(`  • Pages crawled:          ${stats.urlsCrawled.toLocaleString()}`);
  console.log(`  • PDFs created:           ${stats.artifactsCreated.toLocaleString()}`);
  console.log(`  • Errors:                 ${stats.errors.toLocaleString()}`);
  console.log('');
  console.log(`⏱  Duration: ${minutes}m ${seconds}s`);
  if (result.manifestPath) {
    console.log(`📄  URL list: ${result.manifestPath}`);
  }
  console.log(`📁  Output: ${config.outputDir}`);
  console.log('='.repeat(60) + '\n');
}

// Parse CLI arguments
program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = EXIT_FAILURE;
});
