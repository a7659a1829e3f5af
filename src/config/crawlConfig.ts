/**
 * Crawl configuration
 *
 * Defaults are resolved once, the result is validated with zod and frozen.
 * Sources, later wins: defaults < JSON config file < environment < CLI flags.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import type { CrawlConfig } from '../types/crawl.types';
import { ConfigError, errorMessage } from '../utils/errors';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_DELAY_MS,
  DEFAULT_DOMAIN_SCOPE,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_KEYWORD_MAX_NGRAM,
  DEFAULT_LANGUAGE,
  DEFAULT_MAX_NAME_LENGTH,
  DEFAULT_MAX_RETRIES,
  DEFAULT_NUM_KEYWORDS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  MIN_NAME_LENGTH,
  USER_AGENT,
} from './constants';

const crawlConfigSchema = z.object({
  startUrl: z.string().trim().min(1, 'Start URL cannot be empty'),
  maxPages: z.number().int().positive('Max pages must be greater than 0').max(1_000_000),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  delayMs: z.number().int().nonnegative().default(DEFAULT_DELAY_MS),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().positive().default(DEFAULT_MAX_RETRIES),
  retryDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  ignorePatterns: z.array(z.string().min(1)).default(DEFAULT_IGNORE_PATTERNS),
  numKeywords: z.number().int().min(1).max(3).default(DEFAULT_NUM_KEYWORDS),
  keywordMaxNgram: z.number().int().min(1).max(3).default(DEFAULT_KEYWORD_MAX_NGRAM),
  language: z.enum(['de', 'en']).default(DEFAULT_LANGUAGE),
  domainScope: z.enum(['contains', 'exact']).default(DEFAULT_DOMAIN_SCOPE),
  maxNameLength: z.number().int().min(MIN_NAME_LENGTH).default(DEFAULT_MAX_NAME_LENGTH),
  userAgent: z.string().min(1).default(USER_AGENT),
});

export type CrawlConfigInput = z.input<typeof crawlConfigSchema>;

/**
 * Partial settings from a config file, the environment or CLI flags
 */
export type CrawlConfigOverrides = Partial<CrawlConfigInput>;

const overridesSchema = crawlConfigSchema.partial().strict();

/**
 * Build the immutable run configuration
 *
 * @throws ConfigError on missing start URL, non-positive page count or invalid values
 */
export function createCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const result = crawlConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const config = result.data;
  let startUrl = config.startUrl;
  if (!/^https?:\/\//i.test(startUrl)) {
    startUrl = `https://${startUrl}`;
  }

  if (!hostOf(startUrl)) {
    throw new ConfigError(`Invalid start URL: ${config.startUrl}`, [`startUrl: invalid URL format`]);
  }

  return Object.freeze({
    ...config,
    startUrl,
    ignorePatterns: Object.freeze(config.ignorePatterns.map((pattern) => pattern.toLowerCase())),
  });
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Read crawl settings from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CrawlConfigOverrides {
  const overrides: CrawlConfigOverrides = {};

  if (env.SITEPRESS_OUTPUT_DIR) overrides.outputDir = env.SITEPRESS_OUTPUT_DIR;
  const delayMs = parseIntEnv(env.SITEPRESS_DELAY_MS);
  if (delayMs !== undefined) overrides.delayMs = delayMs;
  const timeoutMs = parseIntEnv(env.SITEPRESS_TIMEOUT_MS);
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;
  const maxRetries = parseIntEnv(env.SITEPRESS_MAX_RETRIES);
  if (maxRetries !== undefined) overrides.maxRetries = maxRetries;
  const retryDelayMs = parseIntEnv(env.SITEPRESS_RETRY_DELAY_MS);
  if (retryDelayMs !== undefined) overrides.retryDelayMs = retryDelayMs;
  const batchSize = parseIntEnv(env.SITEPRESS_BATCH_SIZE);
  if (batchSize !== undefined) overrides.batchSize = batchSize;

  if (env.SITEPRESS_LANGUAGE === 'de' || env.SITEPRESS_LANGUAGE === 'en') {
    overrides.language = env.SITEPRESS_LANGUAGE;
  }

  if (env.SITEPRESS_IGNORE_PATTERNS) {
    overrides.ignorePatterns = env.SITEPRESS_IGNORE_PATTERNS.split(',')
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0);
  }

  return overrides;
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Invalid numeric environment value: "${value}"`);
  }
  return parsed;
}

/**
 * Load settings from a JSON config file
 *
 * @throws ConfigError when the file is unreadable or has unknown/invalid keys
 */
export async function loadConfigFile(filePath: string): Promise<CrawlConfigOverrides> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const result = overridesSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Write the effective configuration as JSON
 */
export async function saveConfigFile(filePath: string, config: CrawlConfig): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(config, null, 2), 'utf-8');
}
