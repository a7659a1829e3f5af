/**
 * Tests for configuration validation and its sources
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  configFromEnv,
  createCrawlConfig,
  loadConfigFile,
  saveConfigFile,
} from '../../src/config/crawlConfig';
import { ConfigError } from '../../src/utils/errors';
import { DEFAULT_IGNORE_PATTERNS, USER_AGENT } from '../../src/config/constants';

describe('createCrawlConfig', () => {
  it('fills in defaults', () => {
    const config = createCrawlConfig({ startUrl: 'https://example.com', maxPages: 5 });

    expect(config).toEqual({
      startUrl: 'https://example.com',
      maxPages: 5,
      outputDir: './output',
      delayMs: 2000,
      timeoutMs: 30000,
      maxRetries: 3,
      retryDelayMs: 5000,
      batchSize: 25,
      ignorePatterns: DEFAULT_IGNORE_PATTERNS,
      numKeywords: 3,
      keywordMaxNgram: 2,
      language: 'de',
      domainScope: 'contains',
      maxNameLength: 150,
      userAgent: USER_AGENT,
    });
  });

  it('adds https to a start URL without scheme', () => {
    expect(createCrawlConfig({ startUrl: 'example.com', maxPages: 1 }).startUrl).toBe('https://example.com');
  });

  it('lowercases ignore patterns and freezes the result', () => {
    const config = createCrawlConfig({ startUrl: 'example.com', maxPages: 1, ignorePatterns: ['/Login'] });

    expect(config.ignorePatterns).toEqual(['/login']);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each([
    ['empty start URL', { startUrl: '  ', maxPages: 5 }],
    ['zero max pages', { startUrl: 'example.com', maxPages: 0 }],
    ['negative max pages', { startUrl: 'example.com', maxPages: -3 }],
    ['fractional max pages', { startUrl: 'example.com', maxPages: 2.5 }],
    ['too many keywords', { startUrl: 'example.com', maxPages: 5, numKeywords: 4 }],
    ['zero retries', { startUrl: 'example.com', maxPages: 5, maxRetries: 0 }],
    ['short name limit', { startUrl: 'example.com', maxPages: 5, maxNameLength: 20 }],
  ])('rejects %s', (_, input) => {
    expect(() => createCrawlConfig(input)).toThrow(ConfigError);
  });

  it('lists every issue on the error', () => {
    try {
      createCrawlConfig({ startUrl: '', maxPages: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^startUrl: /);
        expect(error.issues[1]).toBe('maxPages: Max pages must be greater than 0');
      }
    }
  });

  it('rejects a start URL without a host', () => {
    expect(() => createCrawlConfig({ startUrl: 'https://', maxPages: 1 })).toThrow('Invalid start URL');
  });
});

describe('configFromEnv', () => {
  it('reads numeric, language and pattern settings', () => {
    expect(
      configFromEnv({
        SITEPRESS_OUTPUT_DIR: '/tmp/pdfs',
        SITEPRESS_DELAY_MS: '500',
        SITEPRESS_TIMEOUT_MS: '10000',
        SITEPRESS_MAX_RETRIES: '2',
        SITEPRESS_RETRY_DELAY_MS: '0',
        SITEPRESS_BATCH_SIZE: '10',
        SITEPRESS_LANGUAGE: 'en',
        SITEPRESS_IGNORE_PATTERNS: ' /login, .pdf ,,',
      })
    ).toEqual({
      outputDir: '/tmp/pdfs',
      delayMs: 500,
      timeoutMs: 10000,
      maxRetries: 2,
      retryDelayMs: 0,
      batchSize: 10,
      language: 'en',
      ignorePatterns: ['/login', '.pdf'],
    });
  });

  it('ignores unset and blank values and unknown languages', () => {
    expect(configFromEnv({ SITEPRESS_DELAY_MS: '', SITEPRESS_LANGUAGE: 'fr' })).toEqual({});
  });

  it('throws ConfigError for non-numeric values', () => {
    expect(() => configFromEnv({ SITEPRESS_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });
});

describe('config files', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  async function tempFile(name: string, content?: string): Promise<string> {
    dir ??= await fs.mkdtemp(path.join(os.tmpdir(), 'sitepress-config-'));
    const file = path.join(dir, name);
    if (content !== undefined) await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  it('round-trips the effective configuration', async () => {
    const config = createCrawlConfig({ startUrl: 'example.com', maxPages: 7, language: 'en' });
    const file = await tempFile('sitepress.json');

    await saveConfigFile(file, config);
    const loaded = await loadConfigFile(file);

    expect(createCrawlConfig({ startUrl: 'unused.example', maxPages: 1, ...loaded })).toEqual(config);
  });

  it('accepts a partial file', async () => {
    const file = await tempFile('partial.json', JSON.stringify({ maxPages: 12, domainScope: 'exact' }));
    expect(await loadConfigFile(file)).toEqual({ maxPages: 12, domainScope: 'exact' });
  });

  it('rejects unknown keys', async () => {
    const file = await tempFile('unknown.json', JSON.stringify({ maxPages: 12, colour: 'blue' }));
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects invalid JSON and missing files', async () => {
    const broken = await tempFile('broken.json', '{ maxPages: ');
    await expect(loadConfigFile(broken)).rejects.toThrow('is not valid JSON');
    await expect(loadConfigFile(await tempFile('missing.json'))).rejects.toThrow('Cannot read config file');
  });
});
