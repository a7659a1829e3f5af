/**
 * Structured logging with Pino
 */

import pino, { type Logger } from 'pino';
import type { RunStatistics } from '../types/crawl.types';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Create a Pino logger
 *
 * Defaults come from LOG_LEVEL and LOG_PRETTY.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const pretty = options.pretty ?? process.env.LOG_PRETTY === 'true';

  return pino({
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

/**
 * Logger that drops everything (tests, library use)
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Log phase progress
 */
export function logCrawlProgress(
  logger: Logger,
  phase: 'discovery' | 'generation',
  current: number,
  total: number,
  url: string
): void {
  logger.info(
    {
      phase,
      progress: `${current}/${total}`,
      percentage: total > 0 ? Math.round((current / total) * 100) : 0,
      url,
    },
    phase === 'discovery' ? 'Page discovered' : 'Generating document'
  );
}

/**
 * Log run statistics
 */
export function logCrawlStats(logger: Logger, stats: RunStatistics): void {
  const durationMs = stats.endTime ? stats.endTime.getTime() - stats.startTime.getTime() : undefined;

  logger.info(
    {
      stats: {
        crawled: stats.urlsCrawled,
        artifacts: stats.artifactsCreated,
        errors: stats.errors,
        durationMs,
      },
    },
    'Run completed'
  );
}
