/**
 * Interactive prompts for the CLI
 */

import { createInterface } from 'readline/promises';
import { AFFIRMATIVE_ANSWERS } from '../config/constants';
import { RunAbortedError } from '../utils/errors';

export interface Prompter {
  ask(question: string): Promise<string>;
  print(message: string): void;
  close(): void;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Readline-backed prompter on stdin/stdout
 *
 * @param signal - Aborts a pending question
 * @param onInterrupt - Called on Ctrl+C while a question is pending
 */
export function createPrompter(signal: AbortSignal, onInterrupt: () => void): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', onInterrupt);

  return {
    async ask(question) {
      try {
        return await rl.question(question, { signal });
      } catch (error) {
        if (signal.aborted) {
          throw new RunAbortedError('Interrupted at prompt');
        }
        throw error;
      }
    },
    print(message) {
      process.stdout.write(`${message}\n`);
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Accept a URL with or without scheme; https is assumed
 */
export function parseStartUrl(input: string): ParseResult<string> {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, error: 'URL cannot be empty!' };
  }

  const url = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    if (new URL(url).host) {
      return { ok: true, value: url };
    }
  } catch {
    return { ok: false, error: 'Invalid URL format!' };
  }
  return { ok: false, error: 'Invalid URL format!' };
}

export function parseMaxPages(input: string): ParseResult<number> {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, error: 'Input cannot be empty!' };
  }
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: false, error: 'Please enter a valid number!' };
  }

  const value = parseInt(trimmed, 10);
  if (value <= 0) {
    return { ok: false, error: 'Number must be greater than 0!' };
  }
  return { ok: true, value };
}

/**
 * Ask until the answer parses
 */
async function askUntilValid<T>(
  prompter: Prompter,
  question: string,
  parse: (input: string) => ParseResult<T>
): Promise<T> {
  for (;;) {
    const result = parse(await prompter.ask(question));
    if (result.ok) {
      return result.value;
    }
    prompter.print(`✗ ${result.error}`);
  }
}

export async function promptStartUrl(prompter: Prompter): Promise<string> {
  const url = await askUntilValid(prompter, 'Website URL (e.g., https://example.com): ', parseStartUrl);
  prompter.print(`✓ URL accepted: ${url}`);
  return url;
}

export async function promptMaxPages(prompter: Prompter): Promise<number> {
  const maxPages = await askUntilValid(prompter, 'Max URLs to crawl (e.g., 20, 50, 100): ', parseMaxPages);
  prompter.print(`✓ Max pages: ${maxPages}`);
  return maxPages;
}

export function isAffirmative(answer: string): boolean {
  return AFFIRMATIVE_ANSWERS.includes(answer.trim().toLowerCase());
}

/**
 * Ask before entering the generation phase
 */
export async function confirmGeneration(prompter: Prompter, discoveredCount: number): Promise<boolean> {
  prompter.print(`\n${discoveredCount} URLs found and saved.`);
  const answer = await prompter.ask('Create PDFs now? (yes/no): ');
  return isAffirmative(answer);
}
