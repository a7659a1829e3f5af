/**
 * Text extraction: noise removal, block flattening, line heuristics
 */

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import type { Logger } from 'pino';
import { removeNoiseElements } from './htmlCleaner';
import {
  DATE_PATTERN,
  MAX_COLONS_PER_LINE,
  MAX_DATES_PER_LINE,
  MAX_WEEKDAYS_PER_LINE,
  WEEKDAY_TOKENS,
} from '../config/constants';
import { errorMessage } from '../utils/errors';

/**
 * Elements that start and end a line
 */
const BLOCK_TAGS = new Set([
  'address',
  'article',
  'blockquote',
  'body',
  'dd',
  'details',
  'dialog',
  'div',
  'dl',
  'dt',
  'fieldset',
  'figcaption',
  'figure',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'head',
  'hgroup',
  'hr',
  'html',
  'li',
  'main',
  'ol',
  'option',
  'p',
  'pre',
  'section',
  'summary',
  'title',
  'ul',
]);

const WEEKDAYS = new Set(WEEKDAY_TOKENS);

/**
 * Accumulates text into lines at block boundaries
 */
class LineBuffer {
  readonly lines: string[] = [];
  private current = '';

  append(text: string): void {
    const parts = text.split(/\r\n|\r|\n/);
    parts.forEach((part, index) => {
      if (index > 0) this.breakLine();
      this.current += part;
    });
  }

  breakLine(): void {
    const line = this.current.replace(/\s+/g, ' ').trim();
    if (line) {
      this.lines.push(line);
    }
    this.current = '';
  }
}

function walk(node: AnyNode, buffer: LineBuffer): void {
  if (isText(node)) {
    buffer.append(node.data);
    return;
  }

  if (isTag(node)) {
    const tag = node.name.toLowerCase();
    if (tag === 'br') {
      buffer.breakLine();
      return;
    }

    const block = BLOCK_TAGS.has(tag);
    if (block) buffer.breakLine();
    node.children.forEach((child) => walk(child, buffer));
    if (block) buffer.breakLine();
    return;
  }

  if (hasChildren(node)) {
    node.children.forEach((child) => walk(child, buffer));
  }
}

/**
 * Flatten a document to text, one line per block boundary
 */
export function flattenToLines($: cheerio.CheerioAPI): string[] {
  const buffer = new LineBuffer();
  $.root()
    .contents()
    .each((_, node) => walk(node, buffer));
  buffer.breakLine();
  return buffer.lines;
}

/**
 * Line-level noise heuristics (key:value dumps, date lists, weekday grids)
 *
 * @returns True when the line should be dropped
 */
export function isNoiseLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return true;

  const colons = trimmed.split(':').length - 1;
  if (colons > MAX_COLONS_PER_LINE) return true;

  const dates = trimmed.match(DATE_PATTERN)?.length ?? 0;
  if (dates > MAX_DATES_PER_LINE) return true;

  const weekdays = trimmed
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => WEEKDAYS.has(word)).length;
  if (weekdays > MAX_WEEKDAYS_PER_LINE) return true;

  return false;
}

/**
 * Trim lines and drop the ones {@link isNoiseLine} rejects
 */
export function filterLines(lines: readonly string[]): string[] {
  return lines.map((line) => line.trim()).filter((line) => !isNoiseLine(line));
}

/**
 * Markup starts with a tag, doctype or comment; extracted text does not
 */
function looksLikeMarkup(input: string): boolean {
  return input.trimStart().startsWith('<');
}

/**
 * Extract cleaned prose lines from raw markup
 *
 * Text that is already extracted (lines, or lines joined with newlines) only
 * goes through {@link filterLines}; it is never parsed as HTML again, so
 * decoded `<`, `>` and `&` survive a second pass. Joined text whose first
 * line starts with `<` reads as markup; pass such text as lines. Parsing
 * failures degrade to an empty result.
 *
 * @param input - Raw HTML, or previously extracted lines
 * @param logger - Optional logger for extraction failures
 * @returns Ordered, non-empty lines that passed every filter
 */
export function extractContent(input: string | readonly string[], logger?: Logger): string[] {
  if (typeof input !== 'string') {
    return filterLines(input);
  }
  if (!input) return [];
  if (!looksLikeMarkup(input)) {
    return filterLines(input.split(/\r\n|\r|\n/));
  }

  try {
    const $ = cheerio.load(input);
    removeNoiseElements($);
    return filterLines(flattenToLines($));
  } catch (error) {
    logger?.warn({ error: errorMessage(error) }, 'Text extraction failed');
    return [];
  }
}

/**
 * Count non-whitespace characters of extracted lines
 */
export function countContentChars(lines: readonly string[]): number {
  return lines.join('').replace(/\s/g, '').length;
}
