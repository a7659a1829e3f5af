/**
 * Document assembly: cleaned lines + metadata -> typed content blocks
 */

import type { ExtractedDocument, KeywordLanguage } from '../types/crawl.types';
import type { ContentBlock, DocumentModel, PageGeometry } from '../types/document.types';
import { formatDateTime } from '../naming/artifactName';
import { APP_NAME, APP_VERSION, HEADING_MAX_LENGTH, LONG_PARAGRAPH_LENGTH } from '../config/constants';

const INCH = 72;

export const A4_GEOMETRY: PageGeometry = {
  size: 'A4',
  width: 595.28,
  height: 841.89,
  margins: {
    top: 0.75 * INCH,
    right: 0.75 * INCH,
    bottom: 0.75 * INCH,
    left: 0.75 * INCH,
  },
};

interface DocumentLabels {
  title: (index: number, total: number) => string;
  url: string;
  created: string;
  keywords: string;
  empty: string;
  footer: (index: number, total: number) => string;
}

const LABELS: Record<KeywordLanguage, DocumentLabels> = {
  de: {
    title: (index, total) => `${APP_NAME} - Seite ${index}/${total}`,
    url: 'URL',
    created: 'Erstellt',
    keywords: 'Schlüsselwörter',
    empty: 'Kein Textinhalt verfügbar',
    footer: (index, total) => `Seite ${index} von ${total} | ${APP_NAME} v${APP_VERSION}`,
  },
  en: {
    title: (index, total) => `${APP_NAME} - Page ${index}/${total}`,
    url: 'URL',
    created: 'Created',
    keywords: 'Keywords',
    empty: 'No text content available',
    footer: (index, total) => `Page ${index} of ${total} | ${APP_NAME} v${APP_VERSION}`,
  },
};

/**
 * Short, fully upper-case lines are headings
 */
export function isHeading(line: string): boolean {
  return (
    line.length < HEADING_MAX_LENGTH && line === line.toUpperCase() && line !== line.toLowerCase()
  );
}

/**
 * Split a paragraph after sentence-ending punctuation
 */
export function splitSentences(paragraph: string): string[] {
  return paragraph
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Body blocks for the cleaned lines
 */
export function buildBodyBlocks(lines: readonly string[]): ContentBlock[] {
  const blocks: ContentBlock[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) {
      blocks.push({ type: 'spacer', height: 0.1 * INCH });
      continue;
    }

    if (isHeading(line)) {
      blocks.push({ type: 'heading', text: line });
    } else if (line.length > LONG_PARAGRAPH_LENGTH) {
      for (const sentence of splitSentences(line)) {
        blocks.push({ type: 'body', text: sentence });
      }
    } else {
      blocks.push({ type: 'body', text: line });
    }
  }

  return blocks;
}

export interface AssembleOptions {
  keywords: readonly string[];
  createdAt: Date;
  language: KeywordLanguage;
}

/**
 * Assemble the paginated content model for one page
 */
export function assembleDocument(document: ExtractedDocument, options: AssembleOptions): DocumentModel {
  const labels = LABELS[options.language];
  const title = labels.title(document.index, document.total);

  const body = buildBodyBlocks(document.lines);

  const blocks: ContentBlock[] = [
    { type: 'title', text: title },
    { type: 'metadata', label: labels.url, value: document.url },
    { type: 'metadata', label: labels.created, value: formatDateTime(options.createdAt) },
    { type: 'metadata', label: labels.keywords, value: options.keywords.join(', ') },
    { type: 'spacer', height: 0.2 * INCH },
    { type: 'divider' },
    { type: 'spacer', height: 0.3 * INCH },
    ...(body.length > 0 ? body : [{ type: 'body' as const, text: labels.empty, italic: true }]),
    { type: 'spacer', height: 0.3 * INCH },
    { type: 'divider' },
    { type: 'footer', text: labels.footer(document.index, document.total) },
  ];

  return {
    title,
    url: document.url,
    keywords: [...options.keywords],
    createdAt: options.createdAt,
    index: document.index,
    total: document.total,
    geometry: A4_GEOMETRY,
    blocks,
  };
}
