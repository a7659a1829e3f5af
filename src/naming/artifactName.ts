/**
 * Artifact file names: NNN_YYYYMMDD_HHMMSS_<keywords>_<domain>.pdf
 */

import { extractNetloc } from '../core/urlNormalizer';
import {
  ARTIFACT_EXTENSION,
  NAME_DOMAIN_MAX_LENGTH,
  NAME_KEYWORDS_MAX_LENGTH,
} from '../config/constants';

export interface ArtifactNameInput {
  index: number;
  url: string;
  keywords: readonly string[];
  timestamp: Date;
  maxLength: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Host without "www.", non-word characters replaced with "_", max 30 characters
 */
export function sanitizeDomain(url: string): string {
  return extractNetloc(url)
    .replaceAll('www.', '')
    .replace(/[^\p{L}\p{N}_-]/gu, '_')
    .slice(0, NAME_DOMAIN_MAX_LENGTH);
}

/**
 * Keywords joined with "_", cut to 50 characters, filename-safe
 */
export function sanitizeKeywords(keywords: readonly string[]): string {
  return keywords
    .join('_')
    .slice(0, NAME_KEYWORDS_MAX_LENGTH)
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/\s+/g, '_');
}

/**
 * Compose the artifact name
 *
 * Names longer than `maxLength` drop the keywords; sequence, timestamp
 * and domain always remain.
 */
export function buildArtifactName(input: ArtifactNameInput): string {
  const sequence = pad(input.index, 3);
  const timestamp = formatTimestamp(input.timestamp);
  const domain = sanitizeDomain(input.url);
  const keywords = sanitizeKeywords(input.keywords);

  const parts = keywords ? [sequence, timestamp, keywords, domain] : [sequence, timestamp, domain];
  const name = `${parts.join('_')}${ARTIFACT_EXTENSION}`;
  if (name.length <= input.maxLength) {
    return name;
  }

  const prefix = `${sequence}_${timestamp}_`;
  const room = Math.max(0, input.maxLength - prefix.length - ARTIFACT_EXTENSION.length);
  return `${prefix}${domain.slice(0, room)}${ARTIFACT_EXTENSION}`;
}
