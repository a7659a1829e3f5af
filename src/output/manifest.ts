/**
 * Discovery manifest: the ordered list of URLs found in the discovery phase
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { DiscoveryManifest, NormalizedUrl } from '../types/crawl.types';
import { MANIFEST_FILENAME } from '../config/constants';

export function buildManifest(startUrl: string, urls: readonly NormalizedUrl[], now: Date = new Date()): DiscoveryManifest {
  return {
    start_url: startUrl,
    timestamp: now.toISOString(),
    total_urls: urls.length,
    urls: [...urls],
  };
}

/**
 * Write the manifest to `<outputDir>/scraped_urls.json`
 *
 * @returns Path of the written file
 */
export async function writeManifest(outputDir: string, manifest: DiscoveryManifest): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });

  const filePath = path.join(outputDir, MANIFEST_FILENAME);
  await fs.writeFile(filePath, JSON.stringify(manifest, null, 2), 'utf-8');

  return filePath;
}
