/**
 * Document renderer contract
 */

import type { DocumentModel } from '../types/document.types';

export interface DocumentRenderer {
  /**
   * Render the content model to a paginated file
   *
   * Rejects with DocumentRenderError on failure.
   */
  render(document: DocumentModel, outputPath: string): Promise<void>;
}
