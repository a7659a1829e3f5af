/**
 * Content model handed to the document renderer
 */

export type ContentBlock =
  | { type: 'title'; text: string }
  | { type: 'metadata'; label: string; value: string }
  | { type: 'heading'; text: string }
  | { type: 'body'; text: string; italic?: boolean }
  | { type: 'spacer'; height: number }
  | { type: 'divider' }
  | { type: 'footer'; text: string };

/**
 * Page size and margins in PDF points (1/72 inch)
 */
export interface PageGeometry {
  size: 'A4';
  width: number;
  height: number;
  margins: {
    top: number;
    right: number;
    bottom: number;
    left: number;
  };
}

export interface DocumentModel {
  title: string;
  url: string;
  keywords: string[];
  createdAt: Date;
  index: number;
  total: number;
  geometry: PageGeometry;
  blocks: ContentBlock[];
}
