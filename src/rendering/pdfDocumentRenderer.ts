/**
 * PDF rendering with PDFKit
 */

import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import { finished } from 'stream/promises';
import PDFDocument from 'pdfkit';
import type { DocumentRenderer } from './documentRenderer';
import type { ContentBlock, DocumentModel } from '../types/document.types';
import { APP_NAME, APP_VERSION } from '../config/constants';
import { DocumentRenderError, errorMessage } from '../utils/errors';

interface TextStyle {
  font: string;
  size: number;
  color: string;
  spaceBefore: number;
  spaceAfter: number;
  lineGap: number;
}

const STYLES: Record<'title' | 'metadata' | 'heading' | 'body' | 'footer', TextStyle> = {
  title: { font: 'Helvetica-Bold', size: 16, color: '#2c3e50', spaceBefore: 0, spaceAfter: 12, lineGap: 2 },
  metadata: { font: 'Helvetica-Oblique', size: 9, color: '#7f8c8d', spaceBefore: 0, spaceAfter: 6, lineGap: 1 },
  heading: { font: 'Helvetica-Bold', size: 12, color: '#34495e', spaceBefore: 12, spaceAfter: 10, lineGap: 2 },
  body: { font: 'Helvetica', size: 10, color: '#2c3e50', spaceBefore: 0, spaceAfter: 8, lineGap: 4 },
  footer: { font: 'Helvetica-Oblique', size: 9, color: '#7f8c8d', spaceBefore: 0, spaceAfter: 0, lineGap: 1 },
};

const DIVIDER_COLOR = '#7f8c8d';

export class PdfDocumentRenderer implements DocumentRenderer {
  async render(model: DocumentModel, outputPath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });

      const doc = new PDFDocument({
        size: model.geometry.size,
        margins: model.geometry.margins,
        info: {
          Title: model.title,
          Subject: model.url,
          Keywords: model.keywords.join(', '),
          Creator: `${APP_NAME} v${APP_VERSION}`,
          CreationDate: model.createdAt,
        },
      });

      const stream = createWriteStream(outputPath);
      doc.pipe(stream);

      for (const block of model.blocks) {
        this.drawBlock(doc, block, model);
      }

      doc.end();
      await finished(stream);
    } catch (error) {
      throw new DocumentRenderError(outputPath, `PDF creation failed for ${outputPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private drawBlock(doc: PDFKit.PDFDocument, block: ContentBlock, model: DocumentModel): void {
    switch (block.type) {
      case 'spacer':
        doc.y += block.height;
        return;

      case 'divider': {
        const { margins, width } = model.geometry;
        const y = doc.y;
        doc
          .moveTo(margins.left, y)
          .lineTo(width - margins.right, y)
          .lineWidth(0.5)
          .strokeColor(DIVIDER_COLOR)
          .stroke();
        doc.y = y + 6;
        return;
      }

      case 'metadata': {
        const style = STYLES.metadata;
        doc
          .font('Helvetica-Bold')
          .fontSize(style.size)
          .fillColor(style.color)
          .text(`${block.label}: `, { continued: true, lineGap: style.lineGap })
          .font(style.font)
          .text(block.value, { lineGap: style.lineGap });
        doc.y += style.spaceAfter;
        return;
      }

      case 'body':
        this.drawText(doc, block.text, STYLES.body, block.italic ? 'Helvetica-Oblique' : undefined);
        return;

      case 'title':
      case 'heading':
      case 'footer':
        this.drawText(doc, block.text, STYLES[block.type]);
        return;
    }
  }

  private drawText(doc: PDFKit.PDFDocument, text: string, style: TextStyle, font = style.font): void {
    doc.y += style.spaceBefore;
    doc.font(font).fontSize(style.size).fillColor(style.color).text(text, { lineGap: style.lineGap });
    doc.y += style.spaceAfter;
  }
}
