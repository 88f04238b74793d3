/**
 * PDF Text Extraction
 *
 * Extracts text from uploaded PDF bytes using pdfjs-dist.
 */

import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import { logger } from '@policy-extractor/shared';

const pdfjsRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(pdfjsRoot, 'build/pdf.worker.js');

// Base fonts are read from disk; the trailing separator is required
const standardFontDataUrl = path.join(pdfjsRoot, 'standard_fonts') + path.sep;

/**
 * Rebuild the lines of one page.
 *
 * Groups text items by Y position so that a label and the value printed
 * beside it end up on the same line, ordered left to right.
 */
function buildPageLines(items: TextItem[]): string[] {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    // Round Y position to group items on the same line
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // Top to bottom, then left to right
  return [...itemsByY.entries()]
    .sort(([a], [b]) => b - a)
    .map(([, lineItems]) =>
      lineItems
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line.length > 0);
}

/**
 * Extract the text of a PDF, pages separated by a blank line.
 *
 * Never rejects: empty or malformed input yields an empty string, which the
 * extraction engine reports as an unreadable document.
 */
export async function extractPdfText(content: Uint8Array, filename: string): Promise<string> {
  if (content.length === 0) {
    logger.warn('Empty upload, no text to extract', { filename });
    return '';
  }

  try {
    // pdfjs transfers the buffer to its worker, so hand it a copy
    const pdf = await pdfjsLib.getDocument({
      data: new Uint8Array(content),
      standardFontDataUrl,
      // pdfjs warnings go straight to the console; failures reach the logger below
      verbosity: pdfjsLib.VerbosityLevel.ERRORS,
    }).promise;

    try {
      const pages: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const textItems = textContent.items.filter((item): item is TextItem => 'str' in item);
        pages.push(buildPageLines(textItems).join('\n'));
      }

      const text = pages.join('\n\n');

      logger.info('PDF text extraction complete', {
        filename,
        totalPages: pdf.numPages,
        totalChars: text.length,
      });

      return text;
    } finally {
      await pdf.destroy();
    }
  } catch (error) {
    logger.warn('PDF text extraction failed', {
      filename,
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}
