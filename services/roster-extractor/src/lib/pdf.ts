/**
 * PDF Page Text Provider
 *
 * Reconstructs the visual lines of each roster page with pdfjs-dist and
 * exposes them as a RosterSource for the scanner.
 */

import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist';
import type { PDFDocumentProxy, TextItem } from 'pdfjs-dist/types/src/display/api';
import { config, logger, sourceFromPages, type RosterPage, type RosterSource } from '@committee-roster/shared';
import { buildLines, type PositionedText } from './lines';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PdfRoster {
  source: RosterSource;
  totalPages: number;
}

function isTextItem(item: object): item is TextItem {
  return 'str' in item && 'transform' in item;
}

/**
 * Open a roster PDF and read every page's lines.
 *
 * @throws Error when the file cannot be read or is not a PDF
 */
export async function loadPdfRoster(filePath: string, tolerance: number = config.pdfLineTolerance): Promise<PdfRoster> {
  logger.info('Extracting text from roster PDF', { filePath });

  let pdf: PDFDocumentProxy;
  try {
    const data = new Uint8Array(fs.readFileSync(filePath));
    pdf = await pdfjsLib.getDocument({ data }).promise;
  } catch (error) {
    throw new Error(
      `Failed to open roster PDF ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const pages: RosterPage[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const items: PositionedText[] = [];
      for (const item of textContent.items) {
        if (!isTextItem(item)) continue;
        items.push({
          x: Number(item.transform[4]),
          y: Number(item.transform[5]),
          str: item.str,
        });
      }

      pages.push({ pageNumber: pageNum, lines: buildLines(items, tolerance) });
    }
  } finally {
    await pdf.destroy();
  }

  logger.info('PDF text extraction complete', {
    filePath,
    totalPages: pages.length,
    totalLines: pages.reduce((sum, page) => sum + page.lines.length, 0),
  });

  return { source: sourceFromPages(pages), totalPages: pages.length };
}
