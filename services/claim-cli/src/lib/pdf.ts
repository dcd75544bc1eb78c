/**
 * PDF Text Extraction
 *
 * Extracts text from claim PDFs using pdfjs-dist, keeping one output line
 * per visual line so label patterns still see "Label: value" pairs.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '@claim-triage/core';

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

interface PositionedText {
  x: number;
  str: string;
}

async function loadPdfjs() {
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
    path.dirname(require.resolve('pdfjs-dist/package.json')),
    'legacy/build/pdf.worker.mjs'
  );
  return pdfjsLib;
}

/**
 * Join the text items of one page into lines.
 *
 * Items are grouped by rounded Y position (top to bottom) and ordered by X
 * within a line. Items on the same line are separated by three spaces so a
 * two-column layout keeps a column gap between its cells.
 */
export function groupItemsIntoLines(
  items: ReadonlyArray<{ str: string; transform: readonly number[] }>
): string[] {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);
    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str.trim()).join('   ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }
  return lines;
}

/**
 * Extract text from a PDF file, preserving line structure.
 */
export async function extractTextFromPdf(filePath: string): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { file_path: filePath });

  const pdfjsLib = await loadPdfjs();
  const data = new Uint8Array(await fs.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data, useSystemFonts: true }).promise;

  const pages: PageText[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const textItems = textContent.items.flatMap((item) =>
        'str' in item ? [{ str: item.str, transform: item.transform }] : []
      );

      pages.push({
        pageNumber: pageNum,
        text: groupItemsIntoLines(textItems).join('\n'),
      });
    }
  } finally {
    await pdf.destroy();
  }

  const combinedText = pages.map((page) => page.text).join('\n');

  logger.info('PDF text extraction complete', {
    file_path: filePath,
    total_pages: pages.length,
    total_chars: combinedText.length,
  });

  return {
    pages,
    totalPages: pages.length,
    combinedText,
  };
}
