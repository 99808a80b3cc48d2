/**
 * PDF Text Layer Reader
 *
 * Reads the embedded text of each page using pdfjs-dist, preserving line
 * structure so label/value pairs stay on one line for the template patterns.
 */

// The legacy build is the one pdf.js supports outside a browser
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.js';
import { logger, type PageText } from '@meterline/shared';

// Node has no web workers; pdf.js falls back to running this file in-process
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Read the text layer of every page in a PDF.
 *
 * Text items are grouped by Y position into lines, top to bottom, and each
 * line is ordered left to right.
 */
export async function readPdfPages(bytes: Uint8Array): Promise<PageText[]> {
  // pdf.js takes ownership of the buffer it is given
  const data = new Uint8Array(bytes);
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  const pages: PageText[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Round Y position to group items on the same visual line
      const itemsByY = new Map<number, PositionedText[]>();
      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);
        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // Top to bottom on the page
      const lines = Array.from(itemsByY.keys())
        .sort((a, b) => b - a)
        .map((y) =>
          (itemsByY.get(y) ?? [])
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line.length > 0);

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }
  } finally {
    await pdf.destroy();
  }

  logger.debug('PDF text layer read', {
    totalPages: pages.length,
    totalChars: pages.reduce((n, p) => n + p.text.length, 0),
  });

  return pages;
}
