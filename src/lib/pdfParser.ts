import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DocumentUnreadableError } from './errors';
import type { DocumentTextExtractor } from './services/types';
import { toLines, type PositionedText } from './textLayout';

/**
 * Reads the text layer of a PDF statement, page by page, as printed lines.
 */
export class PdfTextExtractor implements DocumentTextExtractor {
  async extractLines(documentPath: string): Promise<string[]> {
    try {
      const data = new Uint8Array(await readFile(documentPath));
      const pdf = await getDocument({ data, isEvalSupported: false, useSystemFonts: false }).promise;

      try {
        const lines: string[] = [];

        for (let i = 1; i <= pdf.numPages; i++) {
          const page = await pdf.getPage(i);
          const textContent = await page.getTextContent();

          const items: PositionedText[] = [];
          for (const item of textContent.items) {
            if ('str' in item && 'transform' in item) {
              const transform: number[] = item.transform;
              items.push({ str: item.str, x: transform[4], y: transform[5] });
            }
          }

          lines.push(...toLines(items));
        }

        return lines;
      } finally {
        await pdf.destroy();
      }
    } catch (error) {
      throw new DocumentUnreadableError(documentPath, error);
    }
  }
}
