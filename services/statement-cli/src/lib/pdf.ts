/**
 * PDF Text Extraction
 *
 * Reads a statement PDF into the DocumentText the extraction core consumes.
 * A PDF that cannot be read is reported on the document, not thrown.
 * pdf-parse is loaded on first use.
 */

import fs from 'fs';
import path from 'path';
import { logger, type DocumentText } from '@ccparse/shared';

export async function extractDocumentText(filePath: string): Promise<DocumentText> {
  const fileName = path.basename(filePath);
  logger.debug('Extracting text from PDF', { filePath });

  try {
    const { default: pdfParse } = await import('pdf-parse');
    const data = await pdfParse(fs.readFileSync(filePath));

    logger.debug('PDF text extraction complete', {
      filePath,
      totalPages: data.numpages,
      totalChars: data.text.length,
    });

    return { fileName, pages: [data.text] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('PDF text extraction failed', { filePath, error: message });
    return { fileName, pages: [], extractionError: message };
  }
}
