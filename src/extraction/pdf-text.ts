/**
 * PDF Text Extraction
 *
 * Wraps pdf-parse. Text of every page is joined in page order; pdf-parse
 * appends a `-- n of m --` marker after each page.
 */

import { PDFParse } from 'pdf-parse';

/** Reads a document's bytes and returns its text */
export type TextExtractor = (content: Buffer) => Promise<string>;

/** Concatenated text of every page in the PDF */
export const extractPdfText: TextExtractor = async (content) => {
  // pdf.js wants a plain Uint8Array, not a Node.js Buffer
  const parser = new PDFParse({ data: new Uint8Array(content) });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
};
