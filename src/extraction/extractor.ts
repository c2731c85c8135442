/**
 * Identifier Extractor
 *
 * Reads a document from disk, pulls its text and finds the identifier.
 * Never throws: unreadable files and documents without a labelled code both
 * come back as null, with a log line saying which.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { findIdentifier } from './identifier.js';
import { extractPdfText } from './pdf-text.js';
import type { TextExtractor } from './pdf-text.js';

export interface ExtractorDeps {
  logger: Logger;
  /** Defaults to pdf-parse */
  extractText?: TextExtractor;
}

export async function extractIdentifier(
  documentPath: string,
  deps: ExtractorDeps,
): Promise<string | null> {
  const { logger, extractText = extractPdfText } = deps;
  const filename = path.basename(documentPath);

  try {
    const content = await readFile(documentPath);
    const text = await extractText(content);

    const identifier = findIdentifier(text);
    if (!identifier) {
      logger.warn(`Could not find Unique Identification Number in ${filename}`);
      return null;
    }

    return identifier;
  } catch (err) {
    logger.error(`Error extracting identifier from ${filename}`, { error: errorMessage(err) });
    return null;
  }
}
