/**
 * Document Classifier
 *
 * Per-document pipeline:
 * 1. Extract the identifier from `{sourceDir}/{filename}`
 * 2. Resolve the identifier to a recipient email
 * 3. Copy the document to `{stagingDir}/{identifier}/{filename}`
 *
 * Every failure is logged and yields null so one bad document never stops
 * the batch. Staging folders are created with `recursive: true`, so two
 * tasks creating the same identifier folder do not conflict.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { extractIdentifier } from '../extraction/index.js';
import { resolveRecipient } from '../lookup/index.js';
import { errorMessage } from '../logger.js';
import type { ClassificationContext, ClassificationResult } from './types.js';

export async function classifyDocument(
  filename: string,
  ctx: ClassificationContext,
): Promise<ClassificationResult | null> {
  const { sourceDir, stagingDir, table, logger, extractText } = ctx;

  try {
    const sourcePath = path.join(sourceDir, filename);

    const identifier = await extractIdentifier(sourcePath, { logger, extractText });
    if (!identifier) {
      logger.warn(`Could not extract identifier from ${filename}`);
      return null;
    }

    const email = resolveRecipient(identifier, table, logger);
    if (!email) {
      return null;
    }

    const identifierDir = path.join(stagingDir, identifier);
    await mkdir(identifierDir, { recursive: true });
    const storedPath = path.join(identifierDir, filename);
    await copyFile(sourcePath, storedPath);

    logger.debug(`Staged ${filename}`, { identifier });
    return { identifier, email, storedPath };
  } catch (err) {
    logger.error(`Error processing ${filename}`, { error: errorMessage(err) });
    return null;
  }
}
