/**
 * Batch Classification
 *
 * Lists the source PDFs and classifies them through a bounded p-limit pool.
 * Results keep one slot per input filename, in input order; null marks a
 * document that was dropped.
 */

import { readdir } from 'node:fs/promises';
import os from 'node:os';
import pLimit from 'p-limit';
import { classifyDocument } from './classifier.js';
import type { ClassificationContext, ClassificationResult } from './types.js';

/** Twice the available processing units */
export function defaultConcurrency(): number {
  return os.availableParallelism() * 2;
}

/**
 * PDF filenames (case-insensitive `.pdf`) of the regular files in a
 * directory, sorted by name.
 */
export async function listSourceDocuments(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => entry.name)
    .sort();
}

export async function classifyDocuments(
  filenames: readonly string[],
  ctx: ClassificationContext,
  concurrency = defaultConcurrency(),
): Promise<Array<ClassificationResult | null>> {
  const limit = pLimit(concurrency);
  return Promise.all(filenames.map((filename) => limit(() => classifyDocument(filename, ctx))));
}
