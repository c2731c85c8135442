/**
 * Classification Type Definitions
 *
 * - ClassificationResult: a document routed to a recipient and staged on disk
 * - ClassificationContext: everything classifyDocument needs, shared read-only
 *   across concurrent tasks
 *
 * Consumers: grouping (groupResults), pipeline (runBatch)
 */

import type { TextExtractor } from '../extraction/index.js';
import type { LookupTable } from '../lookup/index.js';
import type { Logger } from '../logger.js';

/** A document whose identifier and recipient are both known */
export interface ClassificationResult {
  identifier: string;
  email: string;
  /** `{staging}/{identifier}/{original filename}` */
  storedPath: string;
}

export interface ClassificationContext {
  sourceDir: string;
  stagingDir: string;
  table: LookupTable;
  logger: Logger;
  extractText?: TextExtractor;
}
