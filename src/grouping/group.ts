/**
 * Grouping Stage
 *
 * Folds classification results into two maps in a single pass:
 * - byRecipient: email -> staged paths, one outbound message per key
 * - byIdentifier: identifier -> staged paths, used to route archival
 *
 * Lists keep the order of the input; null results are skipped.
 */

import type { ClassificationResult } from '../classification/index.js';

export interface GroupedDocuments {
  byRecipient: Map<string, string[]>;
  byIdentifier: Map<string, string[]>;
}

function append(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

export function groupResults(
  results: ReadonlyArray<ClassificationResult | null>,
): GroupedDocuments {
  const byRecipient = new Map<string, string[]>();
  const byIdentifier = new Map<string, string[]>();

  for (const result of results) {
    if (!result) continue;
    append(byRecipient, result.email, result.storedPath);
    append(byIdentifier, result.identifier, result.storedPath);
  }

  return { byRecipient, byIdentifier };
}
