/**
 * Archival Stage
 *
 * After a group's message is sent, each of its staged documents moves to
 * `{processedDir}/{identifier}/{filename}`. The identifier is found by
 * reverse lookup through the identifier -> paths map built at grouping.
 *
 * Moves are independent: a failed move is logged and counted, the others
 * still run, and the send is not undone.
 */

import { copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';

export interface ArchiveReport {
  /** Final paths of the documents that were moved */
  moved: string[];
  /** Staged paths that could not be moved */
  failed: string[];
}

/** The identifier whose path list contains the given staged path */
export function findOwningIdentifier(
  storedPath: string,
  byIdentifier: ReadonlyMap<string, readonly string[]>,
): string | null {
  for (const [identifier, paths] of byIdentifier) {
    if (paths.includes(storedPath)) return identifier;
  }
  return null;
}

function isCrossDeviceError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}

/** rename(), falling back to copy + unlink when the target is on another device */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    if (!isCrossDeviceError(err)) throw err;
    await copyFile(from, to);
    await unlink(from);
  }
}

export async function archiveGroup(
  attachments: readonly string[],
  byIdentifier: ReadonlyMap<string, readonly string[]>,
  processedDir: string,
  logger: Logger,
): Promise<ArchiveReport> {
  const report: ArchiveReport = { moved: [], failed: [] };

  for (const storedPath of attachments) {
    const filename = path.basename(storedPath);
    try {
      const identifier = findOwningIdentifier(storedPath, byIdentifier);
      if (!identifier) {
        throw new Error('no identifier owns this document');
      }

      const targetDir = path.join(processedDir, identifier);
      await mkdir(targetDir, { recursive: true });
      const target = path.join(targetDir, filename);
      await moveFile(storedPath, target);

      report.moved.push(target);
    } catch (err) {
      logger.error(`Failed to archive ${filename}`, { path: storedPath, error: errorMessage(err) });
      report.failed.push(storedPath);
    }
  }

  return report;
}
