/**
 * Batch Run — Pipeline Orchestrator
 *
 * documents -> classified results -> recipient groups -> sent -> archived
 *
 * 1. Ensure the staging and processed directories exist
 * 2. List the source PDFs
 * 3. Classify them concurrently (extract identifier, resolve email, stage copy)
 * 4. Group staged paths by recipient and by identifier
 * 5. For each recipient group, in map order: send, then archive on success
 *
 * Per-document and per-group failures are logged and counted in the
 * summary; only directory setup and listing failures reject.
 */

import { mkdir } from 'node:fs/promises';
import { archiveGroup } from '../archive/index.js';
import { classifyDocuments, listSourceDocuments } from '../classification/index.js';
import type { BatchConfig } from '../config.js';
import { GroupDispatcher } from '../email/index.js';
import type { Clock, MailTransport } from '../email/index.js';
import type { TextExtractor } from '../extraction/index.js';
import { groupResults } from '../grouping/index.js';
import type { Logger } from '../logger.js';
import type { LookupTable } from '../lookup/index.js';

export interface BatchDeps {
  config: BatchConfig;
  table: LookupTable;
  transport: MailTransport;
  clock: Clock;
  logger: Logger;
  /** Defaults to pdf-parse */
  extractText?: TextExtractor;
  /** Classification pool size; defaults to twice the CPU count */
  concurrency?: number;
}

export interface RunSummary {
  documents: number;
  classified: number;
  unmatched: number;
  groups: number;
  sent: number;
  failed: number;
  archived: number;
  archiveFailures: number;
  dryRun: boolean;
}

/** True when every group was sent and every sent document archived */
export function isCleanRun(summary: RunSummary): boolean {
  return summary.failed === 0 && summary.archiveFailures === 0;
}

export async function runBatch(deps: BatchDeps): Promise<RunSummary> {
  const { config, table, transport, clock, logger, extractText, concurrency } = deps;
  const { directories } = config;

  await mkdir(directories.staging, { recursive: true });
  await mkdir(directories.processed, { recursive: true });

  const filenames = await listSourceDocuments(directories.source);
  logger.info(`Found ${filenames.length} PDF(s) in ${directories.source}`);

  const results = await classifyDocuments(
    filenames,
    {
      sourceDir: directories.source,
      stagingDir: directories.staging,
      table,
      logger: logger.child({ module: 'classification' }),
      extractText,
    },
    concurrency,
  );

  const { byRecipient, byIdentifier } = groupResults(results);
  const classified = results.filter((r) => r !== null).length;

  const summary: RunSummary = {
    documents: filenames.length,
    classified,
    unmatched: filenames.length - classified,
    groups: byRecipient.size,
    sent: 0,
    failed: 0,
    archived: 0,
    archiveFailures: 0,
    dryRun: config.dispatch.dryRun,
  };

  logger.info(`Classified ${classified} of ${filenames.length} document(s) into ${byRecipient.size} group(s)`);

  if (config.dispatch.dryRun) {
    for (const [recipient, attachments] of byRecipient) {
      logger.info(`[dry run] Would send ${attachments.length} attachment(s) to ${recipient}`);
    }
    return summary;
  }

  const dispatcher = new GroupDispatcher({
    transport,
    senderEmail: config.smtp.senderEmail,
    email: config.email,
    dispatch: config.dispatch,
    clock,
    logger: logger.child({ module: 'dispatch' }),
  });
  const archiveLogger = logger.child({ module: 'archive' });

  for (const [recipient, attachments] of byRecipient) {
    const sent = await dispatcher.send(recipient, attachments);
    if (!sent) {
      summary.failed++;
      continue;
    }

    summary.sent++;
    const report = await archiveGroup(attachments, byIdentifier, directories.processed, archiveLogger);
    summary.archived += report.moved.length;
    summary.archiveFailures += report.failed.length;
  }

  return summary;
}
