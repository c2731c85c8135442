#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Runs one batch and exits:
 * 1. Load .env and open the run log (console + logfile_YYYYMMDD_HHMMSS.txt)
 * 2. Build the run configuration
 * 3. Load the lookup table
 * 4. Classify, group, send and archive (pipeline/run.ts)
 * 5. Log the summary, close the SMTP transport and the log
 *
 * Exit status: 0 when every group was sent and archived, 1 when any group
 * or archive move failed, or the run could not start.
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import 'dotenv/config';

import { loadBatchConfig, loadLoggingSettings } from './config.js';
import type { BatchConfig } from './config.js';
import { createSmtpTransport, systemClock } from './email/index.js';
import type { MailTransport } from './email/index.js';
import { closeLogger, createRunLogger, errorMessage } from './logger.js';
import type { Logger } from './logger.js';
import { loadLookupTable } from './lookup/index.js';
import { isCleanRun, runBatch } from './pipeline/index.js';

async function run(logger: Logger, config: BatchConfig): Promise<boolean> {
  const transport: MailTransport = createSmtpTransport(config.smtp);

  try {
    const table = await loadLookupTable(config.lookup.file, config.lookup);
    logger.info(`Loaded ${table.rows.length} lookup row(s) from ${config.lookup.file}`);
    for (const skipped of table.skipped) {
      logger.warn(`Skipped lookup row ${skipped.row}: ${skipped.reason}`);
    }
    if (config.email.recipientOverride) {
      logger.warn(`Recipient override active: all messages go to ${config.email.recipientOverride}`);
    }

    const summary = await runBatch({ config, table, transport, clock: systemClock, logger });

    logger.info(
      `Finished processing PDFs. Sent ${summary.sent} emails with grouped attachments.`,
      summary,
    );
    if (!isCleanRun(summary)) {
      logger.warn(
        `${summary.failed} group(s) failed to send and ${summary.archiveFailures} document(s) ` +
          'failed to archive; failed groups remain in staging for a re-run',
      );
      return false;
    }

    logger.info('Script execution completed successfully');
    return true;
  } catch (err) {
    logger.error('An error occurred during script execution', { error: errorMessage(err) });
    return false;
  } finally {
    transport.close?.();
  }
}

async function main(): Promise<void> {
  // Open the run log first so configuration errors land in it too
  const { logger, logFile } = createRunLogger(loadLoggingSettings());
  logger.info(`Logging to ${logFile}`);

  let ok = false;
  try {
    const config = loadBatchConfig();
    ok = await run(logger, config);
  } catch (err) {
    logger.error('An error occurred during script execution', { error: errorMessage(err) });
  }

  await closeLogger(logger);
  process.exitCode = ok ? 0 : 1;
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exitCode = 1;
});
