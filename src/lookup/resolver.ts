/**
 * Recipient Resolver
 *
 * Exact identifier match against the lookup table. When an identifier
 * appears on several rows the first row wins; rows keep file order.
 */

import { errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import type { LookupTable } from './types.js';

export function resolveRecipient(
  identifier: string,
  table: LookupTable,
  logger: Logger,
): string | null {
  try {
    const match = table.rows.find((row) => row.identifier === identifier);
    if (!match) {
      logger.warn(`No email found for identifier: ${identifier}`);
      return null;
    }
    return match.email;
  } catch (err) {
    logger.error(`Error getting email for identifier ${identifier}`, { error: errorMessage(err) });
    return null;
  }
}
