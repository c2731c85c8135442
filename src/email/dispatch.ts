/**
 * Group Dispatcher
 *
 * Sends one message per recipient group. Every attempt, retries included,
 * first takes a slot from the run-wide rate limiter; failed attempts back off
 * exponentially up to the configured attempt cap.
 *
 * send() resolves true on the first successful attempt and false once the
 * attempts are exhausted. It never touches the filesystem beyond reading
 * attachments; archival is the caller's job and must only follow a true.
 */

import type { DispatchSettings, EmailSettings } from '../config.js';
import { errorMessage } from '../logger.js';
import type { Logger } from '../logger.js';
import { buildGroupedMessage } from './message.js';
import { SlidingWindowRateLimiter } from './rate-limiter.js';
import { RetryExhaustedError, withRetry } from './retry.js';
import type { Clock, MailTransport } from './types.js';

export interface GroupDispatcherOptions {
  transport: MailTransport;
  senderEmail: string;
  email: EmailSettings;
  dispatch: Pick<DispatchSettings, 'rateLimit' | 'rateWindowMs' | 'maxAttempts' | 'baseDelayMs'>;
  clock: Clock;
  logger: Logger;
}

export class GroupDispatcher {
  private readonly limiter: SlidingWindowRateLimiter;

  constructor(private readonly options: GroupDispatcherOptions) {
    const { dispatch, clock } = options;
    this.limiter = new SlidingWindowRateLimiter(dispatch.rateLimit, dispatch.rateWindowMs, clock);
  }

  async send(recipient: string, attachments: readonly string[]): Promise<boolean> {
    const { transport, senderEmail, email, dispatch, clock, logger } = this.options;

    if (attachments.length === 0) {
      logger.warn(`Skipping ${recipient}: no attachments`);
      return false;
    }

    const message = buildGroupedMessage({
      from: senderEmail,
      to: email.recipientOverride ?? recipient,
      subject: email.subject,
      body: email.body,
      attachments,
    });

    try {
      await withRetry(
        async () => {
          await this.limiter.acquire();
          await transport.sendMail(message);
        },
        {
          maxAttempts: dispatch.maxAttempts,
          baseDelayMs: dispatch.baseDelayMs,
          sleep: (ms) => clock.sleep(ms),
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn(
              `Attempt ${attempt} failed to send email to ${recipient}. ` +
                `Retrying in ${delayMs / 1000} seconds.`,
              { error: errorMessage(error) },
            );
          },
        },
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        logger.error(`Failed to send email to ${recipient} after ${err.attempts} attempts.`, {
          error: errorMessage(err.lastError),
        });
        return false;
      }
      throw err;
    }

    logger.info(`Email sent successfully to ${recipient} with ${attachments.length} attachments`);
    return true;
  }
}
