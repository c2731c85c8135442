/**
 * Email Module Type Definitions
 *
 * Types for:
 * - Message construction (GroupedMessageInput)
 * - The SMTP seam the dispatcher sends through (MailTransport)
 * - Time, injectable so rate limiting and backoff run on a fake clock in tests (Clock)
 * - Retry policy (RetryOptions)
 */

import type { SendMailOptions } from 'nodemailer';

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

export interface GroupedMessageInput {
  from: string;
  to: string;
  subject: string;
  /** Plain-text body */
  body: string;
  /** Staged document paths, attached in order */
  attachments: readonly string[];
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** The part of a nodemailer Transporter the dispatcher needs */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
  close?(): void;
}

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

export interface Clock {
  /** Milliseconds since epoch */
  now(): number;
  sleep(ms: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

export interface RetryOptions {
  maxAttempts: number;
  /** Delay before the second attempt; doubles for each attempt after that */
  baseDelayMs: number;
  sleep: (ms: number) => Promise<void>;
  /** Called after a failed attempt that will be retried */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}
