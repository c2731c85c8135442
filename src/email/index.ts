// ============================================================================
// Email Module — Barrel Export
// ============================================================================
//
// Public API for the email module. All downstream consumers should import
// from this barrel rather than individual files.

// Email types
export type { Clock, GroupedMessageInput, MailTransport, RetryOptions } from './types.js';

// Pure functions
export { buildGroupedMessage, PDF_CONTENT_TYPE } from './message.js';
export { backoffDelay, withRetry, RetryExhaustedError } from './retry.js';

// Rate limiting and time
export { SlidingWindowRateLimiter } from './rate-limiter.js';
export { systemClock } from './clock.js';

// SMTP
export { createSmtpTransport } from './transport.js';
export { GroupDispatcher } from './dispatch.js';
export type { GroupDispatcherOptions } from './dispatch.js';
