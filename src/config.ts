/**
 * Batch Configuration
 *
 * Centralizes all environment variable access for a mailer run. The entry
 * point loads `.env` (via dotenv) before calling loadBatchConfig, so this
 * module has no import-time side effects and tests can pass their own env.
 *
 * Environment variables:
 * - SOURCE_PDF_DIR / STAGING_DIR / PROCESSED_DIR: Required directory paths
 * - LOOKUP_TABLE_FILE: Required CSV mapping identifiers to emails
 * - LOOKUP_IDENTIFIER_COLUMN / LOOKUP_EMAIL_COLUMN: CSV headers (default PAN / eMail ID)
 * - SMTP_HOST / SMTP_PORT / SMTP_SENDER_EMAIL / SMTP_SENDER_PASSWORD: SMTP session
 * - EMAIL_SUBJECT / EMAIL_BODY: Message template (`<br>` in the body becomes a newline)
 * - EMAIL_RECIPIENT_OVERRIDE: Optional, readdresses every message (testing)
 * - SEND_RATE_LIMIT / SEND_RATE_WINDOW_MS: Attempts allowed per rolling window (default 20 / 60000)
 * - SEND_MAX_ATTEMPTS / SEND_BASE_DELAY_MS: Retry policy (default 5 / 1000)
 * - DRY_RUN: Set to 'true' to classify and group without sending or archiving
 * - LOG_DIR / LOG_LEVEL: Run log location and level (default . / info)
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Config Interface
// ---------------------------------------------------------------------------

export interface SmtpSettings {
  readonly host: string;
  readonly port: number;
  readonly senderEmail: string;
  readonly senderPassword: string;
}

export interface EmailSettings {
  readonly subject: string;
  /** Plain-text body with `<br>` markers already turned into newlines */
  readonly body: string;
  readonly recipientOverride: string | null;
}

export interface DispatchSettings {
  /** Max send attempts (retries included) in any rolling window */
  readonly rateLimit: number;
  readonly rateWindowMs: number;
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly dryRun: boolean;
}

export interface LookupSettings {
  readonly file: string;
  readonly identifierColumn: string;
  readonly emailColumn: string;
}

export interface BatchConfig {
  readonly directories: {
    readonly source: string;
    readonly staging: string;
    readonly processed: string;
  };
  readonly lookup: LookupSettings;
  readonly smtp: SmtpSettings;
  readonly email: EmailSettings;
  readonly dispatch: DispatchSettings;
  readonly logging: {
    readonly dir: string;
    readonly level: string;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Environment Schema
// ---------------------------------------------------------------------------

/** Literal marker in EMAIL_BODY that stands for a line break */
export const BODY_LINE_BREAK_MARKER = '<br>';

const required = z.string().trim().min(1, 'is required');
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const logDirSchema = z.string().trim().min(1).default('.');
const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']).default('info');

const envSchema = z.object({
  SOURCE_PDF_DIR: required,
  STAGING_DIR: required,
  PROCESSED_DIR: required,
  LOOKUP_TABLE_FILE: required,
  LOOKUP_IDENTIFIER_COLUMN: z.string().trim().min(1).default('PAN'),
  LOOKUP_EMAIL_COLUMN: z.string().trim().min(1).default('eMail ID'),
  SMTP_HOST: required,
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_SENDER_EMAIL: z.string().trim().email('must be an email address'),
  SMTP_SENDER_PASSWORD: z.string().min(1, 'is required'),
  EMAIL_SUBJECT: required,
  EMAIL_BODY: z.string().min(1, 'is required'),
  EMAIL_RECIPIENT_OVERRIDE: z.string().trim().email('must be an email address').optional(),
  SEND_RATE_LIMIT: positiveInt(20),
  SEND_RATE_WINDOW_MS: positiveInt(60_000),
  SEND_MAX_ATTEMPTS: positiveInt(5),
  SEND_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  DRY_RUN: z.enum(['true', 'false']).default('false'),
  LOG_DIR: logDirSchema,
  LOG_LEVEL: logLevelSchema,
});

/** Empty strings count as unset, matching how dotenv leaves blank lines */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Log location and level, read on their own so the run log can open before
 * the rest of the configuration is validated. Invalid values fall back to
 * the defaults; loadBatchConfig still reports them.
 */
export function loadLoggingSettings(
  env: NodeJS.ProcessEnv = process.env,
): BatchConfig['logging'] {
  const values = withoutBlanks(env);
  const dir = logDirSchema.safeParse(values.LOG_DIR);
  const level = logLevelSchema.safeParse(values.LOG_LEVEL);
  return {
    dir: dir.success ? dir.data : '.',
    level: level.success ? level.data : 'info',
  };
}

/**
 * Builds the immutable run configuration from environment variables.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadBatchConfig(env: NodeJS.ProcessEnv = process.env): BatchConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`),
    );
  }

  const e = parsed.data;
  const config: BatchConfig = {
    directories: {
      source: e.SOURCE_PDF_DIR,
      staging: e.STAGING_DIR,
      processed: e.PROCESSED_DIR,
    },
    lookup: {
      file: e.LOOKUP_TABLE_FILE,
      identifierColumn: e.LOOKUP_IDENTIFIER_COLUMN,
      emailColumn: e.LOOKUP_EMAIL_COLUMN,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      senderEmail: e.SMTP_SENDER_EMAIL,
      senderPassword: e.SMTP_SENDER_PASSWORD,
    },
    email: {
      subject: e.EMAIL_SUBJECT,
      body: e.EMAIL_BODY.split(BODY_LINE_BREAK_MARKER).join('\n'),
      recipientOverride: e.EMAIL_RECIPIENT_OVERRIDE ?? null,
    },
    dispatch: {
      rateLimit: e.SEND_RATE_LIMIT,
      rateWindowMs: e.SEND_RATE_WINDOW_MS,
      maxAttempts: e.SEND_MAX_ATTEMPTS,
      baseDelayMs: e.SEND_BASE_DELAY_MS,
      dryRun: e.DRY_RUN === 'true',
    },
    logging: {
      dir: e.LOG_DIR,
      level: e.LOG_LEVEL,
    },
  };

  return deepFreeze(config);
}
