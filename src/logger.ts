/**
 * Run Logger
 *
 * One winston logger per run, writing to the console and to a timestamped
 * log file (logfile_YYYYMMDD_HHMMSS.txt). Created by the entry point and
 * handed to each stage as a child logger tagged with its module name.
 */

import path from 'node:path';
import winston from 'winston';

export type Logger = winston.Logger;

export interface RunLoggerOptions {
  dir: string;
  level: string;
  /** Run start time, used for the log filename */
  now?: Date;
}

export interface RunLogger {
  logger: Logger;
  logFile: string;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Formats a date as YYYYMMDD_HHMMSS in local time */
export function formatRunStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function logFileName(date: Date): string {
  return `logfile_${formatRunStamp(date)}.txt`;
}

const lineFormat = winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
  const tag = typeof module === 'string' ? `[${module}] ` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} - ${level.toUpperCase()} - ${tag}${String(message)}${metaStr}`;
});

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: false }),
  lineFormat,
);

export function createRunLogger(options: RunLoggerOptions): RunLogger {
  const logFile = path.join(options.dir, logFileName(options.now ?? new Date()));

  const logger = winston.createLogger({
    level: options.level,
    format: baseFormat,
    transports: [
      new winston.transports.Console(),
      new winston.transports.File({ filename: logFile }),
    ],
  });

  return { logger, logFile };
}

/**
 * Flushes and closes every transport. Resolves once the file transport has
 * written its buffered lines.
 */
export function closeLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

/** Error message for log metadata, whatever was thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
