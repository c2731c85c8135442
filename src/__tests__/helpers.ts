/**
 * Shared test helpers: a silent logger, throwaway directories and a fake clock.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import winston from 'winston';
import type { Clock } from '../email/index.js';
import type { Logger } from '../logger.js';

export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true });
}

export async function makeTempDir(prefix = 'receipt-mailer-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Writes a file, creating parent directories */
export async function writeFixture(file: string, content: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, 'utf-8');
}

/** Plain-text stand-in for pdf-parse: the "PDF" bytes are the text */
export const readAsText = async (content: Buffer): Promise<string> => content.toString('utf-8');

export interface FakeClock extends Clock {
  sleeps: number[];
  advance(ms: number): void;
}

/** Time only moves when something sleeps or the test advances it */
export function createFakeClock(start = 0): FakeClock {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms) => {
      now += ms;
    },
  };
}
