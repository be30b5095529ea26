import fs from 'node:fs';
import path from 'node:path';
import type { MergeEvent } from './types.js';

export type RunEvent =
  | { type: 'run-started'; batchPath: string; records: number; strategy: string; threshold: number }
  | { type: 'run-finished'; outDir: string; durationMs: number }
  | { type: 'run-failed'; message: string };

export type LoggerEvent = MergeEvent | RunEvent;

type CreateMergeLoggerOptions = {
  logDir: string;
  // Also log every match decision, not only creations and problems.
  verbose?: boolean;
  now?: () => Date;
  mkdir?: typeof fs.promises.mkdir;
  appendFile?: typeof fs.promises.appendFile;
  onError?: (error: unknown) => void;
};

const BASE_EVENT_TYPES = new Set<LoggerEvent['type']>([
  'driver-created',
  'constructor-created',
  'race-created',
  'record-skipped',
  'field-conflict',
  'normalize-failed',
  'merge-finished',
  'run-started',
  'run-finished',
  'run-failed',
]);
const VERBOSE_EVENT_TYPES = new Set<LoggerEvent['type']>([
  'driver-matched',
  'constructor-matched',
  'race-matched',
]);

function writeStderr(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`paddock-merge: unable to write log: ${message}\n`);
}

/**
 * JSONL run log at `<logDir>/merge.log`. `logger` is synchronous so
 * the merge core can call it inline; writes are chained and `flush` waits for
 * them.
 */
export function createMergeLogger({
  logDir,
  verbose = false,
  now = () => new Date(),
  mkdir = fs.promises.mkdir,
  appendFile = fs.promises.appendFile,
  onError = writeStderr,
}: CreateMergeLoggerOptions) {
  const logPath = path.join(logDir, 'merge.log');
  let pending: Promise<void> = Promise.resolve();
  let failed = false;

  const shouldLogEvent = (event: LoggerEvent): boolean =>
    BASE_EVENT_TYPES.has(event.type) || (verbose && VERBOSE_EVENT_TYPES.has(event.type));

  const write = async (line: string) => {
    if (failed) return;
    try {
      await mkdir(logDir, { recursive: true });
      await appendFile(logPath, line, 'utf-8');
    } catch (error) {
      // Report once; a broken log must not fail the merge.
      failed = true;
      onError(error);
    }
  };

  const logger = (event: LoggerEvent): void => {
    if (!shouldLogEvent(event)) return;
    const payload = {
      time: now().toISOString(),
      ...event,
    };
    const line = `${JSON.stringify(payload)}\n`;
    pending = pending.then(() => write(line));
  };

  const flush = (): Promise<void> => pending;

  return { logPath, logger, flush };
}
