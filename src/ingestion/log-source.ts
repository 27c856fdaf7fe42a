/**
 * Log file discovery and reading.
 *
 * Resolves an input path (file or directory) into an ordered list of log
 * files, streams each one line by line (gunzipping `.gz` files) through
 * the line parser, and merges the per-file results in resolution order.
 */

import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';

import type { LogEvent } from '../types/log-event.js';
import { LogSourceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseLine } from './line-parser.js';

const logger = createLogger('log-source');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export const LOG_FILE_SUFFIXES = ['.log', '.log.gz', '.txt', '.gz'] as const;

export interface FileReadResult {
  file: string;
  events: LogEvent[];
  failures: number;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ReadAllResult {
  events: LogEvent[];
  failures: number;
  filesRead: number;
  skippedFiles: SkippedFile[];
}

export interface ReadAllOptions {
  /** Files read at the same time. Default: 4 */
  concurrency?: number;
  /** Called once per file, in resolution order, after it has been read. */
  onFileRead?: (result: FileReadResult, index: number, total: number) => void;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve an input path into the log files it names.
 *
 * A file resolves to itself. A directory is walked recursively and every
 * file with a log suffix is kept, sorted by path.
 */
export async function resolveLogFiles(inputPath: string): Promise<string[]> {
  const isDirectory = await stat(inputPath).then(
    (info) => info.isDirectory(),
    (err: unknown) => {
      throw new LogSourceError(`Input path does not exist: ${inputPath}`, 'NOT_FOUND', inputPath, {
        cause: err,
      });
    },
  );

  if (!isDirectory) return [inputPath];

  const files = (await walkDirectory(inputPath)).filter(isLogFileName).sort();
  logger.debug(`Resolved ${files.length} log file(s) under ${inputPath}`);
  return files;
}

export function isLogFileName(file: string): boolean {
  return LOG_FILE_SUFFIXES.some((suffix) => file.endsWith(suffix));
}

/**
 * Parse every line of one log file.
 *
 * Empty lines are skipped without counting as failures, and a leading
 * byte-order mark is dropped. Rejects with a
 * `LogSourceError` when the file cannot be opened or its gzip stream is
 * corrupt.
 */
export function readLogFile(file: string): Promise<FileReadResult> {
  return new Promise<FileReadResult>((resolve, reject) => {
    const events: LogEvent[] = [];
    let failures = 0;

    const { source, input } = openLogStream(file);
    const lines = createInterface({ input, crlfDelay: Infinity });
    let firstLine = true;

    const fail = (err: unknown): void => {
      reject(
        new LogSourceError(`Failed to read ${file}: ${errorMessage(err)}`, 'READ_FAILED', file, {
          cause: err,
        }),
      );
      lines.close();
      // a failed gunzip only unpipes; close the file stream as well
      source.destroy();
      input.destroy();
    };
    // readline also re-emits input errors; the second reject is a no-op
    input.on('error', fail);
    lines.on('error', fail);

    lines.on('line', (raw) => {
      const line = firstLine ? raw.replace(/^\uFEFF/, '') : raw;
      firstLine = false;
      if (line.length === 0) return;

      const outcome = parseLine(line);
      if (outcome.ok) {
        events.push(outcome.event);
      } else {
        failures++;
      }
    });

    lines.on('close', () => {
      resolve({ file, events, failures });
    });
  });
}

/**
 * Read and parse everything under an input path.
 *
 * Files are read in batches of `concurrency`; results are merged in
 * resolution order, so the event order does not depend on which read
 * finished first. An unreadable file inside a directory is logged and
 * skipped; when the input names a single file, its read error is thrown.
 */
export async function readAllLogs(
  inputPath: string,
  options: ReadAllOptions = {},
): Promise<ReadAllResult> {
  const concurrency = Math.max(1, options.concurrency ?? 4);
  const files = await resolveLogFiles(inputPath);
  const singleInput = files.length === 1 && files[0] === inputPath;

  const result: ReadAllResult = { events: [], failures: 0, filesRead: 0, skippedFiles: [] };

  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const settled = await Promise.allSettled(batch.map((file) => readLogFile(file)));

    for (const [offset, outcome] of settled.entries()) {
      const file = batch[offset];

      if (outcome.status === 'rejected') {
        if (singleInput) throw outcome.reason;
        const reason = errorMessage(outcome.reason);
        logger.warn(`Skipping unreadable log file: ${reason}`);
        result.skippedFiles.push({ file, reason });
        continue;
      }

      const read = outcome.value;
      for (const event of read.events) {
        result.events.push(event);
      }
      result.failures += read.failures;
      result.filesRead += 1;
      logger.debug(`${file}: ${read.events.length} events, ${read.failures} failures`);
      options.onFileRead?.(read, i + offset, files.length);
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function walkDirectory(dir: string, files: string[] = []): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkDirectory(full, files);
    } else if (entry.isFile()) {
      files.push(full);
    }
  }

  return files;
}

interface LogStream {
  /** The file stream. */
  source: Readable;
  /** What readline consumes: the file stream, or its gunzip output. */
  input: Readable;
}

function openLogStream(file: string): LogStream {
  const source = createReadStream(file);
  if (!file.endsWith('.gz')) return { source, input: source };

  const gunzip = createGunzip();
  source.on('error', (err) => gunzip.destroy(err));
  return { source, input: source.pipe(gunzip) };
}
