/**
 * Shared CLI option helpers for tracehound commands.
 *
 * Provides option value parsers, report output planning, and chalk
 * print helpers.
 */

import { basename, dirname, extname, join, resolve } from 'path';
import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';

import type { ReportFormat } from '../types/config.js';

// ---------------------------------------------------------------------------
// Option value parsers
// ---------------------------------------------------------------------------

/** Accepted values of `--format`. */
export type FormatOption = ReportFormat | 'all';

const VALID_FORMATS: readonly FormatOption[] = ['md', 'json', 'html', 'all'];

function isFormatOption(value: string): value is FormatOption {
  return VALID_FORMATS.some((f) => f === value);
}

/**
 * Commander parser for `--format`.
 *
 * @example parseFormatOption('JSON') => 'json'
 */
export function parseFormatOption(value: string): FormatOption {
  const normalized = value.trim().toLowerCase();
  if (!isFormatOption(normalized)) {
    throw new InvalidArgumentError(`Expected one of: ${VALID_FORMATS.join(', ')}.`);
  }
  return normalized;
}

/**
 * Commander parser for positive integer options (`--top`, `--min-req`).
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const n = Number.parseInt(value, 10);
  if (n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

// ---------------------------------------------------------------------------
// Report output planning
// ---------------------------------------------------------------------------

export interface ReportTargets {
  /** Markdown report path (`--out`). */
  out: string;
  json?: string;
  html?: string;
  format?: FormatOption;
  /** Formats from the config file, used when `--format` is absent. */
  configFormats: readonly ReportFormat[];
  /** Base directory for relative report paths. */
  directory: string;
}

export interface PlannedReport {
  format: ReportFormat;
  path: string;
}

/**
 * Decide which reports to write and where.
 *
 * With `--format`, only that format is written (`all` writes
 * `<base>.md/.json/.html` beside `--out`). Without it the Markdown report is
 * always written, plus JSON and HTML when a path is given or the config
 * lists the format. Relative paths resolve against `directory`.
 */
export function planReports(targets: ReportTargets): PlannedReport[] {
  const planned: PlannedReport[] = [];
  const at = (path: string): string => resolve(targets.directory, path);

  if (targets.format === 'all') {
    const base = stripExtension(targets.out);
    for (const format of ['md', 'json', 'html'] as const) {
      planned.push({ format, path: at(`${base}.${format}`) });
    }
    return planned;
  }

  if (targets.format) {
    planned.push({ format: targets.format, path: at(pathFor(targets.format, targets)) });
    return planned;
  }

  planned.push({ format: 'md', path: at(targets.out) });
  if (targets.json || targets.configFormats.includes('json')) {
    planned.push({ format: 'json', path: at(pathFor('json', targets)) });
  }
  if (targets.html || targets.configFormats.includes('html')) {
    planned.push({ format: 'html', path: at(pathFor('html', targets)) });
  }
  return planned;
}

function pathFor(format: ReportFormat, targets: ReportTargets): string {
  switch (format) {
    case 'md':
      return targets.out;
    case 'json':
      return targets.json ?? `${stripExtension(targets.out)}.json`;
    case 'html':
      return targets.html ?? `${stripExtension(targets.out)}.html`;
  }
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? join(dirname(path), basename(path, ext)) : path;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
