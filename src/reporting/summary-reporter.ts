/**
 * Terminal summary table renderer.
 *
 * Produces a colorized summary of an analysis run using box-drawing
 * characters and chalk colors, printed at the end of the `analyze`
 * command.
 */

import chalk from 'chalk';

import type { AnalysisResult } from '../types/analysis.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface SummaryData {
  inputPath: string;
  processingTimeMs: number;
  filesRead: number;
  parsedEvents: number;
  parseFailures: number;
  rankedAddresses: number;
  topAddress?: { address: string; score: number };
  sqliEndpoints: number;
  tools: string[];
  scrapeSection: string | null;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 60;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function toSummaryData(
  result: AnalysisResult,
  inputPath: string,
  processingTimeMs: number,
): SummaryData {
  const [top] = result.topAddresses;
  return {
    inputPath,
    processingTimeMs,
    filesRead: result.filesRead,
    parsedEvents: result.parsedEvents,
    parseFailures: result.parseFailures,
    rankedAddresses: result.topAddresses.length,
    topAddress: top ? { address: top.address, score: top.score } : undefined,
    sqliEndpoints: result.vulnerableEndpoints.length,
    tools: result.toolsFirstSeen.map((t) => t.tool),
    scrapeSection: result.inferredScrapeSection,
  };
}

/**
 * Format the summary data into a colorized terminal table string.
 *
 * Failure rate is green below 1%, yellow below 10%, red otherwise.
 */
export function formatSummaryTable(data: SummaryData): string {
  const lines: string[] = [];
  const rule = chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`);

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine('Threat Hunt Summary', true));
  lines.push(rule);

  lines.push(formatLine(`Input: ${truncate(data.inputPath, BOX_WIDTH - 9)}`));
  lines.push(formatLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));
  lines.push(rule);

  lines.push(formatSectionHeader('INGESTION'));
  lines.push(
    formatLine(
      `  Files: ${formatNumber(data.filesRead)}  │  Events: ${formatNumber(data.parsedEvents)}`,
    ),
  );

  const total = data.parsedEvents + data.parseFailures;
  const failureRate = total > 0 ? (data.parseFailures / total) * 100 : 0;
  const coloredRate = colorizeFailureRate(`${failureRate.toFixed(1)}%`, failureRate);
  lines.push(
    formatLineRaw(`  Parse failures: ${formatNumber(data.parseFailures)} (${coloredRate})`),
  );
  lines.push(rule);

  lines.push(formatSectionHeader('FINDINGS'));
  lines.push(
    formatLine(
      `  Ranked IPs: ${data.rankedAddresses}  │  SQLi endpoints: ${data.sqliEndpoints}`,
    ),
  );
  if (data.topAddress) {
    const suffix = ` (score ${data.topAddress.score.toFixed(2)})`;
    const address = truncate(data.topAddress.address, BOX_WIDTH - 12 - suffix.length);
    lines.push(formatLineRaw(`  Top IP: ${chalk.red.bold(address)}${suffix}`));
  }
  lines.push(
    formatLine(`  Tools: ${truncate(data.tools.length > 0 ? data.tools.join(', ') : 'none', BOX_WIDTH - 11)}`),
  );
  if (data.scrapeSection) {
    lines.push(formatLine(`  Scrape target: ${truncate(data.scrapeSection, BOX_WIDTH - 19)}`));
  }

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));

  return lines.join('\n');
}

export function printSummary(data: SummaryData): void {
  console.log(formatSummaryTable(data));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments. Padding is
 * computed from the visible (ANSI-stripped) length.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string, isBold: boolean = false): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  const styled = isBold ? chalk.bold.white(padded) : padded;
  return `${chalk.cyan('║')} ${styled} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

function colorizeFailureRate(text: string, rate: number): string {
  if (rate < 1) return chalk.green(text);
  if (rate < 10) return chalk.yellow(text);
  return chalk.red(text);
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
