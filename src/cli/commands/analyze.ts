/**
 * Analyze command: hunt for attacker activity in web access logs.
 *
 * Reads a log file or directory, scores addresses and SQLi endpoints,
 * fingerprints attacker tools, and writes Markdown, JSON and HTML reports.
 */

import { basename, resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { analyze, withSourceCounters } from '../../analysis/index.js';
import { loadConfig, mergeCliOptions, resolveConfigPath } from '../../config/loader.js';
import { readAllLogs, type ReadAllResult } from '../../ingestion/index.js';
import {
  printSummary,
  toSummaryData,
  writeHtmlReport,
  writeJsonReport,
  writeMarkdownReport,
} from '../../reporting/index.js';
import type { AnalysisResult, ReportFormat } from '../../types/index.js';
import { errorMessage } from '../../utils/errors.js';
import { setLogLevel } from '../../utils/logger.js';
import {
  parseFormatOption,
  parsePositiveInt,
  planReports,
  printInfo,
  printSuccess,
  printWarning,
  type FormatOption,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface AnalyzeOptions {
  input: string;
  out: string;
  json?: string;
  html?: string;
  format?: FormatOption;
  top?: number;
  minReq?: number;
  concurrency?: number;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const REPORT_WRITERS: Record<ReportFormat, (result: AnalysisResult, path: string) => void> = {
  md: writeMarkdownReport,
  json: writeJsonReport,
  html: writeHtmlReport,
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Hunt for attacker activity in web access logs')
    .requiredOption('-i, --input <path>', 'Log file or directory (.log, .txt, .gz)')
    .option('-o, --out <file>', 'Markdown report path', 'report.md')
    .option('--json <file>', 'Also write a JSON report')
    .option('--html <file>', 'Also write an HTML report')
    .option('-f, --format <fmt>', 'Report format: md, json, html, all', parseFormatOption)
    .option('--top <n>', 'Number of top suspicious IPs (default: 10)', parsePositiveInt)
    .option('--min-req <n>', 'Minimum requests for an IP to be ranked (default: 50)', parsePositiveInt)
    .option('--concurrency <n>', 'Log files read at the same time (default: 4)', parsePositiveInt)
    .option('-c, --config <file>', 'YAML config file')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Only errors; no spinner or summary')
    .action(async (options: AnalyzeOptions) => {
      await runAnalyze(options);
    });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  const startTime = Date.now();
  const quiet = options.quiet ?? false;

  const config = mergeCliOptions(await loadConfig(resolveConfigPath(options.config)), {
    minRequests: options.minReq,
    topIps: options.top,
    concurrency: options.concurrency,
    verbose: options.verbose,
    quiet,
  });
  setLogLevel(config.logging.level);

  const inputPath = resolve(options.input);
  const reports = planReports({
    out: options.out,
    json: options.json,
    html: options.html,
    format: options.format,
    configFormats: config.output.formats,
    directory: config.output.directory,
  });

  if (!quiet) {
    console.log('');
    console.log(chalk.bold.cyan('  tracehound: web log threat hunt'));
    console.log(chalk.gray('  ─────────────────────────────────────────'));
    console.log('');
    printInfo(`Input:   ${inputPath}`);
    for (const { format, path } of reports) {
      printInfo(`Report:  ${path} (${format})`);
    }
    console.log('');
  }

  // --- Read logs ---
  const readSpinner = ora({ text: 'Reading logs...', isSilent: quiet }).start();
  let read: ReadAllResult;
  try {
    read = await readAllLogs(inputPath, {
      concurrency: config.performance.concurrency,
      onFileRead: (file, index, total) => {
        readSpinner.text = `Reading logs... ${index + 1}/${total} ${basename(file.file)}`;
      },
    });
    readSpinner.succeed(
      chalk.green(`Read ${read.filesRead} file(s): ${read.events.length} events, ${read.failures} unparsed lines`),
    );
  } catch (err) {
    readSpinner.fail(chalk.red('Failed to read logs'));
    throw err;
  }

  if (!quiet) {
    for (const skipped of read.skippedFiles) {
      printWarning(`Skipped ${skipped.file}: ${skipped.reason}`);
    }
  }

  // --- Analyze ---
  const analyzeSpinner = ora({ text: 'Scoring addresses and endpoints...', isSilent: quiet }).start();
  const result = withSourceCounters(
    analyze(read.events, {
      minRequests: config.analysis.minRequests,
      topN: config.analysis.topIps,
    }),
    { filesRead: read.filesRead, parseFailures: read.failures },
  );
  analyzeSpinner.succeed(
    chalk.green(
      `Ranked ${result.topAddresses.length} IPs, ${result.vulnerableEndpoints.length} SQLi endpoints`,
    ),
  );

  // --- Write reports ---
  for (const { format, path } of reports) {
    try {
      REPORT_WRITERS[format](result, path);
    } catch (err) {
      throw new Error(`Failed to write ${format} report to ${path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!quiet) printSuccess(`Wrote ${path}`);
  }

  // --- Summary ---
  if (!quiet) {
    console.log('');
    printSummary(toSummaryData(result, inputPath, Date.now() - startTime));
    console.log('');
  }
}
