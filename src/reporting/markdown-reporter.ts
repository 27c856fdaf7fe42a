/**
 * Human-readable Markdown report generator.
 *
 * Renders the analysis result as a Markdown document: counters, ranked
 * addresses, tool timeline, SQLi endpoints, the inferred scrape section
 * and per-address movement.
 */

import { formatLogTimestamp } from '../ingestion/timestamp.js';
import type { AddressProfile, AnalysisResult } from '../types/analysis.js';
import { writeReportFile } from './write-report.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface MarkdownReportOptions {
  /** Maximum endpoints in the SQLi table. Default: 10 */
  endpointLimit?: number;
  /** Include the per-address movement section. Default: true */
  includeAddressDetails?: boolean;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a complete Markdown report from an analysis result.
 */
export function generateMarkdownReport(
  result: AnalysisResult,
  options?: MarkdownReportOptions,
): string {
  const opts: Required<MarkdownReportOptions> = {
    endpointLimit: options?.endpointLimit ?? 10,
    includeAddressDetails: options?.includeAddressDetails ?? true,
  };

  const sections: string[] = [];

  sections.push(renderTitle());
  sections.push(renderCounters(result));
  sections.push(renderTopAddresses(result));
  sections.push(renderToolTimeline(result));
  sections.push(renderVulnerableEndpoints(result, opts.endpointLimit));
  sections.push(renderScrapeSection(result));

  if (opts.includeAddressDetails) {
    sections.push(renderAddressDetails(result));
  }

  return sections.join('\n\n') + '\n';
}

export function writeMarkdownReport(
  result: AnalysisResult,
  outputPath: string,
  options?: MarkdownReportOptions,
): void {
  writeReportFile(outputPath, generateMarkdownReport(result, options));
}

// ---------------------------------------------------------------------------
// Section Renderers
// ---------------------------------------------------------------------------

function renderTitle(): string {
  return '# Web Log Threat Hunt Report';
}

function renderCounters(result: AnalysisResult): string {
  return [
    `- Files read: **${result.filesRead}**`,
    `- Parsed events: **${result.parsedEvents}**`,
    `- Parse failures (non-matching lines): **${result.parseFailures}**`,
  ].join('\n');
}

function renderTopAddresses(result: AnalysisResult): string {
  const lines: string[] = ['## Top suspicious IPs (auto-scored)', ''];

  if (result.topAddresses.length === 0) {
    lines.push('No IPs found matching the minimum request threshold.');
    return lines.join('\n');
  }

  lines.push('| Rank | IP | Score | Requests | Tools |');
  lines.push('| ---: | --- | ---: | ---: | --- |');
  result.topAddresses.forEach((profile, i) => {
    const tools = profile.toolsUsed.length > 0 ? profile.toolsUsed.join(', ') : '-';
    lines.push(
      `| ${i + 1} | ${tableCell(profile.address)} | ${profile.score.toFixed(2)} | ${profile.requestCount} | ${tools} |`,
    );
  });

  return lines.join('\n');
}

function renderToolTimeline(result: AnalysisResult): string {
  const lines: string[] = ['## Attacker tools (by first appearance in logs)', ''];

  if (result.toolsFirstSeen.length === 0) {
    lines.push('- No tool fingerprints found in User-Agent fields.');
  } else {
    for (const { tool, firstSeen } of result.toolsFirstSeen) {
      lines.push(`- **${tool}** — first seen: ${formatLogTimestamp(firstSeen)}`);
    }
  }

  return lines.join('\n');
}

function renderVulnerableEndpoints(result: AnalysisResult, limit: number): string {
  const lines: string[] = ['## Likely vulnerable SQLi endpoints (ranked)', ''];

  const [top] = result.vulnerableEndpoints;
  if (!top) {
    lines.push('- No SQLi signatures found.');
    return lines.join('\n');
  }

  lines.push('| Rank | Endpoint | Score | SQLi hits | SQLi+5xx | Unique payloads |');
  lines.push('| ---: | --- | ---: | ---: | ---: | ---: |');
  result.vulnerableEndpoints.slice(0, limit).forEach((ep, i) => {
    lines.push(
      `| ${i + 1} | ${tableCell(inlineCode(ep.endpoint))} | ${ep.score} | ${ep.sqliHits} | ${ep.sqliWith5xx} | ${ep.uniquePayloads} |`,
    );
  });

  lines.push('');
  lines.push(`### Example SQLi requests targeting ${inlineCode(top.endpoint)}`, '');
  for (const example of top.examples) {
    lines.push(`- ${inlineCode(example)}`);
  }

  return lines.join('\n');
}

function renderScrapeSection(result: AnalysisResult): string {
  const lines: string[] = ['## Inferred section used for data scraping', ''];

  if (result.inferredScrapeSection) {
    lines.push(
      `- Most likely section: **${inlineCode(result.inferredScrapeSection)}** ` +
        '(identity/user-related endpoint repeatedly hit by top suspicious IPs)',
    );
  } else {
    lines.push(
      '- Could not infer a scraping section (no identity endpoint hits among top suspicious IPs).',
    );
  }

  return lines.join('\n');
}

function renderAddressDetails(result: AnalysisResult): string {
  const lines: string[] = ['## Per-IP movement (top suspicious IPs)'];

  for (const profile of result.topAddresses) {
    lines.push('', ...renderSingleAddress(profile));
  }

  return lines.join('\n');
}

function renderSingleAddress(profile: AddressProfile): string[] {
  const lines: string[] = [`### ${profile.address}`, ''];

  lines.push(`- Requests: **${profile.requestCount}**`);
  lines.push(`- Score: **${profile.score.toFixed(2)}**`);
  lines.push(`- Status codes: ${formatStatusCodes(profile.statusCodes)}`);
  lines.push(
    `- Login probes: ${profile.loginAttempts}, identity queries: ${profile.identityQueries}, ` +
      `peak requests/minute: ${profile.maxRequestsPerMinute}`,
  );
  if (profile.toolsUsed.length > 0) {
    lines.push(`- Tools: ${profile.toolsUsed.join(', ')}`);
  }

  lines.push('- Top endpoints:');
  for (const { path, count } of profile.topPaths) {
    lines.push(`  - ${inlineCode(path)} — ${count}`);
  }

  if (profile.abnormalExamples.length > 0) {
    lines.push('- Abnormal query examples:');
    for (const event of profile.abnormalExamples) {
      lines.push(
        `  - **${event.attackTags.join(',')}** ${inlineCode(event.requestTarget)} (status ${event.status})`,
      );
    }
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Status histogram as `code:count` pairs in ascending code order.
 */
export function formatStatusCodes(codes: Record<number, number>): string {
  return Object.entries(codes)
    .map(([code, count]) => ({ code: Number(code), count }))
    .sort((a, b) => a.code - b.code)
    .map(({ code, count }) => `${code}:${count}`)
    .join(', ');
}

/**
 * Wrap a value in a code span whose fence is longer than any backtick
 * run inside it.
 */
export function inlineCode(value: string): string {
  const longestRun = Math.max(0, ...(value.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(longestRun + 1);
  const padded = value.startsWith('`') || value.endsWith('`') ? ` ${value} ` : value;
  return `${fence}${padded}${fence}`;
}

function tableCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}
