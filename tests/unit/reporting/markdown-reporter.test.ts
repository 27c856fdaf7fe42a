/**
 * Unit tests for the Markdown reporter.
 *
 * Tests: generateMarkdownReport, writeMarkdownReport, formatStatusCodes,
 * inlineCode
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import {
  formatStatusCodes,
  generateMarkdownReport,
  inlineCode,
  writeMarkdownReport,
} from '@/reporting/markdown-reporter.js';
import { emptyResult, makeEndpoint, makeProfile, makeResult } from '../../helpers/make-result.js';

function lines(markdown: string): string[] {
  return markdown.split('\n');
}

describe('generateMarkdownReport', () => {
  it('renders placeholder sentences for an empty result', () => {
    expect(generateMarkdownReport(emptyResult())).toBe(
      [
        '# Web Log Threat Hunt Report',
        '',
        '- Files read: **0**',
        '- Parsed events: **0**',
        '- Parse failures (non-matching lines): **0**',
        '',
        '## Top suspicious IPs (auto-scored)',
        '',
        'No IPs found matching the minimum request threshold.',
        '',
        '## Attacker tools (by first appearance in logs)',
        '',
        '- No tool fingerprints found in User-Agent fields.',
        '',
        '## Likely vulnerable SQLi endpoints (ranked)',
        '',
        '- No SQLi signatures found.',
        '',
        '## Inferred section used for data scraping',
        '',
        '- Could not infer a scraping section (no identity endpoint hits among top suspicious IPs).',
        '',
        '## Per-IP movement (top suspicious IPs)',
        '',
      ].join('\n'),
    );
  });

  it('renders the counters', () => {
    const output = lines(generateMarkdownReport(makeResult()));
    expect(output).toContain('- Files read: **2**');
    expect(output).toContain('- Parsed events: **120**');
    expect(output).toContain('- Parse failures (non-matching lines): **3**');
  });

  it('renders the ranked address table with two-decimal scores', () => {
    const output = lines(generateMarkdownReport(makeResult()));
    expect(output).toContain('| Rank | IP | Score | Requests | Tools |');
    expect(output).toContain('| 1 | 198.51.100.20 | 5.62 | 60 | sqlmap |');
  });

  it('shows a dash for addresses without tools', () => {
    const result = makeResult({ topAddresses: [makeProfile({ toolsUsed: [], score: 1 })] });
    expect(lines(generateMarkdownReport(result))).toContain('| 1 | 198.51.100.20 | 1.00 | 60 | - |');
  });

  it('lists tools with their first-seen timestamp in the log offset', () => {
    expect(lines(generateMarkdownReport(makeResult()))).toContain(
      '- **sqlmap** — first seen: 2021-04-10T12:01:40+00:00',
    );
  });

  it('renders the endpoint table and examples of the top endpoint', () => {
    const output = lines(generateMarkdownReport(makeResult()));
    expect(output).toContain('| 1 | `/admin.php` | 241 | 60 | 30 | 1 |');
    expect(output).toContain('### Example SQLi requests targeting `/admin.php`');
    expect(output).toContain("- `/admin.php?id=1' OR 1=1--`");
  });

  it('limits the endpoint table', () => {
    const endpoints = Array.from({ length: 12 }, (_, i) =>
      makeEndpoint({ endpoint: `/e${i}`, score: 100 - i }),
    );
    const markdown = generateMarkdownReport(makeResult({ vulnerableEndpoints: endpoints }), {
      endpointLimit: 3,
    });

    expect(lines(markdown)).toContain('| 3 | `/e2` | 98 | 60 | 30 | 1 |');
    expect(markdown).not.toContain('`/e3`');
  });

  it('names the inferred scrape section', () => {
    expect(lines(generateMarkdownReport(makeResult()))).toContain(
      '- Most likely section: **`/admin.php`** (identity/user-related endpoint repeatedly hit by top suspicious IPs)',
    );
  });

  it('renders per-address movement', () => {
    const markdown = generateMarkdownReport(makeResult());
    const section = markdown.slice(markdown.indexOf('## Per-IP movement'));

    expect(section).toBe(
      [
        '## Per-IP movement (top suspicious IPs)',
        '',
        '### 198.51.100.20',
        '',
        '- Requests: **60**',
        '- Score: **5.62**',
        '- Status codes: 403:30, 500:30',
        '- Login probes: 0, identity queries: 60, peak requests/minute: 40',
        '- Tools: sqlmap',
        '- Top endpoints:',
        '  - `/admin.php` — 60',
        '- Abnormal query examples:',
        "  - **SQLi** `/admin.php?id=1' OR 1=1--` (status 500)",
        '',
      ].join('\n'),
    );
  });

  it('omits per-address movement when asked', () => {
    const markdown = generateMarkdownReport(makeResult(), { includeAddressDetails: false });
    expect(markdown).not.toContain('## Per-IP movement');
    expect(markdown.endsWith('(identity/user-related endpoint repeatedly hit by top suspicious IPs)\n')).toBe(true);
  });

  it('escapes pipes in table cells', () => {
    const result = makeResult({ topAddresses: [makeProfile({ address: 'a|b' })] });
    expect(lines(generateMarkdownReport(result))).toContain('| 1 | a\\|b | 5.62 | 60 | sqlmap |');
  });
});

describe('formatStatusCodes', () => {
  it('sorts by status code', () => {
    expect(formatStatusCodes({ 500: 1, 200: 5, 404: 1 })).toBe('200:5, 404:1, 500:1');
  });

  it('is empty for no codes', () => {
    expect(formatStatusCodes({})).toBe('');
  });
});

describe('inlineCode', () => {
  it('wraps plain values in single backticks', () => {
    expect(inlineCode('/login')).toBe('`/login`');
  });

  it('uses a longer fence than any backtick run inside', () => {
    expect(inlineCode('a`b')).toBe('``a`b``');
    expect(inlineCode('`x')).toBe('`` `x ``');
  });
});

describe('writeMarkdownReport', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('creates parent directories and writes the report', () => {
    dir = mkdtempSync(join(tmpdir(), 'tracehound-md-'));
    const path = join(dir, 'nested', 'report.md');

    writeMarkdownReport(makeResult(), path);

    expect(readFileSync(path, 'utf-8')).toBe(generateMarkdownReport(makeResult()));
  });
});
