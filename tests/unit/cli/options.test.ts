/**
 * Unit tests for shared CLI options.
 *
 * Tests: parseFormatOption, parsePositiveInt, planReports, print helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { resolve } from 'path';

import {
  parseFormatOption,
  parsePositiveInt,
  planReports,
  printWarning,
  type ReportTargets,
} from '@/cli/options.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

// Mock chalk so output assertions see plain text.
vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
  },
}));

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

const WORK = resolve('/work');

function targets(overrides?: Partial<ReportTargets>): ReportTargets {
  return {
    out: 'report.md',
    configFormats: ['md'],
    directory: WORK,
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseFormatOption', () => {
  it('accepts known formats case-insensitively', () => {
    expect(parseFormatOption('md')).toBe('md');
    expect(parseFormatOption('JSON')).toBe('json');
    expect(parseFormatOption(' all ')).toBe('all');
  });

  it('rejects unknown formats', () => {
    expect(() => parseFormatOption('pdf')).toThrow(InvalidArgumentError);
  });
});

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('10')).toBe(10);
    expect(parsePositiveInt('1')).toBe(1);
  });

  it.each(['0', '-3', '2.5', 'ten', ''])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('planReports', () => {
  it('writes only Markdown by default', () => {
    expect(planReports(targets())).toEqual([{ format: 'md', path: resolve(WORK, 'report.md') }]);
  });

  it('adds JSON and HTML when their paths are given', () => {
    expect(planReports(targets({ json: 'r.json', html: 'out/r.html' }))).toEqual([
      { format: 'md', path: resolve(WORK, 'report.md') },
      { format: 'json', path: resolve(WORK, 'r.json') },
      { format: 'html', path: resolve(WORK, 'out/r.html') },
    ]);
  });

  it('adds formats listed in the config beside the Markdown report', () => {
    expect(planReports(targets({ out: 'hunt/report.md', configFormats: ['md', 'html'] }))).toEqual([
      { format: 'md', path: resolve(WORK, 'hunt/report.md') },
      { format: 'html', path: resolve(WORK, 'hunt/report.html') },
    ]);
  });

  it('writes every format beside --out for all', () => {
    expect(planReports(targets({ out: 'out/hunt.md', format: 'all', json: 'ignored.json' }))).toEqual([
      { format: 'md', path: resolve(WORK, 'out/hunt.md') },
      { format: 'json', path: resolve(WORK, 'out/hunt.json') },
      { format: 'html', path: resolve(WORK, 'out/hunt.html') },
    ]);
  });

  it('uses --out as the base name when it has no extension', () => {
    expect(planReports(targets({ out: 'hunt', format: 'all' })).map((r) => r.path)).toEqual([
      resolve(WORK, 'hunt.md'),
      resolve(WORK, 'hunt.json'),
      resolve(WORK, 'hunt.html'),
    ]);
  });

  it('writes a single format when --format names one', () => {
    expect(planReports(targets({ format: 'json' }))).toEqual([
      { format: 'json', path: resolve(WORK, 'report.json') },
    ]);
    expect(planReports(targets({ format: 'json', json: 'x.json' }))).toEqual([
      { format: 'json', path: resolve(WORK, 'x.json') },
    ]);
    expect(planReports(targets({ format: 'md', html: 'x.html' }))).toEqual([
      { format: 'md', path: resolve(WORK, 'report.md') },
    ]);
  });

  it('keeps absolute paths as given', () => {
    const absolute = resolve('/reports/today.json');
    expect(planReports(targets({ json: absolute }))[1]).toEqual({ format: 'json', path: absolute });
  });
});

describe('printWarning', () => {
  it('prints an indented message', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printWarning('Skipped broken.gz');
    expect(log).toHaveBeenCalledWith('  Skipped broken.gz');
  });
});
