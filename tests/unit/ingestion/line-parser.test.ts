/**
 * Unit tests for the combined-format line parser.
 *
 * Tests: parseLine, parseByteCount
 */

import { describe, it, expect } from 'vitest';
import { parseByteCount, parseLine } from '@/ingestion/line-parser.js';
import type { LogEvent } from '@/types/log-event.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseOk(line: string): LogEvent {
  const outcome = parseLine(line);
  if (!outcome.ok) {
    throw new Error(`expected line to parse (${outcome.reason}): ${line}`);
  }
  return outcome.event;
}

const COMBINED_LINE =
  '203.0.113.7 - - [10/Apr/2021:12:01:55 +0000] "GET /search?q=1 HTTP/1.1" 200 1234 "-" "curl/8.0"';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('parseLine', () => {
  it('extracts every field of a combined-format line', () => {
    expect(parseOk(COMBINED_LINE)).toEqual({
      address: '203.0.113.7',
      timestamp: { epochMs: Date.UTC(2021, 3, 10, 12, 1, 55), offsetMinutes: 0, hasOffset: true },
      method: 'GET',
      requestTarget: '/search?q=1',
      path: '/search',
      query: 'q=1',
      status: 200,
      byteCount: 1234,
      userAgent: 'curl/8.0',
      referer: '-',
      detectedTool: 'curl',
      attackTags: [],
    });
  });

  it('keeps the raw target and tags it from its decoded form', () => {
    const event = parseOk(
      '198.51.100.9 - - [10/Apr/2021:12:02:00 +0000] "GET /item.php?id=1%27%20OR%201=1-- HTTP/1.1" 500 0 "-" "sqlmap/1.7"',
    );
    expect(event.requestTarget).toBe('/item.php?id=1%27%20OR%201=1--');
    expect(event.query).toBe('id=1%27%20OR%201=1--');
    expect(event.status).toBe(500);
    expect(event.detectedTool).toBe('sqlmap');
    expect(event.attackTags).toEqual(['SQLi']);
  });

  it('parses common log format lines without referer and User-Agent', () => {
    const event = parseOk('10.0.0.1 - - [10/Apr/2021:12:01:55 +0000] "GET / HTTP/1.0" 304 -');
    expect(event.userAgent).toBe('');
    expect(event.referer).toBeNull();
    expect(event.detectedTool).toBeNull();
    expect(event.byteCount).toBe(0);
  });

  it('accepts a request line without an HTTP version', () => {
    const event = parseOk('10.0.0.1 - - [10/Apr/2021:12:01:55 +0000] "GET /index.html" 200 10 "-" "-"');
    expect(event.requestTarget).toBe('/index.html');
    expect(event.path).toBe('/index.html');
  });

  it('keeps an event whose timestamp cannot be read', () => {
    const event = parseOk('10.0.0.1 - - [yesterday] "POST /login HTTP/1.1" 401 12 "-" "Mozilla/5.0"');
    expect(event.timestamp).toBeNull();
    expect(event.method).toBe('POST');
    expect(event.status).toBe(401);
  });

  it('accepts IPv6 and hostname client addresses as written', () => {
    expect(parseOk('::1 - - [10/Apr/2021:12:01:55 +0000] "GET / HTTP/1.1" 200 1 "-" "-"').address).toBe('::1');
    expect(
      parseOk('proxy.internal - bob [10/Apr/2021:12:01:55 +0000] "GET / HTTP/1.1" 200 1 "-" "-"').address,
    ).toBe('proxy.internal');
  });

  it('reports an empty line', () => {
    expect(parseLine('')).toEqual({ ok: false, reason: 'empty' });
  });

  it.each([
    'hello world',
    '10.0.0.1 - - [10/Apr/2021:12:01:55 +0000] "get / HTTP/1.1" 200 1',
    '10.0.0.1 - - [10/Apr/2021:12:01:55 +0000] "GET / HTTP/1.1" 2000 1',
    '10.0.0.1 - - 10/Apr/2021:12:01:55 +0000 "GET / HTTP/1.1" 200 1',
  ])('rejects a line outside the grammar: %s', (line) => {
    expect(parseLine(line)).toEqual({ ok: false, reason: 'grammar' });
  });
});

describe('parseByteCount', () => {
  it('parses plain digit strings', () => {
    expect(parseByteCount('0')).toBe(0);
    expect(parseByteCount('5120')).toBe(5120);
  });

  it.each(['-', '', '12kb', '-5', '1.5'])('treats %j as zero', (token) => {
    expect(parseByteCount(token)).toBe(0);
  });
});
