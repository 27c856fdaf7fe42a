/**
 * Unit tests for User-Agent tool fingerprinting.
 *
 * Tests: detectTool, isBotUserAgent, TOOL_SIGNATURES
 */

import { describe, it, expect } from 'vitest';
import { TOOL_SIGNATURES, detectTool, isBotUserAgent } from '@/detection/tool-signatures.js';
import { SCANNER_TOOLS } from '@/types/log-event.js';

const CHROME_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

describe('TOOL_SIGNATURES', () => {
  it('covers every scanner tool in priority order', () => {
    expect(TOOL_SIGNATURES.map((s) => s.tool)).toEqual([...SCANNER_TOOLS]);
  });
});

describe('detectTool', () => {
  it('returns null for an empty User-Agent', () => {
    expect(detectTool('')).toBeNull();
  });

  it('names a scanner that appears with a version suffix', () => {
    expect(detectTool('sqlmap/1.0 (http://sqlmap.org)')).toBe('sqlmap');
    expect(detectTool('curl/8.4.0')).toBe('curl');
    expect(detectTool('python-requests/2.31.0')).toBe('python-requests');
    expect(detectTool('Go-http-client/1.1')).toBe('go-http-client');
  });

  it('classifies a desktop browser string as browser', () => {
    expect(detectTool(CHROME_UA)).toBe('browser');
  });

  it('prefers a scanner over browser markers', () => {
    expect(detectTool('Mozilla/5.00 (Nikto/2.1.6)')).toBe('nikto');
  });

  it('uses table order when several scanners match', () => {
    expect(detectTool('sqlmap via python-requests/2.31')).toBe('sqlmap');
  });

  it('requires a version after curl and wget', () => {
    expect(detectTool('libcurl-agent')).toBeNull();
    expect(detectTool('Wget/1.21.3')).toBe('wget');
  });

  it('classifies crawlers without browser markers as bot', () => {
    expect(detectTool('Googlebot/2.1 (+http://www.google.com/bot.html)')).toBe('bot');
  });

  it('checks browser markers before bot markers', () => {
    expect(detectTool('Mozilla/5.0 (compatible; bingbot/2.0)')).toBe('browser');
  });

  it('returns null for an unrecognised agent', () => {
    expect(detectTool('internal-healthcheck')).toBeNull();
  });
});

describe('isBotUserAgent', () => {
  it('matches common crawler names', () => {
    expect(isBotUserAgent('Mozilla/5.0 (compatible; YandexBot/3.0)')).toBe(true);
    expect(isBotUserAgent('facebookexternalhit/1.1')).toBe(true);
  });

  it('does not match a plain browser', () => {
    expect(isBotUserAgent(CHROME_UA)).toBe(false);
  });
});
