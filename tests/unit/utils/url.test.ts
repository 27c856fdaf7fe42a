/**
 * Unit tests for request-target helpers.
 *
 * Tests: percentDecode, splitRequestTarget
 */

import { describe, it, expect } from 'vitest';
import { percentDecode, splitRequestTarget } from '@/utils/url.js';

describe('percentDecode', () => {
  it('decodes ASCII escapes', () => {
    expect(percentDecode('%3Cscript%3E')).toBe('<script>');
  });

  it('decodes multi-byte UTF-8 sequences', () => {
    expect(percentDecode('caf%C3%A9')).toBe('café');
  });

  it('replaces invalid UTF-8 with U+FFFD', () => {
    expect(percentDecode('%FF')).toBe('\uFFFD');
  });

  it('leaves malformed escapes as written', () => {
    expect(percentDecode('%zz')).toBe('%zz');
    expect(percentDecode('100%')).toBe('100%');
    expect(percentDecode('%4')).toBe('%4');
  });

  it('does not translate plus signs', () => {
    expect(percentDecode('a+b%20c')).toBe('a+b c');
  });
});

describe('splitRequestTarget', () => {
  it('splits path and query at the first question mark', () => {
    expect(splitRequestTarget('/search?q=1?2')).toEqual({ path: '/search', query: 'q=1?2' });
  });

  it('drops the fragment', () => {
    expect(splitRequestTarget('/page?x=1#top')).toEqual({ path: '/page', query: 'x=1' });
  });

  it('returns an empty query when there is none', () => {
    expect(splitRequestTarget('/about')).toEqual({ path: '/about', query: '' });
  });

  it('strips scheme and authority from absolute-form targets', () => {
    expect(splitRequestTarget('http://example.com/a/b?x=1')).toEqual({ path: '/a/b', query: 'x=1' });
  });

  it('falls back to the raw target when no path remains', () => {
    expect(splitRequestTarget('http://example.com')).toEqual({
      path: 'http://example.com',
      query: '',
    });
    expect(splitRequestTarget('?only')).toEqual({ path: '?only', query: 'only' });
    expect(splitRequestTarget('*')).toEqual({ path: '*', query: '' });
  });

  it('does not decode the path', () => {
    expect(splitRequestTarget('/a%20b?c=%27')).toEqual({ path: '/a%20b', query: 'c=%27' });
  });
});
