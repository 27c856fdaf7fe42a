/**
 * Unit tests for SQLi endpoint ranking.
 *
 * Tests: scoreEndpoint, rankVulnerableEndpoints
 */

import { describe, it, expect } from 'vitest';
import {
  ENDPOINT_EXAMPLES_LIMIT,
  PAYLOAD_KEY_LENGTH,
  rankVulnerableEndpoints,
  scoreEndpoint,
} from '@/analysis/endpoint-exposure.js';
import type { LogEvent } from '@/types/log-event.js';
import { makeEvent } from '../../helpers/make-event.js';

function sqli(requestTarget: string, status = 200): LogEvent {
  return makeEvent({ requestTarget, status, attackTags: ['SQLi'] });
}

describe('scoreEndpoint', () => {
  it('weights hits, 5xx hits and distinct payloads', () => {
    expect(scoreEndpoint(2, 1, 2)).toBe(10);
  });
});

describe('rankVulnerableEndpoints', () => {
  it('scores and ranks endpoints from SQLi-tagged events only', () => {
    const events = [
      sqli("/a?id=1'", 500),
      sqli("/a?id=1'", 200),
      makeEvent({ requestTarget: '/c?q=<script>', attackTags: ['XSS'] }),
      sqli("/b?x='"),
      sqli("/a?id=2'", 500),
    ];

    expect(rankVulnerableEndpoints(events)).toEqual([
      {
        endpoint: '/a',
        score: 15,
        sqliHits: 3,
        sqliWith5xx: 2,
        uniquePayloads: 2,
        examples: ["/a?id=1'", "/a?id=1'", "/a?id=2'"],
      },
      {
        endpoint: '/b',
        score: 4,
        sqliHits: 1,
        sqliWith5xx: 0,
        uniquePayloads: 1,
        examples: ["/b?x='"],
      },
    ]);
  });

  it('keeps first-attacked order on equal scores', () => {
    const ranked = rankVulnerableEndpoints([sqli("/y?q='"), sqli("/x?q='")]);
    expect(ranked.map((e) => e.endpoint)).toEqual(['/y', '/x']);
  });

  it('caps examples', () => {
    const events = Array.from({ length: 7 }, (_, i) => sqli(`/a?id=${i}'`));
    const [top] = rankVulnerableEndpoints(events);

    expect(top.sqliHits).toBe(7);
    expect(top.examples).toHaveLength(ENDPOINT_EXAMPLES_LIMIT);
    expect(top.examples[4]).toBe("/a?id=4'");
  });

  it('identifies payloads by their leading characters', () => {
    const prefix = `/a?id='${'x'.repeat(PAYLOAD_KEY_LENGTH)}`;
    const [top] = rankVulnerableEndpoints([sqli(`${prefix}1`), sqli(`${prefix}2`)]);
    expect(top.uniquePayloads).toBe(1);
  });

  it('returns an empty list when nothing is SQLi-tagged', () => {
    expect(rankVulnerableEndpoints([makeEvent(), makeEvent({ attackTags: ['XSS'] })])).toEqual([]);
  });

  it('ranks by non-increasing score', () => {
    const events = [
      sqli("/low?q='"),
      ...Array.from({ length: 3 }, (_, i) => sqli(`/high?q=${i}'`, 500)),
      sqli("/mid?q='", 500),
      sqli("/mid?q=''", 500),
    ];
    const scores = rankVulnerableEndpoints(events).map((e) => e.score);

    expect(scores).toEqual([18, 12, 4]);
  });
});
