/**
 * SQL-injection exposure ranking per endpoint.
 *
 * Only events tagged `SQLi` count. An endpoint that answers injection
 * attempts with 5xx errors, across many distinct payloads, ranks higher.
 */

import type { EndpointExposure } from '../types/analysis.js';
import type { LogEvent } from '../types/log-event.js';
import { groupBy } from './grouping.js';

/** Length of the raw-target prefix used as a payload identity. */
export const PAYLOAD_KEY_LENGTH = 200;
export const ENDPOINT_EXAMPLES_LIMIT = 5;

export function scoreEndpoint(hits: number, hitsWith5xx: number, uniquePayloads: number): number {
  return 3 * hits + 2 * hitsWith5xx + uniquePayloads;
}

/**
 * Rank endpoints by SQLi exposure, highest score first. Equal scores keep
 * the order in which the endpoints were first attacked.
 */
export function rankVulnerableEndpoints(events: readonly LogEvent[]): EndpointExposure[] {
  const sqliEvents = events.filter((e) => e.attackTags.includes('SQLi'));
  const byPath = groupBy(sqliEvents, (e) => e.path);

  const exposures: EndpointExposure[] = [];
  for (const [endpoint, hits] of byPath) {
    const sqliWith5xx = hits.filter((e) => e.status >= 500 && e.status <= 599).length;
    const payloads = new Set(hits.map((e) => e.requestTarget.slice(0, PAYLOAD_KEY_LENGTH)));

    exposures.push({
      endpoint,
      score: scoreEndpoint(hits.length, sqliWith5xx, payloads.size),
      sqliHits: hits.length,
      sqliWith5xx,
      uniquePayloads: payloads.size,
      examples: hits.slice(0, ENDPOINT_EXAMPLES_LIMIT).map((e) => e.requestTarget),
    });
  }

  return exposures.sort((a, b) => b.score - a.score);
}
