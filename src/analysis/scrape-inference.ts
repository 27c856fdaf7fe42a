/**
 * Scrape-section inference.
 *
 * Among the ranked addresses, finds the identity/profile endpoint most
 * plausibly used to harvest user data in bulk. This is a heuristic signal,
 * not proof of exfiltration.
 */

import { isIdentityPath } from '../detection/endpoint-hints.js';
import type { LogEvent } from '../types/log-event.js';
import { countBy, mostCommon } from './grouping.js';

export interface ScrapeCandidate {
  address: string;
  path: string;
  hits: number;
  successes: number;
  meanBytes: number;
}

/**
 * Summarise one address's identity-endpoint traffic, or null when it has
 * none. The candidate path is its most-hit identity path (ties by
 * first-seen order).
 */
export function buildScrapeCandidate(
  address: string,
  events: readonly LogEvent[],
): ScrapeCandidate | null {
  const identityEvents = events.filter((e) => isIdentityPath(e.path));
  if (identityEvents.length === 0) return null;

  const [top] = mostCommon(
    countBy(identityEvents, (e) => e.path),
    1,
  );
  const successes = identityEvents.filter((e) => e.status >= 200 && e.status <= 299).length;
  const totalBytes = identityEvents.reduce((sum, e) => sum + e.byteCount, 0);

  return {
    address,
    path: top.key,
    hits: identityEvents.length,
    successes,
    meanBytes: totalBytes / identityEvents.length,
  };
}

/**
 * Compare (hits, successes, meanBytes) lexicographically.
 * Positive when `a` ranks above `b`.
 */
export function compareCandidates(a: ScrapeCandidate, b: ScrapeCandidate): number {
  if (a.hits !== b.hits) return a.hits - b.hits;
  if (a.successes !== b.successes) return a.successes - b.successes;
  return a.meanBytes - b.meanBytes;
}

/**
 * Pick the inferred scrape section from the ranked addresses.
 *
 * @param rankedAddresses - Addresses in rank order.
 * @param eventsByAddress - Every address's events in log order.
 * @returns The winning path, or null when no ranked address touched an
 *          identity endpoint. A full tie keeps the higher-ranked address.
 */
export function inferScrapeSection(
  rankedAddresses: readonly string[],
  eventsByAddress: ReadonlyMap<string, readonly LogEvent[]>,
): string | null {
  let best: ScrapeCandidate | null = null;

  for (const address of rankedAddresses) {
    const events = eventsByAddress.get(address);
    if (!events) continue;

    const candidate = buildScrapeCandidate(address, events);
    if (candidate && (best === null || compareCandidates(candidate, best) > 0)) {
      best = candidate;
    }
  }

  return best?.path ?? null;
}
