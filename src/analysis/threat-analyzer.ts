/**
 * Threat analyzer: turns the full event collection into ranked address,
 * endpoint and tool summaries.
 *
 * Stages:
 *   1. group events by address
 *   2. profile and rank every address above the request floor
 *   3. tool first-seen timeline
 *   4. SQLi endpoint exposure ranking
 *   5. scrape-section inference over the ranked addresses
 */

import type { AddressProfile, AnalysisOptions, AnalysisResult } from '../types/analysis.js';
import type { LogEvent } from '../types/log-event.js';
import { createLogger } from '../utils/logger.js';
import { buildAddressProfile } from './address-profile.js';
import { rankVulnerableEndpoints } from './endpoint-exposure.js';
import { groupBy } from './grouping.js';
import { inferScrapeSection } from './scrape-inference.js';
import { findToolsFirstSeen } from './tool-timeline.js';

const logger = createLogger('analyzer');

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  minRequests: 50,
  topN: 10,
};

export interface SourceCounters {
  filesRead: number;
  parseFailures: number;
}

/**
 * Run every analysis stage over a fully materialised event collection.
 *
 * `filesRead` and `parseFailures` are left at zero; attach them with
 * {@link withSourceCounters}. The events array is kept as given.
 */
export function analyze(
  events: LogEvent[],
  options: Partial<AnalysisOptions> = {},
): AnalysisResult {
  const minRequests = options.minRequests ?? DEFAULT_ANALYSIS_OPTIONS.minRequests;
  const topN = options.topN ?? DEFAULT_ANALYSIS_OPTIONS.topN;

  const byAddress = groupBy(events, (e) => e.address);
  logger.debug(`Grouped ${events.length} events into ${byAddress.size} addresses`);

  const topAddresses = rankAddresses(byAddress, minRequests).slice(0, Math.max(0, topN));
  const toolsFirstSeen = findToolsFirstSeen(events);
  const vulnerableEndpoints = rankVulnerableEndpoints(events);
  const inferredScrapeSection = inferScrapeSection(
    topAddresses.map((p) => p.address),
    byAddress,
  );

  logger.debug(
    `Ranked ${topAddresses.length} addresses, ${vulnerableEndpoints.length} SQLi endpoints, ${toolsFirstSeen.length} tools`,
  );

  return {
    filesRead: 0,
    parsedEvents: events.length,
    parseFailures: 0,
    topAddresses,
    toolsFirstSeen,
    vulnerableEndpoints,
    inferredScrapeSection,
    events,
  };
}

/**
 * Profile every address with at least `minRequests` events, highest score
 * first. Equal scores keep first-seen address order.
 */
export function rankAddresses(
  byAddress: ReadonlyMap<string, readonly LogEvent[]>,
  minRequests: number,
): AddressProfile[] {
  const profiles: AddressProfile[] = [];
  for (const [address, events] of byAddress) {
    if (events.length < minRequests) continue;
    profiles.push(buildAddressProfile(address, events));
  }
  return profiles.sort((a, b) => b.score - a.score);
}

/**
 * A copy of the result carrying the ingestion counters.
 */
export function withSourceCounters(result: AnalysisResult, counters: SourceCounters): AnalysisResult {
  return { ...result, ...counters };
}
