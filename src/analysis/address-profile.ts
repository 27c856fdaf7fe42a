/**
 * Per-address behaviour profile and composite suspicion score.
 */

import { isIdentityPath, isLoginPath } from '../detection/endpoint-hints.js';
import { minuteBucket } from '../ingestion/timestamp.js';
import type { AddressProfile } from '../types/analysis.js';
import type { LogEvent, ToolName } from '../types/log-event.js';
import { countBy, mostCommon } from './grouping.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed weights of the linear suspicion score. */
export const SCORE_WEIGHTS = {
  volume: 0.002,
  serverErrors: 0.02,
  clientErrors: 0.01,
  abnormal: 0.05,
  loginProbes: 0.03,
  identityQueries: 0.02,
  burst: 0.01,
} as const;

export const TOP_PATHS_LIMIT = 10;
export const ABNORMAL_EXAMPLES_LIMIT = 8;

export interface ScoreInputs {
  requestCount: number;
  fivexx: number;
  fourxx: number;
  abnormalCount: number;
  loginAttempts: number;
  identityQueries: number;
  maxRequestsPerMinute: number;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function scoreAddress(inputs: ScoreInputs): number {
  return (
    SCORE_WEIGHTS.volume * inputs.requestCount +
    SCORE_WEIGHTS.serverErrors * inputs.fivexx +
    SCORE_WEIGHTS.clientErrors * inputs.fourxx +
    SCORE_WEIGHTS.abnormal * inputs.abnormalCount +
    SCORE_WEIGHTS.loginProbes * inputs.loginAttempts +
    SCORE_WEIGHTS.identityQueries * inputs.identityQueries +
    SCORE_WEIGHTS.burst * inputs.maxRequestsPerMinute
  );
}

/**
 * Build the profile of one address from its events, in log order.
 */
export function buildAddressProfile(address: string, events: readonly LogEvent[]): AddressProfile {
  const statusCodes: Record<number, number> = {};
  let fourxx = 0;
  let fivexx = 0;
  let loginAttempts = 0;
  let identityQueries = 0;
  const abnormal: LogEvent[] = [];
  const tools = new Set<ToolName>();

  for (const event of events) {
    statusCodes[event.status] = (statusCodes[event.status] ?? 0) + 1;
    if (event.status >= 400 && event.status <= 499) fourxx++;
    if (event.status >= 500 && event.status <= 599) fivexx++;
    if (event.attackTags.length > 0) abnormal.push(event);
    if (isLoginPath(event.path)) loginAttempts++;
    if (isIdentityPath(event.path)) identityQueries++;
    if (event.detectedTool) tools.add(event.detectedTool);
  }

  const maxRequestsPerMinute = peakRequestsPerMinute(events);

  const score = scoreAddress({
    requestCount: events.length,
    fivexx,
    fourxx,
    abnormalCount: abnormal.length,
    loginAttempts,
    identityQueries,
    maxRequestsPerMinute,
  });

  return {
    address,
    requestCount: events.length,
    score,
    statusCodes,
    fourxx,
    fivexx,
    abnormalCount: abnormal.length,
    loginAttempts,
    identityQueries,
    maxRequestsPerMinute,
    topPaths: mostCommon(
      countBy(events, (e) => e.path),
      TOP_PATHS_LIMIT,
    ).map(({ key, count }) => ({ path: key, count })),
    abnormalExamples: abnormal.slice(0, ABNORMAL_EXAMPLES_LIMIT),
    toolsUsed: [...tools],
  };
}

/**
 * Largest number of events sharing one `YYYY-MM-DD HH:MM` bucket.
 * Events without a timestamp are ignored; 0 when none have one.
 */
export function peakRequestsPerMinute(events: readonly LogEvent[]): number {
  const perMinute = new Map<string, number>();
  let peak = 0;

  for (const event of events) {
    if (!event.timestamp) continue;
    const bucket = minuteBucket(event.timestamp);
    const count = (perMinute.get(bucket) ?? 0) + 1;
    perMinute.set(bucket, count);
    if (count > peak) peak = count;
  }

  return peak;
}
