/**
 * Machine-readable JSON report generator.
 *
 * Projects the analysis result into a snake_case document: a `summary`
 * block, full per-address detail, the ranked SQLi endpoints, and the raw
 * events (capped at {@link JSON_EVENT_CAP}).
 */

import { formatLogTimestamp } from '../ingestion/timestamp.js';
import type { AddressProfile, AnalysisResult, EndpointExposure } from '../types/analysis.js';
import type { AttackTag, LogEvent, ToolName } from '../types/log-event.js';
import { writeReportFile } from './write-report.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export const JSON_EVENT_CAP = 20_000;
export const JSON_SUMMARY_ENDPOINT_LIMIT = 10;

export interface JsonEvent {
  ip: string;
  timestamp: string | null;
  method: string;
  url: string;
  path: string;
  query: string;
  status: number;
  bytes: number;
  user_agent: string;
  referer: string | null;
  tool: ToolName | null;
  abnormal: AttackTag[];
}

export interface JsonAddressDetail {
  ip: string;
  request_count: number;
  score: number;
  status_codes: Record<string, number>;
  abnormal_count: number;
  login_attempts: number;
  identity_queries: number;
  max_requests_per_minute: number;
  top_paths: [string, number][];
  abnormal_examples: JsonEvent[];
  tools_used: ToolName[];
}

export interface JsonEndpoint {
  endpoint: string;
  score: number;
  sqli_hits: number;
  sqli_500: number;
  unique_payloads: number;
  examples: string[];
}

export interface JsonReport {
  summary: {
    files_read: number;
    parsed_events: number;
    parse_failures: number;
    top_suspicious_ips: string[];
    tools_by_first_seen: [ToolName, string][];
    top_sqli_endpoints: string[];
    inferred_scrape_section: string | null;
  };
  top_ips_detail: JsonAddressDetail[];
  vulnerable_endpoints: JsonEndpoint[];
  events: JsonEvent[];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function toJsonReport(result: AnalysisResult): JsonReport {
  return {
    summary: {
      files_read: result.filesRead,
      parsed_events: result.parsedEvents,
      parse_failures: result.parseFailures,
      top_suspicious_ips: result.topAddresses.map((p) => p.address),
      tools_by_first_seen: result.toolsFirstSeen.map(({ tool, firstSeen }): [ToolName, string] => [
        tool,
        formatLogTimestamp(firstSeen),
      ]),
      top_sqli_endpoints: result.vulnerableEndpoints
        .slice(0, JSON_SUMMARY_ENDPOINT_LIMIT)
        .map((ep) => ep.endpoint),
      inferred_scrape_section: result.inferredScrapeSection,
    },
    top_ips_detail: result.topAddresses.map(toJsonAddress),
    vulnerable_endpoints: result.vulnerableEndpoints.map(toJsonEndpoint),
    events: result.events.slice(0, JSON_EVENT_CAP).map(toJsonEvent),
  };
}

/**
 * Generate the pretty-printed (2-space) JSON report.
 */
export function generateJsonReport(result: AnalysisResult): string {
  return JSON.stringify(toJsonReport(result), null, 2);
}

/**
 * Write the JSON report, creating parent directories as needed.
 */
export function writeJsonReport(result: AnalysisResult, outputPath: string): void {
  writeReportFile(outputPath, generateJsonReport(result));
}

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

export function toJsonEvent(event: LogEvent): JsonEvent {
  return {
    ip: event.address,
    timestamp: event.timestamp ? formatLogTimestamp(event.timestamp) : null,
    method: event.method,
    url: event.requestTarget,
    path: event.path,
    query: event.query,
    status: event.status,
    bytes: event.byteCount,
    user_agent: event.userAgent,
    referer: event.referer,
    tool: event.detectedTool,
    abnormal: event.attackTags,
  };
}

function toJsonAddress(profile: AddressProfile): JsonAddressDetail {
  return {
    ip: profile.address,
    request_count: profile.requestCount,
    score: profile.score,
    status_codes: { ...profile.statusCodes },
    abnormal_count: profile.abnormalCount,
    login_attempts: profile.loginAttempts,
    identity_queries: profile.identityQueries,
    max_requests_per_minute: profile.maxRequestsPerMinute,
    top_paths: profile.topPaths.map(({ path, count }): [string, number] => [path, count]),
    abnormal_examples: profile.abnormalExamples.map(toJsonEvent),
    tools_used: profile.toolsUsed,
  };
}

function toJsonEndpoint(exposure: EndpointExposure): JsonEndpoint {
  return {
    endpoint: exposure.endpoint,
    score: exposure.score,
    sqli_hits: exposure.sqliHits,
    sqli_500: exposure.sqliWith5xx,
    unique_payloads: exposure.uniquePayloads,
    examples: exposure.examples,
  };
}
