/**
 * Result types produced by the threat analyzer.
 */

import type { LogEvent, LogTimestamp, ToolName } from './log-event.js';

export interface PathCount {
  path: string;
  count: number;
}

export interface AddressProfile {
  address: string;
  requestCount: number;
  score: number;
  statusCodes: Record<number, number>;
  fourxx: number;
  fivexx: number;
  abnormalCount: number;
  loginAttempts: number;
  identityQueries: number;
  maxRequestsPerMinute: number;
  topPaths: PathCount[];
  abnormalExamples: LogEvent[];
  toolsUsed: ToolName[];
}

export interface EndpointExposure {
  endpoint: string;
  score: number;
  sqliHits: number;
  sqliWith5xx: number;
  uniquePayloads: number;
  examples: string[];
}

export interface ToolSighting {
  tool: ToolName;
  firstSeen: LogTimestamp;
}

export interface AnalysisOptions {
  /** Addresses with fewer events are never scored. */
  minRequests: number;
  /** Number of ranked addresses to keep. */
  topN: number;
}

export interface AnalysisResult {
  filesRead: number;
  parsedEvents: number;
  parseFailures: number;
  topAddresses: AddressProfile[];
  toolsFirstSeen: ToolSighting[];
  vulnerableEndpoints: EndpointExposure[];
  inferredScrapeSection: string | null;
  events: LogEvent[];
}
