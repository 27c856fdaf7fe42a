/**
 * Threat analysis: address profiling, endpoint exposure, tool timeline
 * and scrape-section inference.
 */

export {
  analyze,
  rankAddresses,
  withSourceCounters,
  DEFAULT_ANALYSIS_OPTIONS,
  type SourceCounters,
} from './threat-analyzer.js';
export {
  buildAddressProfile,
  scoreAddress,
  peakRequestsPerMinute,
  SCORE_WEIGHTS,
  TOP_PATHS_LIMIT,
  ABNORMAL_EXAMPLES_LIMIT,
  type ScoreInputs,
} from './address-profile.js';
export {
  rankVulnerableEndpoints,
  scoreEndpoint,
  PAYLOAD_KEY_LENGTH,
  ENDPOINT_EXAMPLES_LIMIT,
} from './endpoint-exposure.js';
export { findToolsFirstSeen } from './tool-timeline.js';
export {
  inferScrapeSection,
  buildScrapeCandidate,
  compareCandidates,
  type ScrapeCandidate,
} from './scrape-inference.js';
export { groupBy, countBy, mostCommon, type KeyCount } from './grouping.js';
