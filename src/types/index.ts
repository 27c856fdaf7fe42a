/**
 * Barrel exports for tracehound types.
 */

export {
  ATTACK_TAGS,
  SCANNER_TOOLS,
  type AttackTag,
  type ScannerTool,
  type ToolName,
  type LogTimestamp,
  type LogEvent,
  type ParseFailureReason,
  type ParseOutcome,
} from './log-event.js';

export type {
  PathCount,
  AddressProfile,
  EndpointExposure,
  ToolSighting,
  AnalysisOptions,
  AnalysisResult,
} from './analysis.js';

export type {
  ReportFormat,
  LogLevelName,
  TracehoundConfig,
  AnalysisConfig,
  OutputConfig,
  PerformanceConfig,
  LogConfig,
} from './config.js';
