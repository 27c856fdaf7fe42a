/**
 * Configuration types for tracehound.
 */

export type ReportFormat = 'md' | 'json' | 'html';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface TracehoundConfig {
  analysis: AnalysisConfig;
  output: OutputConfig;
  performance: PerformanceConfig;
  logging: LogConfig;
}

export interface AnalysisConfig {
  minRequests: number;
  topIps: number;
}

export interface OutputConfig {
  formats: ReportFormat[];
  directory: string;
}

export interface PerformanceConfig {
  /** Number of log files read at the same time. */
  concurrency: number;
}

export interface LogConfig {
  level: LogLevelName;
}
