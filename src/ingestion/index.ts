/**
 * tracehound ingestion pipeline
 *
 * Line parsing, timestamp handling and log file reading.
 */

export { parseLine, parseByteCount, COMBINED_LOG_PATTERN } from './line-parser.js';
export { parseLogTimestamp, formatLogTimestamp, minuteBucket } from './timestamp.js';
export {
  resolveLogFiles,
  readLogFile,
  readAllLogs,
  isLogFileName,
  LOG_FILE_SUFFIXES,
  type FileReadResult,
  type SkippedFile,
  type ReadAllResult,
  type ReadAllOptions,
} from './log-source.js';
