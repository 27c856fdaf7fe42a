/**
 * Barrel exports for all tracehound reporter modules.
 */

export {
  generateJsonReport,
  writeJsonReport,
  toJsonReport,
  toJsonEvent,
  JSON_EVENT_CAP,
  type JsonReport,
  type JsonEvent,
  type JsonAddressDetail,
  type JsonEndpoint,
} from './json-reporter.js';

export {
  generateMarkdownReport,
  writeMarkdownReport,
  formatStatusCodes,
  inlineCode,
  type MarkdownReportOptions,
} from './markdown-reporter.js';

export {
  generateHtmlReport,
  writeHtmlReport,
  escapeHtml,
  scoreClass,
} from './html-reporter.js';

export {
  formatSummaryTable,
  printSummary,
  toSummaryData,
  type SummaryData,
} from './summary-reporter.js';

export { writeReportFile } from './write-report.js';
