export { RunReportCollector } from './run_report';
export { discoveryDocument, discoveryTextLines } from './discovery_report';
export type { DiscoveryReportInput } from './discovery_report';
export {
  SEPARATOR,
  categoryLabel,
  formatDuration,
  formatRate,
  plural,
  statusLabel,
  summaryLines,
} from './text';
export { REPORT_VERBOSITIES } from './report.types';
export type {
  DiscoveryReportDocument,
  ReportVerbosity,
  RunReportDocument,
  RunReportResult,
} from './report.types';
