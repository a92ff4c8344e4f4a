/**
 * Report module exports
 */

export { aggregate } from './aggregate.js';
export { toReportRows, formatReportCsv, formatReportJson, formatReportTable } from './format.js';
export { mean, median, stdDev, describeDistribution } from './stats.js';
export type {
  AggregateReport,
  DistributionStats,
  ReportGroup,
  ReportRow,
  ReportTotals,
} from './types.js';
