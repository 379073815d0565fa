/**
 * Query Engine Exports
 */

export { filterRecords, filterOptions, isEmptyFilter } from './filters.js';
export {
  countBy,
  topK,
  ageInYears,
  ageBucket,
  ageHistogram,
  dashboardMetrics,
  statusBreakdown,
} from './aggregations.js';
export { reportInsights, type InsightOptions } from './insights.js';
