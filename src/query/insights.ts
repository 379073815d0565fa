/**
 * Report Insights
 *
 * Alerts and recommendations shown under the report statistics.
 */

import type { LicenseRecord, ReportInsight } from '../types/index.js';
import { countBy } from './aggregations.js';

export interface InsightOptions {
  /** Share of all licenses above which one area is flagged (0-1) */
  concentrationThreshold: number;
}

export function reportInsights(
  records: readonly LicenseRecord[],
  options: InsightOptions = { concentrationThreshold: 0.15 }
): ReportInsight[] {
  const insights: ReportInsight[] = [];

  const expired = records.filter(r => r.status === 'Expired').length;
  if (expired > 0) {
    insights.push({
      level: 'alert',
      message: `${expired} licenses have expired and need renewal or revocation.`,
    });
  }

  const [topArea] = countBy(records, 'area');
  if (topArea && topArea.count > records.length * options.concentrationThreshold) {
    insights.push({
      level: 'notice',
      message: `High concentration of licenses in ${topArea.key} (${topArea.count} licenses). ` +
        'Consider additional monitoring during sensitive periods.',
    });
  }

  return insights;
}
