/**
 * Reporting Aggregations
 *
 * Group-by counts, top-K and the age histogram behind the analytics and
 * report views.
 */

import type {
  AgeBucket,
  AgeHistogram,
  CountEntry,
  DashboardMetrics,
  GroupableField,
  LicenseRecord,
  StatusShare,
} from '../types/index.js';
import { parseIsoDate, wholeYearsBetween } from '../utils/dates.js';

/**
 * Count records per value of a field.
 * Sorted by count descending; equal counts keep first-encountered order.
 * Empty values are not counted.
 */
export function countBy(records: readonly LicenseRecord[], field: GroupableField): CountEntry[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const key = record[field];
    if (key === '') continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, and Map iterates in insertion order
  return [...counts]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count);
}

export function topK(counts: readonly CountEntry[], k: number): CountEntry[] {
  return [...counts].sort((a, b) => b.count - a.count).slice(0, Math.max(0, k));
}

/**
 * Whole years from date of birth to `now`; null when dob is unreadable
 */
export function ageInYears(dob: string, now: Date = new Date()): number | null {
  const born = parseIsoDate(dob);
  if (!born) return null;
  return wholeYearsBetween(born, now);
}

/**
 * Age group for a holder. Under 21 belongs to no group.
 */
export function ageBucket(age: number): AgeBucket | null {
  if (age < 21) return null;
  if (age <= 30) return '21-30';
  if (age <= 40) return '31-40';
  if (age <= 50) return '41-50';
  if (age <= 60) return '51-60';
  return '60+';
}

/**
 * Holders per age group. Holders outside every group are counted in
 * `excluded` so the histogram total plus `excluded` equals the input size.
 */
export function ageHistogram(records: readonly LicenseRecord[], now: Date = new Date()): AgeHistogram {
  const buckets: Record<AgeBucket, number> = {
    '21-30': 0,
    '31-40': 0,
    '41-50': 0,
    '51-60': 0,
    '60+': 0,
  };
  let excluded = 0;

  for (const record of records) {
    const age = ageInYears(record.dob, now);
    const bucket = age === null ? null : ageBucket(age);
    if (bucket) {
      buckets[bucket]++;
    } else {
      excluded++;
    }
  }

  return { buckets, excluded };
}

function percentOf(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}

/**
 * Headline numbers for the dashboard
 */
export function dashboardMetrics(records: readonly LicenseRecord[]): DashboardMetrics {
  const count = (status: LicenseRecord['status']) => records.filter(r => r.status === status).length;
  const expired = count('Expired');

  return {
    total: records.length,
    active: count('Active'),
    submitted: count('Submitted'),
    expired,
    revoked: count('Revoked'),
    expiredPercent: percentOf(expired, records.length),
  };
}

/**
 * Count and share of each status, most common first
 */
export function statusBreakdown(records: readonly LicenseRecord[]): StatusShare[] {
  return countBy(records, 'status').map(({ key, count }) => ({
    status: key,
    count,
    percent: percentOf(count, records.length),
  }));
}
