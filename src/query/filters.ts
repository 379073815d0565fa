/**
 * Record Filters
 *
 * Pure views over the record store. Nothing here mutates its input.
 */

import type { FilterSpec, LicenseRecord } from '../types/index.js';

function isSpecified(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

function matchesExact(value: string, wanted: string | undefined): boolean {
  if (!isSpecified(wanted)) return true;
  // A record missing the field never matches a specified predicate
  return value !== '' && value === wanted.trim();
}

function matchesSubstring(value: string, wanted: string | undefined): boolean {
  if (!isSpecified(wanted)) return true;
  return value !== '' && value.toLowerCase().includes(wanted.trim().toLowerCase());
}

/**
 * Records matching every specified predicate, in input order
 */
export function filterRecords(records: readonly LicenseRecord[], filter: FilterSpec): LicenseRecord[] {
  return records.filter(record =>
    matchesExact(record.area, filter.area) &&
    matchesExact(record.status, filter.status) &&
    matchesExact(record.gunType, filter.gunType) &&
    matchesSubstring(record.name, filter.nameSubstring)
  );
}

export function isEmptyFilter(filter: FilterSpec): boolean {
  return ![filter.area, filter.status, filter.gunType, filter.nameSubstring].some(isSpecified);
}

function sortedDistinct(values: string[]): string[] {
  return [...new Set(values.filter(v => v !== ''))].sort((a, b) => a.localeCompare(b));
}

/**
 * Choices for the area, status and weapon-type pickers
 */
export function filterOptions(records: readonly LicenseRecord[]): {
  areas: string[];
  statuses: string[];
  gunTypes: string[];
} {
  return {
    areas: sortedDistinct(records.map(r => r.area)),
    statuses: sortedDistinct(records.map(r => r.status)),
    gunTypes: sortedDistinct(records.map(r => r.gunType)),
  };
}
