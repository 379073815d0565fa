/**
 * License Dataset Schema
 *
 * Column layout of the tabular source and the per-row shape checks applied
 * on load. Header matching ignores case, so `License_No` and `license_no`
 * both resolve to the same column.
 */

import { z } from 'zod';
import { LICENSE_STATUSES, type LicenseRecord } from '../types/index.js';
import { isIsoDate } from '../utils/dates.js';
import { parseCsv, stringifyCsv } from './csv.js';
import { LoadError } from './errors.js';

interface Column {
  field: keyof LicenseRecord;
  key: string;
  header: string;
}

/**
 * Canonical column order. Exports always use this order and these headers.
 */
export const COLUMNS: readonly Column[] = [
  { field: 'name', key: 'name', header: 'Name' },
  { field: 'licenseNo', key: 'license_no', header: 'License_No' },
  { field: 'area', key: 'area', header: 'Area' },
  { field: 'policeStation', key: 'police_station', header: 'Police_Station' },
  { field: 'address', key: 'address', header: 'Address' },
  { field: 'gunType', key: 'gun_type', header: 'Gun_Type' },
  { field: 'weaponModel', key: 'weapon_model', header: 'Weapon_Model' },
  { field: 'issueDate', key: 'issue_date', header: 'Issue_Date' },
  { field: 'expiryDate', key: 'expiry_date', header: 'Expiry_Date' },
  { field: 'status', key: 'status', header: 'Status' },
  { field: 'mobile', key: 'mobile', header: 'Mobile' },
  { field: 'gender', key: 'gender', header: 'Gender' },
  { field: 'dob', key: 'dob', header: 'DOB' },
  { field: 'remarks', key: 'remarks', header: 'Remarks' },
];

export const REQUIRED_COLUMNS = COLUMNS.map(c => c.key);

const isoDate = (label: string) =>
  z.string().refine(isIsoDate, { message: `${label} must be a YYYY-MM-DD date` });

const statusField = z.preprocess(
  value => (typeof value === 'string'
    ? LICENSE_STATUSES.find(s => s.toLowerCase() === value.toLowerCase()) ?? value
    : value),
  z.enum(LICENSE_STATUSES),
);

export const licenseRecordSchema = z
  .object({
    licenseNo: z.string().min(1, 'license number is empty'),
    name: z.string(),
    address: z.string(),
    area: z.string(),
    policeStation: z.string(),
    mobile: z.string(),
    gunType: z.string(),
    weaponModel: z.string(),
    issueDate: isoDate('issue date'),
    expiryDate: isoDate('expiry date'),
    dob: isoDate('date of birth'),
    gender: z.string(),
    status: statusField,
    remarks: z.string().optional(),
  })
  .refine(r => r.expiryDate >= r.issueDate, {
    message: 'expiry date is before issue date',
    path: ['expiryDate'],
  });

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, '_');
}

export interface ParsedDataset {
  records: LicenseRecord[];
  /** Non-fatal findings such as duplicate license numbers */
  warnings: string[];
}

/**
 * Parse CSV text into license records.
 * Throws LoadError(MalformedSchema) on missing columns or malformed rows.
 */
export function parseLicenseCsv(content: string, source: string): ParsedDataset {
  const { headers, rows, lines } = parseCsv(content);

  const index = new Map<string, number>();
  headers.forEach((header, i) => {
    const key = normalizeHeader(header);
    if (!index.has(key)) index.set(key, i);
  });

  const missing = REQUIRED_COLUMNS.filter(key => !index.has(key));
  if (missing.length > 0) {
    throw new LoadError(
      'MalformedSchema',
      source,
      `${source} is missing required columns: ${missing.join(', ')}`,
      missing,
    );
  }

  const records: LicenseRecord[] = [];
  const problems: string[] = [];

  rows.forEach((row, i) => {
    const candidate: Record<string, string | undefined> = {};
    for (const column of COLUMNS) {
      const value = row[index.get(column.key) ?? -1] ?? '';
      candidate[column.field] = column.field === 'remarks' && value === '' ? undefined : value;
    }

    const parsed = licenseRecordSchema.safeParse(candidate);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }

    const line = lines[i] ?? i + 2;
    const label = candidate.licenseNo ? `line ${line} (${candidate.licenseNo})` : `line ${line}`;
    for (const issue of parsed.error.issues) {
      problems.push(`${label}: ${issue.path.join('.') || 'row'} - ${issue.message}`);
    }
  });

  if (problems.length > 0) {
    throw new LoadError(
      'MalformedSchema',
      source,
      `${source} has ${problems.length} malformed value(s)`,
      problems,
    );
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.licenseNo)) duplicates.add(record.licenseNo);
    seen.add(record.licenseNo);
  }

  return {
    records,
    warnings: [...duplicates].map(licenseNo => `duplicate license number ${licenseNo}`),
  };
}

/**
 * Serialize records with the canonical header row and column order
 */
export function toCsv(records: readonly LicenseRecord[]): string {
  return stringifyCsv(
    COLUMNS.map(c => c.header),
    records.map(record => COLUMNS.map(c => record[c.field] ?? '')),
  );
}
