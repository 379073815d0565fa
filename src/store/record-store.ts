/**
 * Record Store
 *
 * In-memory table of license records for one session. Records keep their
 * load order. Reads hand out copies; the only write path is updateStatus,
 * which asks the transition engine before touching any row.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { LicenseRecord, LicenseStatus } from '../types/index.js';
import { StatusTransitionEngine, type UpdateResult } from '../transitions/engine.js';
import { LoadError } from './errors.js';
import { parseLicenseCsv, toCsv } from './schema.js';

/**
 * Where a dataset comes from: a file on disk or uploaded text
 */
export type LoadSource =
  | { kind: 'file'; path: string }
  | { kind: 'text'; content: string; label?: string };

export interface RecordStoreOptions {
  transitions?: StatusTransitionEngine;
  /** Label of the dataset the records came from */
  source?: string;
  /** Non-fatal findings from load */
  warnings?: string[];
}

export class RecordStore {
  readonly source: string;
  readonly warnings: readonly string[];
  readonly transitions: StatusTransitionEngine;
  private rows: LicenseRecord[];

  constructor(records: readonly LicenseRecord[] = [], options: RecordStoreOptions = {}) {
    this.rows = records.map(copyRecord);
    this.source = options.source ?? 'memory';
    this.warnings = options.warnings ?? [];
    this.transitions = options.transitions ?? new StatusTransitionEngine();
  }

  /**
   * Parse a dataset into a new store.
   * Rejects with LoadError(NotFound) for a missing file and
   * LoadError(MalformedSchema) for missing columns or malformed rows.
   */
  static async load(
    source: LoadSource,
    options: Omit<RecordStoreOptions, 'source' | 'warnings'> = {}
  ): Promise<RecordStore> {
    const label = source.kind === 'file' ? source.path : source.label ?? 'upload';
    const content = source.kind === 'file' ? await readDataset(source.path) : source.content;

    const { records, warnings } = parseLicenseCsv(content, label);
    return new RecordStore(records, { ...options, source: label, warnings });
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * All records in load order
   */
  getAll(): LicenseRecord[] {
    return this.rows.map(record => ({ ...record }));
  }

  findByLicenseNo(licenseNo: string): LicenseRecord | undefined {
    const match = this.rows.find(record => record.licenseNo === licenseNo);
    return match ? { ...match } : undefined;
  }

  findAllByLicenseNo(licenseNo: string): LicenseRecord[] {
    return this.rows
      .filter(record => record.licenseNo === licenseNo)
      .map(record => ({ ...record }));
  }

  /**
   * License numbers held by more than one row, in first-seen order
   */
  duplicateKeys(): string[] {
    const counts = new Map<string, number>();
    for (const record of this.rows) {
      counts.set(record.licenseNo, (counts.get(record.licenseNo) ?? 0) + 1);
    }
    return [...counts].filter(([, count]) => count > 1).map(([licenseNo]) => licenseNo);
  }

  /**
   * Move every row with the license number to a new status.
   * Nothing changes unless the transition engine accepts all of them.
   */
  updateStatus(licenseNo: string, status: LicenseStatus): UpdateResult {
    const matches = this.rows.filter(record => record.licenseNo === licenseNo);
    const verdict = this.transitions.check(
      licenseNo,
      matches.map(record => record.status),
      status
    );

    if (!verdict.ok) {
      console.warn(`[RecordStore] Update rejected (${verdict.error.reason}): ${verdict.error.message}`);
      return verdict;
    }

    for (const record of matches) {
      record.status = verdict.to;
    }

    const change = this.transitions.record({
      licenseNo,
      action: verdict.action,
      from: verdict.from,
      to: verdict.to,
      rowsAffected: matches.length,
    });

    return { ok: true, change };
  }

  /**
   * Serialize all records in load order
   */
  toCsv(): string {
    return toCsv(this.rows);
  }
}

/**
 * Row copy with an empty Remarks value dropped, matching what load produces
 */
function copyRecord({ remarks, ...rest }: LicenseRecord): LicenseRecord {
  return remarks ? { ...rest, remarks } : rest;
}

async function readDataset(filePath: string): Promise<string> {
  try {
    return await fs.readFile(path.resolve(filePath), 'utf-8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'EISDIR') {
      throw new LoadError('NotFound', filePath, `Dataset not found: ${filePath}`);
    }
    throw error;
  }
}
