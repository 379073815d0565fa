/**
 * List Command - Weapon Management View
 *
 * Filters records by area, status, weapon type and name, and optionally
 * exports the filtered view as CSV.
 */

import chalk from 'chalk';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FilterSpec } from '../../types/index.js';
import { filterRecords } from '../../query/filters.js';
import { toCsv } from '../../store/schema.js';
import { availableActions } from '../../transitions/engine.js';
import { openCliSession, type DataOptions } from '../context.js';
import { printHeader, printRecord } from '../render.js';

export const DEFAULT_EXPORT_FILE = 'filtered_weapons.csv';

interface ListOptions extends DataOptions {
  area?: string;
  status?: string;
  gunType?: string;
  name?: string;
  export?: string | boolean;
  limit: string;
}

export async function listCommand(options: ListOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  if (session.loadError) {
    process.exitCode = 1;
    return;
  }

  const filter: FilterSpec = {
    area: options.area,
    status: options.status,
    gunType: options.gunType,
    nameSubstring: options.name,
  };
  const filtered = filterRecords(session.records(), filter);

  console.log('\n');
  printHeader(`filtered results (${filtered.length} records)`);

  const limit = Number.parseInt(options.limit, 10);
  const shown = Number.isNaN(limit) || limit <= 0 ? filtered : filtered.slice(0, limit);

  for (const record of shown) {
    printRecord(record);
    const actions = availableActions(record.status);
    if (actions.length > 0) {
      const hints = actions.map(a => a === 'submit' ? 'mark submitted' : 'mark returned');
      console.log(chalk.gray(`    actions:     ${hints.join(', ')} (weapon-tracker console)`));
    }
  }

  if (shown.length < filtered.length) {
    console.log(chalk.gray(`\n  ... and ${filtered.length - shown.length} more (use --limit 0 to show all)`));
  }

  if (options.export !== undefined && options.export !== false) {
    const target = typeof options.export === 'string' ? options.export : DEFAULT_EXPORT_FILE;
    await fs.writeFile(path.resolve(target), toCsv(filtered), 'utf-8');
    console.log(chalk.green(`\n  ✓ exported ${filtered.length} records to ${target}`));
  }

  console.log('\n');
}
