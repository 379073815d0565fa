/**
 * CLI Session Bootstrap
 *
 * Loads configuration and the dataset behind a spinner, and prints the
 * expected layout when the dataset cannot be used.
 */

import chalk from 'chalk';
import ora from 'ora';
import 'dotenv/config';
import { getConfig } from '../config.js';
import { TrackerSession } from '../session.js';
import { COLUMNS } from '../store/schema.js';

export interface DataOptions {
  data?: string;
}

export async function openCliSession(options: DataOptions = {}): Promise<TrackerSession> {
  const config = getConfig();
  const dataPath = options.data ?? config.datasetPath;

  const spinner = ora(`loading ${dataPath}`).start();
  const session = await TrackerSession.open(config, { kind: 'file', path: dataPath }, { quiet: true });

  const error = session.loadError;
  if (error) {
    spinner.fail(error.reason === 'NotFound' ? 'dataset not found' : 'dataset rejected');
    console.log(chalk.red(`\n  ${error.message}`));
    for (const detail of error.details.slice(0, 5)) {
      console.log(chalk.gray(`    ${detail}`));
    }
    if (error.details.length > 5) {
      console.log(chalk.gray(`    ... and ${error.details.length - 5} more`));
    }
    console.log(chalk.gray('\n  upload a file with --data <file.csv>'));
    console.log(chalk.gray(`  expected columns: ${COLUMNS.map(c => c.header).join(', ')}\n`));
    return session;
  }

  spinner.succeed(`loaded ${session.store.size} records from ${session.store.source}`);
  for (const warning of session.store.warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }
  return session;
}
