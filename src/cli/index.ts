#!/usr/bin/env node
/**
 * Weapon License Tracker CLI
 *
 * Commands:
 *   summary    - Dashboard counts and quick-action campaigns
 *   list       - Filter records, optionally export as CSV
 *   analytics  - Status, weapon, area, gender and age distributions
 *   reports    - Statistics with alerts and recommendations
 *   notify     - Bulk collection notices to Active holders by area
 *   console    - Interactive session (status changes, notices, export)
 *   config     - Show effective configuration
 *
 * Every command reads the configured dataset, or the file given with --data.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { summaryCommand } from './commands/summary.js';
import { listCommand } from './commands/list.js';
import { analyticsCommand } from './commands/analytics.js';
import { reportsCommand } from './commands/reports.js';
import { notifyCommand } from './commands/notify.js';
import { configCommand } from './commands/config.js';

const VERSION = '0.1.0';

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n  ✗ unhandled error'));
  console.error(chalk.gray(`  ${reason}\n`));
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error(chalk.red('\n  ✗ unexpected error'));
  console.error(chalk.gray(`  ${error.message}\n`));
  process.exit(1);
});

const program = new Command();

program
  .name('weapon-tracker')
  .description('track weapon licenses, submissions and collection notices')
  .version(VERSION);

program
  .command('summary')
  .alias('dashboard')
  .description('show license counts and quick actions')
  .option('-D, --data <file>', 'CSV dataset to load')
  .action(summaryCommand);

program
  .command('list')
  .description('filter license records')
  .option('-D, --data <file>', 'CSV dataset to load')
  .option('-a, --area <area>', 'only this area')
  .option('-s, --status <status>', 'only this status (Active, Submitted, Expired, Revoked)')
  .option('-g, --gun-type <type>', 'only this weapon type')
  .option('-n, --name <text>', 'holder name contains text (case-insensitive)')
  .option('-e, --export [file]', 'write the filtered view as CSV (default filtered_weapons.csv)')
  .option('-l, --limit <n>', 'records to print, 0 for all', '50')
  .action(listCommand);

program
  .command('analytics')
  .description('show distributions by status, weapon, area, gender and age')
  .option('-D, --data <file>', 'CSV dataset to load')
  .action(analyticsCommand);

program
  .command('reports')
  .description('show statistics, top areas and alerts')
  .option('-D, --data <file>', 'CSV dataset to load')
  .action(reportsCommand);

program
  .command('notify')
  .description('send collection notices to Active holders in the selected areas')
  .option('-D, --data <file>', 'CSV dataset to load')
  .option('-a, --areas <areas...>', 'areas to notify')
  .option('-k, --kind <kind>', 'collection, reminder or return', 'collection')
  .option('-c, --campaign <campaign>', 'election, festival or emergency')
  .option('--station <name>', 'collection point')
  .option('--deadline <date>', 'submission deadline (YYYY-MM-DD)')
  .option('--return-date <date>', 'return date for return notices (YYYY-MM-DD)')
  .action(notifyCommand);

program
  .command('console')
  .alias('shell')
  .description('interactive session: filter, mark submitted/returned, notify, export')
  .option('-D, --data <file>', 'CSV dataset to load')
  .action(async (options) => {
    const { consoleCommand } = await import('./commands/console.js');
    await consoleCommand(options);
  });

program
  .command('config')
  .description('show effective configuration')
  .argument('[key]', 'config key to show')
  .action(configCommand);

program
  .command('version')
  .description('show version and runtime info')
  .action(() => {
    console.log(chalk.cyan('\n  weapon-tracker') + chalk.gray(` v${VERSION}`));
    console.log(chalk.gray(`  runtime: node ${process.version}\n`));
  });

await program.parseAsync();
