/**
 * Reports Command - Statistics & Alerts
 */

import chalk from 'chalk';
import { countBy, statusBreakdown, topK } from '../../query/aggregations.js';
import { reportInsights } from '../../query/insights.js';
import { openCliSession, type DataOptions } from '../context.js';
import { printHeader } from '../render.js';

export async function reportsCommand(options: DataOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  if (session.loadError) {
    process.exitCode = 1;
    return;
  }

  const records = session.records();

  console.log('\n');
  printHeader('license statistics');
  for (const { status, count, percent } of statusBreakdown(records)) {
    console.log(`  ${status.padEnd(12)} ${String(count).padStart(5)} ${chalk.gray(`(${percent.toFixed(1)}%)`)}`);
  }

  console.log('\n');
  printHeader('top areas');
  for (const { key, count } of topK(countBy(records, 'area'), 5)) {
    console.log(`  ${key.padEnd(24)} ${count} licenses`);
  }

  console.log('\n');
  printHeader('weapon types');
  for (const { key, count } of countBy(records, 'gunType')) {
    console.log(`  ${key.padEnd(24)} ${count}`);
  }

  console.log('\n');
  printHeader('alerts & recommendations');
  const insights = reportInsights(records, {
    concentrationThreshold: session.config.areaConcentrationThreshold,
  });
  if (insights.length === 0) {
    console.log(chalk.gray('  nothing to flag'));
  }
  for (const insight of insights) {
    const label = insight.level === 'alert' ? chalk.red.bold('alert:') : chalk.yellow.bold('notice:');
    console.log(`  ${label} ${insight.message}`);
  }

  console.log('\n');
}
