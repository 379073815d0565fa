/**
 * Summary Command - Dashboard Overview
 *
 * Headline license counts and the quick-action collection campaigns.
 */

import chalk from 'chalk';
import { dashboardMetrics } from '../../query/aggregations.js';
import { CAMPAIGNS } from '../../notifications/campaigns.js';
import { openCliSession, type DataOptions } from '../context.js';
import { printHeader } from '../render.js';

export async function summaryCommand(options: DataOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  if (session.loadError) {
    process.exitCode = 1;
    return;
  }

  const metrics = dashboardMetrics(session.records());

  console.log('\n');
  printHeader('weapon license tracking');
  console.log('\n');
  console.log(`  total licenses:     ${chalk.white.bold(metrics.total)}`);
  console.log(`  active licenses:    ${chalk.green(metrics.active)}`);
  console.log(`  expired licenses:   ${chalk.yellow(metrics.expired)} ${chalk.gray(`(${metrics.expiredPercent.toFixed(1)}%)`)}`);
  console.log(`  weapons submitted:  ${chalk.blue(metrics.submitted)}`);
  console.log(`  revoked licenses:   ${chalk.red(metrics.revoked)}`);
  console.log('\n');

  printHeader('quick actions');
  for (const campaign of Object.values(CAMPAIGNS)) {
    console.log(`\n  ${chalk.cyan(campaign.title)}`);
    console.log(chalk.gray(`    ${campaign.description}`));
    console.log(chalk.gray(`    weapon-tracker notify --campaign ${campaign.type} --areas <area...>`));
  }
  console.log('\n');
}
