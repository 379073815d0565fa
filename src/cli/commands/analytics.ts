/**
 * Analytics Command - Distributions
 *
 * Status, weapon type, area, gender and age-group breakdowns as text bars.
 */

import chalk from 'chalk';
import { AGE_BUCKETS } from '../../types/index.js';
import { ageHistogram, countBy, topK } from '../../query/aggregations.js';
import { openCliSession, type DataOptions } from '../context.js';
import { printCounts, printHeader } from '../render.js';

const TOP_AREAS = 15;

export async function analyticsCommand(options: DataOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  if (session.loadError) {
    process.exitCode = 1;
    return;
  }

  const records = session.records();

  console.log('\n');
  printHeader('license status distribution');
  printCounts(countBy(records, 'status'));

  console.log('\n');
  printHeader('weapon type distribution');
  printCounts(countBy(records, 'gunType'));

  console.log('\n');
  printHeader(`top ${TOP_AREAS} areas by license count`);
  printCounts(topK(countBy(records, 'area'), TOP_AREAS));

  console.log('\n');
  printHeader('gender distribution');
  printCounts(countBy(records, 'gender'));

  console.log('\n');
  printHeader('age group distribution');
  const histogram = ageHistogram(records);
  printCounts(AGE_BUCKETS.map(bucket => ({ key: bucket, count: histogram.buckets[bucket] })));
  if (histogram.excluded > 0) {
    console.log(chalk.gray(`\n  ${histogram.excluded} holder(s) under 21 or without a valid date of birth not shown`));
  }

  console.log('\n');
}
