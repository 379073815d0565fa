/**
 * Config Command - Show effective configuration
 *
 * Usage:
 *   weapon-tracker config          - Show all settings
 *   weapon-tracker config <key>    - Show one setting
 */

import chalk from 'chalk';
import 'dotenv/config';
import { getConfig, validateConfig } from '../../config.js';

export async function configCommand(key?: string): Promise<void> {
  console.log('\n');
  console.log(chalk.cyan('  ─── tracker config ───'));
  console.log('\n');

  const config = getConfig();
  const settings: Record<string, string> = {
    LICENSE_DATASET_PATH: config.datasetPath,
    DUPLICATE_KEY_POLICY: config.duplicateKeyPolicy,
    NOTICE_SIGNATURE: config.notices.signature,
    NOTICE_CONTACT: config.notices.contact,
    COLLECTION_POINTS: config.notices.collectionPoints.join(', '),
    COLLECTION_DEADLINE_DAYS: String(config.notices.deadlineDays),
    RETURN_AFTER_DAYS: String(config.notices.returnAfterDays),
    RECENT_NOTIFICATIONS: String(config.recentNotifications),
    AREA_CONCENTRATION_THRESHOLD: String(config.areaConcentrationThreshold),
  };

  if (key) {
    const value = settings[key.toUpperCase()];
    if (value === undefined) {
      console.log(chalk.yellow(`  ${key} not found`));
    } else {
      console.log(chalk.gray(`  ${key.toUpperCase()}=`) + chalk.white(value));
    }
    console.log('\n');
    return;
  }

  for (const [k, v] of Object.entries(settings)) {
    console.log(chalk.gray(`  ${k}=`) + chalk.white(v));
  }

  const validation = validateConfig();
  if (validation.warnings.length > 0 || validation.errors.length > 0) {
    console.log('\n');
  }
  for (const warning of validation.warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }
  for (const error of validation.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
  console.log('\n');
}
