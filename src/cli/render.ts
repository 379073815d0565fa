/**
 * Terminal rendering helpers shared by the CLI commands
 */

import chalk from 'chalk';
import type { CountEntry, LicenseRecord, NotificationEvent, StatusChange } from '../types/index.js';

export const RULE = '─────────────────────────────────';

const STATUS_COLORS: Record<string, (text: string) => string> = {
  Active: chalk.green,
  Submitted: chalk.blue,
  Expired: chalk.yellow,
  Revoked: chalk.red,
};

export function printHeader(title: string): void {
  console.log(chalk.cyan(`  ${title}`));
  console.log(chalk.gray(`  ${RULE}`));
}

export function colorStatus(status: string): string {
  const color = STATUS_COLORS[status] ?? chalk.white;
  return color(status);
}

export function bar(count: number, max: number, width: number = 30): string {
  if (max <= 0 || count <= 0) return '';
  return '█'.repeat(Math.max(1, Math.round((count / max) * width)));
}

/**
 * Horizontal text bar chart of labelled counts
 */
export function printCounts(entries: readonly CountEntry[]): void {
  if (entries.length === 0) {
    console.log(chalk.gray('  no data'));
    return;
  }

  const max = Math.max(...entries.map(e => e.count));
  const labelWidth = Math.min(24, Math.max(...entries.map(e => e.key.length)));

  for (const { key, count } of entries) {
    const label = key.length > labelWidth ? key.substring(0, labelWidth - 1) + '…' : key.padEnd(labelWidth);
    console.log(`  ${label}  ${String(count).padStart(5)}  ${chalk.cyan(bar(count, max))}`);
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * First 100 characters of a message, with an ellipsis when cut
 */
export function previewMessage(message: string, length: number = 100): string {
  return message.length > length ? `${message.substring(0, length)}...` : message;
}

export function formatRecordTitle(record: LicenseRecord): string {
  return `${record.name} - ${record.licenseNo} (${colorStatus(record.status)})`;
}

export function formatRecordDetails(record: LicenseRecord): string[] {
  const lines = [
    `name:        ${record.name}`,
    `license no:  ${record.licenseNo}`,
    `area:        ${record.area}`,
    `station:     ${record.policeStation}`,
    `address:     ${record.address}`,
    `weapon:      ${record.gunType} - ${record.weaponModel}`,
    `valid:       ${record.issueDate} → ${record.expiryDate}`,
    `mobile:      ${record.mobile}`,
    `status:      ${colorStatus(record.status)}`,
  ];
  if (record.remarks) {
    lines.push(`remarks:     ${record.remarks}`);
  }
  return lines;
}

export function printRecord(record: LicenseRecord): void {
  console.log(`\n  ${chalk.white.bold(formatRecordTitle(record))}`);
  for (const line of formatRecordDetails(record)) {
    console.log(chalk.gray(`    ${line}`));
  }
}

export function printNotification(event: NotificationEvent): void {
  console.log(`\n  ${chalk.green('✓')} ${chalk.white(event.name)} ${chalk.gray(`(${event.mobile})`)}`);
  console.log(chalk.gray(`    sent:    ${formatTimestamp(event.timestamp)}`));
  console.log(chalk.gray(`    message: ${previewMessage(event.message)}`));
}

export function printStatusChange(change: StatusChange): void {
  console.log(
    `  ${chalk.gray(formatTimestamp(change.at))}  ${change.licenseNo}  ` +
    `${colorStatus(change.from)} → ${colorStatus(change.to)}` +
    chalk.gray(change.rowsAffected > 1 ? `  (${change.rowsAffected} rows)` : '')
  );
}
