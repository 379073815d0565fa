/**
 * Console Command - Interactive Session
 *
 * Keeps one dataset in memory and lets an operator filter records, mark
 * weapons submitted or returned, send notices and export the current view.
 * Everything lives for the length of the session only.
 */

import { select, input, checkbox, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  CampaignType,
  FilterSpec,
  LicenseRecord,
  NoticeKind,
  NoticeParams,
  TransitionAction,
} from '../../types/index.js';
import { NOTICE_KINDS } from '../../types/index.js';
import type { TrackerSession } from '../../session.js';
import { filterOptions, filterRecords, isEmptyFilter } from '../../query/filters.js';
import { availableActions, applyAction } from '../../transitions/index.js';
import { CAMPAIGNS } from '../../notifications/campaigns.js';
import { NOTICE_KIND_LABELS } from '../../notifications/templates.js';
import { selectBulkRecipients } from '../../notifications/dispatch.js';
import { isIsoDate } from '../../utils/dates.js';
import { toCsv } from '../../store/schema.js';
import { openCliSession, type DataOptions } from '../context.js';
import { DEFAULT_EXPORT_FILE } from './list.js';
import {
  formatRecordTitle,
  printHeader,
  printNotification,
  printRecord,
  printStatusChange,
} from '../render.js';

type MenuAction =
  | 'filter'
  | 'list'
  | 'submit'
  | 'return'
  | 'notice'
  | 'bulk'
  | 'history'
  | 'audit'
  | 'export'
  | 'load'
  | 'quit';

const ALL = 'All';

function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

function describeFilter(filter: FilterSpec): string {
  if (isEmptyFilter(filter)) return 'no filter';
  return [
    filter.area && `area=${filter.area}`,
    filter.status && `status=${filter.status}`,
    filter.gunType && `weapon=${filter.gunType}`,
    filter.nameSubstring && `name~${filter.nameSubstring}`,
  ].filter(Boolean).join(', ');
}

async function pickOption(message: string, options: string[], current?: string): Promise<string | undefined> {
  const choice = await select({
    message,
    choices: [ALL, ...options].map(value => ({ name: value, value })),
    default: current ?? ALL,
    pageSize: 15,
  });
  return choice === ALL ? undefined : choice;
}

async function promptFilter(session: TrackerSession, current: FilterSpec): Promise<FilterSpec> {
  const options = filterOptions(session.records());
  const area = await pickOption('Select area', options.areas, current.area);
  const status = await pickOption('Select status', options.statuses, current.status);
  const gunType = await pickOption('Select weapon type', options.gunTypes, current.gunType);
  const nameSubstring = await input({
    message: 'Search by name (blank for any)',
    default: current.nameSubstring ?? '',
  });
  return { area, status, gunType, nameSubstring: nameSubstring.trim() || undefined };
}

async function pickRecord(records: LicenseRecord[], message: string): Promise<LicenseRecord | undefined> {
  if (records.length === 0) {
    console.log(chalk.gray('\n  no matching records in the current view\n'));
    return undefined;
  }
  const licenseNo = await select({
    message,
    choices: records.map(record => ({ name: formatRecordTitle(record), value: record.licenseNo })),
    pageSize: 15,
  });
  return records.find(record => record.licenseNo === licenseNo);
}

async function runTransition(session: TrackerSession, view: LicenseRecord[], action: TransitionAction): Promise<void> {
  const eligible = view.filter(record => availableActions(record.status).includes(action));
  const label = action === 'submit' ? 'Mark weapon submitted' : 'Mark weapon returned';
  const record = await pickRecord(eligible, label);
  if (!record) return;

  const result = applyAction(session.store, record.licenseNo, action);
  if (result.ok) {
    console.log(chalk.green(`\n  ✓ weapon marked as ${action === 'submit' ? 'submitted' : 'returned'}`));
    printStatusChange(result.change);
  } else {
    console.log(chalk.red(`\n  ✗ ${result.error.message}`));
  }
  console.log('');
}

async function promptNoticeParams(
  session: TrackerSession,
  kind: NoticeKind,
  campaign?: CampaignType
): Promise<NoticeParams> {
  const defaults = session.defaultNoticeParams(campaign);
  const validDate = (value: string) => isIsoDate(value) || 'enter a YYYY-MM-DD date';

  const collectionPoint = await select({
    message: 'Collection point',
    choices: session.config.notices.collectionPoints.map(value => ({ name: value, value })),
    default: defaults.collectionPoint,
  });
  const deadline = await input({ message: 'Collection deadline', default: defaults.deadline, validate: validDate });
  const returnDate = kind === 'ReturnNotice'
    ? await input({ message: 'Return date', default: defaults.returnDate, validate: validDate })
    : defaults.returnDate;

  return { collectionPoint, deadline, returnDate };
}

async function promptNoticeKind(): Promise<NoticeKind> {
  return select({
    message: 'Message type',
    choices: NOTICE_KINDS.map(kind => ({ name: NOTICE_KIND_LABELS[kind], value: kind })),
  });
}

async function sendSingleNotice(session: TrackerSession, view: LicenseRecord[]): Promise<void> {
  const record = await pickRecord(view, 'Send notice to');
  if (!record) return;

  const kind = await promptNoticeKind();
  const params = await promptNoticeParams(session, kind);
  const event = session.notifyHolder(record.licenseNo, kind, params);
  if (event) {
    console.log(chalk.green(`\n  ✓ notice sent to ${event.name}`));
    printNotification(event);
  }
  console.log('');
}

async function sendBulkNotice(session: TrackerSession): Promise<void> {
  const campaignChoice = await select<CampaignType | 'none'>({
    message: 'Collection drive',
    choices: [
      { name: 'None', value: 'none' },
      ...Object.values(CAMPAIGNS).map(c => ({ name: c.title, value: c.type, description: c.description })),
    ],
  });
  const campaign = campaignChoice === 'none' ? undefined : campaignChoice;

  const areas = await checkbox({
    message: 'Select areas',
    choices: filterOptions(session.records()).areas.map(value => ({ name: value, value })),
    pageSize: 15,
  });
  if (areas.length === 0) {
    console.log(chalk.gray('\n  no areas selected\n'));
    return;
  }

  const recipients = selectBulkRecipients(session.records(), { areas });
  console.log(chalk.cyan(`\n  target recipients: ${recipients.length} license holders\n`));
  if (recipients.length === 0) return;

  const kind = await promptNoticeKind();
  const params = await promptNoticeParams(session, kind, campaign);
  if (!(await confirm({ message: `Send ${recipients.length} notifications?`, default: true }))) {
    return;
  }

  const report = session.notifyAreas(areas, kind, params, { campaign });
  console.log(chalk.green(`\n  ✓ successfully sent ${report.events.length} notifications\n`));
}

function showHistory(session: TrackerSession): void {
  const recent = session.recentNotifications();
  console.log('');
  printHeader(`recent notifications (${session.log.size} total)`);
  if (recent.length === 0) {
    console.log(chalk.gray('  none sent yet'));
  }
  for (const event of recent) {
    printNotification(event);
  }
  console.log('');
}

function showAudit(session: TrackerSession): void {
  const changes = session.transitions.history();
  console.log('');
  printHeader('status changes this session');
  if (changes.length === 0) {
    console.log(chalk.gray('  none yet'));
  }
  for (const change of changes) {
    printStatusChange(change);
  }
  console.log('');
}

async function exportView(view: LicenseRecord[]): Promise<void> {
  const target = await input({ message: 'Export to', default: DEFAULT_EXPORT_FILE });
  await fs.writeFile(path.resolve(target), toCsv(view), 'utf-8');
  console.log(chalk.green(`\n  ✓ exported ${view.length} records to ${target}\n`));
}

async function loadAnother(session: TrackerSession): Promise<void> {
  const file = await input({ message: 'CSV file to load' });
  if (!file.trim()) return;
  const loaded = await session.load({ kind: 'file', path: file.trim() });
  if (loaded) {
    console.log(chalk.green(`\n  ✓ loaded ${session.store.size} records from ${session.store.source}\n`));
  } else {
    console.log(chalk.red(`\n  ✗ ${session.loadError?.message ?? 'load failed'}\n`));
  }
}

export async function consoleCommand(options: DataOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  let filter: FilterSpec = {};

  for (;;) {
    const view = filterRecords(session.records(), filter);

    try {
      const action = await select<MenuAction>({
        message: `${view.length} records (${describeFilter(filter)})`,
        choices: [
          { name: 'Filter records', value: 'filter' },
          { name: 'Show records', value: 'list' },
          { name: 'Mark weapon submitted', value: 'submit' },
          { name: 'Mark weapon returned', value: 'return' },
          { name: 'Send notice to a holder', value: 'notice' },
          { name: 'Send bulk notices by area', value: 'bulk' },
          { name: 'Recent notifications', value: 'history' },
          { name: 'Status change history', value: 'audit' },
          { name: 'Export current view', value: 'export' },
          { name: 'Load another CSV file', value: 'load' },
          { name: 'Quit', value: 'quit' },
        ],
        pageSize: 11,
      });

      switch (action) {
        case 'filter':
          filter = await promptFilter(session, filter);
          break;
        case 'list':
          for (const record of view) printRecord(record);
          console.log('');
          break;
        case 'submit':
        case 'return':
          await runTransition(session, view, action);
          break;
        case 'notice':
          await sendSingleNotice(session, view);
          break;
        case 'bulk':
          await sendBulkNotice(session);
          break;
        case 'history':
          showHistory(session);
          break;
        case 'audit':
          showAudit(session);
          break;
        case 'export':
          await exportView(view);
          break;
        case 'load':
          await loadAnother(session);
          filter = {};
          break;
        case 'quit':
          return;
      }
    } catch (error) {
      if (isPromptExit(error)) return;
      throw error;
    }
  }
}
