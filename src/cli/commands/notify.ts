/**
 * Notify Command - Bulk Collection Notices
 *
 * Sends one simulated SMS to every Active holder in the selected areas.
 *
 * Usage:
 *   weapon-tracker notify --areas "Kolar Road" "MP Nagar"
 *   weapon-tracker notify --campaign emergency --areas "Kolar Road" --kind reminder
 */

import chalk from 'chalk';
import ora from 'ora';
import type { CampaignType, NoticeKind, NoticeParams } from '../../types/index.js';
import type { TrackerSession } from '../../session.js';
import { isIsoDate } from '../../utils/dates.js';
import { filterOptions } from '../../query/filters.js';
import { isCampaignType, CAMPAIGNS } from '../../notifications/campaigns.js';
import { NOTICE_KIND_LABELS, resolveNoticeKind } from '../../notifications/templates.js';
import { selectBulkRecipients } from '../../notifications/dispatch.js';
import { openCliSession, type DataOptions } from '../context.js';
import { printHeader, printNotification } from '../render.js';

export interface NoticeOptions {
  kind?: string;
  station?: string;
  deadline?: string;
  returnDate?: string;
  campaign?: string;
}

export type NoticeRequest =
  | { ok: true; kind: NoticeKind; params: NoticeParams; campaign?: CampaignType }
  | { ok: false; errors: string[] };

/**
 * Merge command-line notice options over the session defaults
 */
export function buildNoticeRequest(session: TrackerSession, options: NoticeOptions): NoticeRequest {
  const errors: string[] = [];

  let campaign: CampaignType | undefined;
  if (options.campaign !== undefined) {
    if (isCampaignType(options.campaign)) {
      campaign = options.campaign;
    } else {
      errors.push(`unknown campaign "${options.campaign}" (${Object.keys(CAMPAIGNS).join(', ')})`);
    }
  }

  const kind = resolveNoticeKind(options.kind ?? 'collection');
  if (!kind) {
    errors.push(`unknown notice kind "${options.kind}" (collection, reminder, return)`);
  }

  const defaults = session.defaultNoticeParams(campaign);
  const params: NoticeParams = {
    collectionPoint: options.station ?? defaults.collectionPoint,
    deadline: options.deadline ?? defaults.deadline,
    returnDate: options.returnDate ?? defaults.returnDate,
  };

  if (!params.collectionPoint) errors.push('no collection point configured; pass --station');
  if (!isIsoDate(params.deadline)) errors.push(`deadline "${params.deadline}" is not a YYYY-MM-DD date`);
  if (!isIsoDate(params.returnDate)) errors.push(`return date "${params.returnDate}" is not a YYYY-MM-DD date`);

  if (!kind || errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, kind, params, campaign };
}

interface NotifyOptions extends DataOptions, NoticeOptions {
  areas?: string[];
}

export async function notifyCommand(options: NotifyOptions): Promise<void> {
  console.log('\n');
  const session = await openCliSession(options);
  if (session.loadError) {
    process.exitCode = 1;
    return;
  }

  const request = buildNoticeRequest(session, options);
  if (!request.ok) {
    for (const error of request.errors) {
      console.log(chalk.red(`  ✗ ${error}`));
    }
    console.log('\n');
    process.exitCode = 1;
    return;
  }

  const areas = options.areas ?? [];
  if (areas.length === 0) {
    console.log(chalk.yellow('  select at least one area with --areas'));
    console.log(chalk.gray(`  available: ${filterOptions(session.records()).areas.join(', ')}\n`));
    process.exitCode = 1;
    return;
  }

  const recipients = selectBulkRecipients(session.records(), { areas });
  const title = request.campaign ? CAMPAIGNS[request.campaign].title : NOTICE_KIND_LABELS[request.kind];

  console.log('\n');
  printHeader(title.toLowerCase());
  console.log(`  collection point:  ${request.params.collectionPoint}`);
  console.log(`  deadline:          ${request.params.deadline}`);
  if (request.kind === 'ReturnNotice') {
    console.log(`  return date:       ${request.params.returnDate}`);
  }
  console.log(`  target recipients: ${chalk.white.bold(recipients.length)} license holders`);

  if (recipients.length === 0) {
    console.log(chalk.gray('\n  no Active holders in the selected areas\n'));
    return;
  }

  const spinner = ora('sending notifications').start();
  const report = session.notifyAreas(areas, request.kind, request.params, {
    campaign: request.campaign,
    onProgress: (sent, total) => {
      spinner.text = `sending notifications... ${sent}/${total}`;
    },
  });
  spinner.succeed(`sent ${report.events.length} notifications`);

  console.log('\n');
  printHeader('recent notifications');
  for (const event of session.recentNotifications()) {
    printNotification(event);
  }
  console.log('\n');
}
