/**
 * Notification Dispatch
 *
 * Simulated SMS delivery. Nothing leaves the process: each dispatch renders
 * the message, appends an event with status "Sent" to the log and returns
 * it. Dispatch never changes a record's status.
 */

import type {
  CampaignType,
  LicenseRecord,
  NoticeKind,
  NoticeParams,
  NotificationEvent,
  Recipient,
} from '../types/index.js';
import { NotificationLog } from './log.js';
import { renderNotice, type NoticeSender } from './templates.js';

export interface DispatcherOptions extends NoticeSender {
  clock?: () => Date;
  /** Skip the per-notice console lines */
  quiet?: boolean;
}

export interface BulkTarget {
  areas: readonly string[];
  /** Defaults to Active holders */
  status?: string;
}

export interface BulkDispatchReport {
  kind: NoticeKind;
  campaign?: CampaignType;
  events: NotificationEvent[];
}

export type BulkProgress = (sent: number, total: number, event: NotificationEvent) => void;

/**
 * Holders in any of the selected areas with the target status, in input order
 */
export function selectBulkRecipients(records: readonly LicenseRecord[], target: BulkTarget): LicenseRecord[] {
  const areas = new Set(target.areas);
  const status = target.status ?? 'Active';
  return records.filter(record => areas.has(record.area) && record.status === status);
}

export class NotificationDispatcher {
  readonly log: NotificationLog;
  private sender: NoticeSender;
  private clock: () => Date;
  private quiet: boolean;

  constructor(log: NotificationLog, options: DispatcherOptions) {
    this.log = log;
    this.sender = { signature: options.signature, contact: options.contact };
    this.clock = options.clock ?? (() => new Date());
    this.quiet = options.quiet ?? false;
  }

  /**
   * Render and record one notice
   */
  dispatch(recipient: Recipient, kind: NoticeKind, params: NoticeParams): NotificationEvent {
    const event = this.log.append({
      mobile: recipient.mobile,
      name: recipient.name,
      kind,
      message: renderNotice(kind, recipient.name, params, this.sender),
      timestamp: this.clock(),
      status: 'Sent',
    });
    if (!this.quiet) {
      console.log(`[Notifications] ${kind} -> ${event.name} (${event.mobile})`);
    }
    return event;
  }

  /**
   * One notice per recipient, in input order
   */
  bulkDispatch(
    recipients: readonly Recipient[],
    kind: NoticeKind,
    params: NoticeParams,
    options: { campaign?: CampaignType; onProgress?: BulkProgress } = {}
  ): BulkDispatchReport {
    const events: NotificationEvent[] = [];

    for (const recipient of recipients) {
      const event = this.dispatch(recipient, kind, params);
      events.push(event);
      options.onProgress?.(events.length, recipients.length, event);
    }

    if (!this.quiet) {
      console.log(
        `[Notifications] Bulk ${kind}${options.campaign ? ` (${options.campaign})` : ''}: ${events.length} sent`
      );
    }

    return { kind, campaign: options.campaign, events };
  }
}
