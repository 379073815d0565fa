/**
 * Tracker Session
 *
 * Owns the record store, the transition engine and the notification log for
 * one working session. Callers create a session, pass it to whatever needs
 * it and drop it when done; nothing is shared through module state.
 *
 * A dataset that fails to load leaves the session running with an empty
 * store and `loadError` set, so every view renders empty.
 */

import type { TrackerConfig } from './config.js';
import type {
  CampaignType,
  FilterSpec,
  LicenseRecord,
  NoticeKind,
  NoticeParams,
  NotificationEvent,
} from './types/index.js';
import { RecordStore, type LoadSource } from './store/record-store.js';
import { isLoadError, type LoadError } from './store/errors.js';
import { toCsv } from './store/schema.js';
import { StatusTransitionEngine, type UpdateResult } from './transitions/engine.js';
import { markReturned, markSubmitted } from './transitions/index.js';
import { filterRecords } from './query/filters.js';
import { NotificationLog } from './notifications/log.js';
import {
  NotificationDispatcher,
  selectBulkRecipients,
  type BulkDispatchReport,
  type BulkProgress,
} from './notifications/dispatch.js';
import { defaultNoticeParams } from './notifications/campaigns.js';

export interface SessionOptions {
  clock?: () => Date;
  /** Leave load and dispatch reporting to the caller (the CLI prints its own) */
  quiet?: boolean;
}

export class TrackerSession {
  readonly config: TrackerConfig;
  readonly transitions: StatusTransitionEngine;
  readonly log: NotificationLog;
  readonly dispatcher: NotificationDispatcher;
  private clock: () => Date;
  private quiet: boolean;
  private _store: RecordStore;
  private _loadError: LoadError | null = null;

  constructor(config: TrackerConfig, options: SessionOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? (() => new Date());
    this.quiet = options.quiet ?? false;
    this.transitions = new StatusTransitionEngine({
      duplicateKeyPolicy: config.duplicateKeyPolicy,
      clock: this.clock,
    });
    this.log = new NotificationLog();
    this.dispatcher = new NotificationDispatcher(this.log, {
      signature: config.notices.signature,
      contact: config.notices.contact,
      clock: this.clock,
      quiet: this.quiet,
    });
    this._store = new RecordStore([], { transitions: this.transitions, source: 'empty' });
  }

  /**
   * Create a session and load its first dataset.
   * Defaults to the configured dataset path.
   */
  static async open(
    config: TrackerConfig,
    source?: LoadSource,
    options: SessionOptions = {}
  ): Promise<TrackerSession> {
    const session = new TrackerSession(config, options);
    await session.load(source ?? { kind: 'file', path: config.datasetPath });
    return session;
  }

  get store(): RecordStore {
    return this._store;
  }

  get loadError(): LoadError | null {
    return this._loadError;
  }

  get hasData(): boolean {
    return this._loadError === null && this._store.size > 0;
  }

  /**
   * Replace the store with a freshly loaded dataset.
   * Load failures are kept on the session rather than thrown.
   */
  async load(source: LoadSource): Promise<boolean> {
    try {
      this._store = await RecordStore.load(source, { transitions: this.transitions });
      this._loadError = null;
      if (!this.quiet) {
        for (const warning of this._store.warnings) {
          console.warn(`[Session] ${this._store.source}: ${warning}`);
        }
        console.log(`[Session] Loaded ${this._store.size} records from ${this._store.source}`);
      }
      return true;
    } catch (error) {
      if (!isLoadError(error)) throw error;

      if (!this.quiet) {
        console.error(`[Session] ${error.message}`);
        for (const detail of error.details.slice(0, 10)) {
          console.error(`[Session]   ${detail}`);
        }
      }
      this._loadError = error;
      this._store = new RecordStore([], { transitions: this.transitions, source: error.source });
      return false;
    }
  }

  records(): LicenseRecord[] {
    return this._store.getAll();
  }

  view(filter: FilterSpec = {}): LicenseRecord[] {
    return filterRecords(this._store.getAll(), filter);
  }

  /**
   * CSV of the filtered view with the canonical columns
   */
  exportView(filter: FilterSpec = {}): string {
    return toCsv(this.view(filter));
  }

  markSubmitted(licenseNo: string): UpdateResult {
    return markSubmitted(this._store, licenseNo);
  }

  markReturned(licenseNo: string): UpdateResult {
    return markReturned(this._store, licenseNo);
  }

  /**
   * Notice defaults from configuration, relative to the session clock
   */
  defaultNoticeParams(campaign?: CampaignType): NoticeParams {
    return defaultNoticeParams(this.config.notices, this.clock(), campaign);
  }

  /**
   * Send one notice to the holder of a license.
   * Returns undefined when no such license is loaded.
   */
  notifyHolder(licenseNo: string, kind: NoticeKind, params: NoticeParams): NotificationEvent | undefined {
    const record = this._store.findByLicenseNo(licenseNo);
    if (!record) return undefined;
    return this.dispatcher.dispatch(record, kind, params);
  }

  /**
   * Notify every Active holder in the selected areas
   */
  notifyAreas(
    areas: readonly string[],
    kind: NoticeKind,
    params: NoticeParams,
    options: { campaign?: CampaignType; onProgress?: BulkProgress } = {}
  ): BulkDispatchReport {
    const recipients = selectBulkRecipients(this._store.getAll(), { areas });
    return this.dispatcher.bulkDispatch(recipients, kind, params, options);
  }

  recentNotifications(limit: number = this.config.recentNotifications): NotificationEvent[] {
    return this.log.recent(limit);
  }
}
