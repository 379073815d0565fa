export { NotificationLog, DEFAULT_RECENT_LIMIT } from './log.js';
export {
  NotificationDispatcher,
  selectBulkRecipients,
  type BulkTarget,
  type BulkDispatchReport,
  type BulkProgress,
  type DispatcherOptions,
} from './dispatch.js';
export {
  renderNotice,
  resolveNoticeKind,
  NOTICE_KIND_ALIASES,
  NOTICE_KIND_LABELS,
  type NoticeSender,
} from './templates.js';
export { CAMPAIGNS, isCampaignType, defaultNoticeParams, type CampaignPreset } from './campaigns.js';
