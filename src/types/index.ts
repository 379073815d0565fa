/**
 * Weapon License Tracker Shared Types
 */

// =============================================================================
// LICENSE RECORDS
// =============================================================================

export const LICENSE_STATUSES = ['Active', 'Submitted', 'Expired', 'Revoked'] as const;

export type LicenseStatus = typeof LICENSE_STATUSES[number];

/**
 * One licensed weapon and its holder
 */
export interface LicenseRecord {
  licenseNo: string;                   // Primary key
  name: string;
  address: string;
  area: string;
  policeStation: string;
  mobile: string;
  gunType: string;
  weaponModel: string;
  issueDate: string;                   // YYYY-MM-DD
  expiryDate: string;                  // YYYY-MM-DD
  dob: string;                         // YYYY-MM-DD
  gender: string;
  status: LicenseStatus;
  remarks?: string;
}

/**
 * Fields the reporting helpers can group by
 */
export type GroupableField = 'status' | 'area' | 'gunType' | 'gender';

// =============================================================================
// FILTERS & VIEWS
// =============================================================================

/**
 * Conjunctive filter over records. Unset or empty fields match everything.
 */
export interface FilterSpec {
  area?: string;
  status?: string;
  gunType?: string;
  nameSubstring?: string;
}

export interface CountEntry {
  key: string;
  count: number;
}

export const AGE_BUCKETS = ['21-30', '31-40', '41-50', '51-60', '60+'] as const;

export type AgeBucket = typeof AGE_BUCKETS[number];

export interface AgeHistogram {
  buckets: Record<AgeBucket, number>;
  /** Holders under 21 or with an unreadable date of birth */
  excluded: number;
}

export interface DashboardMetrics {
  total: number;
  active: number;
  submitted: number;
  expired: number;
  revoked: number;
  expiredPercent: number;
}

export interface StatusShare {
  status: string;
  count: number;
  percent: number;
}

export interface ReportInsight {
  level: 'alert' | 'notice';
  message: string;
}

// =============================================================================
// STATUS TRANSITIONS
// =============================================================================

export type TransitionAction = 'submit' | 'return';

export type DuplicateKeyPolicy = 'update-all' | 'reject';

/**
 * Audit entry for an applied status change
 */
export interface StatusChange {
  licenseNo: string;
  action: TransitionAction;
  from: LicenseStatus;
  to: LicenseStatus;
  rowsAffected: number;
  at: Date;
}

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export const NOTICE_KINDS = ['CollectionNotice', 'Reminder', 'ReturnNotice'] as const;

export type NoticeKind = typeof NOTICE_KINDS[number];

export interface Recipient {
  name: string;
  mobile: string;
}

export interface NoticeParams {
  collectionPoint: string;
  deadline: string;                    // YYYY-MM-DD
  returnDate: string;                  // YYYY-MM-DD
}

/**
 * Record of a simulated message. Copies recipient fields by value.
 */
export interface NotificationEvent {
  readonly mobile: string;
  readonly name: string;
  readonly kind: NoticeKind;
  readonly message: string;
  readonly timestamp: Date;
  readonly status: 'Sent';
}

export type CampaignType = 'election' | 'festival' | 'emergency';
