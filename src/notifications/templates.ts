/**
 * Notice Templates
 *
 * Fixed SMS texts for each notice kind.
 */

import { NOTICE_KINDS, type NoticeKind, type NoticeParams } from '../types/index.js';

export interface NoticeSender {
  /** Appended after " - " at the end of every message */
  signature: string;
  /** Phone number printed on collection notices */
  contact: string;
}

/**
 * Short names accepted on the command line
 */
export const NOTICE_KIND_ALIASES = {
  collection: 'CollectionNotice',
  reminder: 'Reminder',
  return: 'ReturnNotice',
} as const satisfies Record<string, NoticeKind>;

/**
 * Accepts a short alias (`collection`) or the full kind (`CollectionNotice`)
 */
export function resolveNoticeKind(value: string): NoticeKind | undefined {
  const wanted = value.trim().toLowerCase();
  const alias = Object.entries(NOTICE_KIND_ALIASES).find(([key]) => key === wanted);
  if (alias) return alias[1];
  return NOTICE_KINDS.find(kind => kind.toLowerCase() === wanted);
}

export const NOTICE_KIND_LABELS: Record<NoticeKind, string> = {
  CollectionNotice: 'Collection Notice',
  Reminder: 'Reminder',
  ReturnNotice: 'Return Notice',
};

export function renderNotice(
  kind: NoticeKind,
  name: string,
  params: NoticeParams,
  sender: NoticeSender
): string {
  switch (kind) {
    case 'CollectionNotice':
      return `Dear ${name}, As per government orders, please submit your licensed weapon to ` +
        `${params.collectionPoint} by ${params.deadline}. Contact: ${sender.contact}. - ${sender.signature}`;
    case 'Reminder':
      return `Reminder: ${name}, your weapon submission deadline is approaching (${params.deadline}). ` +
        `Please visit ${params.collectionPoint} immediately. - ${sender.signature}`;
    case 'ReturnNotice':
      return `Dear ${name}, you may collect your submitted weapon from ${params.collectionPoint} ` +
        `after ${params.returnDate}. Bring ID proof. - ${sender.signature}`;
  }
}
