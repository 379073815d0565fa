/**
 * Collection Campaigns
 *
 * Quick-action presets for mass-collection drives and the notice defaults
 * offered before any field is edited.
 */

import type { CampaignType, NoticeParams } from '../types/index.js';
import type { NoticeConfig } from '../config.js';
import { addDays, formatIsoDate } from '../utils/dates.js';

export interface CampaignPreset {
  type: CampaignType;
  title: string;
  description: string;
  /** Days from today to the submission deadline; overrides the configured default */
  deadlineDays?: number;
}

export const CAMPAIGNS: Record<CampaignType, CampaignPreset> = {
  election: {
    type: 'election',
    title: 'Election Period Alert',
    description: 'Send collection notices for election period',
  },
  festival: {
    type: 'festival',
    title: 'Festival Period Alert',
    description: 'Send collection notices for festival period',
  },
  emergency: {
    type: 'emergency',
    title: 'Emergency Collection',
    description: 'Send immediate collection notices',
    deadlineDays: 1,
  },
};

export function isCampaignType(value: string): value is CampaignType {
  return Object.hasOwn(CAMPAIGNS, value);
}

/**
 * Deadline a week out, return date a month out, first collection point
 */
export function defaultNoticeParams(
  notices: NoticeConfig,
  now: Date = new Date(),
  campaign?: CampaignType
): NoticeParams {
  const deadlineDays = (campaign && CAMPAIGNS[campaign].deadlineDays) ?? notices.deadlineDays;
  return {
    collectionPoint: notices.collectionPoints[0] ?? '',
    deadline: formatIsoDate(addDays(now, deadlineDays)),
    returnDate: formatIsoDate(addDays(now, notices.returnAfterDays)),
  };
}
