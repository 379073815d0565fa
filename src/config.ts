/**
 * Tracker Configuration
 * Centralized config for dataset location, notices and reporting thresholds
 */

import { existsSync } from 'fs';
import { z } from 'zod';
import type { DuplicateKeyPolicy } from './types/index.js';

export const DEFAULT_COLLECTION_POINTS = [
  'Habibganj Police Station',
  'MP Nagar Police Station',
  'TT Nagar Police Station',
  'Arera Colony Police Station',
  'Kolar Road Police Station',
];

export interface NoticeConfig {
  signature: string;
  contact: string;
  collectionPoints: string[];
  deadlineDays: number;
  returnAfterDays: number;
}

export interface TrackerConfig {
  datasetPath: string;
  duplicateKeyPolicy: DuplicateKeyPolicy;
  notices: NoticeConfig;
  recentNotifications: number;
  areaConcentrationThreshold: number;
}

const envSchema = z.object({
  LICENSE_DATASET_PATH: z.string().min(1).default('bhopal_weapon_licenses_comprehensive.csv'),
  DUPLICATE_KEY_POLICY: z.enum(['update-all', 'reject']).default('update-all'),
  NOTICE_SIGNATURE: z.string().min(1).default('Bhopal Police'),
  NOTICE_CONTACT: z.string().min(1).default('0755-XXX-XXXX'),
  COLLECTION_POINTS: z.string().optional(),
  COLLECTION_DEADLINE_DAYS: z.coerce.number().int().min(0).default(7),
  RETURN_AFTER_DAYS: z.coerce.number().int().min(0).default(30),
  RECENT_NOTIFICATIONS: z.coerce.number().int().positive().default(10),
  AREA_CONCENTRATION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.15),
});

type EnvKey = keyof typeof envSchema.shape;

const ENV_KEYS: readonly EnvKey[] = envSchema.keyof().options;

type Env = Record<string, string | undefined>;

/**
 * Parse env into config. Invalid keys are reported and fall back to defaults.
 */
function readEnv(env: Env): { config: TrackerConfig; issues: string[] } {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const issues: string[] = [];
  const first = envSchema.safeParse(raw);
  if (!first.success) {
    for (const issue of first.error.issues) {
      const key = ENV_KEYS.find(k => k === issue.path[0]);
      if (!key) continue;
      issues.push(`${key}: ${issue.message}`);
      delete raw[key];
    }
  }

  const parsed = first.success ? first.data : envSchema.parse(raw);

  const collectionPoints = parsed.COLLECTION_POINTS
    ? parsed.COLLECTION_POINTS.split(',').map(p => p.trim()).filter(Boolean)
    : [];

  return {
    config: {
      datasetPath: parsed.LICENSE_DATASET_PATH,
      duplicateKeyPolicy: parsed.DUPLICATE_KEY_POLICY,
      notices: {
        signature: parsed.NOTICE_SIGNATURE,
        contact: parsed.NOTICE_CONTACT,
        collectionPoints: collectionPoints.length > 0 ? collectionPoints : [...DEFAULT_COLLECTION_POINTS],
        deadlineDays: parsed.COLLECTION_DEADLINE_DAYS,
        returnAfterDays: parsed.RETURN_AFTER_DAYS,
      },
      recentNotifications: parsed.RECENT_NOTIFICATIONS,
      areaConcentrationThreshold: parsed.AREA_CONCENTRATION_THRESHOLD,
    },
    issues,
  };
}

/**
 * Get the current tracker configuration
 */
export function getConfig(env: Env = process.env): TrackerConfig {
  return readEnv(env).config;
}

/**
 * Validate configuration and collect warnings
 */
export function validateConfig(env: Env = process.env): { valid: boolean; warnings: string[]; errors: string[] } {
  const { config, issues } = readEnv(env);
  const warnings: string[] = [];
  const errors = issues.map(issue => `${issue} (using default)`);

  if (!existsSync(config.datasetPath)) {
    warnings.push(`Dataset ${config.datasetPath} not found - pass --data <file> to load one`);
  }

  if (config.duplicateKeyPolicy === 'update-all') {
    warnings.push('Duplicate license numbers will all be updated together (DUPLICATE_KEY_POLICY=update-all)');
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}
