/**
 * Weapon License Tracker
 *
 * Record store, status transitions and simulated notices for licensed
 * firearms. The CLI in ./cli is one presentation layer over these exports.
 *
 * Architecture:
 * DATASET → RECORD STORE → [QUERIES | TRANSITIONS] ; DISPATCH → NOTIFICATION LOG
 */

export * from './types/index.js';
export { getConfig, validateConfig, DEFAULT_COLLECTION_POINTS, type TrackerConfig, type NoticeConfig } from './config.js';
export * from './store/index.js';
export * from './query/index.js';
export * from './transitions/index.js';
export * from './notifications/index.js';
export { TrackerSession, type SessionOptions } from './session.js';
