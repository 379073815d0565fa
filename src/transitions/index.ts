/**
 * Status Transitions
 *
 * Record-level actions exposed to the presentation layer.
 */

import type { TransitionAction } from '../types/index.js';
import type { RecordStore } from '../store/record-store.js';
import { TRANSITIONS, type UpdateResult } from './engine.js';

export {
  StatusTransitionEngine,
  TRANSITIONS,
  availableActions,
  actionFor,
  type UpdateResult,
  type TransitionVerdict,
  type TransitionEngineOptions,
} from './engine.js';

/**
 * Apply a named action to every row with the license number
 */
export function applyAction(store: RecordStore, licenseNo: string, action: TransitionAction): UpdateResult {
  return store.updateStatus(licenseNo, TRANSITIONS[action].to);
}

/**
 * Mark a weapon as handed in (Active -> Submitted)
 */
export function markSubmitted(store: RecordStore, licenseNo: string): UpdateResult {
  return applyAction(store, licenseNo, 'submit');
}

/**
 * Mark a weapon as returned to its holder (Submitted -> Active)
 */
export function markReturned(store: RecordStore, licenseNo: string): UpdateResult {
  return applyAction(store, licenseNo, 'return');
}
