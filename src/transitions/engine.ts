/**
 * Status Transition Engine
 *
 * Decides whether a requested status change is legal and keeps an audit
 * trail of the changes the record store applied.
 *
 *   Active ──submit──▶ Submitted
 *   Submitted ──return──▶ Active
 *
 * Expired and Revoked are administrative states. They are set by editing the
 * dataset, never through this engine, and neither action leaves them.
 */

import type {
  DuplicateKeyPolicy,
  LicenseStatus,
  StatusChange,
  TransitionAction,
} from '../types/index.js';
import { UpdateError } from '../store/errors.js';

export const TRANSITIONS: Record<TransitionAction, { from: LicenseStatus; to: LicenseStatus }> = {
  submit: { from: 'Active', to: 'Submitted' },
  return: { from: 'Submitted', to: 'Active' },
};

const ACTIONS: readonly TransitionAction[] = ['submit', 'return'];

export type UpdateResult =
  | { ok: true; change: StatusChange }
  | { ok: false; error: UpdateError };

export type TransitionVerdict =
  | { ok: true; action: TransitionAction; from: LicenseStatus; to: LicenseStatus }
  | { ok: false; error: UpdateError };

export interface TransitionEngineOptions {
  duplicateKeyPolicy?: DuplicateKeyPolicy;
  clock?: () => Date;
}

/**
 * Actions offered for a record in the given state
 */
export function availableActions(status: LicenseStatus): TransitionAction[] {
  return ACTIONS.filter(action => TRANSITIONS[action].from === status);
}

/**
 * The action that moves `from` to `to`, if one exists
 */
export function actionFor(from: LicenseStatus, to: LicenseStatus): TransitionAction | undefined {
  return availableActions(from).find(action => TRANSITIONS[action].to === to);
}

function snapshotChange(change: StatusChange): StatusChange {
  return Object.freeze({ ...change, at: new Date(change.at.getTime()) });
}

export class StatusTransitionEngine {
  readonly duplicateKeyPolicy: DuplicateKeyPolicy;
  private clock: () => Date;
  private auditTrail: StatusChange[] = [];

  constructor(options: TransitionEngineOptions = {}) {
    this.duplicateKeyPolicy = options.duplicateKeyPolicy ?? 'update-all';
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check a requested change against every row sharing the license number.
   * All rows must be in the source state or nothing changes.
   */
  check(licenseNo: string, current: readonly LicenseStatus[], to: LicenseStatus): TransitionVerdict {
    if (current.length === 0) {
      return {
        ok: false,
        error: new UpdateError('NotFound', licenseNo, `No license ${licenseNo} in the store`),
      };
    }

    if (current.length > 1 && this.duplicateKeyPolicy === 'reject') {
      return {
        ok: false,
        error: new UpdateError(
          'AmbiguousKey',
          licenseNo,
          `License ${licenseNo} appears ${current.length} times; refusing to update`
        ),
      };
    }

    const from = current[0];
    const action = actionFor(from, to);
    if (!action || current.some(status => status !== from)) {
      const states = [...new Set(current)].join('/');
      return {
        ok: false,
        error: new UpdateError(
          'InvalidTransition',
          licenseNo,
          `License ${licenseNo} cannot move from ${states} to ${to}`
        ),
      };
    }

    return { ok: true, action, from, to };
  }

  /**
   * Append an applied change to the audit trail
   */
  record(change: Omit<StatusChange, 'at'>): StatusChange {
    const entry = snapshotChange({ ...change, at: this.clock() });
    this.auditTrail.push(entry);
    console.log(
      `[Transitions] ${entry.licenseNo}: ${entry.from} -> ${entry.to} (${entry.rowsAffected} row${entry.rowsAffected === 1 ? '' : 's'})`
    );
    return snapshotChange(entry);
  }

  history(): readonly StatusChange[] {
    return this.auditTrail.map(snapshotChange);
  }
}
