/**
 * Status Transition Tests
 *
 * Verifies the Active <-> Submitted state machine, rejection of every other
 * move, duplicate-key policies and the audit trail.
 */

import { describe, it, expect } from 'vitest';
import { RecordStore } from '../store/record-store.js';
import { UpdateError } from '../store/errors.js';
import {
  StatusTransitionEngine,
  actionFor,
  availableActions,
  markReturned,
  markSubmitted,
} from '../transitions/index.js';
import { FIXTURE_NOW, makeRecord, sampleRecords } from './fixtures/licenses.fixtures.js';

function freshStore(policy: 'update-all' | 'reject' = 'update-all'): RecordStore {
  return new RecordStore(sampleRecords, {
    transitions: new StatusTransitionEngine({ duplicateKeyPolicy: policy, clock: () => FIXTURE_NOW }),
  });
}

describe('state machine', () => {
  it('should offer submit for Active and return for Submitted only', () => {
    expect(availableActions('Active')).toEqual(['submit']);
    expect(availableActions('Submitted')).toEqual(['return']);
    expect(availableActions('Expired')).toEqual([]);
    expect(availableActions('Revoked')).toEqual([]);
  });

  it('should resolve the action between two states', () => {
    expect(actionFor('Active', 'Submitted')).toBe('submit');
    expect(actionFor('Submitted', 'Active')).toBe('return');
    expect(actionFor('Expired', 'Active')).toBeUndefined();
    expect(actionFor('Active', 'Revoked')).toBeUndefined();
  });
});

describe('updateStatus', () => {
  it('should round-trip Active -> Submitted -> Active', () => {
    const store = freshStore();

    const submitted = store.updateStatus('WL-1001', 'Submitted');
    expect(submitted.ok).toBe(true);
    expect(store.findByLicenseNo('WL-1001')?.status).toBe('Submitted');

    const returned = store.updateStatus('WL-1001', 'Active');
    expect(returned.ok).toBe(true);
    expect(store.findByLicenseNo('WL-1001')?.status).toBe('Active');
  });

  it('should reject Submitted -> Submitted as an invalid transition', () => {
    const store = freshStore();
    store.updateStatus('WL-1001', 'Submitted');

    const result = store.updateStatus('WL-1001', 'Submitted');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UpdateError);
      expect(result.error.reason).toBe('InvalidTransition');
      expect(result.error.licenseNo).toBe('WL-1001');
    }
    expect(store.findByLicenseNo('WL-1001')?.status).toBe('Submitted');
  });

  it('should fail with NotFound for an unknown license', () => {
    const result = freshStore().updateStatus('WL-0000', 'Submitted');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('NotFound');
  });

  it.each([
    ['WL-1004', 'Active'],
    ['WL-1004', 'Submitted'],
    ['WL-1005', 'Active'],
    ['WL-1005', 'Submitted'],
    ['WL-1001', 'Expired'],
    ['WL-1001', 'Revoked'],
    ['WL-1002', 'Revoked'],
  ] as const)('should reject moving %s to %s', (licenseNo, status) => {
    const store = freshStore();
    const before = store.findByLicenseNo(licenseNo)?.status;

    const result = store.updateStatus(licenseNo, status);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('InvalidTransition');
    expect(store.findByLicenseNo(licenseNo)?.status).toBe(before);
  });

  it('should leave every other record untouched', () => {
    const store = freshStore();

    store.updateStatus('WL-1003', 'Submitted');

    const changed = store.getAll().filter((r, i) => r.status !== sampleRecords[i].status);
    expect(changed.map(r => r.licenseNo)).toEqual(['WL-1003']);
  });
});

describe('helpers', () => {
  it('should mark a weapon submitted and then returned', () => {
    const store = freshStore();

    expect(markSubmitted(store, 'WL-1006').ok).toBe(true);
    expect(markSubmitted(store, 'WL-1006').ok).toBe(false);
    expect(markReturned(store, 'WL-1006').ok).toBe(true);
    expect(store.findByLicenseNo('WL-1006')?.status).toBe('Active');
  });

  it('should refuse to return a weapon that was never submitted', () => {
    const result = markReturned(freshStore(), 'WL-1001');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('InvalidTransition');
  });
});

describe('duplicate license numbers', () => {
  const duplicates = [
    makeRecord({ name: 'First Row' }),
    makeRecord({ name: 'Second Row' }),
    makeRecord({ licenseNo: 'WL-9001' }),
  ];

  it('should update every matching row under update-all', () => {
    const store = new RecordStore(duplicates);

    const result = store.updateStatus('WL-9000', 'Submitted');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.change.rowsAffected).toBe(2);
    expect(store.findAllByLicenseNo('WL-9000').map(r => r.status)).toEqual(['Submitted', 'Submitted']);
    expect(store.findByLicenseNo('WL-9001')?.status).toBe('Active');
  });

  it('should fail with AmbiguousKey under reject', () => {
    const store = new RecordStore(duplicates, {
      transitions: new StatusTransitionEngine({ duplicateKeyPolicy: 'reject' }),
    });

    const result = store.updateStatus('WL-9000', 'Submitted');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('AmbiguousKey');
    expect(store.findAllByLicenseNo('WL-9000').map(r => r.status)).toEqual(['Active', 'Active']);
  });

  it('should change nothing when duplicate rows disagree on status', () => {
    const store = new RecordStore([
      makeRecord(),
      makeRecord({ status: 'Submitted' }),
    ]);

    const result = store.updateStatus('WL-9000', 'Submitted');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('InvalidTransition');
      expect(result.error.message).toBe('License WL-9000 cannot move from Active/Submitted to Submitted');
    }
    expect(store.findAllByLicenseNo('WL-9000').map(r => r.status)).toEqual(['Active', 'Submitted']);
  });
});

describe('audit trail', () => {
  it('should record each applied change with the engine clock', () => {
    const store = freshStore();

    store.updateStatus('WL-1001', 'Submitted');
    store.updateStatus('WL-1001', 'Submitted');
    store.updateStatus('WL-1002', 'Active');

    expect(store.transitions.history()).toEqual([
      { licenseNo: 'WL-1001', action: 'submit', from: 'Active', to: 'Submitted', rowsAffected: 1, at: FIXTURE_NOW },
      { licenseNo: 'WL-1002', action: 'return', from: 'Submitted', to: 'Active', rowsAffected: 1, at: FIXTURE_NOW },
    ]);
  });

  it('should keep recorded times when a returned change date is changed', () => {
    const now = new Date(FIXTURE_NOW.getTime());
    const store = new RecordStore(sampleRecords, {
      transitions: new StatusTransitionEngine({ clock: () => now }),
    });

    const result = store.updateStatus('WL-1001', 'Submitted');
    if (result.ok) result.change.at.setTime(0);
    store.transitions.history()[0]?.at.setTime(0);
    now.setTime(0);

    expect(result.ok).toBe(true);
    expect(store.transitions.history()[0]?.at.getTime()).toBe(FIXTURE_NOW.getTime());
  });

  it('should return the change on success', () => {
    const result = freshStore().updateStatus('WL-1007', 'Submitted');

    expect(result).toEqual({
      ok: true,
      change: { licenseNo: 'WL-1007', action: 'submit', from: 'Active', to: 'Submitted', rowsAffected: 1, at: FIXTURE_NOW },
    });
  });
});
