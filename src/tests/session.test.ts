/**
 * Tracker Session Tests
 */

import { describe, it, expect, vi } from 'vitest';
import * as path from 'path';
import * as os from 'os';
import { getConfig } from '../config.js';
import { TrackerSession } from '../session.js';
import { toCsv } from '../store/schema.js';
import { CSV_HEADER, FIXTURE_NOW, LICENSES_CSV_PATH, sampleRecords } from './fixtures/licenses.fixtures.js';

const MISSING_PATH = path.join(os.tmpdir(), 'weapon-tracker-missing', 'licenses.csv');

function testConfig() {
  return getConfig({ LICENSE_DATASET_PATH: LICENSES_CSV_PATH, NOTICE_SIGNATURE: 'Test Police' });
}

describe('TrackerSession', () => {
  it('should open the configured dataset', async () => {
    const session = await TrackerSession.open(testConfig());

    expect(session.hasData).toBe(true);
    expect(session.loadError).toBeNull();
    expect(session.records()).toEqual(sampleRecords);
    expect(session.store.source).toBe(LICENSES_CSV_PATH);
  });

  it('should keep running with an empty store when the dataset is missing', async () => {
    const session = await TrackerSession.open(getConfig({ LICENSE_DATASET_PATH: MISSING_PATH }));

    expect(session.hasData).toBe(false);
    expect(session.loadError?.reason).toBe('NotFound');
    expect(session.loadError?.message).toBe(`Dataset not found: ${MISSING_PATH}`);
    expect(session.records()).toEqual([]);
    expect(session.view({ area: 'Kolar Road' })).toEqual([]);
    expect(session.exportView()).toBe(CSV_HEADER + '\n');
  });

  it('should record a malformed upload and clear the previous data', async () => {
    const session = await TrackerSession.open(testConfig());

    const loaded = await session.load({ kind: 'text', content: 'Name,Area\nA,B\n', label: 'bad.csv' });

    expect(loaded).toBe(false);
    expect(session.loadError?.reason).toBe('MalformedSchema');
    expect(session.store.size).toBe(0);
    expect(session.store.source).toBe('bad.csv');
  });

  it('should load uploaded text and clear an earlier error', async () => {
    const session = await TrackerSession.open(getConfig({ LICENSE_DATASET_PATH: MISSING_PATH }));

    const loaded = await session.load({ kind: 'text', content: toCsv(sampleRecords.slice(0, 2)) });

    expect(loaded).toBe(true);
    expect(session.loadError).toBeNull();
    expect(session.records().map(r => r.licenseNo)).toEqual(['WL-1001', 'WL-1002']);
    expect(session.store.source).toBe('upload');
  });

  it('should reload an exported view unchanged', async () => {
    const session = await TrackerSession.open(testConfig());
    const exported = session.exportView({ area: 'Kolar Road' });

    await session.load({ kind: 'text', content: exported });

    expect(session.records()).toEqual(sampleRecords.filter(r => r.area === 'Kolar Road'));
  });

  it('should route status changes through the session engine', async () => {
    const session = await TrackerSession.open(testConfig(), undefined, { clock: () => FIXTURE_NOW });

    const submitted = session.markSubmitted('WL-1001');
    expect(submitted.ok).toBe(true);
    expect(session.view({ status: 'Submitted' }).map(r => r.licenseNo)).toEqual(['WL-1001', 'WL-1002']);

    const again = session.markSubmitted('WL-1001');
    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.reason).toBe('InvalidTransition');

    const returned = session.markReturned('WL-1001');
    expect(returned.ok).toBe(true);
    expect(session.store.findByLicenseNo('WL-1001')?.status).toBe('Active');

    expect(session.transitions.history().map(c => [c.licenseNo, c.from, c.to])).toEqual([
      ['WL-1001', 'Active', 'Submitted'],
      ['WL-1001', 'Submitted', 'Active'],
    ]);
  });

  it('should notify a holder by license number', async () => {
    const session = await TrackerSession.open(testConfig(), undefined, { clock: () => FIXTURE_NOW });
    const params = session.defaultNoticeParams();

    const event = session.notifyHolder('WL-1001', 'CollectionNotice', params);

    expect(params).toEqual({
      collectionPoint: 'Habibganj Police Station',
      deadline: '2025-06-27',
      returnDate: '2025-07-20',
    });
    expect(event?.name).toBe('Ravi Kumar');
    expect(event?.message.endsWith('- Test Police')).toBe(true);
    expect(session.recentNotifications()).toEqual(event ? [event] : []);
    expect(session.notifyHolder('WL-0000', 'Reminder', params)).toBeUndefined();
    expect(session.log.size).toBe(1);
  });

  it('should notify Active holders in the selected areas without changing status', async () => {
    const session = await TrackerSession.open(testConfig(), undefined, { clock: () => FIXTURE_NOW });
    const before = session.records();

    const report = session.notifyAreas(['Kolar Road'], 'CollectionNotice', session.defaultNoticeParams('emergency'), {
      campaign: 'emergency',
    });

    expect(report.events.map(e => e.mobile)).toEqual(['9876500000', '9876500002', '9876500005']);
    expect(report.events[0]?.message).toContain('by 2025-06-21');
    expect(session.records()).toEqual(before);
  });

  it('should log load results unless quiet', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      await TrackerSession.open(testConfig());
      const loudCalls = log.mock.calls.map(call => call[0]);
      log.mockClear();

      const quiet = await TrackerSession.open(testConfig(), undefined, { quiet: true });
      quiet.notifyAreas(['Kolar Road'], 'Reminder', quiet.defaultNoticeParams());
      await quiet.load({ kind: 'file', path: MISSING_PATH });

      expect(loudCalls).toContain(`[Session] Loaded 8 records from ${LICENSES_CSV_PATH}`);
      expect(log).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
      expect(quiet.log.size).toBe(3);
    } finally {
      log.mockRestore();
      error.mockRestore();
    }
  });

  it('should keep the notification log across reloads', async () => {
    const session = await TrackerSession.open(testConfig());
    session.notifyHolder('WL-1003', 'Reminder', session.defaultNoticeParams());

    await session.load({ kind: 'file', path: LICENSES_CSV_PATH });

    expect(session.log.size).toBe(1);
  });
});
