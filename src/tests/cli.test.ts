/**
 * CLI Helper Tests
 */

import { describe, it, expect, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { getConfig } from '../config.js';
import { TrackerSession } from '../session.js';
import { buildNoticeRequest } from '../cli/commands/notify.js';
import { bar, formatTimestamp, previewMessage } from '../cli/render.js';
import { summaryCommand } from '../cli/commands/summary.js';
import { CSV_HEADER, FIXTURE_NOW } from './fixtures/licenses.fixtures.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function newSession(): TrackerSession {
  return new TrackerSession(getConfig({}), { clock: () => FIXTURE_NOW });
}

describe('render helpers', () => {
  it('should cut long messages to 100 characters with an ellipsis', () => {
    const long = 'x'.repeat(120);

    expect(previewMessage(long)).toBe('x'.repeat(100) + '...');
    expect(previewMessage('short')).toBe('short');
    expect(previewMessage('x'.repeat(100))).toBe('x'.repeat(100));
  });

  it('should format timestamps as local date and time', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe('2024-01-05 09:07:03');
  });

  it('should scale bars to the largest count', () => {
    expect(bar(10, 10, 20)).toBe('█'.repeat(20));
    expect(bar(5, 10, 20)).toBe('█'.repeat(10));
    expect(bar(1, 1000, 20)).toBe('█');
    expect(bar(0, 10)).toBe('');
  });
});

describe('buildNoticeRequest', () => {
  it('should default to a collection notice with session defaults', () => {
    expect(buildNoticeRequest(newSession(), {})).toEqual({
      ok: true,
      kind: 'CollectionNotice',
      campaign: undefined,
      params: {
        collectionPoint: 'Habibganj Police Station',
        deadline: '2025-06-27',
        returnDate: '2025-07-20',
      },
    });
  });

  it('should apply the emergency deadline and explicit options', () => {
    const request = buildNoticeRequest(newSession(), {
      campaign: 'emergency',
      kind: 'reminder',
      station: 'MP Nagar Police Station',
    });

    expect(request).toEqual({
      ok: true,
      kind: 'Reminder',
      campaign: 'emergency',
      params: {
        collectionPoint: 'MP Nagar Police Station',
        deadline: '2025-06-21',
        returnDate: '2025-07-20',
      },
    });
  });

  it('should collect every problem with the options', () => {
    const request = buildNoticeRequest(newSession(), {
      campaign: 'holiday',
      kind: 'fax',
      deadline: '15/01/2024',
    });

    expect(request).toEqual({
      ok: false,
      errors: [
        'unknown campaign "holiday" (election, festival, emergency)',
        'unknown notice kind "fax" (collection, reminder, return)',
        'deadline "15/01/2024" is not a YYYY-MM-DD date',
      ],
    });
  });
});

describe('commands on an empty dataset', () => {
  it('should render a zeroed dashboard for a header-only file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'weapon-tracker-'));
    const file = path.join(dir, 'empty.csv');
    await fs.writeFile(file, `${CSV_HEADER}\n`, 'utf-8');

    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const previousExitCode = process.exitCode;
    let lines: string[] = [];
    let exitCode: typeof process.exitCode;
    try {
      await summaryCommand({ data: file });
      lines = log.mock.calls.map(call => String(call[0]).replace(ANSI, ''));
      exitCode = process.exitCode;
    } finally {
      log.mockRestore();
      process.exitCode = previousExitCode;
      await fs.rm(dir, { recursive: true, force: true });
    }

    expect(exitCode).toBe(previousExitCode);
    expect(lines).toContain('  total licenses:     0');
    expect(lines).toContain('  expired licenses:   0 (0.0%)');
  });
});
