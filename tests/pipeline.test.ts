import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ALERT_SUBJECTS } from '../src/alerts/admin.js';
import { parseCalendarDate } from '../src/deadlines/calendar.js';
import { NotificationDispatcher } from '../src/notifications/dispatcher.js';
import { runReminders } from '../src/pipeline.js';
import { RosterLoader } from '../src/roster/loader.js';
import { RecordingAlerter, RecordingTransport } from './fakes.js';
import type { CalendarDate } from '../src/types/index.js';

let dir: string;
let alerter: RecordingAlerter;
let transport: RecordingTransport;

function today(): CalendarDate {
  const date = parseCalendarDate('2026-10-19');
  if (!date) throw new Error('bad fixture');
  return date;
}

function writeRoster(content: string): string {
  const filePath = path.join(dir, 'students.csv');
  fs.writeFileSync(filePath, content);
  return filePath;
}

function pipeline() {
  return {
    loader: new RosterLoader(alerter),
    dispatcher: new NotificationDispatcher({ transport, alerter, signature: 'the example.edu team' }),
  };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
  alerter = new RecordingAlerter();
  transport = new RecordingTransport();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('runReminders', () => {
  it('loads the roster and reminds the students who need it', async () => {
    const file = writeRoster(
      'Name,Email,Due Date\nAna,ana@example.com,2026-10-19\nLuis,luis@example.com,2026-10-18\nMia,mia@example.com,2026-10-25\n'
    );

    const summary = await runReminders(pipeline(), file, today());

    expect(summary?.processed).toBe(3);
    expect(transport.sent.map((m) => m.to)).toEqual(['ana@example.com', 'luis@example.com']);
    expect(alerter.alerts).toEqual([]);
  });

  it('stops before dispatch when a required column is missing', async () => {
    const file = writeRoster('Name,Due Date\nAna,2026-10-19\n');
    const parts = pipeline();
    const run = vi.spyOn(parts.dispatcher, 'run');

    const summary = await runReminders(parts, file, today());

    expect(summary).toBeNull();
    expect(run).not.toHaveBeenCalled();
    expect(transport.attempts).toEqual([]);
    expect(alerter.alerts.map((a) => a.subject)).toEqual([ALERT_SUBJECTS['missing-columns']]);
  });

  it('reports a bad date once at the end of the run', async () => {
    const file = writeRoster('name,email,due_date\nMia,mia@example.com,not-a-date\n');

    const summary = await runReminders(pipeline(), file, today());

    expect(summary?.warnings).toHaveLength(1);
    expect(transport.attempts).toEqual([]);
    expect(alerter.alerts.map((a) => a.subject)).toEqual([ALERT_SUBJECTS.warnings]);
  });

  it('reports a blank row in the batched warning instead of dropping it', async () => {
    const file = writeRoster('name,email,due_date\n,,\nAna,ana@example.com,2026-10-19\n');

    const summary = await runReminders(pipeline(), file, today());

    expect(summary?.processed).toBe(2);
    expect(transport.sent.map((m) => m.to)).toEqual(['ana@example.com']);
    expect(summary?.warnings).toEqual([
      "Invalid date format for student  on task \"Final Course Submission\" with value ''. Task skipped.",
    ]);
    expect(alerter.alerts.map((a) => a.subject)).toEqual([ALERT_SUBJECTS.warnings]);
  });
});
