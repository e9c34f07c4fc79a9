// Core data types used throughout the application

import type { Dayjs } from 'dayjs';

/** A calendar day with no time-of-day component. */
export type CalendarDate = Dayjs;

export interface Task {
  name: string;
  dueDate: string;
  submitted: boolean;
}

export interface Student {
  id: number;
  name: string;
  email: string;
  tasks: Task[];
}

export type DeadlineStatus = 'DUE_TODAY' | 'OVERDUE';

export type Classification =
  | { kind: 'actionable'; status: DeadlineStatus; label: string }
  | { kind: 'skip'; warning: string }
  | { kind: 'none'; reason: 'submitted' | 'upcoming' };

export interface ActionableTask {
  taskName: string;
  status: DeadlineStatus;
  label: string;
}

export type RosterFailureCategory =
  | 'invalid-format'
  | 'missing-columns'
  | 'file-not-found'
  | 'parse-failure';

export interface RosterFailure {
  category: RosterFailureCategory;
  message: string;
}

export type RosterResult =
  | { ok: true; students: Student[] }
  | { ok: false; failure: RosterFailure };

export interface MailMessage {
  to: string;
  subject: string;
  html?: string;
  text?: string;
}

export type StudentOutcome = 'sent' | 'failed' | 'nothing-due';

export interface RunSummary {
  processed: number;
  sent: number;
  failed: number;
  warnings: string[];
  outcomes: { studentId: number; email: string; outcome: StudentOutcome }[];
}

export interface Config {
  smtp: {
    host: string;
    port: number;
    user?: string;
    password?: string;
  };
  alerts: {
    adminEmail?: string;
  };
  roster: {
    filePath: string;
    taskLabel: string;
  };
  reminders: {
    teamName?: string;
  };
  paths: {
    dataDir: string;
    logFile: string;
  };
}
