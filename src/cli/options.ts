import { InvalidArgumentError } from 'commander';
import { parseCalendarDate, today } from '../deadlines/calendar.js';
import type { CalendarDate } from '../types/index.js';

export interface RosterCommandOptions {
  file?: string;
  today?: CalendarDate;
}

export interface RemindCommandOptions extends RosterCommandOptions {
  dryRun?: boolean;
}

export function parseDateOption(value: string): CalendarDate {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new InvalidArgumentError('Expected a date in YYYY-MM-DD format.');
  }
  return date;
}

export function runDate(options: RosterCommandOptions): CalendarDate {
  return options.today ?? today();
}
