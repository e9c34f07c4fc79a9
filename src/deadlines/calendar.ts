import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import type { CalendarDate } from '../types/index.js';

dayjs.extend(customParseFormat);

export const ISO_DATE_FORMAT = 'YYYY-MM-DD';

const LEADING_ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:[ T]|$)/;

/**
 * Strictly parse a `YYYY-MM-DD` string. Returns null for anything else,
 * including impossible days such as 2026-02-30.
 */
export function parseCalendarDate(text: string): CalendarDate | null {
  const parsed = dayjs(text.trim(), ISO_DATE_FORMAT, true);
  return parsed.isValid() ? parsed.startOf('day') : null;
}

export function today(): CalendarDate {
  return dayjs().startOf('day');
}

export function formatCalendarDate(date: CalendarDate): string {
  return date.format(ISO_DATE_FORMAT);
}

/**
 * Keep only the date portion of a due-date cell: a leading ISO date, or else
 * whatever precedes the first space.
 */
export function dueDateText(cell: unknown): string {
  const text = String(cell ?? '').trim();
  const iso = text.match(LEADING_ISO_DATE);
  if (iso) return iso[1];
  return text.split(' ')[0];
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): -1 | 0 | 1 {
  if (a.isSame(b, 'day')) return 0;
  return a.isBefore(b, 'day') ? -1 : 1;
}
