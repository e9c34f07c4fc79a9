import type { CalendarDate, Classification, Task } from '../types/index.js';
import { compareCalendarDates, parseCalendarDate } from './calendar.js';

export const STATUS_LABELS = {
  DUE_TODAY: 'DEADLINE IS TODAY',
  OVERDUE: 'DEADLINE PASSED',
} as const;

/**
 * Decide whether a task needs a reminder today. Pure: no I/O, and an
 * unreadable due date comes back as a `skip` carrying the warning text.
 */
export function classify(task: Task, today: CalendarDate, studentName: string): Classification {
  if (task.submitted) {
    return { kind: 'none', reason: 'submitted' };
  }

  const due = parseCalendarDate(task.dueDate);
  if (!due) {
    return {
      kind: 'skip',
      warning: `Invalid date format for student ${studentName} on task "${task.name}" with value '${task.dueDate}'. Task skipped.`,
    };
  }

  switch (compareCalendarDates(due, today)) {
    case 0:
      return { kind: 'actionable', status: 'DUE_TODAY', label: STATUS_LABELS.DUE_TODAY };
    case -1:
      return {
        kind: 'actionable',
        status: 'OVERDUE',
        label: `${STATUS_LABELS.OVERDUE} (due date: ${task.dueDate})`,
      };
    default:
      return { kind: 'none', reason: 'upcoming' };
  }
}
