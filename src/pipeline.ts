import type { NotificationDispatcher } from './notifications/dispatcher.js';
import type { RosterLoader } from './roster/loader.js';
import { logger } from './utils/logger.js';
import type { CalendarDate, RunSummary } from './types/index.js';

export interface Pipeline {
  loader: Pick<RosterLoader, 'load'>;
  dispatcher: Pick<NotificationDispatcher, 'run'>;
}

/**
 * Load the roster and dispatch reminders. Returns null when the roster came
 * back empty, in which case nothing was evaluated or sent.
 */
export async function runReminders(
  { loader, dispatcher }: Pipeline,
  filePath: string,
  today: CalendarDate
): Promise<RunSummary | null> {
  const students = await loader.load(filePath);

  if (students.length === 0) {
    logger.info('No students to monitor. Finishing.');
    return null;
  }

  return dispatcher.run(students, today);
}
