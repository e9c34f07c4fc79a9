import { type Alerter, ALERT_SUBJECTS } from '../alerts/admin.js';
import { formatCalendarDate } from '../deadlines/calendar.js';
import { classify } from '../deadlines/evaluator.js';
import type { MailTransport } from '../mail/transport.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ActionableTask, CalendarDate, RunSummary, Student } from '../types/index.js';
import { composeReminder } from './message.js';

export interface DispatcherOptions {
  transport: MailTransport;
  alerter: Alerter;
  signature: string;
}

export function warningsReport(warnings: string[]): string {
  return [
    'The following data format problems were found in the roster file:',
    '',
    ...warnings,
    '',
    "Please check that due dates use the 'YYYY-MM-DD' format in the Excel or CSV file.",
  ].join('\n');
}

export class NotificationDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Send one reminder to every student with a task due today or overdue.
   * Students are handled one after another; a failed send is escalated and
   * the loop moves on. Date warnings are reported in one alert at the end.
   */
  async run(students: Student[], today: CalendarDate): Promise<RunSummary> {
    const summary: RunSummary = { processed: 0, sent: 0, failed: 0, warnings: [], outcomes: [] };
    logger.info(`Checking deadlines for ${students.length} students. Today: ${formatCalendarDate(today)}`);

    for (const student of students) {
      summary.processed++;
      const actionable: ActionableTask[] = [];

      for (const task of student.tasks) {
        const result = classify(task, today, student.name);
        if (result.kind === 'skip') {
          logger.warn(result.warning);
          summary.warnings.push(result.warning);
        } else if (result.kind === 'actionable') {
          actionable.push({ taskName: task.name, status: result.status, label: result.label });
        }
      }

      if (actionable.length === 0) {
        summary.outcomes.push({ studentId: student.id, email: student.email, outcome: 'nothing-due' });
        continue;
      }

      logger.info(`${student.name}: ${actionable.length} deadline(s) need attention`);
      const delivered = await this.deliver(student, actionable);
      if (delivered) {
        summary.sent++;
      } else {
        summary.failed++;
      }
      summary.outcomes.push({
        studentId: student.id,
        email: student.email,
        outcome: delivered ? 'sent' : 'failed',
      });
    }

    if (summary.warnings.length > 0) {
      await this.options.alerter.alert(ALERT_SUBJECTS.warnings, warningsReport(summary.warnings));
    }

    logger.info(`Reminder run finished: ${summary.sent} sent, ${summary.failed} failed, ${summary.warnings.length} warnings`);
    return summary;
  }

  private async deliver(student: Student, tasks: ActionableTask[]): Promise<boolean> {
    const message = composeReminder(student, tasks, this.options.signature);

    try {
      await this.options.transport.send(message);
      logger.info(`Reminder sent to ${student.email}`);
      return true;
    } catch (error) {
      const detail = `Error sending reminder to student ${student.email}: ${describeError(error)}`;
      logger.error(detail);
      await this.options.alerter.alert(
        ALERT_SUBJECTS.delivery,
        `SMTP DELIVERY FAILURE:\n\n${detail}\n\nCheck the EMAIL_USER and EMAIL_PASSWORD settings.`
      );
      return false;
    }
  }
}
