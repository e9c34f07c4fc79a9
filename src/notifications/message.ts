import type { ActionableTask, MailMessage, Student } from '../types/index.js';

export const REMINDER_SUBJECT = 'URGENT: Notice about your course deadline';

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Team name for the sign-off: the configured name, else the domain of the
 * sending address.
 */
export function teamSignature(teamName: string | undefined, sender: string | undefined): string {
  if (teamName) return teamName;
  const domain = sender?.split('@')[1];
  return domain ? `the ${domain} team` : 'the course team';
}

export function composeReminder(student: Student, tasks: ActionableTask[], signature: string): MailMessage {
  const items = tasks
    .map((task) => `      <li><strong>${escapeHtml(task.taskName)}</strong> (${escapeHtml(task.label)})</li>`)
    .join('\n');

  const html = `<html><body>
    <p>Dear <strong>${escapeHtml(student.name)}</strong>,</p>
    <p>This is an <strong>important notice</strong> about the status of your course deadline. Submitting this work is required to pass the course.</p>
    <p>The current status of your deadline is:</p>
    <ul>
${items}
    </ul>
    <p><strong>If your deadline is today</strong>, please submit without delay.
    <strong>If your deadline has passed</strong>, contact us right away to sort out your situation.</p>
    <p>If you have already submitted your work, please ignore this message.</p>
    <p>Best regards,<br>${escapeHtml(signature)}</p>
  </body></html>`;

  return { to: student.email, subject: REMINDER_SUBJECT, html };
}
