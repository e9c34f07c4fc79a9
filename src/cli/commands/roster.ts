import { Command } from 'commander';
import { formatCalendarDate } from '../../deadlines/calendar.js';
import { classify } from '../../deadlines/evaluator.js';
import { readRoster } from '../../roster/loader.js';
import { loadConfig } from '../../utils/config.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { CalendarDate, Classification, Student } from '../../types/index.js';
import { parseDateOption, RosterCommandOptions, runDate } from '../options.js';

function describeClassification(result: Classification): string {
  switch (result.kind) {
    case 'actionable':
      return result.label;
    case 'skip':
      return 'INVALID DATE (skipped)';
    case 'none':
      return result.reason === 'submitted' ? 'submitted' : 'upcoming';
  }
}

export function formatStudentLines(student: Student, today: CalendarDate): string[] {
  const lines = [`#${student.id} ${student.name} <${student.email}>`];
  for (const task of student.tasks) {
    const result = classify(task, today, student.name);
    lines.push(`    ${task.name}: ${task.dueDate || '(empty)'} -> ${describeClassification(result)}`);
  }
  return lines;
}

export const rosterCommand = new Command('roster')
  .description('Validate the roster and show each deadline status without sending anything')
  .option('-f, --file <path>', 'Roster file (.xlsx or .csv)')
  .option('--today <date>', 'Evaluate deadlines as of this date (YYYY-MM-DD)', parseDateOption)
  .action(async (options: RosterCommandOptions) => {
    try {
      const config = loadConfig();
      const filePath = options.file ?? config.roster.filePath;
      const result = await readRoster(filePath, config.roster.taskLabel);
      if (!result.ok) {
        console.error(`\nRoster is not usable (${result.failure.category}): ${result.failure.message}`);
        process.exit(1);
      }

      const today = runDate(options);
      console.log(`\n=== Roster: ${filePath} ===`);
      console.log(`Students: ${result.students.length}`);
      console.log(`Today: ${formatCalendarDate(today)}\n`);

      for (const student of result.students) {
        for (const line of formatStudentLines(student, today)) {
          console.log(line);
        }
      }
      console.log('');
    } catch (error) {
      logger.error(`Roster check failed: ${describeError(error)}`);
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
  });
