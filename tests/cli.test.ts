import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { formatCalendarDate } from '../src/deadlines/calendar.js';
import { student } from './fakes.js';
import { formatStudentLines } from '../src/cli/commands/roster.js';
import { createCLI } from '../src/cli/index.js';
import { parseDateOption, runDate } from '../src/cli/options.js';

describe('parseDateOption', () => {
  it('accepts YYYY-MM-DD', () => {
    expect(formatCalendarDate(parseDateOption('2026-10-19'))).toBe('2026-10-19');
  });

  it('rejects anything else with a commander argument error', () => {
    expect(() => parseDateOption('tomorrow')).toThrow(InvalidArgumentError);
  });
});

describe('runDate', () => {
  it('prefers the --today value', () => {
    expect(formatCalendarDate(runDate({ today: parseDateOption('2026-01-05') }))).toBe('2026-01-05');
  });
});

describe('formatStudentLines', () => {
  it('shows each task with its status', () => {
    const today = parseDateOption('2026-10-19');

    expect(formatStudentLines(student(3, 'Ana', 'ana@example.com', '2026-10-18'), today)).toEqual([
      '#3 Ana <ana@example.com>',
      '    Final Course Submission: 2026-10-18 -> DEADLINE PASSED (due date: 2026-10-18)',
    ]);
    expect(formatStudentLines(student(4, 'Mia', 'mia@example.com', ''), today)[1]).toBe(
      '    Final Course Submission: (empty) -> INVALID DATE (skipped)'
    );
  });
});

describe('createCLI', () => {
  it('registers the remind and roster commands', () => {
    expect(createCLI().commands.map((command) => command.name())).toEqual(['remind', 'roster']);
  });
});
