import { Command } from 'commander';
import { remindCommand } from './commands/remind.js';
import { rosterCommand } from './commands/roster.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('deadline-notifier')
    .description('Email students about coursework deadlines that are due today or overdue')
    .version('1.0.0');

  program.addCommand(remindCommand);
  program.addCommand(rosterCommand);

  return program;
}
