import { Command } from 'commander';
import { AdminAlerter } from '../../alerts/admin.js';
import { createMailTransport } from '../../mail/transport.js';
import { NotificationDispatcher } from '../../notifications/dispatcher.js';
import { teamSignature } from '../../notifications/message.js';
import { runReminders } from '../../pipeline.js';
import { RosterLoader } from '../../roster/loader.js';
import { loadConfig } from '../../utils/config.js';
import { describeError } from '../../utils/errors.js';
import { enableFileLogging, logger } from '../../utils/logger.js';
import { parseDateOption, RemindCommandOptions, runDate } from '../options.js';

export const remindCommand = new Command('remind')
  .description('Email students whose deadline is today or has passed')
  .option('-f, --file <path>', 'Roster file (.xlsx or .csv)')
  .option('--today <date>', 'Evaluate deadlines as of this date (YYYY-MM-DD)', parseDateOption)
  .option('--dry-run', 'Print the messages instead of sending them')
  .action(async (options: RemindCommandOptions) => {
    try {
      const config = loadConfig();
      enableFileLogging(config.paths.logFile);

      const transport = createMailTransport(config, { dryRun: options.dryRun });
      const alerter = new AdminAlerter(config, transport);
      if (!alerter.isConfigured) {
        logger.warn('Admin alerts are disabled: set ADMIN_EMAIL, EMAIL_USER and EMAIL_PASSWORD to enable them');
      }

      const loader = new RosterLoader(alerter, config.roster.taskLabel);
      const dispatcher = new NotificationDispatcher({
        transport,
        alerter,
        signature: teamSignature(config.reminders.teamName, config.smtp.user),
      });

      if (options.dryRun) {
        console.log('DRY RUN - messages are printed, nothing is sent.\n');
      }

      const summary = await runReminders(
        { loader, dispatcher },
        options.file ?? config.roster.filePath,
        runDate(options)
      );

      if (!summary) {
        console.log('No students to monitor.');
        return;
      }

      console.log(`\nChecked ${summary.processed} students.`);
      console.log(`Reminders ${options.dryRun ? 'previewed' : 'sent'}: ${summary.sent}`);
      if (summary.failed > 0) console.log(`Failed deliveries: ${summary.failed}`);
      if (summary.warnings.length > 0) console.log(`Data warnings: ${summary.warnings.length}`);
    } catch (error) {
      logger.error(`Reminder run failed: ${describeError(error)}`);
      console.error(`\nReminder run failed: ${describeError(error)}`);
      process.exit(1);
    }
  });
