import { describe, it, expect } from 'vitest';
import path from 'path';
import { DEFAULT_TASK_LABEL, loadConfig } from '../src/utils/config.js';

describe('loadConfig', () => {
  it('reads every setting from the given environment', () => {
    const config = loadConfig({
      SMTP_SERVER: 'smtp.example.edu',
      SMTP_PORT: '465',
      EMAIL_USER: 'sender@example.edu',
      EMAIL_PASSWORD: 'test-secret',
      ADMIN_EMAIL: 'admin@example.edu',
      ROSTER_FILE: 'students.csv',
      TASK_LABEL: 'Thesis',
      TEAM_NAME: 'Course Office',
      DATA_DIR: '/tmp/reminders',
    });

    expect(config).toEqual({
      smtp: { host: 'smtp.example.edu', port: 465, user: 'sender@example.edu', password: 'test-secret' },
      alerts: { adminEmail: 'admin@example.edu' },
      roster: { filePath: 'students.csv', taskLabel: 'Thesis' },
      reminders: { teamName: 'Course Office' },
      paths: { dataDir: '/tmp/reminders', logFile: path.join('/tmp/reminders', 'reminders.log') },
    });
  });

  it('falls back to defaults and treats blank values as unset', () => {
    const config = loadConfig({ EMAIL_USER: '  ', ADMIN_EMAIL: '' });

    expect(config.smtp).toEqual({ host: 'smtp.gmail.com', port: 587, user: undefined, password: undefined });
    expect(config.alerts.adminEmail).toBeUndefined();
    expect(config.roster).toEqual({ filePath: 'roster.xlsx', taskLabel: DEFAULT_TASK_LABEL });
    expect(path.basename(config.paths.logFile)).toBe('reminders.log');
  });

  it('rejects a port that is not a number', () => {
    expect(() => loadConfig({ SMTP_PORT: 'smtp' })).toThrow('SMTP_PORT must be a port number, got "smtp"');
  });
});
