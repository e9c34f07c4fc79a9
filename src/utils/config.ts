import path from 'path';
import { fileURLToPath } from 'url';
import type { Config } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

export const DEFAULT_TASK_LABEL = 'Final Course Submission';

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePort(value: string | undefined): number {
  const raw = optional(value);
  if (!raw) return 587;

  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`SMTP_PORT must be a port number, got "${raw}"`);
  }
  return port;
}

/**
 * Build the run configuration from environment variables. Called once at
 * startup; the result is handed to every component that needs it.
 */
export function loadConfig(env: Env = process.env): Config {
  const dataDir = optional(env.DATA_DIR) ?? path.join(projectRoot, 'data');

  return {
    smtp: {
      host: optional(env.SMTP_SERVER) ?? 'smtp.gmail.com',
      port: parsePort(env.SMTP_PORT),
      user: optional(env.EMAIL_USER),
      password: optional(env.EMAIL_PASSWORD),
    },
    alerts: {
      adminEmail: optional(env.ADMIN_EMAIL),
    },
    roster: {
      filePath: optional(env.ROSTER_FILE) ?? 'roster.xlsx',
      taskLabel: optional(env.TASK_LABEL) ?? DEFAULT_TASK_LABEL,
    },
    reminders: {
      teamName: optional(env.TEAM_NAME),
    },
    paths: {
      dataDir,
      logFile: path.join(dataDir, 'reminders.log'),
    },
  };
}
