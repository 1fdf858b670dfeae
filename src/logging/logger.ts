/**
 * Application debug logger.
 *
 * The TUI owns stdout, so log lines go to an NDJSON file that can be followed with `tail -f`.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  [field: string]: string | number | boolean | null | undefined;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_FILE_NAME = 'gcm.log';

let logFilePath: string | null = null;
let minLevel: LogLevel = 'info';

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

/**
 * Point the logger at `<logDir>/gcm.log`, creating the directory.
 *
 * Until this runs every log call is a no-op.
 */
export function initLogger(logDir: string, level: LogLevel = parseLogLevel(process.env.GCM_LOG_LEVEL)): string {
  fs.mkdirSync(logDir, { recursive: true });
  logFilePath = path.join(logDir, LOG_FILE_NAME);
  minLevel = level;
  return logFilePath;
}

export function closeLogger(): void {
  logFilePath = null;
  minLevel = 'info';
}

export function getLogFilePath(): string | null {
  return logFilePath;
}

function write(level: LogLevel, msg: string, fields?: LogFields): void {
  if (!logFilePath) return;
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

  const entry: LogEntry = { ...fields, ts: new Date().toISOString(), level, msg };
  try {
    fs.appendFileSync(logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
  } catch {
    // Log target is gone; disable file logging.
    logFilePath = null;
  }
}

export const logger = {
  debug: (msg: string, fields?: LogFields): void => write('debug', msg, fields),
  info: (msg: string, fields?: LogFields): void => write('info', msg, fields),
  warn: (msg: string, fields?: LogFields): void => write('warn', msg, fields),
  error: (msg: string, fields?: LogFields): void => write('error', msg, fields),
};
