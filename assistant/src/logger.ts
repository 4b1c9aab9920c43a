/**
 * Logging for engine, evaluator and trainer runs.
 * Entries go to the console with colours and into a bounded in-memory history
 * that evaluation reports can attach.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogStage =
  | 'engine'
  | 'backend'
  | 'tools'
  | 'evaluator'
  | 'trainer'
  | 'agents'
  | 'chat'
  | 'cli';

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  stage: LogStage;
  message: string;
  data?: unknown;
};

const logs: LogEntry[] = [];
let maxLogs = 1000;
let minLogLevelIndex = 0;
let consoleMinLogLevelIndex = LOG_LEVELS.indexOf('info');

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.blue,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

const CONSOLE_WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Formats a console line: `timestamp [stage] [LEVEL] message`.
 */
export function formatLogMessage(
  level: LogLevel,
  stage: LogStage,
  message: string,
  timestamp: string,
): string {
  const levelFormatted = LEVEL_COLORS[level](`[${level.toUpperCase()}]`);
  return `${chalk.gray(timestamp)} ${chalk.cyan(`[${stage}]`)} ${levelFormatted} ${message}`;
}

/**
 * Log a message at the specified level
 */
export function log(
  level: LogLevel,
  stage: LogStage,
  message: string,
  data?: unknown,
): void {
  const levelIndex = LOG_LEVELS.indexOf(level);
  const timestamp = new Date().toISOString();

  if (levelIndex >= minLogLevelIndex) {
    logs.push({ timestamp, level, stage, message, data });
    if (logs.length > maxLogs) {
      logs.shift();
    }
  }

  if (levelIndex < consoleMinLogLevelIndex) {
    return;
  }

  const formattedMessage = formatLogMessage(level, stage, message, timestamp);
  const write = CONSOLE_WRITERS[level];
  if (data !== undefined) {
    write(formattedMessage, data);
  } else {
    write(formattedMessage);
  }
}

/**
 * Configure history size and the thresholds for history and console output.
 */
export function configureLogger(options: {
  maxHistorySize?: number;
  minLevel?: LogLevel;
  consoleLevel?: LogLevel;
} = {}): void {
  if (options.maxHistorySize !== undefined && options.maxHistorySize > 0) {
    maxLogs = options.maxHistorySize;
    while (logs.length > maxLogs) {
      logs.shift();
    }
  }
  if (options.minLevel !== undefined) {
    minLogLevelIndex = LOG_LEVELS.indexOf(options.minLevel);
  }
  if (options.consoleLevel !== undefined) {
    consoleMinLogLevelIndex = LOG_LEVELS.indexOf(options.consoleLevel);
  }
}

export const Logger = {
  debug: (stage: LogStage, message: string, data?: unknown) =>
    log('debug', stage, message, data),
  info: (stage: LogStage, message: string, data?: unknown) =>
    log('info', stage, message, data),
  warn: (stage: LogStage, message: string, data?: unknown) =>
    log('warn', stage, message, data),
  error: (stage: LogStage, message: string, data?: unknown) =>
    log('error', stage, message, data),
};

/**
 * Get a copy of the retained entries, oldest first.
 */
export function getLogs(): LogEntry[] {
  return [...logs];
}

export function clearLogs(): void {
  logs.length = 0;
}
