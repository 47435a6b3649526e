/**
 * Logger
 *
 * Leveled logging for parser tracing and model warnings.
 * Set log level via ARGBIND_LOG_LEVEL environment variable.
 *
 * Levels: debug < info < warn < error < off
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'off';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get the log level from environment or default to 'warn'
 */
function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env.ARGBIND_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'warn';
}

let currentLevel: LogLevel = getLogLevelFromEnv();

/**
 * Set the current log level programmatically
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, 'off'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  const prefix = level.toUpperCase().padEnd(5);
  return `[${timestamp}] [${prefix}] ${message}`;
}

function log(level: Exclude<LogLevel, 'off'>, message: string, ...args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }

  const formattedMessage = formatMessage(level, message);

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formattedMessage, ...args);
      break;
    case 'warn':
      console.warn(formattedMessage, ...args);
      break;
    case 'error':
      console.error(formattedMessage, ...args);
      break;
  }
}

/**
 * Logger object with methods for each log level
 */
export const logger = {
  debug: (message: string, ...args: unknown[]): void => log('debug', message, ...args),
  info: (message: string, ...args: unknown[]): void => log('info', message, ...args),
  warn: (message: string, ...args: unknown[]): void => log('warn', message, ...args),
  error: (message: string, ...args: unknown[]): void => log('error', message, ...args),

  /**
   * Check if debug logging is enabled (guards expensive trace messages)
   */
  isDebugEnabled: (): boolean => shouldLog('debug'),
};

export default logger;
