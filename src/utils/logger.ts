/**
 * Structured logging utility for worktree-warden.
 *
 * Supports log levels (debug, info, warn, error) configured via environment variable.
 * All output goes to stderr so stdout stays free for CLI results and the MCP transport.
 */

/** Available log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Numeric values for log level comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Default log level when not configured */
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/** Prefix used for all log messages */
const LOG_PREFIX = '[warden]';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Get the configured log level from environment.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.WARDEN_LOG_LEVEL?.toLowerCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  if (process.env.WARDEN_DEBUG === '1' || process.env.WARDEN_DEBUG === 'true') {
    return 'debug';
  }

  return DEFAULT_LOG_LEVEL;
}

function shouldLog(level: LogLevel): boolean {
  const currentLevel = getLogLevel();
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[currentLevel];
}

/**
 * Format a log message with optional context.
 */
function formatMessage(level: LogLevel, message: string, context?: string): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const contextTag = context ? `[${context}]` : '';
  return `${LOG_PREFIX} ${levelTag} ${contextTag} ${message}`.trim();
}

function writeData(data?: Record<string, unknown>): void {
  if (data) {
    console.error(`${LOG_PREFIX}       `, JSON.stringify(data, null, 2));
  }
}

/**
 * Logger instance for structured logging.
 */
export const logger = {
  /**
   * Log debug information. Only shown when WARDEN_LOG_LEVEL=debug.
   */
  debug(message: string, context?: string, data?: Record<string, unknown>): void {
    if (!shouldLog('debug')) return;
    console.error(formatMessage('debug', message, context));
    writeData(data);
  },

  info(message: string, context?: string, data?: Record<string, unknown>): void {
    if (!shouldLog('info')) return;
    console.error(formatMessage('info', message, context));
    writeData(data);
  },

  warn(message: string, context?: string, data?: Record<string, unknown>): void {
    if (!shouldLog('warn')) return;
    console.error(formatMessage('warn', message, context));
    writeData(data);
  },

  error(message: string, context?: string, error?: unknown): void {
    if (!shouldLog('error')) return;
    console.error(formatMessage('error', message, context));
    if (error instanceof Error) {
      console.error(`${LOG_PREFIX}       `, error.message);
      if (getLogLevel() === 'debug' && error.stack) {
        console.error(`${LOG_PREFIX}       `, error.stack);
      }
    } else if (error !== undefined) {
      console.error(`${LOG_PREFIX}       `, error);
    }
  },

  getLevel(): LogLevel {
    return getLogLevel();
  },

  isDebugEnabled(): boolean {
    return shouldLog('debug');
  },
};
