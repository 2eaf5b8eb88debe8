export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function minLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

function formatEntry(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  });
}

export interface RequestLogEntry {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  responseTime: number;
}

/**
 * Writes a structured JSON log line for an HTTP request to stdout.
 */
export function log(entry: RequestLogEntry): void {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level: 'info',
    requestId: entry.requestId,
    method: entry.method,
    path: entry.path,
    statusCode: entry.statusCode,
    responseTime: entry.responseTime,
  });
  process.stdout.write(line + '\n');
}

/**
 * Renders a secret for log output: the last four characters behind a fixed
 * mask, or the mask alone for values of eight characters or fewer.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '****';
  return `****${secret.slice(-4)}`;
}

/**
 * General-purpose structured logger. debug/info go to stdout,
 * warn/error to stderr. LOG_LEVEL sets the minimum level (default info).
 */
export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('debug')) process.stdout.write(formatEntry('debug', message, data) + '\n');
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('info')) process.stdout.write(formatEntry('info', message, data) + '\n');
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('warn')) process.stderr.write(formatEntry('warn', message, data) + '\n');
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('error')) process.stderr.write(formatEntry('error', message, data) + '\n');
  },
};
