/**
 * Logger configuration using Pino
 * Provides structured logging with configurable levels and user-friendly output
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogFormat = 'text' | 'json';
export type Logger = pino.Logger;

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  destination?: NodeJS.WritableStream;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

// Emoji symbols for pretty logging
const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Map a raw level string to a pino level, falling back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

export function parseLogFormat(value: string | undefined): LogFormat {
  return value?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

/**
 * Format a value for clean inline display
 */
export function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    if (keys.length === 0) return '{}';
    return `{${keys.length} fields}`;
  }

  return String(value);
}

// Keys that contain IDs — truncate to short form
const ID_KEYS = new Set(['containerId', 'vmid', 'id']);

/**
 * Format context data in a clean, readable way
 * Prioritizes important fields and keeps output short
 */
export function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = [
    'hostname', 'hosts', 'containerName', 'name', 'node',
    'type', 'target', 'address', 'key', 'count',
  ];

  // If containerName present, skip containerId from display
  const skipKeys = new Set<string>();
  if (log['containerName']) skipKeys.add('containerId');

  const sortedKeys = contextKeys
    .filter((k) => !skipKeys.has(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const value = log[key];
    if (value === undefined || value === null) continue;
    const maxLen = ID_KEYS.has(key) ? 12 : 40;
    const formatted = formatValue(value, maxLen);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream(destination?: NodeJS.WritableStream) {
  return pretty({
    colorize: destination === undefined,
    translateTime: 'yyyy-mm-dd HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    destination,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = typeof log['level'] === 'string' ? log['level'] : 'info';
      const service = log['service'];
      const msg = String(log[messageKey] ?? '');
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = '';
      if (typeof service === 'string') {
        output += `[${service}] `;
      }
      output += msg;

      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      // Surface the error message inline; the stack stays in JSON output
      const error = log['error'];
      if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        output += `: ${error.message}`;
      }

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

export function createLogger(options: LoggerOptions): Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'dnsherpa',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.format === 'text') {
    return pino(baseConfig, createPrettyStream(options.destination));
  }

  return pino(baseConfig, options.destination ?? process.stdout);
}

/**
 * Root logger, configured from the environment before config validation runs
 */
export const logger = createLogger({
  level: parseLogLevel(process.env['LOG_LEVEL']),
  format: parseLogFormat(process.env['LOG_FORMAT']),
});

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}

/**
 * Logger that discards everything, for tests and optional collaborators
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export default logger;
