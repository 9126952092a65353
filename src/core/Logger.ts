/**
 * Logger configuration using Pino
 * Provides structured logging with configurable levels and user-friendly output
 */
import pino from 'pino';
import pretty from 'pino-pretty';
import { logLevelSchema, type LogLevel } from '../config/schema.js';

export type { LogLevel };
export type { Logger } from 'pino';

export interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

const parsedLevel = logLevelSchema.safeParse(process.env['LOG_LEVEL']?.toLowerCase());

const defaultOptions: LoggerOptions = {
  level: parsedLevel.success ? parsedLevel.data : 'info',
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

/**
 * Format a value for clean inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
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

// Container ids are 64 hex chars; show the short form docker ps uses
const ID_KEYS = new Set(['containerId', 'id']);

/**
 * Format context data, most useful fields first
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = ['name', 'names', 'address', 'type', 'count', 'oldName', 'newName', 'peer'];

  const sortedKeys = contextKeys.sort((a, b) => {
    const aIdx = priorityKeys.indexOf(a);
    const bIdx = priorityKeys.indexOf(b);
    if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
    if (aIdx >= 0) return -1;
    if (bIdx >= 0) return 1;
    return 0;
  });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key], ID_KEYS.has(key) ? 12 : 40);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = String(log['level']);
      const service = log['service'];
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = '';
      if (typeof service === 'string') {
        output += `[${service}] `;
      }
      output += String(log[messageKey] ?? '');

      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

export function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'container-dns',
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
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
