import { config } from '@/utils/config.ts';
import type { LogLevel } from '@/utils/config.ts';

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[config.logLevel];

// Errors serialize to `{}` with JSON.stringify.
const replacer = (_key: string, value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

const formatMessage = (level: LogLevel, scope: string | null, message: string, meta?: LogMeta): string => {
  const color = LEVEL_COLORS[level];
  const tag = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` (${scope})` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta, replacer)}` : '';
  return `${color}[${new Date().toISOString()}] ${tag}${RESET}${scopeStr} ${message}${metaStr}`;
};

const createLogger = (scope: string | null): Logger => {
  const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (!shouldLog(level)) return;
    const line = formatMessage(level, scope, message, meta);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
};

export const logger = createLogger(null);

export default logger;
