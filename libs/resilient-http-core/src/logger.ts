import type { LogLevel, Logger, LoggerMeta } from './types';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped. Default: 'info'. */
  level?: LogLevel;
  /** Static fields merged into every entry. */
  context?: LoggerMeta;
  now?: () => Date;
}

/**
 * Structured logger writing one JSON line per entry to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minPriority = LOG_LEVEL_PRIORITY[options.level ?? 'info'];
  const now = options.now ?? (() => new Date());

  const isLevelEnabled = (level: LogLevel): boolean => LOG_LEVEL_PRIORITY[level] >= minPriority;

  const write = (level: LogLevel, message: string, meta?: LoggerMeta): void => {
    if (!isLevelEnabled(level)) {
      return;
    }
    const entry = {
      level,
      ts: now().toISOString(),
      msg: message,
      ...options.context,
      ...meta,
    };
    console.error(JSON.stringify(entry));
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    isLevelEnabled,
  };
}

/**
 * Maps a TF_LOG style value to a level. Unknown or empty values fall back.
 */
export function logLevelFromEnv(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'trace':
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return fallback;
  }
}
