/**
 * Shared contracts for the HTTP layer used by the Cloudflare client.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
  /** When present and false for a level, callers may skip building entries for it. */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Fetch-compatible transport. Decorators wrap one transport in another.
 */
export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export interface RateLimiter {
  throttle(): Promise<void>;
}

export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying. */
  maxRetries: number;
  minRetryDelayMs: number;
  maxRetryDelayMs: number;
}
