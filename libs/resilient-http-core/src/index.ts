export * from './types';
export { createConsoleLogger, logLevelFromEnv } from './logger';
export type { ConsoleLoggerOptions } from './logger';
export { IntervalRateLimiter, NoopRateLimiter, createRateLimiter } from './rateLimiter';
export { computeBackoffMs, computeRetryDelayMs, parseRetryAfterMs, retryPolicyFromSeconds } from './backoff';
export { fetchTransport } from './transport/fetchTransport';
export { createLoggingTransport } from './transport/loggingTransport';
export type { LoggingTransportOptions } from './transport/loggingTransport';
