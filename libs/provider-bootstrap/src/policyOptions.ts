import {
  usingHttpTransport,
  usingLogger,
  usingRateLimit,
  usingRetryPolicy,
} from '@provider-cloudflare/cloudflare-client';
import type { ClientOption, ClientOptions } from '@provider-cloudflare/cloudflare-client';
import { createLoggingTransport, fetchTransport } from '@provider-cloudflare/resilient-http-core';
import type { HttpTransport, Logger } from '@provider-cloudflare/resilient-http-core';
import type { PolicyConfig } from './types';

export interface PolicyOptionDeps {
  logger: Logger;
  /** Base transport wrapped by the diagnostic logger. Default: fetch. */
  transport?: HttpTransport;
}

/**
 * Translates policy settings into the first-pass client directives: rate
 * limit, retry policy, the request logger when enabled, and the transport
 * wrapped in a debug-level diagnostic logger.
 */
export function buildPolicyOptions(policy: PolicyConfig, deps: PolicyOptionDeps): ClientOptions {
  const options: ClientOption[] = [
    usingRateLimit(policy.rps),
    usingRetryPolicy(policy.retries, policy.minBackoffSeconds, policy.maxBackoffSeconds),
  ];

  if (policy.loggingEnabled) {
    options.push(usingLogger(deps.logger));
  }

  options.push(
    usingHttpTransport(createLoggingTransport('Cloudflare', deps.transport ?? fetchTransport, deps.logger)),
  );

  return Object.freeze(options);
}
