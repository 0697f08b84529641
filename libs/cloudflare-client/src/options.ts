import { fetchTransport, retryPolicyFromSeconds } from '@provider-cloudflare/resilient-http-core';
import type { HttpTransport, Logger, RetryPolicy } from '@provider-cloudflare/resilient-http-core';

export const DEFAULT_BASE_URL = 'https://api.cloudflare.com/client/v4';
export const DEFAULT_REQUESTS_PER_SECOND = 4;
export const DEFAULT_RETRY_POLICY: RetryPolicy = retryPolicyFromSeconds(3, 1, 30);

/**
 * A single client construction directive. The client applies directives in
 * list order, so a later directive of the same kind replaces an earlier one.
 */
export type ClientOption =
  | { readonly kind: 'rateLimit'; readonly requestsPerSecond: number }
  | { readonly kind: 'retryPolicy'; readonly policy: RetryPolicy }
  | { readonly kind: 'logger'; readonly logger: Logger }
  | { readonly kind: 'httpTransport'; readonly transport: HttpTransport }
  | { readonly kind: 'organization'; readonly organizationId: string }
  | { readonly kind: 'userAgent'; readonly userAgent: string };

export type ClientOptionKind = ClientOption['kind'];

export type ClientOptions = readonly ClientOption[];

export const usingRateLimit = (requestsPerSecond: number): ClientOption => ({
  kind: 'rateLimit',
  requestsPerSecond,
});

export const usingRetryPolicy = (
  maxRetries: number,
  minBackoffSeconds: number,
  maxBackoffSeconds: number,
): ClientOption => ({
  kind: 'retryPolicy',
  policy: retryPolicyFromSeconds(maxRetries, minBackoffSeconds, maxBackoffSeconds),
});

export const usingLogger = (logger: Logger): ClientOption => ({ kind: 'logger', logger });

export const usingHttpTransport = (transport: HttpTransport): ClientOption => ({
  kind: 'httpTransport',
  transport,
});

export const usingOrganization = (organizationId: string): ClientOption => ({
  kind: 'organization',
  organizationId,
});

export const withUserAgent = (userAgent: string): ClientOption => ({ kind: 'userAgent', userAgent });

/**
 * Returns a new frozen list; `options` is left untouched.
 */
export function appendOptions(options: ClientOptions, ...more: ClientOption[]): ClientOptions {
  return Object.freeze([...options, ...more]);
}

export interface ClientSettings {
  requestsPerSecond: number;
  retryPolicy: RetryPolicy;
  logger?: Logger;
  transport: HttpTransport;
  organizationId?: string;
  userAgent: string;
}

export function applyClientOptions(options: ClientOptions): ClientSettings {
  const settings: ClientSettings = {
    requestsPerSecond: DEFAULT_REQUESTS_PER_SECOND,
    retryPolicy: { ...DEFAULT_RETRY_POLICY },
    transport: fetchTransport,
    userAgent: '',
  };

  for (const option of options) {
    switch (option.kind) {
      case 'rateLimit':
        settings.requestsPerSecond = option.requestsPerSecond;
        break;
      case 'retryPolicy':
        settings.retryPolicy = { ...option.policy };
        break;
      case 'logger':
        settings.logger = option.logger;
        break;
      case 'httpTransport':
        settings.transport = option.transport;
        break;
      case 'organization':
        settings.organizationId = option.organizationId;
        break;
      case 'userAgent':
        settings.userAgent = option.userAgent;
        break;
    }
  }

  return settings;
}
