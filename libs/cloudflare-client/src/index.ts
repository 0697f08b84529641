/**
 * @provider-cloudflare/cloudflare-client
 *
 * Minimal Cloudflare v4 API client used while configuring the provider:
 * zone lookup, zone details and organization listing, built from an ordered
 * list of construction directives.
 *
 * ## Usage
 *
 * ```typescript
 * import { createCloudflareClient, usingRateLimit, usingRetryPolicy } from '@provider-cloudflare/cloudflare-client';
 *
 * const client = createCloudflareClient(
 *   { email: 'user@example.com', token: process.env.CLOUDFLARE_TOKEN ?? '' },
 *   [usingRateLimit(4), usingRetryPolicy(3, 1, 30)],
 * );
 *
 * const zoneId = await client.zoneIdByName('example.com');
 * const zone = await client.zoneDetails(zoneId);
 * ```
 */

export { CloudflareClient, createCloudflareClient, normalizeZoneName } from './cloudflareClient';

export {
  DEFAULT_BASE_URL,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_RETRY_POLICY,
  appendOptions,
  applyClientOptions,
  usingHttpTransport,
  usingLogger,
  usingOrganization,
  usingRateLimit,
  usingRetryPolicy,
  withUserAgent,
} from './options';
export type { ClientOption, ClientOptionKind, ClientOptions, ClientSettings } from './options';

export type {
  ApiResponse,
  CloudflareApiError,
  Credentials,
  Organization,
  ResultInfo,
  Zone,
  ZoneOwner,
} from './types';

export { AuthConfigError, CloudflareRequestError, ZoneNotFoundError } from './types';
