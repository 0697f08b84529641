/**
 * @provider-cloudflare/provider-bootstrap
 *
 * Turns provider configuration into a ready-to-use Cloudflare API client,
 * optionally pinned to an organization.
 *
 * ## Usage
 *
 * ```typescript
 * import { configureProviderFromEnv } from '@provider-cloudflare/provider-bootstrap';
 *
 * // Reads CLOUDFLARE_EMAIL, CLOUDFLARE_TOKEN, CLOUDFLARE_ORG_ZONE, ...
 * const { client, orgContext } = await configureProviderFromEnv({ rps: 8 });
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `CLOUDFLARE_EMAIL` - Account email
 * - `CLOUDFLARE_TOKEN` - Global API key
 *
 * Optional:
 * - `CLOUDFLARE_RPS` - Requests per second (default: 4, 0 disables throttling)
 * - `CLOUDFLARE_RETRIES` - Retries per request (default: 3)
 * - `CLOUDFLARE_MIN_BACKOFF` / `CLOUDFLARE_MAX_BACKOFF` - Backoff bounds in seconds (default: 1 / 30)
 * - `CLOUDFLARE_API_CLIENT_LOGGING` - Log retries and request failures (default: false)
 * - `CLOUDFLARE_ORG_ZONE` - Infer the organization from this zone's owner
 * - `CLOUDFLARE_ORG_ID` - Pin the organization explicitly
 * - `TF_LOG` - Log level (trace, debug, info, warn, error)
 * - `TF_APPEND_USER_AGENT` - Appended to the host part of the User-Agent
 */

export { configureProvider, configureProviderFromEnv } from './bootstrap';
export type { BootstrapDeps, BootstrapResult, ClientFactory } from './bootstrap';

export { PROVIDER_SCHEMA, loadProviderConfig, selectOrg } from './config';
export type {
  ProviderConfigKey,
  ProviderField,
  ProviderFieldKind,
  RawProviderConfig,
} from './config';

export { buildPolicyOptions } from './policyOptions';
export type { PolicyOptionDeps } from './policyOptions';

export { orgContextOptions, resolveOrgContext } from './orgContext';
export type { OrganizationLookup } from './orgContext';

export { PROVIDER_PRODUCT_TOKEN, composeUserAgent, defaultHostUserAgent } from './userAgent';
export { PROVIDER_VERSION } from './version';

export type { OrgSelector, PolicyConfig, ProviderConfig, ResolvedOrgContext } from './types';

export {
  OrgListError,
  ProviderBootstrapError,
  ProviderConfigError,
  ZoneDetailError,
  ZoneLookupError,
} from './errors';
export type { BootstrapStep } from './errors';

export { AuthConfigError } from '@provider-cloudflare/cloudflare-client';
