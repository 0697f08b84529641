import { appendOptions, createCloudflareClient, withUserAgent } from '@provider-cloudflare/cloudflare-client';
import type { ClientOptions, CloudflareClient, Credentials } from '@provider-cloudflare/cloudflare-client';
import { createConsoleLogger, logLevelFromEnv } from '@provider-cloudflare/resilient-http-core';
import type { HttpTransport, Logger } from '@provider-cloudflare/resilient-http-core';
import { loadProviderConfig } from './config';
import type { RawProviderConfig } from './config';
import { orgContextOptions, resolveOrgContext } from './orgContext';
import { buildPolicyOptions } from './policyOptions';
import type { ProviderConfig, ResolvedOrgContext } from './types';
import { composeUserAgent, defaultHostUserAgent } from './userAgent';
import { PROVIDER_VERSION } from './version';

export type ClientFactory = (credentials: Credentials, options: ClientOptions) => CloudflareClient;

export interface BootstrapDeps {
  logger?: Logger;
  /** Base HTTP transport; wrapped by the diagnostic logging transport. */
  transport?: HttpTransport;
  createClient?: ClientFactory;
  hostUserAgent?: string;
  providerVersion?: string;
  /**
   * When no organization selector is configured the lookup client is
   * returned as-is. Set to true to rebuild it with the composed user agent
   * anyway. Default: false.
   */
  rebuildWhenUnbound?: boolean;
}

export interface BootstrapResult {
  client: CloudflareClient;
  orgContext: ResolvedOrgContext;
  /** Directives the returned client was built from. */
  options: ClientOptions;
  /** Composed user agent; absent when the lookup client is returned as-is. */
  userAgent?: string;
}

/**
 * Builds the provider's API client.
 *
 * options0 → lookup client → organization context → options1 (organization
 * and user agent appended) → final client. Each step produces a new value;
 * a failing lookup aborts the whole bootstrap. Without an organization
 * selector the lookup client is the result unless `rebuildWhenUnbound` is set.
 */
export async function configureProvider(
  config: ProviderConfig,
  deps: BootstrapDeps = {},
): Promise<BootstrapResult> {
  const logger = deps.logger ?? createConsoleLogger({ level: logLevelFromEnv(process.env.TF_LOG) });
  const createClient = deps.createClient ?? createCloudflareClient;

  const baseOptions = buildPolicyOptions(config.policy, { logger, transport: deps.transport });
  const lookupClient = createClient(config.credentials, baseOptions);

  const orgContext = await resolveOrgContext(lookupClient, config.orgSelector, logger);

  if (config.orgSelector.kind === 'none' && deps.rebuildWhenUnbound !== true) {
    return { client: lookupClient, orgContext, options: baseOptions };
  }

  const userAgent = composeUserAgent(
    deps.hostUserAgent ?? defaultHostUserAgent(),
    deps.providerVersion ?? PROVIDER_VERSION,
    lookupClient.userAgent,
  );
  const options = appendOptions(baseOptions, ...orgContextOptions(orgContext), withUserAgent(userAgent));
  const client = createClient(config.credentials, options);

  logger.debug('Configured Cloudflare API client', {
    orgContext: orgContext.kind,
    organizationId: client.organizationId,
    userAgent,
  });

  return { client, orgContext, options, userAgent };
}

/**
 * Loads and validates configuration from explicit values and the
 * environment, then runs {@link configureProvider}.
 */
export async function configureProviderFromEnv(
  raw: RawProviderConfig = {},
  env: NodeJS.ProcessEnv = process.env,
  deps: BootstrapDeps = {},
): Promise<BootstrapResult> {
  const config = loadProviderConfig(raw, env);
  return configureProvider(config, {
    ...deps,
    logger: deps.logger ?? createConsoleLogger({ level: logLevelFromEnv(env.TF_LOG) }),
    hostUserAgent: deps.hostUserAgent ?? defaultHostUserAgent(env),
  });
}
