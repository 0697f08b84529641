import type { Credentials } from '@provider-cloudflare/cloudflare-client';

export interface PolicyConfig {
  rps: number;
  retries: number;
  minBackoffSeconds: number;
  maxBackoffSeconds: number;
  loggingEnabled: boolean;
}

/**
 * Which organization the client should be pinned to. An explicit id always
 * takes precedence over a zone name.
 */
export type OrgSelector =
  | { kind: 'none' }
  | { kind: 'explicit'; orgId: string }
  | { kind: 'zone'; zoneName: string };

export type ResolvedOrgContext =
  | { kind: 'none' }
  | { kind: 'explicit'; orgId: string }
  | { kind: 'zone'; orgId: string; zoneName: string };

export interface ProviderConfig {
  credentials: Credentials;
  policy: PolicyConfig;
  orgSelector: OrgSelector;
}
