import { z } from 'zod';
import { ProviderConfigError } from './errors';
import type { OrgSelector, ProviderConfig } from './types';

export type ProviderConfigKey =
  | 'email'
  | 'token'
  | 'rps'
  | 'retries'
  | 'min_backoff'
  | 'max_backoff'
  | 'api_client_logging'
  | 'use_org_from_zone'
  | 'org_id';

export type ProviderFieldKind = 'string' | 'int' | 'bool';

export interface ProviderField {
  key: ProviderConfigKey;
  envVar: string;
  kind: ProviderFieldKind;
  required: boolean;
  default?: number | boolean;
  description: string;
}

/**
 * User-facing provider settings. Explicit values win over the environment
 * variable, which wins over the default.
 */
export const PROVIDER_SCHEMA: readonly ProviderField[] = [
  {
    key: 'email',
    envVar: 'CLOUDFLARE_EMAIL',
    kind: 'string',
    required: true,
    description: 'A registered Cloudflare email address.',
  },
  {
    key: 'token',
    envVar: 'CLOUDFLARE_TOKEN',
    kind: 'string',
    required: true,
    description: 'The token key for API operations.',
  },
  {
    key: 'rps',
    envVar: 'CLOUDFLARE_RPS',
    kind: 'int',
    required: false,
    default: 4,
    description: 'RPS limit to apply when making calls to the API',
  },
  {
    key: 'retries',
    envVar: 'CLOUDFLARE_RETRIES',
    kind: 'int',
    required: false,
    default: 3,
    description: 'Maximum number of retries to perform when an API request fails',
  },
  {
    key: 'min_backoff',
    envVar: 'CLOUDFLARE_MIN_BACKOFF',
    kind: 'int',
    required: false,
    default: 1,
    description: 'Minimum backoff period in seconds after failed API calls',
  },
  {
    key: 'max_backoff',
    envVar: 'CLOUDFLARE_MAX_BACKOFF',
    kind: 'int',
    required: false,
    default: 30,
    description: 'Maximum backoff period in seconds after failed API calls',
  },
  {
    key: 'api_client_logging',
    envVar: 'CLOUDFLARE_API_CLIENT_LOGGING',
    kind: 'bool',
    required: false,
    default: false,
    description: 'Whether to print logs from the API client',
  },
  {
    key: 'use_org_from_zone',
    envVar: 'CLOUDFLARE_ORG_ZONE',
    kind: 'string',
    required: false,
    description:
      'If specified zone is owned by an organization, configure API client to always use that organization',
  },
  {
    key: 'org_id',
    envVar: 'CLOUDFLARE_ORG_ID',
    kind: 'string',
    required: false,
    description:
      "Configure API client to always use that organization. If set this will override 'use_org_from_zone'",
  },
];

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

const requiredString = (envVar: string) =>
  z.string({
    required_error: `is required (set it in the provider block or ${envVar})`,
    invalid_type_error: 'must be a string',
  });

const nonNegativeInt = z
  .number({ invalid_type_error: 'must be an integer' })
  .int({ message: 'must be an integer' })
  .min(0, { message: 'must be >= 0' });

const optionalName = z
  .string({ invalid_type_error: 'must be a string' })
  .optional()
  .transform((value) => value?.trim() || undefined);

const providerConfigSchema = z
  .object({
    email: requiredString('CLOUDFLARE_EMAIL'),
    token: requiredString('CLOUDFLARE_TOKEN'),
    rps: nonNegativeInt,
    retries: nonNegativeInt,
    min_backoff: nonNegativeInt,
    max_backoff: nonNegativeInt,
    api_client_logging: z.boolean({ invalid_type_error: 'must be a boolean' }),
    use_org_from_zone: optionalName,
    org_id: optionalName,
  })
  .refine((config) => config.max_backoff >= config.min_backoff, {
    message: 'must be greater than or equal to min_backoff',
    path: ['max_backoff'],
  })
  .transform(
    (config): ProviderConfig => ({
      credentials: { email: config.email, token: config.token },
      policy: {
        rps: config.rps,
        retries: config.retries,
        minBackoffSeconds: config.min_backoff,
        maxBackoffSeconds: config.max_backoff,
        loggingEnabled: config.api_client_logging,
      },
      orgSelector: selectOrg(config.org_id, config.use_org_from_zone),
    }),
  );

export type RawProviderConfig = Partial<Record<ProviderConfigKey, unknown>>;

/**
 * Resolves every provider field and validates the result once.
 *
 * @throws ProviderConfigError listing every invalid field
 */
export function loadProviderConfig(
  raw: RawProviderConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig {
  const resolved: Record<string, unknown> = {};

  for (const field of PROVIDER_SCHEMA) {
    const explicit = raw[field.key];
    if (explicit !== undefined && explicit !== null) {
      resolved[field.key] = explicit;
      continue;
    }

    const fromEnv = env[field.envVar];
    if (fromEnv !== undefined && fromEnv !== '') {
      resolved[field.key] = parseEnvValue(field.kind, fromEnv);
      continue;
    }

    if (field.default !== undefined) {
      resolved[field.key] = field.default;
    }
  }

  const parsed = providerConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new ProviderConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function selectOrg(orgId?: string, zoneName?: string): OrgSelector {
  if (orgId) {
    return { kind: 'explicit', orgId };
  }
  if (zoneName) {
    return { kind: 'zone', zoneName };
  }
  return { kind: 'none' };
}

/**
 * Values that do not parse are passed through so validation reports them.
 */
function parseEnvValue(kind: ProviderFieldKind, value: string): unknown {
  switch (kind) {
    case 'string':
      return value;
    case 'int':
      return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    case 'bool':
      if (TRUE_VALUES.has(value)) {
        return true;
      }
      if (FALSE_VALUES.has(value)) {
        return false;
      }
      return value;
  }
}
