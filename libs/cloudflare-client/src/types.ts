import { z } from 'zod';

/**
 * Cloudflare API Client Types
 *
 * Response schemas for the v4 API envelope, zones and organizations, plus the
 * errors raised by the client.
 */

// ============================================================================
// Credentials
// ============================================================================

export interface Credentials {
  email: string;
  token: string;
}

// ============================================================================
// Response Envelope
// ============================================================================

export const apiErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

export const resultInfoSchema = z.object({
  page: z.number(),
  per_page: z.number(),
  count: z.number().optional(),
  total_count: z.number().optional(),
  total_pages: z.number().optional(),
});

export const envelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(apiErrorSchema).default([]),
  messages: z.array(z.unknown()).default([]),
  result: z.unknown(),
  result_info: resultInfoSchema.optional(),
});

export type CloudflareApiError = z.infer<typeof apiErrorSchema>;
export type ResultInfo = z.infer<typeof resultInfoSchema>;
export type Envelope = z.infer<typeof envelopeSchema>;

export interface ApiResponse<T> {
  result: T;
  resultInfo?: ResultInfo;
}

// ============================================================================
// Zones
// ============================================================================

export const zoneOwnerSchema = z.object({
  id: z.string().default(''),
  email: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
});

export const zoneSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string().optional(),
  paused: z.boolean().optional(),
  name_servers: z.array(z.string()).optional(),
  owner: zoneOwnerSchema.default({}),
});

export type ZoneOwner = z.infer<typeof zoneOwnerSchema>;
export type Zone = z.infer<typeof zoneSchema>;

// ============================================================================
// Organizations
// ============================================================================

export const organizationSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string().optional(),
  permissions: z.array(z.string()).optional(),
  roles: z.array(z.string()).optional(),
});

export type Organization = z.infer<typeof organizationSchema>;

// ============================================================================
// Errors
// ============================================================================

export class AuthConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthConfigError';
  }
}

export class CloudflareRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly errors: CloudflareApiError[] = [],
    public readonly responseBody?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CloudflareRequestError';
  }
}

/**
 * The zone listing succeeded (status 200) but matched nothing.
 */
export class ZoneNotFoundError extends CloudflareRequestError {
  constructor(public readonly zoneName: string) {
    super(`zone could not be found: ${zoneName}`, 200, []);
    this.name = 'ZoneNotFoundError';
  }
}

export type QueryParams = Record<string, string | number>;
