import { setTimeout as sleep } from 'timers/promises';
import { domainToASCII } from 'node:url';
import { z } from 'zod';
import {
  computeRetryDelayMs,
  createRateLimiter,
  parseRetryAfterMs,
} from '@provider-cloudflare/resilient-http-core';
import type {
  HttpTransport,
  Logger,
  RateLimiter,
  RetryPolicy,
} from '@provider-cloudflare/resilient-http-core';
import { DEFAULT_BASE_URL, applyClientOptions } from './options';
import type { ClientOptions } from './options';
import {
  AuthConfigError,
  CloudflareRequestError,
  ZoneNotFoundError,
  envelopeSchema,
  organizationSchema,
  zoneSchema,
} from './types';
import type {
  ApiResponse,
  CloudflareApiError,
  Credentials,
  Envelope,
  Organization,
  QueryParams,
  Zone,
} from './types';

const ORGANIZATIONS_PAGE_SIZE = 50;

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const zoneListSchema = z.array(zoneSchema);
const organizationListSchema = z.array(organizationSchema);

/**
 * Cloudflare v4 API Client
 *
 * Authenticates with the account email and global API key. Every request is
 * throttled by the client's own rate limiter and retried on network errors,
 * 429 and 5xx responses according to its retry policy.
 */
export class CloudflareClient {
  readonly userAgent: string;
  readonly organizationId?: string;
  readonly retryPolicy: RetryPolicy;
  readonly requestsPerSecond: number;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;
  private readonly transport: HttpTransport;

  constructor(private readonly credentials: Credentials, options: ClientOptions = []) {
    if (!credentials.email || !credentials.token) {
      throw new AuthConfigError('invalid credentials: token & email must not be empty');
    }

    const settings = applyClientOptions(options);
    this.userAgent = settings.userAgent;
    this.organizationId = settings.organizationId;
    this.retryPolicy = settings.retryPolicy;
    this.requestsPerSecond = settings.requestsPerSecond;
    this.rateLimiter = createRateLimiter(settings.requestsPerSecond);
    this.logger = settings.logger;
    this.transport = settings.transport;
  }

  // ==========================================================================
  // Zones
  // ==========================================================================

  async zoneIdByName(zoneName: string): Promise<string> {
    const name = normalizeZoneName(zoneName);
    const { result: zones } = await this.request('GET', '/zones', zoneListSchema, { name });

    if (zones.length === 0) {
      throw new ZoneNotFoundError(name);
    }
    if (zones.length > 1) {
      throw new CloudflareRequestError(
        `ambiguous zone name ${JSON.stringify(name)}: ${zones.length} zones matched`,
        200,
      );
    }
    return zones[0].id;
  }

  async zoneDetails(zoneId: string): Promise<Zone> {
    const { result } = await this.request('GET', `/zones/${encodeURIComponent(zoneId)}`, zoneSchema);
    return result;
  }

  // ==========================================================================
  // Organizations
  // ==========================================================================

  /**
   * Lists every organization the credentials belong to, following pagination.
   */
  async listOrganizations(): Promise<Organization[]> {
    const organizations: Organization[] = [];
    let page = 1;

    while (true) {
      const response = await this.request('GET', '/user/organizations', organizationListSchema, {
        page,
        per_page: ORGANIZATIONS_PAGE_SIZE,
      });
      organizations.push(...response.result);

      const totalPages = response.resultInfo?.total_pages ?? 1;
      if (response.result.length === 0 || page >= totalPages) {
        break;
      }
      page += 1;
    }

    return organizations;
  }

  /**
   * Path for user-level resources, rerouted under the bound organization.
   */
  userScopedPath(suffix = ''): string {
    const base = this.organizationId
      ? `/organizations/${encodeURIComponent(this.organizationId)}`
      : '/user';
    const trimmed = suffix.replace(/^\/+/, '');
    return trimmed ? `${base}/${trimmed}` : base;
  }

  // ==========================================================================
  // Core HTTP
  // ==========================================================================

  private async request<T>(
    method: HttpMethod,
    path: string,
    resultSchema: ResultSchema<T>,
    params?: QueryParams,
  ): Promise<ApiResponse<T>> {
    const url = this.buildUrl(path, params);
    const init: RequestInit = { method, headers: this.buildHeaders() };
    let lastError: CloudflareRequestError | undefined;
    let retryAfterMs: number | undefined;

    for (let attempt = 0; attempt <= this.retryPolicy.maxRetries; attempt += 1) {
      if (attempt > 0) {
        const delayMs = computeRetryDelayMs(attempt, this.retryPolicy, retryAfterMs);
        this.logger?.info(
          `Sleeping ${delayMs}ms before retry attempt number ${attempt} for request ${method} ${path}`,
        );
        await sleep(delayMs);
      }

      await this.rateLimiter.throttle();

      let response: Response;
      retryAfterMs = undefined;
      try {
        response = await this.transport(url, init);
      } catch (error) {
        lastError = new CloudflareRequestError(
          `HTTP request failed: ${error instanceof Error ? error.message : String(error)}`,
          0,
          [],
          undefined,
          { cause: error },
        );
        this.logger?.error(`Error performing request: ${method} ${path}: ${lastError.message}`);
        continue;
      }

      const body = await response.text();
      if (isRetryableStatus(response.status)) {
        retryAfterMs = parseRetryAfterMs(response.headers.get('retry-after'));
        const envelope = parseEnvelope(body);
        lastError = new CloudflareRequestError(
          `HTTP status ${response.status}: ${describeApiErrors(envelope?.errors ?? [], body)}`,
          response.status,
          envelope?.errors ?? [],
          body,
        );
        this.logger?.error(`Error performing request: ${method} ${path}: ${lastError.message}`);
        continue;
      }

      return parseResponse(response.status, body, resultSchema);
    }

    throw lastError ?? new CloudflareRequestError(`${method} ${path} exceeded retries`, 0);
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${DEFAULT_BASE_URL}${path}`);
    if (params) {
      const entries = Object.entries(params).sort(([a], [b]) => a.localeCompare(b));
      for (const [key, value] of entries) {
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'X-Auth-Email': this.credentials.email,
      'X-Auth-Key': this.credentials.token,
      'Content-Type': 'application/json',
    };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    return headers;
  }
}

/**
 * Constructs an independent client from credentials and ordered directives.
 */
export function createCloudflareClient(
  credentials: Credentials,
  options: ClientOptions = [],
): CloudflareClient {
  return new CloudflareClient(credentials, options);
}

export function normalizeZoneName(name: string): string {
  const lowered = name.trim().toLowerCase();
  return domainToASCII(lowered) || lowered;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function parseEnvelope(body: string): Envelope | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = envelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

function parseResponse<T>(status: number, body: string, resultSchema: ResultSchema<T>): ApiResponse<T> {
  const envelope = parseEnvelope(body);
  if (status >= 400 || !envelope?.success) {
    const errors = envelope?.errors ?? [];
    throw new CloudflareRequestError(
      `HTTP status ${status}: ${describeApiErrors(errors, body)}`,
      status,
      errors,
      body,
    );
  }

  const result = resultSchema.safeParse(envelope.result);
  if (!result.success) {
    throw new CloudflareRequestError(
      `unexpected result shape from Cloudflare API: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      status,
      [],
      body,
      { cause: result.error },
    );
  }

  return { result: result.data, resultInfo: envelope.result_info };
}

function describeApiErrors(errors: CloudflareApiError[], body: string): string {
  if (errors.length > 0) {
    return errors.map((error) => `${error.message} (${error.code})`).join(', ');
  }
  return body.trim().slice(0, 200) || 'empty response body';
}
