/**
 * Cloudflare Client Unit Tests
 *
 * Exercises option application, lookups, retries and error mapping with a
 * mocked transport.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { HttpTransport, Logger } from '@provider-cloudflare/resilient-http-core';
import { CloudflareClient, createCloudflareClient, normalizeZoneName } from '../cloudflareClient';
import {
  usingHttpTransport,
  usingLogger,
  usingOrganization,
  usingRateLimit,
  usingRetryPolicy,
  withUserAgent,
} from '../options';
import type { ClientOption } from '../options';
import { AuthConfigError, CloudflareRequestError, ZoneNotFoundError } from '../types';

const credentials = { email: 'a@b.com', token: 'test-token' };

const envelope = (result: unknown, resultInfo?: Record<string, number>, init?: ResponseInit) =>
  new Response(
    JSON.stringify({ success: true, errors: [], messages: [], result, result_info: resultInfo }),
    { status: 200, headers: { 'Content-Type': 'application/json' }, ...init },
  );

const failure = (status: number, errors: Array<{ code: number; message: string }>) =>
  new Response(JSON.stringify({ success: false, errors, messages: [], result: null }), { status });

describe('CloudflareClient', () => {
  let transport: Mock<Parameters<HttpTransport>, ReturnType<HttpTransport>>;
  let logger: Logger;

  beforeEach(() => {
    transport = vi.fn();
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  const createClient = (...extra: ClientOption[]) =>
    createCloudflareClient(credentials, [
      usingRateLimit(0),
      usingRetryPolicy(2, 0, 0),
      usingHttpTransport(transport),
      ...extra,
    ]);

  describe('construction', () => {
    it('rejects empty credentials', () => {
      expect(() => createCloudflareClient({ email: '', token: 'test-token' })).toThrow(AuthConfigError);
      expect(() => createCloudflareClient({ email: 'a@b.com', token: '' })).toThrow(
        'invalid credentials: token & email must not be empty',
      );
    });

    it('applies defaults when no directive overrides them', () => {
      const client = createCloudflareClient(credentials);

      expect(client).toBeInstanceOf(CloudflareClient);
      expect(client.requestsPerSecond).toBe(4);
      expect(client.retryPolicy).toEqual({ maxRetries: 3, minRetryDelayMs: 1000, maxRetryDelayMs: 30_000 });
      expect(client.userAgent).toBe('');
      expect(client.organizationId).toBeUndefined();
    });

    it('lets the last directive of a kind win', () => {
      const client = createCloudflareClient(credentials, [
        usingOrganization('org-a'),
        withUserAgent('first'),
        usingRateLimit(10),
        usingOrganization('org-b'),
        withUserAgent('second'),
      ]);

      expect(client.organizationId).toBe('org-b');
      expect(client.userAgent).toBe('second');
      expect(client.requestsPerSecond).toBe(10);
    });

    it('builds independent handles from shared options', () => {
      const options = [usingRateLimit(2)];
      const first = createCloudflareClient(credentials, options);
      const second = createCloudflareClient(credentials, [...options, usingOrganization('org-1')]);

      expect(first.organizationId).toBeUndefined();
      expect(second.organizationId).toBe('org-1');
      expect(options).toHaveLength(1);
    });
  });

  describe('zoneIdByName', () => {
    it('sends authenticated requests for the normalized zone name', async () => {
      transport.mockResolvedValueOnce(envelope([{ id: 'z1', name: 'example.com', owner: { id: 'org1' } }]));
      const client = createClient(withUserAgent('test-agent/1.0'));

      await expect(client.zoneIdByName(' Example.COM ')).resolves.toBe('z1');

      expect(transport).toHaveBeenCalledTimes(1);
      const [url, init] = transport.mock.calls[0];
      expect(url).toBe('https://api.cloudflare.com/client/v4/zones?name=example.com');
      expect(init).toEqual({
        method: 'GET',
        headers: {
          'X-Auth-Email': 'a@b.com',
          'X-Auth-Key': 'test-token',
          'Content-Type': 'application/json',
          'User-Agent': 'test-agent/1.0',
        },
      });
    });

    it('omits the User-Agent header when none is configured', async () => {
      transport.mockResolvedValueOnce(envelope([{ id: 'z1', name: 'example.com' }]));
      const client = createClient();

      await client.zoneIdByName('example.com');

      expect(transport.mock.calls[0][1].headers).not.toHaveProperty('User-Agent');
    });

    it('throws ZoneNotFoundError when nothing matches', async () => {
      transport.mockResolvedValueOnce(envelope([]));
      const client = createClient();

      const error = await client.zoneIdByName('missing.example').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ZoneNotFoundError);
      expect(error).toBeInstanceOf(CloudflareRequestError);
      expect((error as ZoneNotFoundError).message).toBe('zone could not be found: missing.example');
      expect((error as ZoneNotFoundError).name).toBe('ZoneNotFoundError');
      expect((error as ZoneNotFoundError).zoneName).toBe('missing.example');
      expect((error as ZoneNotFoundError).status).toBe(200);
      expect((error as ZoneNotFoundError).errors).toEqual([]);
    });

    it('rejects ambiguous names', async () => {
      transport.mockResolvedValueOnce(
        envelope([
          { id: 'z1', name: 'example.com' },
          { id: 'z2', name: 'example.com' },
        ]),
      );
      const client = createClient();

      await expect(client.zoneIdByName('example.com')).rejects.toThrow(
        'ambiguous zone name "example.com": 2 zones matched',
      );
    });
  });

  describe('zoneDetails', () => {
    it('returns the zone with its owner', async () => {
      transport.mockResolvedValueOnce(
        envelope({
          id: 'z1',
          name: 'example.com',
          status: 'active',
          owner: { id: 'org1', name: 'Example Org', type: 'organization' },
        }),
      );
      const client = createClient();

      const zone = await client.zoneDetails('z1');

      expect(transport.mock.calls[0][0]).toBe('https://api.cloudflare.com/client/v4/zones/z1');
      expect(zone).toEqual({
        id: 'z1',
        name: 'example.com',
        status: 'active',
        owner: { id: 'org1', name: 'Example Org', type: 'organization' },
      });
    });

    it('defaults a missing owner to an empty id', async () => {
      transport.mockResolvedValueOnce(envelope({ id: 'z1', name: 'example.com' }));
      const client = createClient();

      const zone = await client.zoneDetails('z1');

      expect(zone.owner).toEqual({ id: '' });
    });

    it('does not retry client errors', async () => {
      transport.mockResolvedValueOnce(failure(403, [{ code: 10000, message: 'Authentication error' }]));
      const client = createClient();

      const error = await client.zoneDetails('z1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CloudflareRequestError);
      expect((error as CloudflareRequestError).message).toBe('HTTP status 403: Authentication error (10000)');
      expect((error as CloudflareRequestError).status).toBe(403);
      expect((error as CloudflareRequestError).errors).toEqual([{ code: 10000, message: 'Authentication error' }]);
      expect(transport).toHaveBeenCalledTimes(1);
    });
  });

  describe('listOrganizations', () => {
    it('follows pagination until the last page', async () => {
      transport
        .mockResolvedValueOnce(
          envelope([{ id: 'org1', name: 'One' }], { page: 1, per_page: 50, count: 1, total_pages: 2 }),
        )
        .mockResolvedValueOnce(
          envelope([{ id: 'org2', name: 'Two', status: 'member' }], {
            page: 2,
            per_page: 50,
            count: 1,
            total_pages: 2,
          }),
        );
      const client = createClient();

      const organizations = await client.listOrganizations();

      expect(organizations).toEqual([
        { id: 'org1', name: 'One' },
        { id: 'org2', name: 'Two', status: 'member' },
      ]);
      expect(transport.mock.calls.map(([url]) => url)).toEqual([
        'https://api.cloudflare.com/client/v4/user/organizations?page=1&per_page=50',
        'https://api.cloudflare.com/client/v4/user/organizations?page=2&per_page=50',
      ]);
    });

    it('stops after a single page when no page info is returned', async () => {
      transport.mockResolvedValueOnce(envelope([]));
      const client = createClient();

      await expect(client.listOrganizations()).resolves.toEqual([]);
      expect(transport).toHaveBeenCalledTimes(1);
    });
  });

  describe('retries', () => {
    it('retries server errors and logs through the request logger', async () => {
      transport
        .mockResolvedValueOnce(failure(502, [{ code: 1000, message: 'Bad gateway' }]))
        .mockResolvedValueOnce(envelope({ id: 'z1', name: 'example.com' }));
      const client = createClient(usingLogger(logger));

      const zone = await client.zoneDetails('z1');

      expect(zone.id).toBe('z1');
      expect(transport).toHaveBeenCalledTimes(2);
      expect(logger.error).toHaveBeenCalledWith(
        'Error performing request: GET /zones/z1: HTTP status 502: Bad gateway (1000)',
      );
      expect(logger.info).toHaveBeenCalledWith('Sleeping 0ms before retry attempt number 1 for request GET /zones/z1');
    });

    it('gives up after the configured number of retries', async () => {
      transport.mockRejectedValue(new Error('connection reset'));
      const client = createClient(usingRetryPolicy(1, 0, 0));

      const error = await client.zoneDetails('z1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CloudflareRequestError);
      expect((error as CloudflareRequestError).message).toBe('HTTP request failed: connection reset');
      expect((error as CloudflareRequestError).status).toBe(0);
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it('does not log retries without a logger directive', async () => {
      transport
        .mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }))
        .mockResolvedValueOnce(envelope({ id: 'z1', name: 'example.com' }));
      const client = createClient();

      await client.zoneDetails('z1');

      expect(logger.info).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('Retry-After', () => {
    it('waits for the delay the server asks for on 429', async () => {
      transport
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ success: false, errors: [], messages: [], result: null }), {
            status: 429,
            headers: { 'Retry-After': '0' },
          }),
        )
        .mockResolvedValueOnce(envelope({ id: 'z1', name: 'example.com' }));
      const client = createClient(usingLogger(logger), usingRetryPolicy(1, 5, 30));

      const zone = await client.zoneDetails('z1');

      expect(zone.id).toBe('z1');
      expect(logger.info).toHaveBeenCalledWith('Sleeping 0ms before retry attempt number 1 for request GET /zones/z1');
    });

    it('caps a long Retry-After at the maximum backoff', async () => {
      transport
        .mockResolvedValueOnce(
          new Response('rate limited', { status: 429, headers: { 'Retry-After': '3600' } }),
        )
        .mockResolvedValueOnce(envelope({ id: 'z1', name: 'example.com' }));
      const client = createClient(usingLogger(logger), usingRetryPolicy(1, 0, 0));

      await client.zoneDetails('z1');

      expect(logger.info).toHaveBeenCalledWith('Sleeping 0ms before retry attempt number 1 for request GET /zones/z1');
    });
  });

  describe('userScopedPath', () => {
    it('routes user resources under the bound organization', () => {
      expect(createClient().userScopedPath('/firewall/access_rules/rules')).toBe(
        '/user/firewall/access_rules/rules',
      );
      expect(createClient(usingOrganization('org1')).userScopedPath('firewall/access_rules/rules')).toBe(
        '/organizations/org1/firewall/access_rules/rules',
      );
      expect(createClient(usingOrganization('org1')).userScopedPath()).toBe('/organizations/org1');
    });
  });
});

describe('normalizeZoneName', () => {
  it('lowercases, trims and converts to ASCII', () => {
    expect(normalizeZoneName(' Example.COM ')).toBe('example.com');
    expect(normalizeZoneName('bücher.example')).toBe('xn--bcher-kva.example');
  });
});
