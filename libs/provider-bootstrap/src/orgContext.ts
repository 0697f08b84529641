import { usingOrganization } from '@provider-cloudflare/cloudflare-client';
import type { ClientOption, Organization, Zone } from '@provider-cloudflare/cloudflare-client';
import type { Logger } from '@provider-cloudflare/resilient-http-core';
import { OrgListError, ZoneDetailError, ZoneLookupError } from './errors';
import type { OrgSelector, ResolvedOrgContext } from './types';

/**
 * Remote calls needed to infer an organization from zone ownership.
 */
export interface OrganizationLookup {
  zoneIdByName(zoneName: string): Promise<string>;
  zoneDetails(zoneId: string): Promise<Pick<Zone, 'id' | 'name' | 'owner'>>;
  listOrganizations(): Promise<Array<Pick<Organization, 'id' | 'name'>>>;
}

/**
 * Decides which organization the final client is bound to. An explicit id
 * needs no remote calls. A zone whose owner is not among the caller's
 * organizations falls back to no organization instead of failing.
 *
 * @throws ZoneLookupError, ZoneDetailError or OrgListError when a lookup fails
 */
export async function resolveOrgContext(
  client: OrganizationLookup,
  selector: OrgSelector,
  logger: Logger,
): Promise<ResolvedOrgContext> {
  switch (selector.kind) {
    case 'explicit':
      logger.info(`Using specified organization id ${selector.orgId} in Cloudflare provider`, {
        orgId: selector.orgId,
      });
      return { kind: 'explicit', orgId: selector.orgId };
    case 'zone':
      return resolveFromZone(client, selector.zoneName, logger);
    case 'none':
      return { kind: 'none' };
  }
}

async function resolveFromZone(
  client: OrganizationLookup,
  zoneName: string,
  logger: Logger,
): Promise<ResolvedOrgContext> {
  let zoneId: string;
  try {
    zoneId = await client.zoneIdByName(zoneName);
  } catch (error) {
    throw new ZoneLookupError(zoneName, error);
  }

  let zone: Pick<Zone, 'id' | 'name' | 'owner'>;
  try {
    zone = await client.zoneDetails(zoneId);
  } catch (error) {
    throw new ZoneDetailError(zoneName, zoneId, error);
  }
  logger.debug('Looked up zone to match organization details to', {
    zoneId: zone.id,
    zoneName: zone.name,
    owner: zone.owner,
  });

  let organizations: Array<Pick<Organization, 'id' | 'name'>>;
  try {
    organizations = await client.listOrganizations();
  } catch (error) {
    throw new OrgListError(error);
  }
  logger.debug('Found organizations for current user', {
    organizationIds: organizations.map((org) => org.id),
  });

  const ownerId = zone.owner.id;
  const owner = ownerId ? organizations.find((org) => org.id === ownerId) : undefined;
  if (!owner) {
    logger.info(
      'Zone ownership specified but organization owner not found. Falling back to using user API for Cloudflare provider',
      { zoneName, ownerId },
    );
    return { kind: 'none' };
  }

  logger.info(`Using organization ${owner.name} (${owner.id}) in Cloudflare provider`, {
    zoneName,
    orgId: owner.id,
  });
  return { kind: 'zone', orgId: owner.id, zoneName };
}

/**
 * Directives to append for a resolved context; none when unbound.
 */
export function orgContextOptions(context: ResolvedOrgContext): ClientOption[] {
  return context.kind === 'none' ? [] : [usingOrganization(context.orgId)];
}
