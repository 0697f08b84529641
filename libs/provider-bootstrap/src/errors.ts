export type BootstrapStep = 'zone-lookup' | 'zone-details' | 'list-organizations';

/**
 * Fatal failure of one organization resolution step. The remote error is
 * kept as `cause`.
 */
export class ProviderBootstrapError extends Error {
  constructor(
    message: string,
    public readonly step: BootstrapStep,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ProviderBootstrapError';
  }
}

export class ZoneLookupError extends ProviderBootstrapError {
  constructor(public readonly zoneName: string, cause: unknown) {
    super(`error finding zone "${zoneName}": ${describeError(cause)}`, 'zone-lookup', { cause });
    this.name = 'ZoneLookupError';
  }
}

export class ZoneDetailError extends ProviderBootstrapError {
  constructor(
    public readonly zoneName: string,
    public readonly zoneId: string,
    cause: unknown,
  ) {
    super(
      `error fetching details for zone "${zoneName}" (${zoneId}): ${describeError(cause)}`,
      'zone-details',
      { cause },
    );
    this.name = 'ZoneDetailError';
  }
}

export class OrgListError extends ProviderBootstrapError {
  constructor(cause: unknown) {
    super(`error listing organizations: ${describeError(cause)}`, 'list-organizations', { cause });
    this.name = 'OrgListError';
  }
}

export class ProviderConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid provider configuration: ${issues.join('; ')}`);
    this.name = 'ProviderConfigError';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
