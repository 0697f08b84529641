export const PROVIDER_PRODUCT_TOKEN = 'terraform-provider-cloudflare';

/**
 * `<host> terraform-provider-cloudflare/<version> <client>`, with empty parts
 * dropped so no double spaces remain.
 */
export function composeUserAgent(
  hostUserAgent: string,
  providerVersion: string,
  clientUserAgent = '',
): string {
  return [hostUserAgent, `${PROVIDER_PRODUCT_TOKEN}/${providerVersion}`, clientUserAgent]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(' ');
}

/**
 * Identity of the hosting runtime, extended by TF_APPEND_USER_AGENT.
 */
export function defaultHostUserAgent(env: NodeJS.ProcessEnv = process.env): string {
  const base = `Node.js/${process.versions.node} (${process.platform}; ${process.arch})`;
  const appended = env.TF_APPEND_USER_AGENT?.trim();
  return appended ? `${base} ${appended}` : base;
}
