// Keep in sync with package.json.
export const PROVIDER_VERSION = '0.1.0';
