import type { HttpTransport, Logger } from '../types';

const REDACTED_HEADERS = new Set(['authorization', 'x-auth-key']);

export interface LoggingTransportOptions {
  /** Additional header names (case-insensitive) whose values are masked. */
  redactHeaders?: string[];
}

/**
 * Wraps a transport and logs every request and response at debug level,
 * prefixed with `name`. Credential headers are masked. When the logger
 * reports debug as disabled, requests pass straight through and response
 * bodies are not buffered.
 */
export function createLoggingTransport(
  name: string,
  inner: HttpTransport,
  logger: Logger,
  options: LoggingTransportOptions = {},
): HttpTransport {
  const redacted = new Set(REDACTED_HEADERS);
  for (const header of options.redactHeaders ?? []) {
    redacted.add(header.toLowerCase());
  }

  return async (url: string, init: RequestInit): Promise<Response> => {
    if (logger.isLevelEnabled?.('debug') === false) {
      return inner(url, init);
    }

    logger.debug(`${name} API Request Details`, {
      method: init.method ?? 'GET',
      url,
      headers: maskHeaders(new Headers(init.headers), redacted),
    });

    let response: Response;
    try {
      response = await inner(url, init);
    } catch (error) {
      logger.debug(`${name} API Request Failed`, {
        method: init.method ?? 'GET',
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logger.debug(`${name} API Response Details`, {
      method: init.method ?? 'GET',
      url,
      status: response.status,
      headers: maskHeaders(response.headers, redacted),
      body: await response.clone().text(),
    });

    return response;
  };
}

function maskHeaders(headers: Headers, redacted: Set<string>): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = redacted.has(key.toLowerCase()) ? '[REDACTED]' : value;
  });
  return result;
}
