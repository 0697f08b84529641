import type { HttpTransport } from '../types';

/**
 * Default transport backed by the global fetch API.
 */
export const fetchTransport: HttpTransport = (url: string, init: RequestInit): Promise<Response> =>
  fetch(url, init);
