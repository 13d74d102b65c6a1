import { request } from 'undici';
import type { FetchResult, FetchSource } from '../types/errors.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'underdog-ev/0.1 (personal research)',
  Accept: 'application/json',
};

export interface FetchJsonOptions {
  source: FetchSource;
  timeoutMs: number;
}

/**
 * GET a JSON document. Non-2xx statuses, timeouts, transport errors and
 * unparseable bodies come back as a TransportFailure value.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<FetchResult<unknown>> {
  const { source, timeoutMs } = options;
  try {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });

    if (statusCode < 200 || statusCode >= 300) {
      // drain so the socket can be reused
      await body.dump();
      return {
        ok: false,
        error: { kind: 'transport', source, status: statusCode, message: `HTTP ${statusCode}` },
      };
    }

    const value: unknown = await body.json();
    return { ok: true, value };
  } catch (err) {
    return {
      ok: false,
      error: {
        kind: 'transport',
        source,
        status: null,
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }
}

export function withQuery(baseUrl: string, params: Record<string, string>): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
