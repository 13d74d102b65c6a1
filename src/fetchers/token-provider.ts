import type { FetchResult } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Supplies the rotating session token the odds feed requires. How the token
 * is discovered (page automation, a side channel) is up to the implementation.
 */
export interface TokenProvider {
  resolveToken(): Promise<string | null>;
}

export function staticTokenProvider(token: string | null | undefined): TokenProvider {
  const value = token?.trim() || null;
  return {
    resolveToken: async () => value,
  };
}

class TokenTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Token resolution timed out after ${timeoutMs}ms`);
    this.name = 'TokenTimeoutError';
  }
}

/** Bound token resolution; a timeout, rejection or empty token is a transport failure. */
export async function resolveTokenWithin(
  provider: TokenProvider,
  timeoutMs: number,
): Promise<FetchResult<string>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TokenTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    const token = await Promise.race([provider.resolveToken(), timeout]);
    if (!token) {
      return {
        ok: false,
        error: { kind: 'transport', source: 'token', status: null, message: 'No session token available' },
      };
    }
    return { ok: true, value: token };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ err: message }, 'Session token resolution failed');
    return { ok: false, error: { kind: 'transport', source: 'token', status: null, message } };
  } finally {
    clearTimeout(timer);
  }
}
