import { config } from '../config.js';
import type { FetchResult } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { fetchJson, withQuery } from './http-client.js';
import { oddsFeedSchema, type OddsFeed } from './feed-schema.js';

export interface OddsFetchOptions {
  feedUrl?: string;
  timeoutMs?: number;
}

const log = logger.child({ component: 'odds-fetcher' });

async function fetchFeed(
  url: string,
  source: 'odds-feed' | 'reference',
  timeoutMs: number,
): Promise<FetchResult<OddsFeed>> {
  const result = await fetchJson(url, { source, timeoutMs });
  if (!result.ok) {
    log.warn({ url, status: result.error.status, err: result.error.message }, 'Odds feed fetch failed');
    return result;
  }

  const parsed = oddsFeedSchema.safeParse(result.value);
  if (!parsed.success) {
    log.warn({ url, issues: parsed.error.issues.length }, 'Odds feed has unexpected shape');
    return {
      ok: false,
      error: { kind: 'transport', source, status: null, message: 'Unexpected odds feed shape' },
    };
  }

  return { ok: true, value: parsed.data };
}

/**
 * Fetch the game-odds feed authorised by a resolved session token.
 * The feed covers every league; callers pick theirs out during normalization.
 */
export async function fetchOddsFeed(
  token: string,
  options: OddsFetchOptions = {},
): Promise<FetchResult<OddsFeed>> {
  const url = withQuery(options.feedUrl ?? config.ODDS_FEED_URL, { v: token });
  return fetchFeed(url, 'odds-feed', options.timeoutMs ?? config.FETCH_TIMEOUT_MS);
}

/** Unversioned feed; enough to rebuild the market-source and team directories. */
export async function fetchReferenceFeed(options: OddsFetchOptions = {}): Promise<FetchResult<OddsFeed>> {
  return fetchFeed(
    options.feedUrl ?? config.ODDS_FEED_URL,
    'reference',
    options.timeoutMs ?? config.FETCH_TIMEOUT_MS,
  );
}
