import { z } from 'zod';
import { config } from '../config.js';
import type { FetchResult } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { fetchJson } from './http-client.js';

export interface PollFetchOptions {
  pollIdsUrl?: string;
  pollUrlTemplate?: string;
  timeoutMs?: number;
}

const pollIdsSchema = z.record(z.union([z.string(), z.number()]).nullable());

export function pollUrlFor(template: string, pollId: string): string {
  return template.replace('{pollId}', encodeURIComponent(pollId));
}

/**
 * Fetch today's poll for a sport. The poll id rotates daily, so it is looked up
 * from the id directory first. Returns the raw payload; PollProcessor validates it.
 */
export async function fetchPoll(sport: string, options: PollFetchOptions = {}): Promise<FetchResult<unknown>> {
  const timeoutMs = options.timeoutMs ?? config.FETCH_TIMEOUT_MS;
  const log = logger.child({ component: 'poll-fetcher', sport });

  const ids = await fetchJson(options.pollIdsUrl ?? config.POLL_IDS_URL, { source: 'poll-ids', timeoutMs });
  if (!ids.ok) {
    log.warn({ status: ids.error.status, err: ids.error.message }, 'Poll id lookup failed');
    return ids;
  }

  const parsedIds = pollIdsSchema.safeParse(ids.value);
  const pollId = parsedIds.success ? parsedIds.data[sport] : undefined;
  if (pollId === undefined || pollId === null || pollId === '') {
    log.warn('No poll id for sport');
    return {
      ok: false,
      error: { kind: 'transport', source: 'poll-ids', status: null, message: `No poll id found for sport: ${sport}` },
    };
  }

  const url = pollUrlFor(options.pollUrlTemplate ?? config.POLL_URL_TEMPLATE, String(pollId));
  const poll = await fetchJson(url, { source: 'poll', timeoutMs });
  if (!poll.ok) {
    log.warn({ url, status: poll.error.status, err: poll.error.message }, 'Poll fetch failed');
    return poll;
  }

  log.debug({ pollId }, 'Poll fetched');
  return poll;
}
