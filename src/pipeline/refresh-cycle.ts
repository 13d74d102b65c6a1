import { config } from '../config.js';
import type { OddsFeed } from '../fetchers/feed-schema.js';
import { fetchOddsFeed } from '../fetchers/odds-fetcher.js';
import { fetchPoll } from '../fetchers/poll-fetcher.js';
import { resolveTokenWithin, type TokenProvider } from '../fetchers/token-provider.js';
import type { FetchResult, TransportFailure } from '../types/errors.js';
import type { Event } from '../types/event.js';
import type { ProcessedPoll } from '../types/poll.js';
import type { FairProbability } from '../types/probability.js';
import type { ReferenceDirectories } from '../types/reference.js';
import type { EVReport } from '../types/result.js';
import { logger } from '../utils/logger.js';
import { manualProbability } from './ev-calculator.js';
import { normalizeEvents } from './event-normalizer.js';
import { computeFairProbabilities } from './fair-probability.js';
import { parsePollPayload, processPoll } from './poll-processor.js';
import { aggregateResults } from './result-aggregator.js';
import { buildAbbreviationIndex } from './team-resolver.js';

/**
 * Everything that survives between refresh cycles. Owned by the caller;
 * every operation here returns a new state instead of mutating this one.
 */
export interface AppState {
  readonly directories: ReferenceDirectories;
  readonly events: ReadonlyMap<string, Event>;
  readonly fairProbabilities: ReadonlyMap<string, FairProbability>;
  readonly poll: ProcessedPoll | null;
  readonly manualProbabilities: ReadonlyMap<string, number>;
  readonly report: EVReport | null;
  readonly lastRefreshedAt: string | null;
}

export interface CycleDeps {
  tokenProvider: TokenProvider;
  leagueId: number;
  /** Poll directory key, e.g. 'nhl' */
  sport: string;
  fetchOdds?: (token: string) => Promise<FetchResult<OddsFeed>>;
  fetchPoll?: (sport: string) => Promise<FetchResult<unknown>>;
  now?: () => Date;
  timeZone?: string;
  stopAtFirstMismatch?: boolean;
  tokenTimeoutMs?: number;
  /** Carry manual probabilities into the new cycle instead of dropping them */
  keepManualProbabilities?: boolean;
}

export type CycleResult =
  | { ok: true; state: AppState }
  | { ok: false; error: TransportFailure; state: AppState };

export function createAppState(directories: ReferenceDirectories): AppState {
  return {
    directories,
    events: new Map(),
    fairProbabilities: new Map(),
    poll: null,
    manualProbabilities: new Map(),
    report: null,
    lastRefreshedAt: null,
  };
}

function reaggregate(state: AppState, manualProbabilities: ReadonlyMap<string, number>, now: Date): AppState {
  const report = state.poll
    ? aggregateResults(state.poll.entries, state.fairProbabilities, manualProbabilities, now)
    : state.report;
  return { ...state, manualProbabilities, report };
}

/**
 * One sequential pass: token -> odds feed -> normalize -> fair probabilities
 * -> poll -> EV report. A transport failure at any step returns the previous
 * state untouched. Manual probabilities belong to the cycle they were entered
 * in and are dropped on success unless `keepManualProbabilities` is set.
 */
export async function runRefreshCycle(state: AppState, deps: CycleDeps): Promise<CycleResult> {
  const now = deps.now ?? (() => new Date());
  const log = logger.child({ component: 'refresh-cycle', leagueId: deps.leagueId, sport: deps.sport });
  const fail = (error: TransportFailure): CycleResult => {
    log.warn({ source: error.source, status: error.status, err: error.message }, 'Refresh cycle aborted');
    return { ok: false, error, state };
  };

  const token = await resolveTokenWithin(deps.tokenProvider, deps.tokenTimeoutMs ?? config.TOKEN_TIMEOUT_MS);
  if (!token.ok) return fail(token.error);

  const feed = await (deps.fetchOdds ?? ((t: string) => fetchOddsFeed(t)))(token.value);
  if (!feed.ok) return fail(feed.error);

  const poll = await (deps.fetchPoll ?? ((s: string) => fetchPoll(s)))(deps.sport);
  if (!poll.ok) return fail(poll.error);

  const cycleTime = now();
  const events = normalizeEvents(feed.value, deps.leagueId, {
    now: cycleTime,
    timeZone: deps.timeZone,
    stopAtFirstMismatch: deps.stopAtFirstMismatch,
  });
  const fairProbabilities = computeFairProbabilities(events, state.directories);

  const index = buildAbbreviationIndex(state.directories, deps.leagueId);
  const processed = processPoll(parsePollPayload(poll.value), index);
  const manualProbabilities: ReadonlyMap<string, number> = deps.keepManualProbabilities
    ? state.manualProbabilities
    : new Map();
  const report = aggregateResults(processed.entries, fairProbabilities, manualProbabilities, cycleTime);

  log.info(
    {
      events: events.size,
      pollEntries: processed.entries.length,
      totalVotes: processed.totalVotes,
      valid: report.valid.length,
      missing: report.missing.length,
      unresolved: report.unresolved.length,
    },
    'Refresh cycle completed',
  );

  return {
    ok: true,
    state: {
      ...state,
      events,
      fairProbabilities,
      poll: processed,
      manualProbabilities,
      report,
      lastRefreshedAt: cycleTime.toISOString(),
    },
  };
}

/**
 * Record a manual probability for a team from two user-entered prices and
 * rescore the last poll. Throws OddsDomainError for zero odds.
 */
export function setManualProbability(
  state: AppState,
  teamId: string,
  teamOdds: number,
  opponentOdds: number,
  now: Date = new Date(),
): AppState {
  const manual = new Map(state.manualProbabilities);
  manual.set(teamId, manualProbability(teamOdds, opponentOdds));
  return reaggregate(state, manual, now);
}

export function clearManualProbabilities(state: AppState, now: Date = new Date()): AppState {
  return reaggregate(state, new Map(), now);
}
