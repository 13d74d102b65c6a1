export * from './types/index.js';
export { config, type Config } from './config.js';
export {
  LEAGUE_IDS,
  BET_TYPE_BY_LEAGUE,
  betTypeForLeague,
  leagueFeedKey,
  leagueIdFor,
  type LeagueSlug,
  type BetTypeTag,
} from './leagues.js';
export { fetchOddsFeed, fetchReferenceFeed, type OddsFetchOptions } from './fetchers/odds-fetcher.js';
export type { OddsFeed } from './fetchers/feed-schema.js';
export { fetchPoll, type PollFetchOptions } from './fetchers/poll-fetcher.js';
export { staticTokenProvider, resolveTokenWithin, type TokenProvider } from './fetchers/token-provider.js';
export {
  buildReferenceDirectories,
  fetchReferenceDirectories,
  loadReferenceDirectories,
  saveReferenceDirectories,
  marketName,
  teamsForLeague,
} from './pipeline/reference-store.js';
export { normalizeEvents, type NormalizeOptions } from './pipeline/event-normalizer.js';
export {
  americanToProb,
  pairFairProbability,
  probToAmerican,
  computeFairProbabilities,
  OddsDomainError,
} from './pipeline/fair-probability.js';
export { buildAbbreviationIndex, resolveTeamId } from './pipeline/team-resolver.js';
export { parsePollPayload, parseQuotedOdds, processPoll } from './pipeline/poll-processor.js';
export { payout, expectedValue, manualProbability, resolveProbabilities } from './pipeline/ev-calculator.js';
export { aggregateResults } from './pipeline/result-aggregator.js';
export {
  createAppState,
  runRefreshCycle,
  setManualProbability,
  clearManualProbabilities,
  type AppState,
  type CycleDeps,
  type CycleResult,
} from './pipeline/refresh-cycle.js';
export { buildOddsSnapshot, writeOddsSnapshot, type OddsSnapshot } from './snapshots/odds-snapshot.js';
