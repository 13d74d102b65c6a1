export type { MarketSource, Team, ReferenceDirectories } from './reference.js';
export type { BookPrice, TeamSideOdds, Event } from './event.js';
export type { PollOption, PollEntry, ProcessedPoll } from './poll.js';
export type {
  BookFairProbability,
  FairProbability,
  ProbabilitySource,
  ResolvedProbability,
} from './probability.js';
export type { EVResult, EVReport } from './result.js';
export type { FetchSource, TransportFailure, FetchResult } from './errors.js';
