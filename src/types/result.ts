import type { PollEntry } from './poll.js';
import type { ProbabilitySource } from './probability.js';

export interface EVResult {
  team: string;
  teamId: string;
  rank: number;
  realOdds: number;
  payout: number;
  fairProbability: number | null;
  probabilitySource: ProbabilitySource | null;
  /** 0 when isMissing; never compared against real EVs */
  expectedValue: number;
  isMissing: boolean;
}

export interface EVReport {
  /** Sorted by expected value, descending */
  valid: EVResult[];
  /** No market or manual probability; candidates for manual entry */
  missing: EVResult[];
  /** Poll entries whose label matched no team in the league */
  unresolved: PollEntry[];
  generatedAt: string;
}
