import type { PollEntry } from '../types/poll.js';
import type { FairProbability, ResolvedProbability } from '../types/probability.js';
import type { EVResult } from '../types/result.js';
import { OddsDomainError, isValidAmericanOdds, pairFairProbability } from './fair-probability.js';

export const RANK_BONUS_PER_PLACE = 20;
const NOTIONAL_STAKE = 100;

/**
 * Poll payout: a fixed bonus per rank place plus the return on a notional
 * $100 stake at the poll-quoted price.
 */
export function payout(rank: number, americanOdds: number): number {
  const rankBonus = RANK_BONUS_PER_PLACE * rank;
  const oddsPayout =
    americanOdds < 0 ? (NOTIONAL_STAKE / Math.abs(americanOdds)) * NOTIONAL_STAKE : americanOdds;
  return rankBonus + oddsPayout;
}

/** Score a resolved poll entry. A null probability yields a missing row with EV 0. */
export function expectedValue(
  entry: PollEntry & { teamId: string },
  probability: ResolvedProbability | null,
): EVResult {
  const entryPayout = payout(entry.rank, entry.americanOdds);
  const base = {
    team: entry.label,
    teamId: entry.teamId,
    rank: entry.rank,
    realOdds: entry.americanOdds,
    payout: entryPayout,
  };

  if (!probability) {
    return { ...base, fairProbability: null, probabilitySource: null, expectedValue: 0, isMissing: true };
  }

  return {
    ...base,
    fairProbability: probability.probability,
    probabilitySource: probability.source,
    expectedValue: entryPayout * probability.probability,
    isMissing: false,
  };
}

/** Fair probability from two user-entered prices for the same matchup. */
export function manualProbability(teamOdds: number, opponentOdds: number): number {
  if (!isValidAmericanOdds(teamOdds) || !isValidAmericanOdds(opponentOdds)) {
    throw new OddsDomainError('Manual odds must be non-zero integers');
  }
  return pairFairProbability(teamOdds, opponentOdds);
}

/** Manual probabilities win over computed ones for the same team. */
export function resolveProbabilities(
  computed: ReadonlyMap<string, FairProbability>,
  manual: ReadonlyMap<string, number>,
): Map<string, ResolvedProbability> {
  const resolved = new Map<string, ResolvedProbability>();
  for (const [teamId, fair] of computed) {
    resolved.set(teamId, { probability: fair.meanProbability, source: 'market' });
  }
  for (const [teamId, probability] of manual) {
    resolved.set(teamId, { probability, source: 'manual' });
  }
  return resolved;
}
