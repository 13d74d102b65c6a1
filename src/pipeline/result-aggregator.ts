import type { PollEntry } from '../types/poll.js';
import type { FairProbability } from '../types/probability.js';
import type { EVReport, EVResult } from '../types/result.js';
import { expectedValue, resolveProbabilities } from './ev-calculator.js';

function hasTeam(entry: PollEntry): entry is PollEntry & { teamId: string } {
  return entry.teamId !== null;
}

/**
 * One row per poll entry with a resolved team. Rows without a probability go
 * to `missing`; the rest are sorted by EV, highest first, ties in poll order.
 */
export function aggregateResults(
  entries: readonly PollEntry[],
  computed: ReadonlyMap<string, FairProbability>,
  manual: ReadonlyMap<string, number>,
  generatedAt: Date = new Date(),
): EVReport {
  const probabilities = resolveProbabilities(computed, manual);
  const valid: EVResult[] = [];
  const missing: EVResult[] = [];
  const unresolved: PollEntry[] = [];

  for (const entry of entries) {
    if (!hasTeam(entry)) {
      unresolved.push(entry);
      continue;
    }
    const row = expectedValue(entry, probabilities.get(entry.teamId) ?? null);
    (row.isMissing ? missing : valid).push(row);
  }

  valid.sort((a, b) => b.expectedValue - a.expectedValue);

  return { valid, missing, unresolved, generatedAt: generatedAt.toISOString() };
}
