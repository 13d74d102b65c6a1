import type { ReferenceDirectories } from '../types/reference.js';
import { teamsForLeague } from './reference-store.js';

/** abbreviation -> team id, for a single league */
export type AbbreviationIndex = ReadonlyMap<string, string>;

/**
 * Index a league's teams by abbreviation. Abbreviations are only unique
 * within a league, so the index is always built for one league.
 */
export function buildAbbreviationIndex(directories: ReferenceDirectories, leagueId: number): AbbreviationIndex {
  const index = new Map<string, string>();
  for (const team of teamsForLeague(directories, leagueId)) {
    index.set(team.abbreviation, team.id);
  }
  return index;
}

/** Exact, case-sensitive abbreviation match. */
export function resolveTeamId(index: AbbreviationIndex, label: string): string | null {
  return index.get(label) ?? null;
}
