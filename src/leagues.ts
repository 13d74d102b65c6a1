export const LEAGUE_IDS = {
  nfl: 1,
  cfb: 2,
  nba: 3,
  cbb: 4,
  mlb: 5,
  nhl: 6,
  wnba: 7,
  pga: 8,
} as const;

export type LeagueSlug = keyof typeof LEAGUE_IDS;

/** bt1 = moneyline, bt2 = spread-style (carries a point line). */
export type BetTypeTag = 'bt1' | 'bt2';

/**
 * Bet type read from each book entry, per league. Leagues scored without a
 * spread (hockey) are priced off the moneyline tag.
 */
export const BET_TYPE_BY_LEAGUE: Readonly<Record<number, BetTypeTag>> = {
  [LEAGUE_IDS.nfl]: 'bt2',
  [LEAGUE_IDS.cfb]: 'bt2',
  [LEAGUE_IDS.nba]: 'bt2',
  [LEAGUE_IDS.cbb]: 'bt2',
  [LEAGUE_IDS.mlb]: 'bt2',
  [LEAGUE_IDS.nhl]: 'bt1',
  [LEAGUE_IDS.wnba]: 'bt2',
  [LEAGUE_IDS.pga]: 'bt2',
};

const DEFAULT_BET_TYPE: BetTypeTag = 'bt2';

export function betTypeForLeague(leagueId: number): BetTypeTag {
  return BET_TYPE_BY_LEAGUE[leagueId] ?? DEFAULT_BET_TYPE;
}

export function betTypeCarriesLine(betType: BetTypeTag): boolean {
  return betType === 'bt2';
}

/** Key of a league's pregame events inside the odds feed. */
export function leagueFeedKey(leagueId: number): string {
  return `lg${leagueId}:pt1:pregame`;
}

export function isLeagueSlug(value: string): value is LeagueSlug {
  return Object.hasOwn(LEAGUE_IDS, value);
}

export function leagueIdFor(slug: string): number | null {
  return isLeagueSlug(slug) ? LEAGUE_IDS[slug] : null;
}
