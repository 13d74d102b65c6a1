export interface BookPrice {
  americanOdds: number;
  /** Point line; only set for spread-style bet types */
  line: number | null;
  lastModified: string;
}

export interface TeamSideOdds {
  teamId: string;
  /** bookId -> price */
  bookPrices: ReadonlyMap<string, BookPrice>;
}

/** A single matchup for "today" in the target league. */
export interface Event {
  id: string;
  name: string;
  leagueId: number;
  startTimeUtc: string;
  sides: readonly [TeamSideOdds, TeamSideOdds];
}
