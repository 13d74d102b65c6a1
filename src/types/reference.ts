export interface MarketSource {
  id: string;
  name: string;
}

export interface Team {
  id: string;
  name: string;
  abbreviation: string;
  leagueId: number;
  eventId: string | null;
}

/** Immutable for the duration of a refresh cycle; rebuilt wholesale, never patched. */
export interface ReferenceDirectories {
  readonly marketSources: ReadonlyMap<string, MarketSource>;
  readonly teams: ReadonlyMap<string, Team>;
}
