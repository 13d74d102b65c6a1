export interface PollOption {
  label: string;
  /** Quoted American odds as sent by the poll, e.g. '+145' */
  odds: string;
  count: number;
}

export interface PollEntry {
  label: string;
  americanOdds: number;
  voteCount: number;
  /** 1-based, by descending votes */
  rank: number;
  teamId: string | null;
}

export interface ProcessedPoll {
  entries: PollEntry[];
  totalVotes: number;
}
