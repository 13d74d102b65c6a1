export interface BookFairProbability {
  bookId: string;
  book: string;
  teamOdds: number;
  opponentOdds: number;
  fairProbability: number;
}

export interface FairProbability {
  teamId: string;
  meanProbability: number;
  perBookDetail: BookFairProbability[];
}

export type ProbabilitySource = 'market' | 'manual';

export interface ResolvedProbability {
  probability: number;
  source: ProbabilitySource;
}
