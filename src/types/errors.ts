export type FetchSource = 'token' | 'odds-feed' | 'reference' | 'poll-ids' | 'poll';

/** Non-success status, timeout or transport exception on a network call. */
export interface TransportFailure {
  kind: 'transport';
  source: FetchSource;
  status: number | null;
  message: string;
}

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: TransportFailure };
