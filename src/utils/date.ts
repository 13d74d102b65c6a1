/** Calendar date (YYYY-MM-DD) of an instant as seen in the given IANA timezone. */
export function dateStringInZone(instant: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(instant);
}

/** Returns today's date as YYYY-MM-DD in the given timezone. */
export function todayDateString(timeZone: string, now: Date = new Date()): string {
  return dateStringInZone(now, timeZone);
}

/**
 * Parses a feed timestamp as UTC. The feed omits the offset
 * (e.g. '2026-10-19T23:00:00'), so a bare timestamp is read as UTC.
 */
export function parseUtcTimestamp(raw: string): Date | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const date = new Date(hasZone ? trimmed : `${trimmed}Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}
