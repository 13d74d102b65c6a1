import { describe, it, expect } from 'vitest';
import { dateStringInZone, parseUtcTimestamp, todayDateString } from '../../src/utils/date.js';

describe('date utils', () => {
  it('should format the calendar date in the given zone', () => {
    const instant = new Date('2026-10-20T02:30:00Z');
    expect(dateStringInZone(instant, 'America/New_York')).toBe('2026-10-19');
    expect(dateStringInZone(instant, 'UTC')).toBe('2026-10-20');
  });

  it('should take today from the supplied clock', () => {
    expect(todayDateString('America/New_York', new Date('2026-10-19T03:59:00Z'))).toBe('2026-10-18');
  });

  it('should read bare feed timestamps as UTC', () => {
    expect(parseUtcTimestamp('2026-10-19T23:00:00')?.toISOString()).toBe('2026-10-19T23:00:00.000Z');
    expect(parseUtcTimestamp('2026-10-19T23:00:00Z')?.toISOString()).toBe('2026-10-19T23:00:00.000Z');
    expect(parseUtcTimestamp('2026-10-19T19:00:00-04:00')?.toISOString()).toBe('2026-10-19T23:00:00.000Z');
  });

  it('should reject unreadable timestamps', () => {
    expect(parseUtcTimestamp('')).toBeNull();
    expect(parseUtcTimestamp('tomorrow')).toBeNull();
  });
});
