import { describe, it, expect } from 'vitest';
import { normalizeEvents } from '../../src/pipeline/event-normalizer.js';
import { oddsFeedSchema } from '../../src/fetchers/feed-schema.js';
import { FIXTURE_NOW, loadFeedFixture } from '../helpers/fixture-loader.js';

describe('normalizeEvents', () => {
  const feed = loadFeedFixture();
  const options = { now: FIXTURE_NOW, timeZone: 'America/New_York' };

  it("should keep only today's events in the reference timezone", () => {
    const events = normalizeEvents(feed, 6, options);
    // 102 starts 02:30 UTC on the 20th, which is still the 19th in New York
    expect([...events.keys()]).toEqual(['101', '102', '105']);
  });

  it('should stop at the first non-matching event when asked to', () => {
    const events = normalizeEvents(feed, 6, { ...options, stopAtFirstMismatch: true });
    expect([...events.keys()]).toEqual(['101', '102']);
  });

  it('should drop everything when today is a different date', () => {
    const events = normalizeEvents(feed, 6, { ...options, now: new Date('2026-10-21T16:00:00Z') });
    expect(events.size).toBe(0);
  });

  it('should extract both sides with team ids and event metadata', () => {
    const event = normalizeEvents(feed, 6, options).get('101');
    expect(event).toMatchObject({
      id: '101',
      name: 'Boston Bruins @ Toronto Maple Leafs',
      leagueId: 6,
      startTimeUtc: '2026-10-19T23:00:00',
    });
    expect(event?.sides[0].teamId).toBe('11');
    expect(event?.sides[1].teamId).toBe('12');
  });

  it('should read the moneyline tag for hockey and skip books without it', () => {
    const event = normalizeEvents(feed, 6, options).get('101');
    // book 4 only quotes bt2; book 6 is malformed; ev:summary is not a side
    expect([...(event?.sides[0].bookPrices.keys() ?? [])]).toEqual(['1', '2', '3', '5']);
    expect([...(event?.sides[1].bookPrices.keys() ?? [])]).toEqual(['1', '2', '3']);
    expect(event?.sides[0].bookPrices.get('1')).toEqual({
      americanOdds: 130,
      line: null,
      lastModified: '2026-10-19T14:00:00',
    });
  });

  it('should read the spread tag with its line for other leagues', () => {
    const event = normalizeEvents(feed, 3, options).get('201');
    expect([...(event?.sides[0].bookPrices.keys() ?? [])]).toEqual(['1']);
    expect(event?.sides[0].bookPrices.get('1')).toEqual({
      americanOdds: -108,
      line: -4.5,
      lastModified: '2026-10-19T15:00:00',
    });
    expect(event?.sides[1].bookPrices.get('1')?.line).toBe(4.5);
  });

  it('should return an empty map for a league missing from the feed', () => {
    expect(normalizeEvents(feed, 1, options).size).toBe(0);
  });

  it('should skip events with an unreadable start time', () => {
    const bad = oddsFeedSchema.parse({
      gameOddsEvents: {
        'lg6:pt1:pregame': [
          {
            eventId: 1,
            eventStart: 'not a date',
            name: 'x',
            eventTeams: { '0': { id: 1 }, '1': { id: 2 } },
            gameOddsMarketSourcesLines: {},
          },
        ],
      },
    });
    expect(normalizeEvents(bad, 6, options).size).toBe(0);
  });

  it('should accept start times that carry an explicit offset', () => {
    const withZone = oddsFeedSchema.parse({
      gameOddsEvents: {
        'lg6:pt1:pregame': [
          {
            eventId: 7,
            eventStart: '2026-10-19T19:00:00-04:00',
            eventTeams: { '0': { id: 1 }, '1': { id: 2 } },
          },
        ],
      },
    });
    const event = normalizeEvents(withZone, 6, options).get('7');
    expect(event?.name).toBe('');
    expect(event?.sides[0].bookPrices.size).toBe(0);
  });

  it('should skip a book quoting zero odds', () => {
    const zero = oddsFeedSchema.parse({
      gameOddsEvents: {
        'lg6:pt1:pregame': [
          {
            eventId: 8,
            eventStart: '2026-10-19T23:00:00',
            name: 'zero',
            eventTeams: { '0': { id: 1 }, '1': { id: 2 } },
            gameOddsMarketSourcesLines: {
              'si0:ms1:an0': { bt1: { marketSourceId: 1, americanPrice: 0, modifiedOn: '2026-10-19T12:00:00' } },
            },
          },
        ],
      },
    });
    expect(normalizeEvents(zero, 6, options).get('8')?.sides[0].bookPrices.size).toBe(0);
  });

  it('should skip an odds source that is not an object and keep the rest of the event', () => {
    const mixed = oddsFeedSchema.parse({
      gameOddsEvents: {
        'lg6:pt1:pregame': [
          {
            eventId: 9,
            eventStart: '2026-10-19T23:00:00',
            name: 'mixed',
            eventTeams: { '0': { id: 1 }, '1': { id: 2 } },
            gameOddsMarketSourcesLines: {
              'si0:ms1:an0': 'broken',
              'si1:ms1:an0': { bt1: { marketSourceId: 1, americanPrice: -120, modifiedOn: '2026-10-19T12:00:00' } },
            },
          },
        ],
      },
    });
    const event = normalizeEvents(mixed, 6, options).get('9');
    expect(event?.sides[0].bookPrices.size).toBe(0);
    expect(event?.sides[1].bookPrices.get('1')?.americanOdds).toBe(-120);
  });

  it('should return an empty map when the league entry is not a list', () => {
    const feedWithNull = oddsFeedSchema.parse({ gameOddsEvents: { 'lg6:pt1:pregame': null } });
    expect(normalizeEvents(feedWithNull, 6, options).size).toBe(0);
  });

  it('should keep events and books whose name or modification time is null', () => {
    const nulls = oddsFeedSchema.parse({
      gameOddsEvents: {
        'lg6:pt1:pregame': [
          {
            eventId: 10,
            eventStart: '2026-10-19T23:00:00',
            name: null,
            eventTeams: { '0': { id: 1 }, '1': { id: 2 } },
            gameOddsMarketSourcesLines: {
              'si0:ms1:an0': { bt1: { marketSourceId: 1, americanPrice: 140, modifiedOn: null } },
              'si1:ms1:an0': { bt1: { marketSourceId: 1, americanPrice: -160, modifiedOn: '2026-10-19T12:00:00' } },
            },
          },
        ],
      },
    });
    const event = normalizeEvents(nulls, 6, options).get('10');
    expect(event?.name).toBe('');
    expect(event?.sides[0].bookPrices.get('1')).toEqual({ americanOdds: 140, line: null, lastModified: '' });
    expect(event?.sides[1].bookPrices.get('1')?.americanOdds).toBe(-160);
  });
});
