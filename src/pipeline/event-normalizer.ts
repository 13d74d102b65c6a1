import { config } from '../config.js';
import { betTypeLinesSchema, bookLineSchema, feedEventSchema, leagueEventsSchema, type FeedEvent, type OddsFeed } from '../fetchers/feed-schema.js';
import { betTypeCarriesLine, betTypeForLeague, leagueFeedKey, type BetTypeTag } from '../leagues.js';
import type { BookPrice, Event } from '../types/event.js';
import { dateStringInZone, parseUtcTimestamp, todayDateString } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export interface NormalizeOptions {
  now?: Date;
  timeZone?: string;
  /**
   * Stop at the first event not on today's date. Only safe when the feed is
   * known to be in chronological order.
   */
  stopAtFirstMismatch?: boolean;
}

const SIDE_PREFIXES = ['si0', 'si1'] as const;

function sideIndexOf(sourceKey: string): 0 | 1 | null {
  const prefix = sourceKey.slice(0, 3);
  if (prefix === SIDE_PREFIXES[0]) return 0;
  if (prefix === SIDE_PREFIXES[1]) return 1;
  return null;
}

function extractBookPrices(
  event: FeedEvent,
  betType: BetTypeTag,
): [Map<string, BookPrice>, Map<string, BookPrice>] {
  const sides: [Map<string, BookPrice>, Map<string, BookPrice>] = [new Map(), new Map()];
  const withLine = betTypeCarriesLine(betType);

  for (const [sourceKey, rawSource] of Object.entries(event.gameOddsMarketSourcesLines)) {
    const sideIndex = sideIndexOf(sourceKey);
    if (sideIndex === null) continue;

    const byBetType = betTypeLinesSchema.safeParse(rawSource);
    if (!byBetType.success) {
      logger.debug({ eventId: event.eventId, sourceKey }, 'Skipping malformed odds source');
      continue;
    }

    const raw = byBetType.data[betType];
    if (raw === undefined || raw === null) continue;

    const parsed = bookLineSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug({ eventId: event.eventId, sourceKey }, 'Skipping malformed book entry');
      continue;
    }

    const line = parsed.data;
    sides[sideIndex].set(line.marketSourceId, {
      americanOdds: line.americanPrice,
      line: withLine ? (line.points ?? null) : null,
      lastModified: line.modifiedOn,
    });
  }

  return sides;
}

/**
 * Pick today's events for a league out of the feed and reshape each into two
 * sides with per-book prices. Events and books that fail extraction are
 * skipped; they never abort the rest of the feed.
 */
export function normalizeEvents(
  feed: OddsFeed,
  leagueId: number,
  options: NormalizeOptions = {},
): Map<string, Event> {
  const timeZone = options.timeZone ?? config.REFERENCE_TIMEZONE;
  const today = todayDateString(timeZone, options.now);
  const betType = betTypeForLeague(leagueId);
  const log = logger.child({ component: 'event-normalizer', leagueId, today });

  const events = new Map<string, Event>();
  const rawEvents = leagueEventsSchema.safeParse(feed.gameOddsEvents[leagueFeedKey(leagueId)]);
  if (!rawEvents.success) {
    log.info('No events for league in feed');
    return events;
  }

  let skipped = 0;
  for (const raw of rawEvents.data) {
    const parsed = feedEventSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      log.debug({ issues: parsed.error.issues.length }, 'Skipping malformed event');
      continue;
    }

    const event = parsed.data;
    const start = parseUtcTimestamp(event.eventStart);
    if (!start) {
      skipped++;
      log.debug({ eventId: event.eventId, eventStart: event.eventStart }, 'Skipping event with bad start time');
      continue;
    }

    if (dateStringInZone(start, timeZone) !== today) {
      if (options.stopAtFirstMismatch) break;
      continue;
    }

    const [side0, side1] = extractBookPrices(event, betType);
    events.set(event.eventId, {
      id: event.eventId,
      name: event.name,
      leagueId,
      startTimeUtc: event.eventStart,
      sides: [
        { teamId: event.eventTeams['0'].id, bookPrices: side0 },
        { teamId: event.eventTeams['1'].id, bookPrices: side1 },
      ],
    });
  }

  log.info({ events: events.size, skipped, betType }, 'Events normalized');
  return events;
}
