import fs from 'node:fs';
import path from 'node:path';
import { marketName } from '../pipeline/reference-store.js';
import type { Event, TeamSideOdds } from '../types/event.js';
import type { ReferenceDirectories } from '../types/reference.js';

export interface SnapshotBookEntry {
  odds: number;
  timestamp: string;
  market_name: string;
  line: number | null;
}

export type SnapshotSide = Record<string, SnapshotBookEntry>;

/**
 * `start_time`, `name` and `timestamp` plus one key per team id. Team ids are
 * numeric strings, so they never collide with the fixed keys.
 */
export interface SnapshotEvent {
  start_time: string;
  name: string;
  timestamp: string;
  [teamId: string]: string | SnapshotSide;
}

/** league key -> event id -> event */
export type OddsSnapshot = Record<string, Record<string, SnapshotEvent>>;

function sideEntries(side: TeamSideOdds, directories: ReferenceDirectories): SnapshotSide {
  const out: SnapshotSide = {};
  for (const [bookId, price] of side.bookPrices) {
    out[bookId] = {
      odds: price.americanOdds,
      timestamp: price.lastModified,
      market_name: marketName(directories, bookId),
      line: price.line,
    };
  }
  return out;
}

export function buildOddsSnapshot(
  eventsByLeague: Readonly<Record<string, ReadonlyMap<string, Event>>>,
  directories: ReferenceDirectories,
  generatedAt: Date = new Date(),
): OddsSnapshot {
  const snapshot: OddsSnapshot = {};
  const timestamp = generatedAt.toISOString();

  for (const [leagueKey, events] of Object.entries(eventsByLeague)) {
    const league: Record<string, SnapshotEvent> = {};
    for (const event of events.values()) {
      const [sideA, sideB] = event.sides;
      league[event.id] = {
        start_time: event.startTimeUtc,
        name: event.name,
        timestamp,
        [sideA.teamId]: sideEntries(sideA, directories),
        [sideB.teamId]: sideEntries(sideB, directories),
      };
    }
    snapshot[leagueKey] = league;
  }

  return snapshot;
}

export function writeOddsSnapshot(filePath: string, snapshot: OddsSnapshot): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2));
}
