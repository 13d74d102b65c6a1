import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { marketSourceRecordSchema, teamRecordSchema, type OddsFeed } from '../fetchers/feed-schema.js';
import { fetchReferenceFeed, type OddsFetchOptions } from '../fetchers/odds-fetcher.js';
import type { FetchResult } from '../types/errors.js';
import type { MarketSource, ReferenceDirectories, Team } from '../types/reference.js';
import { logger } from '../utils/logger.js';

export const MARKET_SOURCES_FILE = 'market_sources.json';
export const TEAMS_FILE = 'teams.json';

const marketSourcesFileSchema = z.record(z.string());

const teamsFileSchema = z.record(
  z.object({
    name: z.string(),
    abbreviation: z.string(),
    eventId: z.string().nullable().default(null),
    leagueId: z.number().int(),
  }),
);

/** Build both directories from a feed. Malformed records are skipped. */
export function buildReferenceDirectories(feed: OddsFeed): ReferenceDirectories {
  const marketSources = new Map<string, MarketSource>();
  let skipped = 0;

  for (const raw of feed.marketSources) {
    const parsed = marketSourceRecordSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    marketSources.set(parsed.data.id, parsed.data);
  }

  const teams = new Map<string, Team>();
  for (const raw of Object.values(feed.teams)) {
    const parsed = teamRecordSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const { id, name, abbreviation, leagueId, eventId } = parsed.data;
    teams.set(id, { id, name, abbreviation, leagueId, eventId: eventId ?? null });
  }

  logger.info(
    { marketSources: marketSources.size, teams: teams.size, skipped },
    'Reference directories built',
  );
  return { marketSources, teams };
}

/** Fetch the unversioned feed and build directories from it. */
export async function fetchReferenceDirectories(
  options: OddsFetchOptions = {},
): Promise<FetchResult<ReferenceDirectories>> {
  const feed = await fetchReferenceFeed(options);
  if (!feed.ok) return feed;
  return { ok: true, value: buildReferenceDirectories(feed.value) };
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    logger.warn({ path: filePath, err }, 'Could not parse directory file');
    return undefined;
  }
}

/**
 * Load the directory files written by `saveReferenceDirectories`.
 * A missing or unreadable file yields an empty directory.
 */
export function loadReferenceDirectories(dir: string): ReferenceDirectories {
  const marketSources = new Map<string, MarketSource>();
  const teams = new Map<string, Team>();

  const marketsPath = path.join(dir, MARKET_SOURCES_FILE);
  const markets = marketSourcesFileSchema.safeParse(readJsonFile(marketsPath));
  if (markets.success) {
    for (const [id, name] of Object.entries(markets.data)) {
      marketSources.set(id, { id, name });
    }
  } else {
    logger.warn({ path: marketsPath }, 'Market source directory missing or malformed');
  }

  const teamsPath = path.join(dir, TEAMS_FILE);
  const teamRecords = teamsFileSchema.safeParse(readJsonFile(teamsPath));
  if (teamRecords.success) {
    for (const [id, team] of Object.entries(teamRecords.data)) {
      teams.set(id, { id, ...team });
    }
  } else {
    logger.warn({ path: teamsPath }, 'Team directory missing or malformed');
  }

  return { marketSources, teams };
}

export function saveReferenceDirectories(dir: string, directories: ReferenceDirectories): void {
  fs.mkdirSync(dir, { recursive: true });

  const markets: Record<string, string> = {};
  for (const source of directories.marketSources.values()) {
    markets[source.id] = source.name;
  }

  const teams: Record<string, z.infer<typeof teamsFileSchema>[string]> = {};
  for (const team of directories.teams.values()) {
    teams[team.id] = {
      name: team.name,
      abbreviation: team.abbreviation,
      eventId: team.eventId,
      leagueId: team.leagueId,
    };
  }

  fs.writeFileSync(path.join(dir, MARKET_SOURCES_FILE), JSON.stringify(markets, null, 2));
  fs.writeFileSync(path.join(dir, TEAMS_FILE), JSON.stringify(teams, null, 2));
}

/** Display name for a book, or a `Book {id}` placeholder when unknown. */
export function marketName(directories: ReferenceDirectories, bookId: string): string {
  return directories.marketSources.get(bookId)?.name ?? `Book ${bookId}`;
}

export function teamsForLeague(directories: ReferenceDirectories, leagueId: number): Team[] {
  return [...directories.teams.values()].filter((t) => t.leagueId === leagueId);
}
