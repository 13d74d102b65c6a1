import { z } from 'zod';

/** Feed ids arrive as numbers or numeric strings; they are keyed as strings everywhere else. */
export const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const marketSourceRecordSchema = z.object({
  id: idSchema,
  name: z.string(),
});

export const teamRecordSchema = z.object({
  id: idSchema,
  name: z.string(),
  abbreviation: z.string(),
  leagueId: z.coerce.number().int(),
  eventId: idSchema.nullish(),
});

export const bookLineSchema = z.object({
  marketSourceId: idSchema,
  americanPrice: z.number().int().refine((v) => v !== 0, 'American odds cannot be 0'),
  points: z.number().nullish(),
  modifiedOn: z.string().nullish().transform((v) => v ?? ''),
});

export const betTypeLinesSchema = z.record(z.unknown());

export const feedEventSchema = z.object({
  eventId: idSchema,
  eventStart: z.string(),
  name: z.string().nullish().transform((v) => v ?? ''),
  eventTeams: z.object({
    '0': z.object({ id: idSchema }),
    '1': z.object({ id: idSchema }),
  }),
  // odds-source key -> bet-type tag -> line; validated one source at a time
  gameOddsMarketSourcesLines: z.record(z.unknown()).default({}),
});

/** One league's event list; checked only for the league being normalized. */
export const leagueEventsSchema = z.array(z.unknown());

/**
 * Top-level shape only. Events, books, teams and market sources are checked
 * individually so one malformed record never discards the feed.
 */
export const oddsFeedSchema = z.object({
  marketSources: z.array(z.unknown()).catch([]),
  teams: z.record(z.unknown()).catch({}),
  gameOddsEvents: z
    .record(z.unknown())
    .nullish()
    .transform((v) => v ?? {}),
});

export type OddsFeed = z.infer<typeof oddsFeedSchema>;
export type FeedEvent = z.infer<typeof feedEventSchema>;
export type BookLine = z.infer<typeof bookLineSchema>;
