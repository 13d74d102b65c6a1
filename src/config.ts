import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ODDS_FEED_URL: z.string().url().default('https://content.unabated.com/markets/game-odds/b_gameodds.json'),
  POLL_IDS_URL: z.string().url().default('https://dotd-ids.tomfconreal.workers.dev/'),
  /** `{pollId}` is replaced with the id looked up from POLL_IDS_URL */
  POLL_URL_TEMPLATE: z
    .string()
    .default('https://dotd.tomfconreal.workers.dev/?url=https://api.real.vg/polls/{pollId}'),
  FEED_TOKEN: z.string().optional(),
  REFERENCE_DIR: z.string().default('./reference'),
  SNAPSHOT_PATH: z.string().default('./snapshots/odds.json'),
  REFERENCE_TIMEZONE: z.string().default('America/New_York'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  TOKEN_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  POLL_SPORT: z.string().default('nhl'),
  LEAGUE: z.string().default('nhl'),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
