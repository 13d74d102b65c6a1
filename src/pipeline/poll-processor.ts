import { z } from 'zod';
import type { PollEntry, PollOption, ProcessedPoll } from '../types/poll.js';
import { logger } from '../utils/logger.js';
import { resolveTeamId, type AbbreviationIndex } from './team-resolver.js';

const pollOptionSchema = z.object({
  label: z.string().min(1),
  odds: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? '' : String(v))),
  count: z.coerce.number().int().nonnegative(),
});

const pollPayloadSchema = z.object({
  poll: z.object({
    options: z.array(z.unknown()).default([]),
  }),
});

/** Extract the options of a raw poll payload. Malformed options are skipped. */
export function parsePollPayload(raw: unknown): PollOption[] {
  const payload = pollPayloadSchema.safeParse(raw);
  if (!payload.success) {
    logger.warn('Poll payload has no poll options');
    return [];
  }

  const options: PollOption[] = [];
  for (const rawOption of payload.data.poll.options) {
    const parsed = pollOptionSchema.safeParse(rawOption);
    if (!parsed.success) {
      logger.debug({ option: rawOption }, 'Skipping malformed poll option');
      continue;
    }
    options.push(parsed.data);
  }
  return options;
}

/** '+145' -> 145, '-120' -> -120; anything unparseable -> 0. */
export function parseQuotedOdds(text: string): number {
  const cleaned = text.trim().replace(/^\+/, '');
  if (!/^-?\d+$/.test(cleaned)) return 0;
  return parseInt(cleaned, 10);
}

/**
 * Resolve each option's team against one league's abbreviations and rank by
 * descending votes. Ties keep their original order; ranks are 1-based.
 */
export function processPoll(options: PollOption[], index: AbbreviationIndex): ProcessedPoll {
  let totalVotes = 0;
  const unranked = options.map((option) => {
    totalVotes += option.count;
    return {
      label: option.label,
      americanOdds: parseQuotedOdds(option.odds),
      voteCount: option.count,
      teamId: resolveTeamId(index, option.label),
    };
  });

  // Array.prototype.sort is stable
  const entries: PollEntry[] = [...unranked]
    .sort((a, b) => b.voteCount - a.voteCount)
    .map((entry, i) => ({ ...entry, rank: i + 1 }));

  return { entries, totalVotes };
}
