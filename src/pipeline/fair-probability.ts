/**
 * No-vig probability engine.
 *
 * Each book's two-sided price is converted to implied probabilities and the
 * overround is removed proportionally (p1 / (p1 + p2)). The event-level fair
 * probability is the plain mean across qualifying books.
 */

import type { Event } from '../types/event.js';
import type { BookFairProbability, FairProbability } from '../types/probability.js';
import type { ReferenceDirectories } from '../types/reference.js';
import { logger } from '../utils/logger.js';
import { marketName } from './reference-store.js';

/** Both sides at -110 is a book's placeholder, not a real quote. */
export const PLACEHOLDER_ODDS = -110;

/** Returned by probToAmerican for a certain outcome. */
export const CERTAIN_ODDS_SENTINEL = -10000;

export class OddsDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OddsDomainError';
  }
}

export function isValidAmericanOdds(odds: number): boolean {
  return Number.isInteger(odds) && odds !== 0;
}

export function americanToProb(odds: number): number {
  if (!isValidAmericanOdds(odds)) {
    throw new OddsDomainError(`Invalid American odds: ${odds}`);
  }
  if (odds > 0) return 100 / (odds + 100);
  const risk = Math.abs(odds);
  return risk / (risk + 100);
}

/** Fair probability of the first side after removing the pair's overround. */
export function pairFairProbability(odds1: number, odds2: number): number {
  const p1 = americanToProb(odds1);
  const p2 = americanToProb(odds2);
  return p1 / (p1 + p2);
}

/** Display/debug inverse of americanToProb, truncated toward zero. */
export function probToAmerican(prob: number): number {
  if (prob <= 0) return 0;
  if (prob >= 1) return CERTAIN_ODDS_SENTINEL;
  if (prob > 0.5) return Math.trunc(-(prob * 100) / (1 - prob));
  return Math.trunc(((1 - prob) * 100) / prob);
}

export function isPlaceholderPair(odds1: number, odds2: number): boolean {
  return odds1 === PLACEHOLDER_ODDS && odds2 === PLACEHOLDER_ODDS;
}

export function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Per-book fair probabilities for the event's first side. */
export function bookPairsForEvent(event: Event, directories: ReferenceDirectories): BookFairProbability[] {
  const [sideA, sideB] = event.sides;
  const pairs: BookFairProbability[] = [];

  for (const [bookId, priceA] of sideA.bookPrices) {
    const priceB = sideB.bookPrices.get(bookId);
    if (!priceB) continue;

    const teamOdds = priceA.americanOdds;
    const opponentOdds = priceB.americanOdds;
    if (isPlaceholderPair(teamOdds, opponentOdds)) continue;
    if (!isValidAmericanOdds(teamOdds) || !isValidAmericanOdds(opponentOdds)) {
      logger.debug({ eventId: event.id, bookId, teamOdds, opponentOdds }, 'Skipping book with invalid odds');
      continue;
    }

    pairs.push({
      bookId,
      book: marketName(directories, bookId),
      teamOdds,
      opponentOdds,
      fairProbability: pairFairProbability(teamOdds, opponentOdds),
    });
  }

  return pairs;
}

function mirror(pair: BookFairProbability): BookFairProbability {
  return {
    bookId: pair.bookId,
    book: pair.book,
    teamOdds: pair.opponentOdds,
    opponentOdds: pair.teamOdds,
    fairProbability: 1 - pair.fairProbability,
  };
}

/**
 * Fair probability for both teams of every event that has at least one
 * qualifying book. Teams of events with none are absent from the result.
 */
export function computeFairProbabilities(
  events: ReadonlyMap<string, Event>,
  directories: ReferenceDirectories,
): Map<string, FairProbability> {
  const result = new Map<string, FairProbability>();
  let withoutBooks = 0;

  for (const event of events.values()) {
    const pairs = bookPairsForEvent(event, directories);
    if (pairs.length === 0) {
      withoutBooks++;
      continue;
    }

    const meanA = mean(pairs.map((p) => p.fairProbability));
    const [sideA, sideB] = event.sides;

    result.set(sideA.teamId, { teamId: sideA.teamId, meanProbability: meanA, perBookDetail: pairs });
    result.set(sideB.teamId, {
      teamId: sideB.teamId,
      meanProbability: 1 - meanA,
      perBookDetail: pairs.map(mirror),
    });
  }

  logger.debug({ teams: result.size, eventsWithoutBooks: withoutBooks }, 'Fair probabilities computed');
  return result;
}
