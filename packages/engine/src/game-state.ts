/**
 * Game state reducer
 *
 * Replays the at-bat log over the lineup to derive inning, outs and the
 * batter due up. Pure: the same log and lineup always give the same state, so
 * nothing about the current position ever needs to be stored.
 */

import type { AtBatEvent, InGameState, Lineup, LineupEntry } from './types.js';
import { ValidationError } from './errors.js';
import { outCount } from './scoring-rules.js';

const OUTS_PER_INNING = 3;

function parseTimestamp(event: AtBatEvent): number {
  const ms = Date.parse(event.createdAt);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`At-bat ${event.id} has an invalid createdAt: '${event.createdAt}'`);
  }
  return ms;
}

/**
 * Log order: createdAt, then the client-assigned sequence (events without one
 * go after those with one), then id. Total, so input order never matters.
 */
function compareAtBats(
  a: { event: AtBatEvent; ms: number },
  b: { event: AtBatEvent; ms: number }
): number {
  if (a.ms !== b.ms) return a.ms - b.ms;

  const sa = a.event.sequence ?? Number.POSITIVE_INFINITY;
  const sb = b.event.sequence ?? Number.POSITIVE_INFINITY;
  if (sa !== sb) return sa < sb ? -1 : 1;

  if (a.event.id === b.event.id) return 0;
  return a.event.id < b.event.id ? -1 : 1;
}

/**
 * Sort at-bats into log order. Throws ValidationError on an unparseable
 * timestamp.
 */
export function sortAtBats<T extends AtBatEvent>(events: readonly T[]): T[] {
  return events
    .map((event) => ({ event, ms: parseTimestamp(event) }))
    .sort(compareAtBats)
    .map(({ event }) => event);
}

/**
 * Sort the lineup by batting order and check it can be batted through
 */
export function sortLineup(lineup: Lineup): LineupEntry[] {
  if (lineup.length === 0) {
    throw new ValidationError('Lineup cannot be empty');
  }

  const seen = new Set<number>();
  for (const entry of lineup) {
    if (!entry.playerId) {
      throw new ValidationError('Lineup entry is missing a playerId');
    }
    if (!Number.isInteger(entry.battingOrder) || entry.battingOrder < 1) {
      throw new ValidationError(
        `Invalid battingOrder ${entry.battingOrder} for player ${entry.playerId}`
      );
    }
    if (seen.has(entry.battingOrder)) {
      throw new ValidationError(`Duplicate battingOrder ${entry.battingOrder} in lineup`);
    }
    seen.add(entry.battingOrder);
  }

  return [...lineup].sort((a, b) => a.battingOrder - b.battingOrder);
}

function toOuts(outs: number): InGameState['outs'] {
  switch (outs) {
    case 0:
    case 1:
    case 2:
      return outs;
    default:
      throw new RangeError(`outs out of range: ${outs}`);
  }
}

/**
 * State at the first pitch of the game
 */
export function initialGameState(lineup: Lineup): InGameState {
  return compute([], lineup);
}

/**
 * Derive the current game state from the at-bat log
 *
 * Every at-bat, whatever its result, moves the lineup on by one batter.
 * Outs past the third roll into the next inning, so a triple play with
 * nobody out ends the inning.
 *
 * @throws ValidationError for an empty or malformed lineup or a malformed event
 */
export function compute(events: readonly AtBatEvent[], lineup: Lineup): InGameState {
  const order = sortLineup(lineup);

  for (const event of events) {
    if (typeof event.resultCode !== 'string') {
      throw new ValidationError(`At-bat ${event.id} has no result code`);
    }
  }
  const log = sortAtBats(events);

  let inning = 1;
  let outs = 0;
  let batterIndex = 0;

  for (const event of log) {
    outs += outCount(event.resultCode);
    while (outs >= OUTS_PER_INNING) {
      inning += 1;
      outs -= OUTS_PER_INNING;
    }

    batterIndex = (batterIndex + 1) % order.length;
  }

  return {
    inning,
    outs: toOuts(outs),
    batterIndex,
    batterPlayerId: order[batterIndex].playerId,
  };
}
