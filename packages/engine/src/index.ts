/**
 * @scorebook/engine - Derived game state
 *
 * Classifies recorded result codes and replays the at-bat log of a game
 * into its current inning, outs and batter.
 */

// Core types
export type {
  ResultCode,
  HitLocation,
  AtBatEvent,
  LineupEntry,
  Lineup,
  InGameState,
} from './types.js';

export { ValidationError } from './errors.js';

// Result code classification
export {
  SINGLE_OUT_CODES,
  HIT_CODES,
  WALK_CODES,
  HIT_BY_PITCH_CODES,
  MISPLAY_REACH_CODES,
  normalizeResultCode,
  isOut,
  outCount,
  isHit,
  isWalk,
  isHitByPitch,
  reachesBase,
} from './scoring-rules.js';

// Reducer
export { compute, initialGameState, sortAtBats, sortLineup } from './game-state.js';
