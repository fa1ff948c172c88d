/**
 * Core types for derived game state
 */

/**
 * Result code as recorded by the scorer (K, BB, 1B, F8, DP, ...).
 * Free-form on the wire; classified by scoring-rules.ts.
 */
export type ResultCode = string;

/**
 * Normalized hit location on the field diagram, both axes in 0..1
 */
export interface HitLocation {
  x: number;
  y: number;
}

/**
 * One recorded plate appearance.
 *
 * Created once and never mutated in place. An edit replaces fields but keeps
 * `id`, `createdAt` and `sequence`, so the event keeps its place in the log.
 */
export interface AtBatEvent {
  id: string;
  gameId: string;
  teamId?: string;
  playerId: string;
  resultCode: ResultCode;
  /** Inning and outs as seen by the scorer when the at-bat was recorded */
  inning: number;
  outs: number;
  battingOrder?: number;
  hitLocation?: HitLocation;
  hitType?: string;
  rbis?: number;
  /** ISO-8601 */
  createdAt: string;
  updatedAt: string;
  /**
   * Monotonic creation number assigned by the client that recorded the event.
   * Breaks ties between events created within the same clock tick.
   */
  sequence?: number;
}

export interface LineupEntry {
  playerId: string;
  battingOrder: number;
}

export type Lineup = readonly LineupEntry[];

/**
 * Current game position derived from the at-bat log.
 * Only game-state.ts constructs values of this type.
 */
export interface InGameState {
  readonly inning: number;
  readonly outs: 0 | 1 | 2;
  readonly batterIndex: number;
  readonly batterPlayerId: string;
}
