/**
 * Result code classification
 *
 * Single source of truth for what a recorded result code means. Codes are
 * compared after normalization (trimmed, uppercased). Unrecognized codes are
 * neither outs nor hits.
 */

import type { ResultCode } from './types.js';

export const SINGLE_OUT_CODES: readonly string[] = [
  'K', // strikeout
  'OUT',
  'FO',
  'GO',
  'PO',
  'LO',
  // fly outs by field
  'F7',
  'F8',
  'F9',
  // line outs by field
  'L7',
  'L8',
  'L9',
  // pop outs by infielder
  'P3',
  'P4',
  'P5',
  'P6',
  // ground outs by infielder
  'G3',
  'G4',
  'G5',
  'G6',
  // sacrifices are outs for the batter
  'SF',
  'SH',
  'SAC',
];

export const HIT_CODES: readonly string[] = [
  '1B',
  '2B',
  '3B',
  'HR',
  'SINGLE',
  'DOUBLE',
  'TRIPLE',
  'HOMERUN',
  'HOME_RUN',
];

export const WALK_CODES: readonly string[] = ['BB', 'BASE_ON_BALLS', 'WALK'];

export const HIT_BY_PITCH_CODES: readonly string[] = ['HBP', 'HIT_BY_PITCH'];

/** Batter reaches without a hit: error or fielder's choice */
export const MISPLAY_REACH_CODES: readonly string[] = ['E', 'ERROR', 'FC', 'FIELDERS_CHOICE'];

export function normalizeResultCode(code: ResultCode): string {
  return code.trim().toUpperCase();
}

function isTriplePlay(normalized: string): boolean {
  return normalized.startsWith('TP') || normalized === 'TRIPLE_PLAY';
}

function isDoublePlay(normalized: string): boolean {
  return normalized.startsWith('DP') || normalized === 'DOUBLE_PLAY';
}

export function isOut(code: ResultCode): boolean {
  const normalized = normalizeResultCode(code);
  return (
    SINGLE_OUT_CODES.includes(normalized) || isDoublePlay(normalized) || isTriplePlay(normalized)
  );
}

/**
 * Number of outs recorded on the play: 3 for a triple play, 2 for a double
 * play, 1 for any other out, 0 otherwise.
 */
export function outCount(code: ResultCode): number {
  const normalized = normalizeResultCode(code);

  if (isTriplePlay(normalized)) return 3;
  if (isDoublePlay(normalized)) return 2;
  return SINGLE_OUT_CODES.includes(normalized) ? 1 : 0;
}

export function isHit(code: ResultCode): boolean {
  return HIT_CODES.includes(normalizeResultCode(code));
}

export function isWalk(code: ResultCode): boolean {
  return WALK_CODES.includes(normalizeResultCode(code));
}

export function isHitByPitch(code: ResultCode): boolean {
  return HIT_BY_PITCH_CODES.includes(normalizeResultCode(code));
}

export function reachesBase(code: ResultCode): boolean {
  return (
    isHit(code) ||
    isWalk(code) ||
    isHitByPitch(code) ||
    MISPLAY_REACH_CODES.includes(normalizeResultCode(code))
  );
}
