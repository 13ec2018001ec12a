import type { Color } from '../map/tile';
import type { Coord, Orientation } from '../map/grid';

// ============================================================================
// MOVES - The only input the simulation accepts
// ============================================================================

export type Move = 'up' | 'left' | 'down' | 'right';

/** Accepts move names and the w/a/s/d keys. Anything else is not a move. */
export function parseMove(input: string): Move | undefined {
  switch (input.trim().toLowerCase()) {
    case 'up':
    case 'w':
      return 'up';
    case 'left':
    case 'a':
      return 'left';
    case 'down':
    case 's':
      return 'down';
    case 'right':
    case 'd':
      return 'right';
    default:
      return undefined;
  }
}

export function moveOrientation(move: Move): Orientation {
  switch (move) {
    case 'up':
      return 'UP';
    case 'left':
      return 'LEFT';
    case 'down':
      return 'DOWN';
    case 'right':
      return 'RIGHT';
  }
}

// ============================================================================
// GAME EVENTS - Outputs returned by the engine (never mutate external systems)
// ============================================================================

export interface PlayerMovedEvent {
  readonly type: 'PLAYER_MOVED';
  readonly levelId: number;
  readonly x: number;
  readonly y: number;
}

/** Wall, off-grid or unrecognised input. The step still counts. */
export interface MoveBlockedEvent {
  readonly type: 'MOVE_BLOCKED';
  readonly input: string;
  readonly steps: number;
}

export interface CoinCollectedEvent {
  readonly type: 'COIN_COLLECTED';
  readonly levelId: number;
  readonly coins: number;
}

export interface PipeTraveledEvent {
  readonly type: 'PIPE_TRAVELED';
  readonly levelId: number;
  readonly color: Color;
  readonly from: Coord;
  readonly to: Coord;
}

export interface LevelChangedEvent {
  readonly type: 'LEVEL_CHANGED';
  readonly from: number;
  readonly to: number;
}

export interface BossSpawnedEvent {
  readonly type: 'BOSS_SPAWNED';
  readonly x: number;
  readonly y: number;
  readonly health: number;
}

export interface BossMovedEvent {
  readonly type: 'BOSS_MOVED';
  readonly x: number;
  readonly y: number;
}

export interface BossDamagedEvent {
  readonly type: 'BOSS_DAMAGED';
  readonly health: number;
}

export interface BossDefeatedEvent {
  readonly type: 'BOSS_DEFEATED';
}

/** Discriminated union of all game events */
export type GameEvent =
  | PlayerMovedEvent
  | MoveBlockedEvent
  | CoinCollectedEvent
  | PipeTraveledEvent
  | LevelChangedEvent
  | BossSpawnedEvent
  | BossMovedEvent
  | BossDamagedEvent
  | BossDefeatedEvent;

// ============================================================================
// RESULT TYPE - The engine never throws, returns Result instead
// ============================================================================

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: string, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
