// ============================================================================
// PLAYER STATE - Immutable snapshot plus the one-step transition
// ============================================================================

import { moveOrientation, parseMove } from '../actions/types';
import type { Board } from '../map/board';
import { getTileAt } from '../map/board';
import type { Coord } from '../map/grid';
import { assertInBounds, isInBounds, manhattan, stepCoord } from '../map/grid';
import type { Tile, TileType } from '../map/tile';
import { EMPTY } from '../map/tile';
import type { LevelId, Levels } from '../levels/levels';
import {
  entrancePipe,
  exitPipe,
  finalLevelId,
  getBoard,
  nextLevel,
  prevLevel,
  startCoord,
} from '../levels/levels';
import { PreconditionError } from '../errors';
import type { BossState } from './bossState';
import { moveBoss } from './bossState';

export interface PlayerState {
  readonly levelId: LevelId;
  readonly coord: Coord;
  /** Tile under the player, with consumed coins shown as empty */
  readonly tile: TileType;
  readonly coins: number;
  /** Every processed input, accepted or not */
  readonly steps: number;
  /** Coin cells already picked up, keyed by `coinKey` */
  readonly collected: ReadonlySet<string>;
}

/** Resolves what happens when the player and the boss end a turn next to each other. */
export type EncounterRule = (
  player: PlayerState,
  boss: BossState
) => readonly [PlayerState, BossState];

/** Default rule: being close has no consequence. */
export const noEncounterEffect: EncounterRule = (player, boss) => [player, boss];

export function coinKey(levelId: LevelId, coord: Coord): string {
  return `${levelId}:${coord.x},${coord.y}`;
}

function assertCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new PreconditionError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export function makePlayerState(
  x: number,
  y: number,
  tile: TileType,
  levelId: LevelId,
  coins: number,
  steps: number,
  collected: ReadonlySet<string> = new Set()
): PlayerState {
  const coord = { x, y };
  assertInBounds(coord);
  assertCount('Coin count', coins);
  assertCount('Step count', steps);
  return { levelId, coord, tile, coins, steps, collected };
}

function placeAtDoor(levelId: LevelId, door: Tile, board: Board, steps: number): PlayerState {
  const start = startCoord(door);
  return makePlayerState(start.x, start.y, getTileAt(board, start).type, levelId, 0, steps);
}

/** Level 0, standing in front of its entrance */
export function initState(levels: Levels, board: Board): PlayerState {
  return placeAtDoor(0, entrancePipe(levels, 0), board, 0);
}

/** The final level's starting cell, for jumping straight to the boss fight */
export function finalState(levels: Levels, board: Board, steps: number): PlayerState {
  const id = finalLevelId(levels);
  return placeAtDoor(id, entrancePipe(levels, id), board, steps);
}

// ============================================================================
// TRANSITION
// ============================================================================

/** Put the player on `coord` of `levelId`, picking up a coin if one is still there. */
function land(state: PlayerState, levelId: LevelId, coord: Coord, tile: TileType): PlayerState {
  if (tile.kind !== 'COIN') {
    return { ...state, levelId, coord, tile };
  }

  const key = coinKey(levelId, coord);
  if (state.collected.has(key)) {
    return { ...state, levelId, coord, tile: EMPTY };
  }
  const collected = new Set(state.collected);
  collected.add(key);
  return { ...state, levelId, coord, tile: EMPTY, coins: state.coins + 1, collected };
}

function arrive(state: PlayerState, levels: Levels, levelId: LevelId, door: Tile): PlayerState {
  const start = startCoord(door);
  return land(state, levelId, start, getTileAt(getBoard(levels, levelId), start).type);
}

/**
 * Apply one input. `board` is the board of `state.levelId`.
 *
 * The step count always goes up by one, also when the move is rejected or the
 * input is not a move. Walking into an exit or entrance changes level and may
 * throw `UnknownLevelError` when there is no level on the other side.
 */
export function update(input: string, state: PlayerState, levels: Levels, board: Board): PlayerState {
  const counted: PlayerState = { ...state, steps: state.steps + 1 };
  const move = parseMove(input);
  if (!move) {
    return counted;
  }

  const dest = stepCoord(state.coord, moveOrientation(move));
  if (!isInBounds(dest)) {
    return counted;
  }

  const tile = getTileAt(board, dest);
  switch (tile.type.kind) {
    case 'WALL':
      return counted;
    case 'EMPTY':
    case 'ITEM':
    case 'COIN':
      return land(counted, state.levelId, dest, tile.type);
    case 'PIPE': {
      const { end } = tile.type.pipe;
      return land(counted, state.levelId, end, getTileAt(board, end).type);
    }
    case 'EXIT': {
      const to = nextLevel(levels, state.levelId);
      return arrive(counted, levels, to, entrancePipe(levels, to));
    }
    case 'ENTRANCE': {
      const to = prevLevel(levels, state.levelId);
      return arrive(counted, levels, to, exitPipe(levels, to));
    }
  }
}

/**
 * `update`, then one boss step toward the player's new cell. When they end up
 * within one cell of each other, `encounter` decides the outcome.
 *
 * A player who leaves the final level through its entrance leaves the boss where it is.
 */
export function finalLevelUpdate(
  input: string,
  state: PlayerState,
  levels: Levels,
  board: Board,
  boss: BossState,
  encounter: EncounterRule = noEncounterEffect
): readonly [PlayerState, BossState] {
  const player = update(input, state, levels, board);
  if (player.levelId !== state.levelId) {
    return [player, boss];
  }

  const chased = moveBoss(player.coord, boss, board);
  if (manhattan(player.coord, chased.coord) <= 1) {
    return encounter(player, chased);
  }
  return [player, chased];
}
