// ============================================================================
// BOSS STATE - Immutable snapshot of the final-level boss
// ============================================================================

import type { Board } from '../map/board';
import { getTileAt } from '../map/board';
import type { Coord } from '../map/grid';
import { assertInBounds } from '../map/grid';
import type { TileType } from '../map/tile';
import { PreconditionError } from '../errors';

export interface BossState {
  readonly coord: Coord;
  /** Tile under the boss when the snapshot was taken */
  readonly tile: TileType;
  readonly health: number;
}

export function makeBossState(x: number, y: number, tile: TileType, health: number): BossState {
  const coord = { x, y };
  assertInBounds(coord);
  if (!Number.isInteger(health) || health < 0) {
    throw new PreconditionError(`Boss health must be a non-negative integer, got ${health}`);
  }
  return { coord, tile, health };
}

export function decreaseHealth(boss: BossState, amount: number): BossState {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new PreconditionError(`Damage must be a non-negative integer, got ${amount}`);
  }
  return { ...boss, health: Math.max(0, boss.health - amount) };
}

export function isDefeated(boss: BossState): boolean {
  return boss.health === 0;
}

/**
 * One greedy step toward the player.
 *
 * The axis with the larger gap wins; on an exact tie the x axis is used.
 * A wall in the way cancels the step, the other axis is not tried.
 */
export function moveBoss(playerCoord: Coord, boss: BossState, board: Board): BossState {
  const dx = playerCoord.x - boss.coord.x;
  const dy = playerCoord.y - boss.coord.y;
  if (dx === 0 && dy === 0) {
    return boss;
  }

  const target =
    Math.abs(dx) >= Math.abs(dy)
      ? { x: boss.coord.x + Math.sign(dx), y: boss.coord.y }
      : { x: boss.coord.x, y: boss.coord.y + Math.sign(dy) };

  const tile = getTileAt(board, target);
  if (tile.type.kind === 'WALL') {
    return boss;
  }
  return { ...boss, coord: target, tile: tile.type };
}
