// ============================================================================
// BOARD - Dense 16x16 tile array for one level
// ============================================================================

import type { Coord } from './grid';
import { DIMX, DIMY, coordOfIndex, formatCoord, indexOfCoord } from './grid';
import type { Tile } from './tile';
import { EMPTY, ITEM, WALL, makeTile, tileToString } from './tile';
import { LevelDefinitionError, PreconditionError } from '../errors';
import type { SeededRandom } from '../utils/random';

export interface Board {
  readonly dimx: number;
  readonly dimy: number;
  /** Row-major, index = x + dimx * y. Written only while a level is built. */
  readonly tiles: Tile[];
}

export interface Room {
  readonly bottomLeft: Coord;
  readonly topRight: Coord;
}

export function roomOfCoords(bottomLeft: Coord, topRight: Coord): Room {
  return { bottomLeft, topRight };
}

function wallBoard(): Board {
  const tiles: Tile[] = [];
  for (let i = 0; i < DIMX * DIMY; i++) {
    tiles.push(makeTile(WALL, coordOfIndex(i)));
  }
  return { dimx: DIMX, dimy: DIMY, tiles };
}

export function getTile(board: Board, index: number): Tile {
  if (!Number.isInteger(index) || index < 0 || index >= board.tiles.length) {
    throw new PreconditionError(`Index ${index} is outside the board`);
  }
  return board.tiles[index];
}

export function getTileAt(board: Board, coord: Coord): Tile {
  return board.tiles[indexOfCoord(coord)];
}

/** Overwrite the cell at the tile's own coordinate */
export function setTile(board: Board, tile: Tile): void {
  board.tiles[indexOfCoord(tile.coord)] = tile;
}

export function getSize(board: Board): number {
  return board.tiles.length;
}

/** Carve an inclusive rectangle to empty floor */
export function makeRoom(board: Board, room: Room): Board {
  const { bottomLeft, topRight } = room;
  for (let x = bottomLeft.x; x <= topRight.x; x++) {
    for (let y = bottomLeft.y; y <= topRight.y; y++) {
      setTile(board, makeTile(EMPTY, { x, y }));
    }
  }
  return board;
}

/** All wall, rooms carved out, then the entrance and exit written on top. */
export function makeBoard(entrance: Tile, exit: Tile, rooms: readonly Room[]): Board {
  const board = wallBoard();
  for (const room of rooms) {
    makeRoom(board, room);
  }
  setTile(board, entrance);
  setTile(board, exit);
  return board;
}

/** Place pipe and coin tiles. Other variants are rejected. */
export function addTiles(board: Board, tiles: readonly Tile[]): Board {
  for (const tile of tiles) {
    if (tile.type.kind !== 'PIPE' && tile.type.kind !== 'COIN') {
      throw new PreconditionError(
        `Only pipes and coins can be added, got ${tile.type.kind} at ${formatCoord(tile.coord)}`
      );
    }
    setTile(board, tile);
  }
  return board;
}

/** Turn `count` distinct empty cells into items, chosen by `rng`. */
export function placeRandomItems(board: Board, count: number, rng: SeededRandom): Board {
  for (let placed = 0; placed < count; placed++) {
    const empties = board.tiles.filter((tile) => tile.type.kind === 'EMPTY');
    const target = rng.pick(empties);
    if (!target) {
      throw new LevelDefinitionError(`No empty tile left for item ${placed + 1} of ${count}`);
    }
    setTile(board, makeTile(ITEM, target.coord));
  }
  return board;
}

export function countTiles(board: Board, kind: Tile['type']['kind']): number {
  return board.tiles.filter((tile) => tile.type.kind === kind).length;
}

/** Top row first, one `|c` cell per tile */
export function boardToString(board: Board): string {
  let out = '\n';
  for (let row = 0; row < board.dimy; row++) {
    for (let x = 0; x < board.dimx; x++) {
      out += '|' + tileToString(getTileAt(board, { x, y: board.dimy - 1 - row }).type);
    }
    out += '|\n';
  }
  return out;
}
