// ============================================================================
// TILES - One grid cell and its variant
// ============================================================================

import type { Coord, Orientation } from './grid';
import { formatCoord } from './grid';
import { PreconditionError } from '../errors';

export type Color = 'GREEN' | 'RED' | 'GOLD' | 'BLUE' | 'BLACK';

export const COLORS: readonly Color[] = ['GREEN', 'RED', 'GOLD', 'BLUE', 'BLACK'];

export interface Pipe {
  readonly color: Color;
  readonly orientation: Orientation;
  /** The cell in front of the pipe's far end */
  readonly end: Coord;
}

export interface WallTile {
  readonly kind: 'WALL';
}

export interface PipeTile {
  readonly kind: 'PIPE';
  readonly pipe: Pipe;
}

export interface EntranceTile {
  readonly kind: 'ENTRANCE';
  readonly orientation: Orientation;
}

export interface ExitTile {
  readonly kind: 'EXIT';
  readonly orientation: Orientation;
}

export interface EmptyTile {
  readonly kind: 'EMPTY';
}

export interface CoinTile {
  readonly kind: 'COIN';
}

export interface ItemTile {
  readonly kind: 'ITEM';
}

/** Discriminated union of all tile variants */
export type TileType =
  | WallTile
  | PipeTile
  | EntranceTile
  | ExitTile
  | EmptyTile
  | CoinTile
  | ItemTile;

export type TileKind = TileType['kind'];

export interface Tile {
  readonly coord: Coord;
  readonly type: TileType;
}

export const WALL: WallTile = { kind: 'WALL' };
export const EMPTY: EmptyTile = { kind: 'EMPTY' };
export const COIN: CoinTile = { kind: 'COIN' };
export const ITEM: ItemTile = { kind: 'ITEM' };

export function entrance(orientation: Orientation): EntranceTile {
  return { kind: 'ENTRANCE', orientation };
}

export function exit(orientation: Orientation): ExitTile {
  return { kind: 'EXIT', orientation };
}

export function makeTile(type: TileType, coord: Coord): Tile {
  return { coord, type };
}

/** Facing of a pipe, entrance or exit. Any other tile is a precondition violation. */
export function getTileOrientation(tile: Tile): Orientation {
  switch (tile.type.kind) {
    case 'ENTRANCE':
    case 'EXIT':
      return tile.type.orientation;
    case 'PIPE':
      return tile.type.pipe.orientation;
    default:
      throw new PreconditionError(`${tile.type.kind} tile at ${formatCoord(tile.coord)} has no orientation`);
  }
}

export function getPipeEnd(tile: Tile): Coord {
  if (tile.type.kind !== 'PIPE') {
    throw new PreconditionError(`${tile.type.kind} tile at ${formatCoord(tile.coord)} is not a pipe`);
  }
  return tile.type.pipe.end;
}

const PIPE_GLYPHS: Record<Orientation, string> = {
  RIGHT: '>',
  LEFT: '<',
  UP: '^',
  DOWN: 'v',
};

export function tileToString(type: TileType): string {
  switch (type.kind) {
    case 'WALL':
      return 'W';
    case 'PIPE':
      return PIPE_GLYPHS[type.pipe.orientation];
    case 'ENTRANCE':
      return 'I';
    case 'EXIT':
      return 'O';
    case 'EMPTY':
      return ' ';
    case 'COIN':
      return 'c';
    case 'ITEM':
      return '*';
  }
}
