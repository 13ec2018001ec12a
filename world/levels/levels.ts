// ============================================================================
// LEVELS - Ordered collection of boards linked by entrances and exits
// ============================================================================

import type { Board } from '../map/board';
import { addTiles, countTiles, getTileAt, makeBoard, placeRandomItems } from '../map/board';
import type { Coord } from '../map/grid';
import { formatCoord, isInBounds, stepCoord } from '../map/grid';
import { makePipeTile } from '../map/pipes';
import type { Tile } from '../map/tile';
import { COIN, entrance, exit, getPipeEnd, getTileOrientation, makeTile } from '../map/tile';
import { LevelDefinitionError, UnknownLevelError } from '../errors';
import { SeededRandom } from '../utils/random';
import type { BossSpawn, LevelDefinition, LevelsDefinitionInput } from './definition';
import { parseLevelsDefinition } from './definition';

export type LevelId = number;

export interface Level {
  readonly id: LevelId;
  readonly board: Board;
  readonly entrance: Tile;
  readonly exit: Tile;
  /** Coins on the board when it was built. Never decremented. */
  readonly coinCount: number;
  readonly isFinal: boolean;
}

export interface Levels {
  /** Indexed by level id */
  readonly levels: readonly Level[];
  readonly boss?: BossSpawn;
}

export interface LevelIssue {
  readonly levelId: LevelId;
  readonly message: string;
}

export interface FromDefinitionOptions {
  /** Generator for item placement. Defaults to one seeded from the definition. */
  readonly rng?: SeededRandom;
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

// The cell in front of a door must lie on the grid.
function assertDoorFacesGrid(levelId: LevelId, door: Tile, label: string): void {
  const start = startCoord(door);
  if (!isInBounds(start)) {
    throw new LevelDefinitionError(
      `Level ${levelId}: ${label} at ${formatCoord(door.coord)} faces off the grid to ${formatCoord(start)}`
    );
  }
}

function assertNotOnDoor(levelId: LevelId, doors: readonly Tile[], coord: Coord, what: string): void {
  const door = doors.find((tile) => tile.coord.x === coord.x && tile.coord.y === coord.y);
  if (door) {
    throw new LevelDefinitionError(
      `Level ${levelId}: ${what} at ${formatCoord(coord)} would cover the ${door.type.kind.toLowerCase()}`
    );
  }
}

function buildLevel(definition: LevelDefinition, isFinal: boolean, rng: SeededRandom): Level {
  const { entrance: entranceDoor, exit: exitDoor } = definition;
  const entranceTile = makeTile(entrance(entranceDoor.orientation), { x: entranceDoor.x, y: entranceDoor.y });
  const exitTile = makeTile(exit(exitDoor.orientation), { x: exitDoor.x, y: exitDoor.y });
  assertDoorFacesGrid(definition.id, entranceTile, 'Entrance');
  assertDoorFacesGrid(definition.id, exitTile, 'Exit');
  const doors = [entranceTile, exitTile];
  const board = makeBoard(entranceTile, exitTile, definition.rooms);

  const pipes = definition.pipes.map((pipe) => {
    assertNotOnDoor(definition.id, doors, pipe, `${pipe.color} pipe`);
    const tile = makePipeTile({ x: pipe.x, y: pipe.y }, pipe.color, pipe.orientation);
    const end = getPipeEnd(tile);
    if (!isInBounds(end)) {
      throw new LevelDefinitionError(
        `Level ${definition.id}: ${pipe.color} ${pipe.orientation} pipe at ${formatCoord(tile.coord)} leads off the grid to ${formatCoord(end)}`
      );
    }
    return tile;
  });
  addTiles(board, pipes);
  addTiles(
    board,
    definition.coins.map((coin) => {
      assertNotOnDoor(definition.id, doors, coin, 'Coin');
      return makeTile(COIN, { x: coin.x, y: coin.y });
    })
  );
  placeRandomItems(board, definition.items, rng);

  return {
    id: definition.id,
    board,
    entrance: entranceTile,
    exit: exitTile,
    coinCount: countTiles(board, 'COIN'),
    isFinal,
  };
}

/** Build every level's board. The last id is the final level. */
export function fromDefinition(raw: LevelsDefinitionInput, options: FromDefinitionOptions = {}): Levels {
  const definition = parseLevelsDefinition(raw);
  const rng = options.rng ?? new SeededRandom(definition.seed ?? 0);

  definition.levels.forEach((level, position) => {
    if (level.id !== position) {
      throw new LevelDefinitionError(
        `Level at position ${position} has id ${level.id}; ids must run from 0 in order`
      );
    }
  });

  const lastId = definition.levels.length - 1;
  const levels = definition.levels.map((level) => buildLevel(level, level.id === lastId, rng));

  const { boss } = definition;
  if (boss) {
    const spawn = getTileAt(levels[lastId].board, boss);
    if (spawn.type.kind === 'WALL') {
      throw new LevelDefinitionError(`Boss spawn ${formatCoord(boss)} is inside a wall on level ${lastId}`);
    }
  }

  return { levels, boss };
}

// ============================================================================
// QUERIES
// ============================================================================

export function levelCount(levels: Levels): number {
  return levels.levels.length;
}

export function getLevel(levels: Levels, id: LevelId): Level {
  if (!Number.isInteger(id) || id < 0 || id >= levels.levels.length) {
    throw new UnknownLevelError(id);
  }
  return levels.levels[id];
}

export function getBoard(levels: Levels, id: LevelId): Board {
  return getLevel(levels, id).board;
}

/** Throws `UnknownLevelError` carrying `id + 1` when there is no such level. */
export function nextLevel(levels: Levels, id: LevelId): LevelId {
  return getLevel(levels, id + 1).id;
}

export function prevLevel(levels: Levels, id: LevelId): LevelId {
  return getLevel(levels, id - 1).id;
}

export function entrancePipe(levels: Levels, id: LevelId): Tile {
  return getLevel(levels, id).entrance;
}

export function exitPipe(levels: Levels, id: LevelId): Tile {
  return getLevel(levels, id).exit;
}

export function coinCount(levels: Levels, id: LevelId): number {
  return getLevel(levels, id).coinCount;
}

export function isFinalLevel(levels: Levels, id: LevelId): boolean {
  return getLevel(levels, id).isFinal;
}

export function finalLevelId(levels: Levels): LevelId {
  return levels.levels.length - 1;
}

/** The cell a player steps onto when arriving through an entrance or exit */
export function startCoord(door: Tile): Coord {
  return stepCoord(door.coord, getTileOrientation(door));
}

// ============================================================================
// VALIDITY
// ============================================================================

// Start cells are on the grid, construction rejects the rest.
function checkDoor(level: Level, door: Tile, label: string): LevelIssue[] {
  if (getTileAt(level.board, startCoord(door)).type.kind === 'WALL') {
    return [{ levelId: level.id, message: `${label} at ${formatCoord(door.coord)} faces a wall` }];
  }
  return [];
}

/** Problems that do not stop a level from loading but make parts of it unplayable. */
export function checkLevels(levels: Levels): LevelIssue[] {
  const issues: LevelIssue[] = [];
  for (const level of levels.levels) {
    issues.push(...checkDoor(level, level.entrance, 'Entrance'));
    issues.push(...checkDoor(level, level.exit, 'Exit'));
    for (const tile of level.board.tiles) {
      if (tile.type.kind !== 'PIPE') continue;
      if (getTileAt(level.board, tile.type.pipe.end).type.kind === 'WALL') {
        issues.push({
          levelId: level.id,
          message: `Pipe at ${formatCoord(tile.coord)} leads into a wall at ${formatCoord(tile.type.pipe.end)}`,
        });
      }
    }
  }
  return issues;
}
