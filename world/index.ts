// ============================================================================
// WORLD MODULE - Deterministic core of the pipe-crawler simulation
// ============================================================================

// Core engine
export { Game } from './engine/game';
export type { GameSnapshot, GameOptions } from './engine/game';

// Grid & tiles
export {
  DIMX,
  DIMY,
  ORIENTATIONS,
  makeCoord,
  isInBounds,
  indexOfCoord,
  coordOfIndex,
  stepCoord,
  sameCoord,
  manhattan,
  formatCoord,
} from './map/grid';
export type { Coord, Orientation } from './map/grid';
export {
  COLORS,
  WALL,
  EMPTY,
  COIN,
  ITEM,
  entrance,
  exit,
  makeTile,
  getTileOrientation,
  getPipeEnd,
  tileToString,
} from './map/tile';
export type { Color, Pipe, Tile, TileType, TileKind } from './map/tile';
export { pipeEnd, makePipeTile } from './map/pipes';
export {
  makeBoard,
  makeRoom,
  roomOfCoords,
  addTiles,
  placeRandomItems,
  getTile,
  getTileAt,
  setTile,
  getSize,
  countTiles,
  boardToString,
} from './map/board';
export type { Board, Room } from './map/board';

// Levels
export {
  fromDefinition,
  levelCount,
  getLevel,
  getBoard,
  nextLevel,
  prevLevel,
  entrancePipe,
  exitPipe,
  coinCount,
  isFinalLevel,
  finalLevelId,
  startCoord,
  checkLevels,
} from './levels/levels';
export type { Level, LevelId, Levels, LevelIssue, FromDefinitionOptions } from './levels/levels';
export { parseLevelsDefinition, LevelsDefinitionSchema } from './levels/definition';
export type { LevelsDefinition, LevelsDefinitionInput, LevelDefinition, BossSpawn } from './levels/definition';
export { loadLevelsFile } from './levels/load';

// State
export {
  makePlayerState,
  initState,
  finalState,
  update,
  finalLevelUpdate,
  noEncounterEffect,
  coinKey,
} from './state/playerState';
export type { PlayerState, EncounterRule } from './state/playerState';
export { makeBossState, decreaseHealth, moveBoss, isDefeated } from './state/bossState';
export type { BossState } from './state/bossState';

// Moves, events & results
export { parseMove, moveOrientation, ok, err } from './actions/types';
export type {
  Move,
  GameEvent,
  PlayerMovedEvent,
  MoveBlockedEvent,
  CoinCollectedEvent,
  PipeTraveledEvent,
  LevelChangedEvent,
  BossSpawnedEvent,
  BossMovedEvent,
  BossDamagedEvent,
  BossDefeatedEvent,
  Result,
  ResultOk,
  ResultErr,
} from './actions/types';

// Errors
export { GameError, PreconditionError, UnknownLevelError, LevelDefinitionError, getErrorMessage } from './errors';

// Utilities
export { SeededRandom } from './utils/random';
